export type ExperimentMode = 'PACE' | 'PANCE'

export const EXPERIMENT_MODES: readonly ExperimentMode[] = ['PACE', 'PANCE']

export const CIRCUIT_TYPES = [
  'RNAP_promoter',
  'one_hybrid',
  'two_hybrid',
  'protease_split',
  'base_editing',
  'gVI',
  'other',
] as const

export const REPORTER_GENES = ['gIII', 'gVI', 'other'] as const

export const TITER_METHODS = ['plaque', 'qPCR', 'spectro', 'other'] as const

export const SAMPLE_TYPES = ['phage_supernatant', 'cells', 'DNA', 'RNA'] as const

export type TiterMethod = (typeof TITER_METHODS)[number]
export type SampleType = (typeof SAMPLE_TYPES)[number]

export interface StartingProtein {
  name: string
  dna_seq: string
  aa_seq: string
  features: string[]
  vector_context: string
}

export interface PlasmidSet {
  AP: string
  CP: string
  MP: string
  DP: string
}

export interface HostSystem {
  strain: string
  genotype: string
  F_prime_status: string
  plasmids: PlasmidSet
  resistances: string[]
}

export interface Inducer {
  name: string
  concentration_mM: number
}

export interface Antibiotic {
  name: string
  concentration_ug_per_ml: number
}

export interface LagoonConditions {
  mode: ExperimentMode
  volume_ml: number
  temp_c: number
  media: string
  antibiotics: Antibiotic[]
  inducers: Inducer[]
  dilution_rate_vol_per_hr?: number
  passage_fraction?: number
}

export interface PhageTiter {
  value: number
  method: string
}

export interface StagedFile {
  uri: string
  sha256: string
  size_bytes: number
}

export interface FastqFile extends StagedFile {
  read: 'R1' | 'R2'
}

export interface SequencingRun {
  run_id: string
  platform: string
  fastq: FastqFile[]
}

export interface LibraryPrep {
  library_id: string
  protocol: string
  amplicon_targets: string
  sequencing_runs: SequencingRun[]
}

export interface Sample {
  sample_id: string
  sample_type: string
  library_preps: LibraryPrep[]
}

export interface Lagoon {
  lagoon_id: string
  condition_label: string
  mutagenesis_on: boolean
  conditions: LagoonConditions
  measurements: {
    phage_titer_pfu_per_ml: PhageTiter
  }
  samples: Sample[]
}

export interface Timepoint {
  t: number
  timestamp: string
  global_events: string[]
  lagoons: Record<string, Lagoon>
}

export interface Arm {
  arm_id: string
  label: string
  description: string
  status: string
  timepoints: Timepoint[]
}

export interface SelectionCircuit {
  id: string
  type: string
  ap_details: string
  cp_details: string
  reporter_gene: string
  negative_selection: string
  stepping_stones: string[]
  version: string
}

export interface SelectionDesign {
  selection_circuit_id: string
  stepping_stones: string[]
}

export interface Segment {
  segment_id: string
  mode: ExperimentMode
  applied_to_arms: string[]
  start_time: string
  end_time?: string
  selection_design: SelectionDesign
}

export interface AnalysisOutputs {
  alignments: StagedFile[]
  variant_tables: StagedFile[]
  consensus_sequences: StagedFile[]
  selection_scores: StagedFile[]
}

export interface Analysis {
  analysis_id: string
  pipeline_id: string
  code_hash: string
  env: string
  ref_seq_id: string
  params: Record<string, string>
  inputs: string[]
  outputs: AnalysisOutputs
  provenance: {
    who: string
    when: string
  }
  notes: string
}

export interface Attachment extends StagedFile {
  description: string
}

export interface Campaign {
  campaign_id: string
  title: string
  created_at: string
  created_by: string
  starting_protein: StartingProtein
  host_system: HostSystem
  arms: Record<string, Arm>
  segments: Segment[]
  selection_circuits: Record<string, SelectionCircuit>
  analyses: Analysis[]
  attachments: Attachment[]
  ontologies: Record<string, string[]>
  notes: string
}

export interface CampaignDocument {
  schema_version: string
  campaign: Campaign
}

export interface CampaignSummary {
  arm_count: number
  segment_count: number
  circuit_count: number
  max_duration_hours: number
}

export type ActionResult = { ok: true } | { ok: false; reason: string }
