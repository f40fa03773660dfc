// purpose: seed documents for a fresh editor session and the schematic demo
// status: experimental

import { SCHEMA_VERSION } from '../config/campaign'
import type { Arm, CampaignDocument, Segment, SelectionCircuit } from '../types'

const MS_PER_HOUR = 3_600_000

export const createEmptyCampaign = (now: Date): CampaignDocument => ({
  schema_version: SCHEMA_VERSION,
  campaign: {
    campaign_id: '',
    title: '',
    created_at: now.toISOString(),
    created_by: '',
    starting_protein: {
      name: '',
      dna_seq: '',
      aa_seq: '',
      features: [],
      vector_context: '',
    },
    host_system: {
      strain: '',
      genotype: '',
      F_prime_status: '',
      plasmids: { AP: '', CP: '', MP: '', DP: '' },
      resistances: [],
    },
    arms: {},
    segments: [],
    selection_circuits: {},
    analyses: [],
    attachments: [],
    ontologies: {},
    notes: '',
  },
})

const pathwayArm = (armId: string, label: string, description: string): Arm => ({
  arm_id: armId,
  label,
  description,
  status: 'active',
  timepoints: [],
})

const pathwayCircuit = (id: string, promoter: string, stones: string[]): SelectionCircuit => ({
  id,
  type: 'RNAP_promoter',
  ap_details: `pBAD variant; pIII under ${promoter} promoter`,
  cp_details: 'T7 RNAP expressed via arabinose',
  reporter_gene: 'gIII',
  negative_selection: 'gIII-neg',
  stepping_stones: stones,
  version: '1.0',
})

const pathwaySegments = (
  now: Date,
  armId: string,
  circuitId: string,
  suffix: string,
  phases: Array<{ stage: string; stones: string[] }>,
): Segment[] => {
  const at = (hours: number) => new Date(now.getTime() + hours * MS_PER_HOUR).toISOString()
  return phases.map((phase, index): Segment => ({
    segment_id: `seg-0${index + 1}-${suffix}-${phase.stage}`,
    mode: 'PACE',
    applied_to_arms: [armId],
    start_time: at(index * 48),
    end_time: at((index + 1) * 48),
    selection_design: {
      selection_circuit_id: circuitId,
      stepping_stones: phase.stones,
    },
  }))
}

/** Two-pathway demo campaign: T3 and SP6 arms, three 48 h PACE phases each, starting at `now`. */
export const createSampleCampaign = (now: Date): CampaignDocument => {
  const empty = createEmptyCampaign(now)
  return {
    schema_version: SCHEMA_VERSION,
    campaign: {
      ...empty.campaign,
      campaign_id: 'sample-campaign',
      title: 'Sample PACE Campaign - T3 and SP6 Pathways',
      created_by: 'demo-user',
      starting_protein: {
        name: 'Sample_Protein_v0',
        dna_seq: 'ATG...TAA',
        aa_seq: 'M...*',
        features: [],
        vector_context: 'pBAD-MCS',
      },
      host_system: {
        strain: 'S2060',
        genotype: 'ΔendA ΔrecA F+',
        F_prime_status: "F' lacIq",
        plasmids: { AP: 'ap-pt7-v3', CP: 'cp-T7RNAP', MP: 'MP6', DP: 'DP6' },
        resistances: ['ampicillin', 'chloramphenicol'],
      },
      arms: {
        'arm-t3': pathwayArm('arm-t3', 'T3 Pathway', 'T3 promoter evolution pathway'),
        'arm-sp6': pathwayArm('arm-sp6', 'SP6 Pathway', 'SP6 promoter evolution pathway'),
      },
      selection_circuits: {
        'sel-t3-pathway': pathwayCircuit('sel-t3-pathway', 'T7/T3', ['T7/T3', 'T3', 'T3/final', 'final']),
        'sel-sp6-pathway': pathwayCircuit('sel-sp6-pathway', 'T7/SP6', ['T7/SP6', 'SP6', 'SP6/final', 'final']),
      },
      segments: [
        ...pathwaySegments(now, 'arm-t3', 'sel-t3-pathway', 't3', [
          { stage: 'init', stones: ['T7/T3'] },
          { stage: 'evolve', stones: ['T3'] },
          { stage: 'final', stones: ['T3/final', 'final'] },
        ]),
        ...pathwaySegments(now, 'arm-sp6', 'sel-sp6-pathway', 'sp6', [
          { stage: 'init', stones: ['T7/SP6'] },
          { stage: 'evolve', stones: ['SP6'] },
          { stage: 'final', stones: ['SP6/final', 'final'] },
        ]),
      ],
      notes: 'Sample campaign demonstrating T3 and SP6 pathway visualization',
    },
  }
}
