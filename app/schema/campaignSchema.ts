// purpose: zod mirror of the campaign document for import and on-demand validation
// status: experimental
// notes: objects pass unknown keys through so imported documents export unchanged.
//   Fields the editor can start empty default to '', [] or {}; measured values,
//   staged file records and the document envelope stay required.

import * as z from 'zod'
import type { Campaign, CampaignDocument } from '../types'

const record = <T extends z.ZodRawShape>(shape: T) => z.object(shape).passthrough()

const text = z.string().default('')
const stringList = z.array(z.string()).default([])

const stagedFileSchema = record({
  uri: z.string(),
  sha256: z.string(),
  size_bytes: z.number().int().nonnegative(),
})

const sequencingRunSchema = record({
  run_id: z.string(),
  platform: text,
  fastq: z.array(stagedFileSchema.extend({ read: z.enum(['R1', 'R2']) })).default([]),
})

const libraryPrepSchema = record({
  library_id: z.string(),
  protocol: text,
  amplicon_targets: text,
  sequencing_runs: z.array(sequencingRunSchema).default([]),
})

const sampleSchema = record({
  sample_id: z.string(),
  sample_type: text,
  library_preps: z.array(libraryPrepSchema).default([]),
})

const modeSchema = z.enum(['PACE', 'PANCE'])

const lagoonSchema = record({
  lagoon_id: z.string(),
  condition_label: text,
  mutagenesis_on: z.boolean().default(false),
  conditions: record({
    mode: modeSchema.default('PACE'),
    volume_ml: z.number(),
    temp_c: z.number(),
    media: text,
    antibiotics: z.array(record({ name: z.string(), concentration_ug_per_ml: z.number() })).default([]),
    inducers: z.array(record({ name: z.string(), concentration_mM: z.number() })).default([]),
    dilution_rate_vol_per_hr: z.number().optional(),
    passage_fraction: z.number().min(0).max(1).optional(),
  }),
  measurements: record({
    phage_titer_pfu_per_ml: record({ value: z.number(), method: text }),
  }),
  samples: z.array(sampleSchema).default([]),
})

const timepointSchema = record({
  t: z.number().int().nonnegative(),
  timestamp: text,
  global_events: stringList,
  lagoons: z.record(z.string(), lagoonSchema).default({}),
})

const armSchema = record({
  arm_id: z.string(),
  label: text,
  description: text,
  status: z.string().default('active'),
  timepoints: z.array(timepointSchema).default([]),
})

const selectionCircuitSchema = record({
  id: z.string(),
  type: text,
  ap_details: text,
  cp_details: text,
  reporter_gene: text,
  negative_selection: text,
  stepping_stones: stringList,
  version: text,
})

const segmentSchema = record({
  segment_id: z.string(),
  mode: modeSchema.default('PACE'),
  applied_to_arms: stringList,
  start_time: text,
  end_time: z.string().optional(),
  selection_design: record({
    selection_circuit_id: text,
    stepping_stones: stringList,
  }).default({}),
})

const analysisSchema = record({
  analysis_id: z.string(),
  pipeline_id: text,
  code_hash: text,
  env: text,
  ref_seq_id: text,
  params: z.record(z.string(), z.string()).default({}),
  inputs: stringList,
  outputs: record({
    alignments: z.array(stagedFileSchema).default([]),
    variant_tables: z.array(stagedFileSchema).default([]),
    consensus_sequences: z.array(stagedFileSchema).default([]),
    selection_scores: z.array(stagedFileSchema).default([]),
  }).default({}),
  provenance: record({ who: text, when: text }).default({}),
  notes: text,
})

export const campaignSchema: z.ZodType<Campaign, z.ZodTypeDef, unknown> = record({
  campaign_id: text,
  title: text,
  created_at: text,
  created_by: text,
  starting_protein: record({
    name: text,
    dna_seq: text,
    aa_seq: text,
    features: stringList,
    vector_context: text,
  }).default({}),
  host_system: record({
    strain: text,
    genotype: text,
    F_prime_status: text,
    plasmids: record({ AP: text, CP: text, MP: text, DP: text }).default({}),
    resistances: stringList,
  }).default({}),
  arms: z.record(z.string(), armSchema).default({}),
  segments: z.array(segmentSchema).default([]),
  selection_circuits: z.record(z.string(), selectionCircuitSchema).default({}),
  analyses: z.array(analysisSchema).default([]),
  attachments: z.array(stagedFileSchema.extend({ description: text })).default([]),
  ontologies: z.record(z.string(), z.array(z.string())).default({}),
  notes: text,
})

export const campaignDocumentSchema: z.ZodType<CampaignDocument, z.ZodTypeDef, unknown> = record({
  schema_version: z.string(),
  campaign: campaignSchema,
})
