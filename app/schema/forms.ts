// purpose: field schemas for the editor's "add" forms
// status: experimental

import * as z from 'zod'
import { CIRCUIT_TYPES, REPORTER_GENES, SAMPLE_TYPES, TITER_METHODS } from '../types'

const text = z.string()
const nonNegative = z.number({ invalid_type_error: 'Enter a number' }).min(0)
const modeField = z.enum(['PACE', 'PANCE'])

export const circuitFormSchema = z.object({
  id: text,
  type: z.enum(CIRCUIT_TYPES),
  ap_details: text,
  cp_details: text,
  reporter_gene: z.enum(REPORTER_GENES),
  negative_selection: text,
  stepping_stones: text,
  version: text,
})
export type CircuitFormValues = z.infer<typeof circuitFormSchema>

export const armFormSchema = z.object({
  arm_id: text,
  label: text,
  description: text,
})
export type ArmFormValues = z.infer<typeof armFormSchema>

export const timepointFormSchema = z.object({
  t: nonNegative.int(),
  timestamp: text,
})
export type TimepointFormValues = z.infer<typeof timepointFormSchema>

export const lagoonFormSchema = z.object({
  lagoon_id: text,
  condition_label: text,
  mutagenesis_on: z.boolean(),
  mode: modeField,
  volume_ml: nonNegative,
  dilution_rate_vol_per_hr: nonNegative,
  passage_fraction: nonNegative.max(1),
  temp_c: z.number({ invalid_type_error: 'Enter a number' }),
  media: text,
  inducers: text,
  antibiotics: text,
  titer_value: nonNegative,
  titer_method: z.enum(TITER_METHODS),
})
export type LagoonFormValues = z.infer<typeof lagoonFormSchema>

export const sampleFormSchema = z.object({
  sample_id: text,
  sample_type: z.enum(SAMPLE_TYPES),
})
export type SampleFormValues = z.infer<typeof sampleFormSchema>

export const libraryFormSchema = z.object({
  library_id: text,
  protocol: text,
  amplicon_targets: text,
})
export type LibraryFormValues = z.infer<typeof libraryFormSchema>

export const runFormSchema = z.object({
  run_id: text,
  platform: text,
})
export type RunFormValues = z.infer<typeof runFormSchema>

export const segmentFormSchema = z.object({
  segment_id: text,
  mode: modeField,
  applied_to_arms: z.array(text),
  start_time: text,
  end_time: text,
  selection_circuit_id: text,
  stepping_stones: text,
})
export type SegmentFormValues = z.infer<typeof segmentFormSchema>

export const analysisFormSchema = z.object({
  analysis_id: text,
  pipeline_id: text,
  code_hash: text,
  env: text,
  ref_seq_id: text,
  inputs: text,
  notes: text,
})
export type AnalysisFormValues = z.infer<typeof analysisFormSchema>

export const ontologyFormSchema = z.object({
  key: text,
  values: text,
})
export type OntologyFormValues = z.infer<typeof ontologyFormSchema>
