import { create } from 'zustand'
import { subscribeWithSelector } from 'zustand/middleware'
import { createEmptyCampaign, createSampleCampaign } from '../campaign/factories'
import { CAMPAIGN_PERSISTENCE_ENABLED, CAMPAIGN_STORAGE_KEY } from '../config/campaign'
import { validateCampaignDocument } from '../schema/validate'
import type {
  ActionResult,
  Analysis,
  AnalysisOutputs,
  Antibiotic,
  Arm,
  Attachment,
  Campaign,
  CampaignDocument,
  ExperimentMode,
  FastqFile,
  HostSystem,
  Inducer,
  Lagoon,
  LibraryPrep,
  PlasmidSet,
  Sample,
  SelectionCircuit,
  StartingProtein,
  Timepoint,
} from '../types'
import { hasOwnKey } from '../utils/records'

export type SelectionCircuitInput = SelectionCircuit

export interface ArmInput {
  arm_id: string
  label: string
  description: string
}

export interface TimepointInput {
  t: number
  timestamp: string
}

export interface LagoonInput {
  lagoon_id: string
  condition_label: string
  mutagenesis_on: boolean
  mode: ExperimentMode
  volume_ml: number
  dilution_rate_vol_per_hr: number
  passage_fraction: number
  temp_c: number
  media: string
  inducers: Inducer[]
  antibiotics: Antibiotic[]
  titer_value: number
  titer_method: string
}

export interface SampleInput {
  sample_id: string
  sample_type: string
}

export interface LibraryPrepInput {
  library_id: string
  protocol: string
  amplicon_targets: string
}

export interface SequencingRunInput {
  run_id: string
  platform: string
  fastq: FastqFile[]
}

export interface SegmentInput {
  segment_id: string
  mode: ExperimentMode
  applied_to_arms: string[]
  start_time: string
  end_time: string
  selection_circuit_id: string
  stepping_stones: string[]
}

export interface AnalysisInput {
  analysis_id: string
  pipeline_id: string
  code_hash: string
  env: string
  ref_seq_id: string
  inputs: string[]
  outputs: AnalysisOutputs
  notes: string
}

export interface LagoonLocator {
  armId: string
  timepointIndex: number
  lagoonId: string
}

interface CampaignState {
  document: CampaignDocument

  updateCampaign: (patch: Partial<Pick<Campaign, 'campaign_id' | 'title' | 'created_at' | 'created_by' | 'notes'>>) => void
  updateStartingProtein: (patch: Partial<StartingProtein>) => void
  updateHostSystem: (patch: Partial<Omit<HostSystem, 'plasmids'>>) => void
  updatePlasmids: (patch: Partial<PlasmidSet>) => void

  addSelectionCircuit: (input: SelectionCircuitInput) => ActionResult
  addArm: (input: ArmInput) => ActionResult
  addTimepoint: (armId: string, input: TimepointInput) => ActionResult
  addLagoon: (armId: string, timepointIndex: number, input: LagoonInput) => ActionResult
  addSample: (locator: LagoonLocator, input: SampleInput) => ActionResult
  addLibraryPrep: (locator: LagoonLocator, sampleIndex: number, input: LibraryPrepInput) => ActionResult
  addSequencingRun: (
    locator: LagoonLocator,
    sampleIndex: number,
    libraryIndex: number,
    input: SequencingRunInput,
  ) => ActionResult
  addSegment: (input: SegmentInput) => ActionResult
  addAnalysis: (input: AnalysisInput, now: Date) => ActionResult
  addAttachments: (attachments: Attachment[]) => void
  setOntology: (key: string, values: string[]) => ActionResult

  loadDocument: (document: CampaignDocument) => void
  loadSampleCampaign: (now: Date) => void
  resetCampaign: (now: Date) => void
}

const ok: ActionResult = { ok: true }
const reject = (reason: string): ActionResult => ({ ok: false, reason })

const withCampaign = (document: CampaignDocument, campaign: Campaign): CampaignDocument => ({
  ...document,
  campaign,
})

const replaceAt = <T,>(items: readonly T[], index: number, item: T): T[] =>
  items.map((existing, position) => (position === index ? item : existing))

type LagoonUpdate = (lagoon: Lagoon) => Lagoon | string

/**
 * Apply `update` to one lagoon. A string returned from `update` (or a missing
 * arm, timepoint or lagoon) rejects the change and leaves the document as is.
 */
const updateLagoonIn = (
  campaign: Campaign,
  { armId, timepointIndex, lagoonId }: LagoonLocator,
  update: LagoonUpdate,
): Campaign | string => {
  if (!hasOwnKey(campaign.arms, armId)) return `Unknown arm ${armId}.`
  const arm = campaign.arms[armId]
  const timepoint = arm.timepoints[timepointIndex]
  if (!timepoint) return 'Add a timepoint first.'
  if (!hasOwnKey(timepoint.lagoons, lagoonId)) return `Unknown lagoon ${lagoonId}.`
  const next = update(timepoint.lagoons[lagoonId])
  if (typeof next === 'string') return next

  const nextTimepoint: Timepoint = { ...timepoint, lagoons: { ...timepoint.lagoons, [lagoonId]: next } }
  const nextArm: Arm = { ...arm, timepoints: replaceAt(arm.timepoints, timepointIndex, nextTimepoint) }
  return { ...campaign, arms: { ...campaign.arms, [armId]: nextArm } }
}

const updateSampleIn = (
  lagoon: Lagoon,
  sampleIndex: number,
  update: (sample: Sample) => Sample | string,
): Lagoon | string => {
  const sample = lagoon.samples[sampleIndex]
  if (!sample) return 'Select a sample first.'
  const next = update(sample)
  if (typeof next === 'string') return next
  return { ...lagoon, samples: replaceAt(lagoon.samples, sampleIndex, next) }
}

const buildLagoon = (input: LagoonInput): Lagoon => {
  const conditions: Lagoon['conditions'] = {
    mode: input.mode,
    volume_ml: input.volume_ml,
    temp_c: input.temp_c,
    media: input.media,
    antibiotics: input.antibiotics,
    inducers: input.inducers,
  }
  if (input.mode === 'PACE') {
    conditions.dilution_rate_vol_per_hr = input.dilution_rate_vol_per_hr
  } else {
    conditions.passage_fraction = input.passage_fraction
  }
  return {
    lagoon_id: input.lagoon_id,
    condition_label: input.condition_label,
    mutagenesis_on: input.mutagenesis_on,
    conditions,
    measurements: {
      phage_titer_pfu_per_ml: { value: input.titer_value, method: input.titer_method },
    },
    samples: [],
  }
}

export const useCampaign = create<CampaignState>()(
  subscribeWithSelector((set, get) => {
    const commit = (result: Campaign | string): ActionResult => {
      if (typeof result === 'string') return reject(result)
      set((state) => ({ document: withCampaign(state.document, result) }))
      return ok
    }
    const campaign = () => get().document.campaign

    return {
      document: createEmptyCampaign(new Date()),

      updateCampaign: (patch) => {
        commit({ ...campaign(), ...patch })
      },

      updateStartingProtein: (patch) => {
        const current = campaign()
        commit({ ...current, starting_protein: { ...current.starting_protein, ...patch } })
      },

      updateHostSystem: (patch) => {
        const current = campaign()
        commit({ ...current, host_system: { ...current.host_system, ...patch } })
      },

      updatePlasmids: (patch) => {
        const current = campaign()
        commit({
          ...current,
          host_system: {
            ...current.host_system,
            plasmids: { ...current.host_system.plasmids, ...patch },
          },
        })
      },

      addSelectionCircuit: (input) => {
        const current = campaign()
        if (!input.id) return reject('Provide circuit ID.')
        if (hasOwnKey(current.selection_circuits, input.id)) return reject('ID already exists.')
        return commit({
          ...current,
          selection_circuits: { ...current.selection_circuits, [input.id]: input },
        })
      },

      addArm: ({ arm_id, label, description }) => {
        const current = campaign()
        if (!arm_id) return reject('Provide arm ID.')
        if (hasOwnKey(current.arms, arm_id)) return reject('Arm ID exists.')
        const arm: Arm = { arm_id, label, description, status: 'active', timepoints: [] }
        return commit({ ...current, arms: { ...current.arms, [arm_id]: arm } })
      },

      addTimepoint: (armId, { t, timestamp }) => {
        const current = campaign()
        if (!hasOwnKey(current.arms, armId)) return reject(`Unknown arm ${armId}.`)
        const arm = current.arms[armId]
        const timepoint: Timepoint = { t, timestamp, global_events: [], lagoons: {} }
        return commit({
          ...current,
          arms: { ...current.arms, [armId]: { ...arm, timepoints: [...arm.timepoints, timepoint] } },
        })
      },

      addLagoon: (armId, timepointIndex, input) => {
        const current = campaign()
        if (!input.lagoon_id) return reject('Provide lagoon ID.')
        if (!hasOwnKey(current.arms, armId)) return reject(`Unknown arm ${armId}.`)
        const arm = current.arms[armId]
        const timepoint = arm.timepoints[timepointIndex]
        if (!timepoint) return reject('Add a timepoint first.')
        if (hasOwnKey(timepoint.lagoons, input.lagoon_id)) return reject('Lagoon ID exists.')
        const nextTimepoint: Timepoint = {
          ...timepoint,
          lagoons: { ...timepoint.lagoons, [input.lagoon_id]: buildLagoon(input) },
        }
        return commit({
          ...current,
          arms: {
            ...current.arms,
            [armId]: { ...arm, timepoints: replaceAt(arm.timepoints, timepointIndex, nextTimepoint) },
          },
        })
      },

      addSample: (locator, { sample_id, sample_type }) => {
        if (!sample_id) return reject('Provide sample ID.')
        const sample: Sample = { sample_id, sample_type, library_preps: [] }
        return commit(
          updateLagoonIn(campaign(), locator, (lagoon) => ({ ...lagoon, samples: [...lagoon.samples, sample] })),
        )
      },

      addLibraryPrep: (locator, sampleIndex, input) => {
        if (!input.library_id) return reject('Provide library ID.')
        const library: LibraryPrep = { ...input, sequencing_runs: [] }
        return commit(
          updateLagoonIn(campaign(), locator, (lagoon) =>
            updateSampleIn(lagoon, sampleIndex, (sample) => ({
              ...sample,
              library_preps: [...sample.library_preps, library],
            })),
          ),
        )
      },

      addSequencingRun: (locator, sampleIndex, libraryIndex, input) => {
        if (!input.run_id) return reject('Provide run ID.')
        return commit(
          updateLagoonIn(campaign(), locator, (lagoon) =>
            updateSampleIn(lagoon, sampleIndex, (sample) => {
              const library = sample.library_preps[libraryIndex]
              if (!library) return 'Select a library first.'
              const nextLibrary: LibraryPrep = {
                ...library,
                sequencing_runs: [...library.sequencing_runs, input],
              }
              return { ...sample, library_preps: replaceAt(sample.library_preps, libraryIndex, nextLibrary) }
            }),
          ),
        )
      },

      addSegment: (input) => {
        const current = campaign()
        if (!input.segment_id || input.applied_to_arms.length === 0 || !input.selection_circuit_id) {
          return reject('Provide segment ID, arms, and selection circuit.')
        }
        const endTime = input.end_time.trim()
        return commit({
          ...current,
          segments: [
            ...current.segments,
            {
              segment_id: input.segment_id,
              mode: input.mode,
              applied_to_arms: input.applied_to_arms,
              start_time: input.start_time,
              ...(endTime ? { end_time: endTime } : {}),
              selection_design: {
                selection_circuit_id: input.selection_circuit_id,
                stepping_stones: input.stepping_stones,
              },
            },
          ],
        })
      },

      addAnalysis: (input, now) => {
        const current = campaign()
        if (!input.analysis_id || input.inputs.length === 0) {
          return reject('Provide analysis ID and at least one input.')
        }
        const analysis: Analysis = {
          ...input,
          params: {},
          provenance: { who: current.created_by, when: now.toISOString() },
        }
        return commit({ ...current, analyses: [...current.analyses, analysis] })
      },

      addAttachments: (attachments) => {
        const current = campaign()
        commit({ ...current, attachments: [...current.attachments, ...attachments] })
      },

      setOntology: (key, values) => {
        if (!key) return reject('Provide ontology key.')
        const current = campaign()
        return commit({ ...current, ontologies: { ...current.ontologies, [key]: values } })
      },

      loadDocument: (document) => set({ document }),
      loadSampleCampaign: (now) => set({ document: createSampleCampaign(now) }),
      resetCampaign: (now) => set({ document: createEmptyCampaign(now) }),
    }
  }),
)

if (typeof window !== 'undefined' && CAMPAIGN_PERSISTENCE_ENABLED) {
  try {
    const saved = localStorage.getItem(CAMPAIGN_STORAGE_KEY)
    if (saved) {
      const validation = validateCampaignDocument(JSON.parse(saved))
      if (validation.valid) {
        useCampaign.setState({ document: validation.document })
      } else {
        console.warn('Discarding stored campaign that failed validation:', validation.issues)
      }
    }
  } catch (error) {
    console.warn('Failed to load campaign from localStorage:', error)
  }

  useCampaign.subscribe(
    (state) => state.document,
    (document) => {
      try {
        localStorage.setItem(CAMPAIGN_STORAGE_KEY, JSON.stringify(document))
      } catch (error) {
        console.warn('Failed to persist campaign to localStorage:', error)
      }
    },
  )
}
