import { beforeEach, describe, expect, it } from 'vitest'

import { createEmptyCampaign } from '../../campaign/factories'
import { CAMPAIGN_STORAGE_KEY } from '../../config/campaign'
import type { AnalysisOutputs } from '../../types'
import { useCampaign, type LagoonInput, type LagoonLocator } from '../useCampaign'

const now = new Date('2025-06-01T08:00:00Z')

const noOutputs: AnalysisOutputs = { alignments: [], variant_tables: [], consensus_sequences: [], selection_scores: [] }

const lagoonInput = (overrides: Partial<LagoonInput> = {}): LagoonInput => ({
  lagoon_id: 'lg-1',
  condition_label: 'Step1',
  mutagenesis_on: true,
  mode: 'PACE',
  volume_ml: 40,
  dilution_rate_vol_per_hr: 1.5,
  passage_fraction: 0.1,
  temp_c: 37,
  media: '2xYT',
  inducers: [{ name: 'arabinose', concentration_mM: 10 }],
  antibiotics: [],
  titer_value: 1e8,
  titer_method: 'plaque',
  ...overrides,
})

const campaign = () => useCampaign.getState().document.campaign
const actions = () => useCampaign.getState()

const locator: LagoonLocator = { armId: 'arm-a', timepointIndex: 0, lagoonId: 'lg-1' }

const seedLagoon = () => {
  actions().addArm({ arm_id: 'arm-a', label: 'A', description: '' })
  actions().addTimepoint('arm-a', { t: 0, timestamp: '2025-06-01T08:00:00Z' })
  actions().addLagoon('arm-a', 0, lagoonInput())
}

describe('useCampaign store', () => {
  beforeEach(() => {
    useCampaign.setState({ document: createEmptyCampaign(now) })
  })

  it('patches header fields in place', () => {
    actions().updateCampaign({ title: 'Mdh evolution' })
    actions().updatePlasmids({ AP: 'ap-1' })
    actions().updateHostSystem({ strain: 'S2060' })
    actions().updateStartingProtein({ features: ['His-tag'] })

    expect(campaign().title).toBe('Mdh evolution')
    expect(campaign().host_system.plasmids).toEqual({ AP: 'ap-1', CP: '', MP: '', DP: '' })
    expect(campaign().host_system.strain).toBe('S2060')
    expect(campaign().starting_protein.features).toEqual(['His-tag'])
  })

  it('adds selection circuits once per id', () => {
    const circuit = {
      id: 'sel-1',
      type: 'RNAP_promoter',
      ap_details: '',
      cp_details: '',
      reporter_gene: 'gIII',
      negative_selection: '',
      stepping_stones: ['T7/T3'],
      version: '1',
    }
    expect(actions().addSelectionCircuit({ ...circuit, id: '' })).toEqual({ ok: false, reason: 'Provide circuit ID.' })
    expect(actions().addSelectionCircuit(circuit)).toEqual({ ok: true })
    expect(actions().addSelectionCircuit(circuit)).toEqual({ ok: false, reason: 'ID already exists.' })
    expect(Object.keys(campaign().selection_circuits)).toEqual(['sel-1'])
  })

  it('adds arms with an active status', () => {
    expect(actions().addArm({ arm_id: '', label: '', description: '' })).toEqual({
      ok: false,
      reason: 'Provide arm ID.',
    })
    expect(actions().addArm({ arm_id: 'arm-a', label: 'A', description: 'first' })).toEqual({ ok: true })
    expect(actions().addArm({ arm_id: 'arm-a', label: 'B', description: '' })).toEqual({
      ok: false,
      reason: 'Arm ID exists.',
    })
    expect(campaign().arms['arm-a']).toEqual({
      arm_id: 'arm-a',
      label: 'A',
      description: 'first',
      status: 'active',
      timepoints: [],
    })
  })

  it('does not treat inherited keys as existing ids', () => {
    expect(actions().addArm({ arm_id: 'constructor', label: '', description: '' })).toEqual({ ok: true })
    expect(actions().addTimepoint('toString', { t: 0, timestamp: '' })).toEqual({
      ok: false,
      reason: 'Unknown arm toString.',
    })
  })

  it('builds lagoon conditions for the chosen mode', () => {
    seedLagoon()
    actions().addLagoon('arm-a', 0, lagoonInput({ lagoon_id: 'lg-2', mode: 'PANCE' }))

    const lagoons = campaign().arms['arm-a'].timepoints[0].lagoons
    expect(lagoons['lg-1'].conditions).toEqual({
      mode: 'PACE',
      volume_ml: 40,
      temp_c: 37,
      media: '2xYT',
      antibiotics: [],
      inducers: [{ name: 'arabinose', concentration_mM: 10 }],
      dilution_rate_vol_per_hr: 1.5,
    })
    expect(lagoons['lg-2'].conditions.passage_fraction).toBe(0.1)
    expect(lagoons['lg-2'].conditions.dilution_rate_vol_per_hr).toBeUndefined()
    expect(lagoons['lg-1'].measurements).toEqual({ phage_titer_pfu_per_ml: { value: 1e8, method: 'plaque' } })
  })

  it('guards lagoon creation', () => {
    actions().addArm({ arm_id: 'arm-a', label: '', description: '' })
    expect(actions().addLagoon('arm-a', 0, lagoonInput())).toEqual({ ok: false, reason: 'Add a timepoint first.' })
    actions().addTimepoint('arm-a', { t: 0, timestamp: '' })
    expect(actions().addLagoon('arm-a', 0, lagoonInput({ lagoon_id: '' }))).toEqual({
      ok: false,
      reason: 'Provide lagoon ID.',
    })
    expect(actions().addLagoon('arm-a', 0, lagoonInput())).toEqual({ ok: true })
    expect(actions().addLagoon('arm-a', 0, lagoonInput())).toEqual({ ok: false, reason: 'Lagoon ID exists.' })
  })

  it('nests samples, library preps and sequencing runs', () => {
    seedLagoon()
    expect(actions().addSample(locator, { sample_id: 's-1', sample_type: 'DNA' })).toEqual({ ok: true })
    expect(
      actions().addLibraryPrep(locator, 0, { library_id: 'lib-1', protocol: 'Amplicon-v1', amplicon_targets: 'mdh' }),
    ).toEqual({ ok: true })
    const fastq = [{ read: 'R1' as const, uri: 'file://attached_fastqs/r1.fq', sha256: 'abc', size_bytes: 3 }]
    expect(actions().addSequencingRun(locator, 0, 0, { run_id: 'run-1', platform: 'NextSeq', fastq })).toEqual({
      ok: true,
    })

    const sample = campaign().arms['arm-a'].timepoints[0].lagoons['lg-1'].samples[0]
    expect(sample.sample_id).toBe('s-1')
    expect(sample.library_preps[0].library_id).toBe('lib-1')
    expect(sample.library_preps[0].sequencing_runs).toEqual([{ run_id: 'run-1', platform: 'NextSeq', fastq }])
  })

  it('rejects nested additions without a parent', () => {
    seedLagoon()
    expect(actions().addSample({ ...locator, lagoonId: 'lg-9' }, { sample_id: 's', sample_type: 'DNA' })).toEqual({
      ok: false,
      reason: 'Unknown lagoon lg-9.',
    })
    expect(actions().addSample(locator, { sample_id: '', sample_type: 'DNA' })).toEqual({
      ok: false,
      reason: 'Provide sample ID.',
    })
    expect(actions().addLibraryPrep(locator, 0, { library_id: 'lib', protocol: '', amplicon_targets: '' })).toEqual({
      ok: false,
      reason: 'Select a sample first.',
    })
    actions().addSample(locator, { sample_id: 's-1', sample_type: 'DNA' })
    expect(actions().addSequencingRun(locator, 0, 0, { run_id: 'run', platform: '', fastq: [] })).toEqual({
      ok: false,
      reason: 'Select a library first.',
    })
    expect(actions().addSequencingRun(locator, 0, 0, { run_id: '', platform: '', fastq: [] })).toEqual({
      ok: false,
      reason: 'Provide run ID.',
    })
  })

  it('adds segments and drops a blank end time', () => {
    const input = {
      segment_id: 'seg-1',
      mode: 'PANCE' as const,
      applied_to_arms: ['arm-a'],
      start_time: '2025-06-01T08:00:00Z',
      end_time: '  ',
      selection_circuit_id: 'sel-1',
      stepping_stones: ['T3'],
    }
    expect(actions().addSegment({ ...input, applied_to_arms: [] })).toEqual({
      ok: false,
      reason: 'Provide segment ID, arms, and selection circuit.',
    })
    expect(actions().addSegment(input)).toEqual({ ok: true })
    expect(actions().addSegment({ ...input, segment_id: 'seg-2', end_time: ' 2025-06-02T08:00:00Z ' })).toEqual({
      ok: true,
    })

    const [first, second] = campaign().segments
    expect(first).toEqual({
      segment_id: 'seg-1',
      mode: 'PANCE',
      applied_to_arms: ['arm-a'],
      start_time: '2025-06-01T08:00:00Z',
      selection_design: { selection_circuit_id: 'sel-1', stepping_stones: ['T3'] },
    })
    expect('end_time' in first).toBe(false)
    expect(second.end_time).toBe('2025-06-02T08:00:00Z')
  })

  it('stamps analyses with provenance', () => {
    actions().updateCampaign({ created_by: 'lab-user' })
    const input = {
      analysis_id: 'an-1',
      pipeline_id: 'pace-amplicon@0.1.0',
      code_hash: 'a1b2c3d',
      env: '',
      ref_seq_id: 'Mdh_v0',
      inputs: ['lib-1'],
      outputs: noOutputs,
      notes: '',
    }
    expect(actions().addAnalysis({ ...input, inputs: [] }, now)).toEqual({
      ok: false,
      reason: 'Provide analysis ID and at least one input.',
    })
    expect(actions().addAnalysis(input, now)).toEqual({ ok: true })
    expect(campaign().analyses[0]).toEqual({
      ...input,
      params: {},
      provenance: { who: 'lab-user', when: '2025-06-01T08:00:00.000Z' },
    })
  })

  it('appends attachments and replaces ontologies by key', () => {
    actions().addAttachments([{ uri: 'file://attachments/a.txt', sha256: 'x', size_bytes: 1, description: 'a.txt' }])
    expect(campaign().attachments).toHaveLength(1)

    expect(actions().setOntology('', ['x'])).toEqual({ ok: false, reason: 'Provide ontology key.' })
    actions().setOntology('media', ['LB'])
    actions().setOntology('media', ['2xYT', 'LB'])
    expect(campaign().ontologies).toEqual({ media: ['2xYT', 'LB'] })
  })

  it('loads the sample campaign and resets', () => {
    actions().loadSampleCampaign(now)
    expect(campaign().campaign_id).toBe('sample-campaign')
    actions().resetCampaign(now)
    expect(campaign().campaign_id).toBe('')
  })

  it('persists the document to localStorage', () => {
    actions().updateCampaign({ campaign_id: 'cmp-1' })
    const saved = localStorage.getItem(CAMPAIGN_STORAGE_KEY)
    expect(saved).not.toBeNull()
    expect(JSON.parse(saved ?? '{}').campaign.campaign_id).toBe('cmp-1')
  })
})
