import { describe, expect, it } from 'vitest'

import { createEmptyCampaign, createSampleCampaign } from '../../campaign/factories'
import { findReferenceWarnings, formatIssuePath, validateCampaignDocument } from '../validate'

const now = new Date('2025-06-01T08:00:00Z')

const asPlainJson = (value: unknown): Record<string, unknown> => JSON.parse(JSON.stringify(value))

describe('formatIssuePath', () => {
  it('renders keys and indexes', () => {
    expect(formatIssuePath([])).toBe('$')
    expect(formatIssuePath(['campaign', 'segments', 0, 'mode'])).toBe('$.campaign.segments[0].mode')
  })
})

describe('validateCampaignDocument', () => {
  it('accepts factory documents', () => {
    const empty = createEmptyCampaign(now)
    expect(validateCampaignDocument(empty)).toEqual({ valid: true, document: empty, issues: [] })
    expect(validateCampaignDocument(asPlainJson(createSampleCampaign(now))).valid).toBe(true)
  })

  it('reports every issue sorted by path', () => {
    const document = createSampleCampaign(now)
    const broken = asPlainJson({
      ...document,
      campaign: {
        ...document.campaign,
        title: 42,
        segments: [{ ...document.campaign.segments[0], mode: 'BATCH' }],
      },
    })

    const result = validateCampaignDocument(broken)
    expect(result.valid).toBe(false)
    expect(result.issues.map((issue) => issue.path)).toEqual(['$.campaign.segments[0].mode', '$.campaign.title'])
  })

  it('fills an empty campaign body with editor defaults', () => {
    const empty = createEmptyCampaign(now)
    expect(validateCampaignDocument({ schema_version: '0.1.0', campaign: {} })).toEqual({
      valid: true,
      document: { ...empty, campaign: { ...empty.campaign, created_at: '' } },
      issues: [],
    })
  })

  it('names missing fields', () => {
    const { schema_version: _unused, ...rest } = createEmptyCampaign(now)
    expect(validateCampaignDocument(rest).issues).toEqual([{ path: '$.schema_version', message: 'Required' }])
  })

  it('rejects passage fractions above one', () => {
    const document = asPlainJson(createEmptyCampaign(now))
    const campaign = asPlainJson(document.campaign)
    campaign.arms = {
      a: {
        arm_id: 'a',
        label: '',
        description: '',
        status: 'active',
        timepoints: [
          {
            t: 0,
            timestamp: '',
            global_events: [],
            lagoons: {
              lg: {
                lagoon_id: 'lg',
                condition_label: '',
                mutagenesis_on: false,
                conditions: {
                  mode: 'PANCE',
                  volume_ml: 40,
                  temp_c: 37,
                  media: '',
                  antibiotics: [],
                  inducers: [],
                  passage_fraction: 1.5,
                },
                measurements: { phage_titer_pfu_per_ml: { value: 0, method: 'plaque' } },
                samples: [],
              },
            },
          },
        ],
      },
    }
    const result = validateCampaignDocument({ ...document, campaign })
    expect(result.issues.map((issue) => issue.path)).toEqual([
      '$.campaign.arms.a.timepoints[0].lagoons.lg.conditions.passage_fraction',
    ])
  })
})

describe('findReferenceWarnings', () => {
  it('is quiet for the sample campaign', () => {
    expect(findReferenceWarnings(createSampleCampaign(now).campaign)).toEqual([])
  })

  it('flags unknown arms and circuits', () => {
    const { campaign } = createSampleCampaign(now)
    const segment = campaign.segments[0]
    const warnings = findReferenceWarnings({
      ...campaign,
      segments: [
        {
          ...segment,
          applied_to_arms: ['arm-t3', 'arm-x'],
          selection_design: { ...segment.selection_design, selection_circuit_id: 'sel-missing' },
        },
      ],
    })
    expect(warnings).toEqual([
      { path: '$.campaign.segments[0].applied_to_arms[1]', message: 'Unknown arm "arm-x"' },
      {
        path: '$.campaign.segments[0].selection_design.selection_circuit_id',
        message: 'Unknown selection circuit "sel-missing"',
      },
    ])
  })

  it('ignores an empty circuit id', () => {
    const { campaign } = createSampleCampaign(now)
    const segment = campaign.segments[0]
    expect(
      findReferenceWarnings({
        ...campaign,
        segments: [{ ...segment, selection_design: { ...segment.selection_design, selection_circuit_id: '' } }],
      }),
    ).toEqual([])
  })
})
