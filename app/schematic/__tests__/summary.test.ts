import { describe, expect, it } from 'vitest'

import { createEmptyCampaign, createSampleCampaign } from '../../campaign/factories'
import type { Segment } from '../../types'
import { maxSegmentDurationHours, summariseCampaign } from '../summary'

const now = new Date('2025-06-01T08:00:00Z')

const timed = (start: string, end?: string): Segment => ({
  segment_id: 'seg',
  mode: 'PACE',
  applied_to_arms: ['arm-a'],
  start_time: start,
  ...(end === undefined ? {} : { end_time: end }),
  selection_design: { selection_circuit_id: '', stepping_stones: [] },
})

describe('summariseCampaign', () => {
  it('counts the sample campaign', () => {
    expect(summariseCampaign(createSampleCampaign(now).campaign)).toEqual({
      arm_count: 2,
      segment_count: 6,
      circuit_count: 2,
      max_duration_hours: 48,
    })
  })

  it('is all zeros for a new campaign', () => {
    expect(summariseCampaign(createEmptyCampaign(now).campaign)).toEqual({
      arm_count: 0,
      segment_count: 0,
      circuit_count: 0,
      max_duration_hours: 0,
    })
  })
})

describe('maxSegmentDurationHours', () => {
  it('skips segments without two parseable date-times', () => {
    const campaign = {
      ...createEmptyCampaign(now).campaign,
      segments: [
        timed('2025-01-01T00:00:00Z', '2025-01-04T00:00:00+00:00'),
        timed('2025-01-01T00:00:00Z'),
        timed('0', '500'),
        timed('2025-01-01T00:00:00', '2025-02-01T00:00:00Z'),
      ],
    }
    expect(maxSegmentDurationHours(campaign)).toBe(72)
  })

  it('never reports a negative duration', () => {
    const campaign = {
      ...createEmptyCampaign(now).campaign,
      segments: [timed('2025-01-02T00:00:00Z', '2025-01-01T00:00:00Z')],
    }
    expect(maxSegmentDurationHours(campaign)).toBe(0)
  })
})
