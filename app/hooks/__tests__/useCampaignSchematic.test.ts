import { renderHook } from '@testing-library/react'
import { afterEach, describe, expect, it, vi } from 'vitest'

import { createSampleCampaign } from '../../campaign/factories'
import type { Campaign, Segment } from '../../types'
import { useCampaignSchematic } from '../useCampaignSchematic'

const reference = new Date('2025-06-01T08:00:00Z')

const withoutEnd = ({ end_time: _end, ...segment }: Segment): Segment => segment

const openEnded = (count: number): Campaign => {
  const { campaign } = createSampleCampaign(reference)
  return {
    ...campaign,
    segments: campaign.segments.map((segment, index) => (index < count ? withoutEnd(segment) : segment)),
  }
}

describe('useCampaignSchematic', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('logs fallbacks only when they change', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined)
    const first = openEnded(1)
    const { result, rerender } = renderHook(({ campaign }) => useCampaignSchematic(campaign, reference), {
      initialProps: { campaign: first },
    })

    expect(result.current?.rows.map((row) => row.armId)).toEqual(['arm-sp6', 'arm-t3'])
    expect(warn).toHaveBeenCalledTimes(1)
    expect(warn).toHaveBeenCalledWith('Schematic fallback applied', {
      segmentId: 'seg-01-t3-init',
      fallback: 'missing-end',
    })

    rerender({ campaign: { ...first, title: 'Renamed' } })
    expect(warn).toHaveBeenCalledTimes(1)

    rerender({ campaign: openEnded(2) })
    expect(warn).toHaveBeenCalledTimes(3)
    expect(warn).toHaveBeenLastCalledWith('Schematic fallback applied', {
      segmentId: 'seg-02-t3-evolve',
      fallback: 'missing-end',
    })
  })
})
