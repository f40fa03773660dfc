import type { Campaign, CampaignSummary } from '../types'
import { parseOffsetDateTime } from './timeParser'

const MS_PER_HOUR = 3_600_000

/** Longest single segment in hours; segments without two parseable date-times are skipped. */
export const maxSegmentDurationHours = (campaign: Campaign): number => {
  let longest = 0
  for (const segment of campaign.segments) {
    if (!segment.start_time || !segment.end_time) continue
    const start = parseOffsetDateTime(segment.start_time)
    const end = parseOffsetDateTime(segment.end_time)
    if (start === null || end === null) continue
    longest = Math.max(longest, (end - start) / MS_PER_HOUR)
  }
  return longest
}

export const summariseCampaign = (campaign: Campaign): CampaignSummary => ({
  arm_count: Object.keys(campaign.arms).length,
  segment_count: campaign.segments.length,
  circuit_count: Object.keys(campaign.selection_circuits).length,
  max_duration_hours: maxSegmentDurationHours(campaign),
})
