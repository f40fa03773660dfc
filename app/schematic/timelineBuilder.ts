// purpose: resolve campaign segments into per-arm timeline layouts for the schematic
// status: experimental
// depends_on: app/schematic/timeParser, app/schematic/promoterClassifier

import type { Campaign, ExperimentMode, Segment } from '../types'
import { hasOwnKey } from '../utils/records'
import { DEFAULT_PHASE_HOURS } from './constants'
import {
  PROMOTER_COLORS,
  PROMOTER_LABELS,
  classifyPromoter,
  type PromoterClassification,
  type PromoterKind,
} from './promoterClassifier'
import { parseTimeToHours, type TimeParseResult } from './timeParser'

export interface SegmentLayout {
  armId: string
  segmentId: string
  promoter: PromoterKind
  promoterLabel: string
  mode: ExperimentMode
  startHours: number
  endHours: number
  color: string
  steppingStones: string[]
}

export type SchematicFallback =
  | 'start-unparseable'
  | 'start-clamped'
  | 'end-unparseable'
  | 'end-clamped'
  | 'missing-end'
  | 'inverted-interval'
  | 'unknown-circuit'
  | 'default-promoter'

export interface SchematicDiagnostic {
  segmentId: string
  fallback: SchematicFallback
  detail?: string
}

export interface TimelineResult {
  /** Arm id to layouts, in the order segments were encountered. */
  lanes: Map<string, SegmentLayout[]>
  maxEndHours: number
  diagnostics: SchematicDiagnostic[]
}

interface ResolvedInterval {
  startHours: number
  endHours: number
}

const describeTimeFallback = (
  segmentId: string,
  edge: 'start' | 'end',
  raw: string,
  result: TimeParseResult,
): SchematicDiagnostic | null => {
  if (result.source === 'unparseable') {
    return { segmentId, fallback: edge === 'start' ? 'start-unparseable' : 'end-unparseable', detail: raw }
  }
  if (result.source === 'clamped') {
    return { segmentId, fallback: edge === 'start' ? 'start-clamped' : 'end-clamped', detail: raw }
  }
  return null
}

const resolveInterval = (
  segment: Segment,
  reference: Date,
  diagnostics: SchematicDiagnostic[],
): ResolvedInterval => {
  const { segment_id: segmentId, start_time: startTime, end_time: endTime } = segment
  const start = parseTimeToHours(startTime, reference)
  const startNote = describeTimeFallback(segmentId, 'start', startTime, start)
  if (startNote) diagnostics.push(startNote)

  if (!endTime) {
    diagnostics.push({ segmentId, fallback: 'missing-end' })
    return { startHours: start.hours, endHours: start.hours + DEFAULT_PHASE_HOURS }
  }

  const end = parseTimeToHours(endTime, reference)
  const endNote = describeTimeFallback(segmentId, 'end', endTime, end)
  if (endNote) diagnostics.push(endNote)

  if (end.hours <= start.hours) {
    diagnostics.push({
      segmentId,
      fallback: 'inverted-interval',
      detail: `${end.hours}h <= ${start.hours}h`,
    })
    return { startHours: start.hours, endHours: start.hours + DEFAULT_PHASE_HOURS }
  }
  return { startHours: start.hours, endHours: end.hours }
}

const classifySegment = (
  campaign: Campaign,
  segment: Segment,
  diagnostics: SchematicDiagnostic[],
): PromoterClassification => {
  const { selection_circuit_id: circuitId, stepping_stones: steppingStones } = segment.selection_design
  const circuit =
    circuitId && hasOwnKey(campaign.selection_circuits, circuitId)
      ? campaign.selection_circuits[circuitId]
      : undefined
  if (circuitId && !circuit) {
    diagnostics.push({ segmentId: segment.segment_id, fallback: 'unknown-circuit', detail: circuitId })
  }
  const classification = classifyPromoter({
    steppingStones,
    circuitType: circuit?.type ?? '',
    circuitId,
  })
  if (classification.kind === 'Default') {
    diagnostics.push({ segmentId: segment.segment_id, fallback: 'default-promoter' })
  }
  return classification
}

/**
 * Fan each segment out into one layout per target arm. Arm ids that are not
 * declared on the campaign still get a lane. An empty result means there is
 * nothing to draw.
 */
export const buildTimeline = (campaign: Campaign, reference: Date): TimelineResult => {
  const lanes = new Map<string, SegmentLayout[]>()
  const diagnostics: SchematicDiagnostic[] = []

  if (Object.keys(campaign.arms).length === 0 || campaign.segments.length === 0) {
    return { lanes, maxEndHours: 0, diagnostics }
  }

  let maxEndHours = Number.NEGATIVE_INFINITY
  for (const segment of campaign.segments) {
    const { startHours, endHours } = resolveInterval(segment, reference, diagnostics)
    const { kind } = classifySegment(campaign, segment, diagnostics)

    for (const armId of segment.applied_to_arms) {
      const lane = lanes.get(armId) ?? []
      lane.push({
        armId,
        segmentId: segment.segment_id,
        promoter: kind,
        promoterLabel: PROMOTER_LABELS[kind],
        mode: segment.mode,
        startHours,
        endHours,
        color: PROMOTER_COLORS[kind],
        steppingStones: segment.selection_design.stepping_stones,
      })
      lanes.set(armId, lane)
      maxEndHours = Math.max(maxEndHours, endHours)
    }
  }

  return { lanes, maxEndHours: lanes.size > 0 ? maxEndHours : 0, diagnostics }
}
