// purpose: map per-arm timeline layouts onto a renderable schematic scene
// status: experimental
// depends_on: app/schematic/timelineBuilder

import type { Campaign } from '../types'
import {
  ARM_LABEL_X,
  AXIS_PADDING_HOURS,
  BAND_COLORS,
  BAND_HALF_HEIGHT,
  BAND_PADDING_HOURS,
  BASE_CANVAS_HEIGHT,
  CONNECTOR_GLYPH_OFFSET_HOURS,
  CONNECTOR_GLYPH_RISE,
  CONNECTOR_LENGTH_HOURS,
  GRID_STEP_HOURS,
  LEGEND_COLUMN_STEP,
  LEGEND_ORIGIN,
  LEGEND_ROW_STEP,
  LEGEND_ROWS_PER_COLUMN,
  ROW_CANVAS_HEIGHT,
  SCHEMATIC_TITLE,
  SEGMENT_HALF_HEIGHT,
  TICK_LABEL_Y,
} from './constants'
import { PROMOTER_COLORS, PROMOTER_KINDS, PROMOTER_LABELS, type PromoterKind } from './promoterClassifier'
import {
  buildTimeline,
  type SchematicDiagnostic,
  type SegmentLayout,
  type TimelineResult,
} from './timelineBuilder'

export interface SchematicRow {
  armId: string
  row: number
  labelX: number
}

export interface SchematicBand {
  armId: string
  row: number
  x0: number
  x1: number
  y0: number
  y1: number
  fill: string
}

export interface SchematicSegmentShape {
  armId: string
  segmentId: string
  row: number
  promoter: PromoterKind
  x0: number
  x1: number
  y0: number
  y1: number
  fill: string
}

export interface SchematicLabel {
  armId: string
  segmentId: string
  x: number
  y: number
  lines: string[]
}

export interface SchematicConnector {
  armId: string
  fromSegmentId: string
  toSegmentId: string
  x0: number
  x1: number
  y: number
  glyphX: number
  glyphY: number
}

export interface SchematicGridline {
  hours: number
  y0: number
  y1: number
  label: string
  labelY: number
}

/** Legend positions are fractions of the plot area, origin bottom-left. */
export interface SchematicLegendEntry {
  promoter: PromoterKind
  label: string
  color: string
  x: number
  y: number
}

export interface SchematicScene {
  title: string
  rows: SchematicRow[]
  bands: SchematicBand[]
  segments: SchematicSegmentShape[]
  labels: SchematicLabel[]
  connectors: SchematicConnector[]
  gridlines: SchematicGridline[]
  legend: SchematicLegendEntry[]
  xRange: [number, number]
  yRange: [number, number]
  height: number
  maxEndHours: number
  diagnostics: SchematicDiagnostic[]
}

const bandColorFor = (layouts: SegmentLayout[]): string =>
  layouts.some((layout) => layout.promoterLabel.includes('SP6')) ? BAND_COLORS.sp6 : BAND_COLORS.t3

export const segmentLabelLines = (layout: SegmentLayout): string[] => {
  const lines = [layout.segmentId, `(${layout.mode})`]
  if (layout.steppingStones.length > 0) {
    lines.push(layout.steppingStones.join(', '))
  }
  return lines
}

/** Hours at which vertical gridlines are drawn: 0 up to the next 24 h boundary above max. */
export const gridlineHours = (maxEndHours: number): number[] => {
  const last = (Math.floor(Math.floor(maxEndHours) / GRID_STEP_HOURS) + 1) * GRID_STEP_HOURS
  const hours: number[] = []
  for (let hour = 0; hour <= last; hour += GRID_STEP_HOURS) {
    hours.push(hour)
  }
  return hours
}

export const buildLegend = (): SchematicLegendEntry[] =>
  PROMOTER_KINDS.filter((kind) => kind !== 'Default').map((kind, index) => {
    const column = Math.floor(index / LEGEND_ROWS_PER_COLUMN)
    const position = index % LEGEND_ROWS_PER_COLUMN
    return {
      promoter: kind,
      label: PROMOTER_LABELS[kind],
      color: PROMOTER_COLORS[kind],
      x: LEGEND_ORIGIN.x + column * LEGEND_COLUMN_STEP,
      y: LEGEND_ORIGIN.y - position * LEGEND_ROW_STEP,
    }
  })

/**
 * Lay out a timeline as a scene. Rows follow lexicographic arm id order.
 * Returns null when there is nothing to draw so callers can show an empty state.
 */
export const layoutSchematic = (timeline: TimelineResult): SchematicScene | null => {
  if (timeline.lanes.size === 0) {
    return null
  }

  const armIds = Array.from(timeline.lanes.keys()).sort()
  const rowCount = armIds.length
  const scene: SchematicScene = {
    title: SCHEMATIC_TITLE,
    rows: [],
    bands: [],
    segments: [],
    labels: [],
    connectors: [],
    gridlines: [],
    legend: buildLegend(),
    xRange: [-AXIS_PADDING_HOURS, timeline.maxEndHours + AXIS_PADDING_HOURS],
    yRange: [-1, rowCount],
    height: BASE_CANVAS_HEIGHT + rowCount * ROW_CANVAS_HEIGHT,
    maxEndHours: timeline.maxEndHours,
    diagnostics: timeline.diagnostics,
  }

  armIds.forEach((armId, row) => {
    const layouts = timeline.lanes.get(armId) ?? []
    scene.rows.push({ armId, row, labelX: ARM_LABEL_X })
    if (layouts.length === 0) return

    const minStart = Math.min(...layouts.map((layout) => layout.startHours))
    const maxEnd = Math.max(...layouts.map((layout) => layout.endHours))
    scene.bands.push({
      armId,
      row,
      x0: minStart - BAND_PADDING_HOURS,
      x1: maxEnd + BAND_PADDING_HOURS,
      y0: row - BAND_HALF_HEIGHT,
      y1: row + BAND_HALF_HEIGHT,
      fill: bandColorFor(layouts),
    })

    layouts.forEach((layout, index) => {
      scene.segments.push({
        armId,
        segmentId: layout.segmentId,
        row,
        promoter: layout.promoter,
        x0: layout.startHours,
        x1: layout.endHours,
        y0: row - SEGMENT_HALF_HEIGHT,
        y1: row + SEGMENT_HALF_HEIGHT,
        fill: layout.color,
      })
      scene.labels.push({
        armId,
        segmentId: layout.segmentId,
        x: (layout.startHours + layout.endHours) / 2,
        y: row,
        lines: segmentLabelLines(layout),
      })
      const next = layouts[index + 1]
      if (next) {
        scene.connectors.push({
          armId,
          fromSegmentId: layout.segmentId,
          toSegmentId: next.segmentId,
          x0: layout.endHours,
          x1: layout.endHours + CONNECTOR_LENGTH_HOURS,
          y: row,
          glyphX: layout.endHours + CONNECTOR_GLYPH_OFFSET_HOURS,
          glyphY: row + CONNECTOR_GLYPH_RISE,
        })
      }
    })
  })

  scene.gridlines = gridlineHours(timeline.maxEndHours).map((hours) => ({
    hours,
    y0: -0.5,
    y1: rowCount - 0.5,
    label: `${hours}h`,
    labelY: TICK_LABEL_Y,
  }))

  return scene
}

/** Single entry point for the editor: campaign in, scene or null out. */
export const buildSchematic = (campaign: Campaign, reference: Date): SchematicScene | null =>
  layoutSchematic(buildTimeline(campaign, reference))
