export const DEFAULT_PHASE_HOURS = 72
export const BAND_PADDING_HOURS = 10
export const GRID_STEP_HOURS = 24
export const AXIS_PADDING_HOURS = 30

export const SEGMENT_HALF_HEIGHT = 0.3
export const BAND_HALF_HEIGHT = 0.4

export const ARM_LABEL_X = -20
export const TICK_LABEL_Y = -0.8
export const CONNECTOR_LENGTH_HOURS = 8
export const CONNECTOR_GLYPH_OFFSET_HOURS = 4
export const CONNECTOR_GLYPH_RISE = 0.1

export const BASE_CANVAS_HEIGHT = 500
export const ROW_CANVAS_HEIGHT = 120

export const LEGEND_ORIGIN = { x: 0.02, y: 1.02 } as const
export const LEGEND_ROW_STEP = 0.04
export const LEGEND_COLUMN_STEP = 0.3
export const LEGEND_ROWS_PER_COLUMN = 6

export const BAND_COLORS = {
  t3: 'rgba(255, 182, 193, 0.1)',
  sp6: 'rgba(173, 216, 230, 0.1)',
} as const

export const SCHEMATIC_TITLE = 'PACE/PANCE Campaign Schematic'
