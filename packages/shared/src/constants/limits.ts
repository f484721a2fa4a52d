/** Sheet dimension limits (Excel-compatible) */
export const SHEET_LIMITS = {
  MAX_ROWS: 1_048_576,
  MAX_COLS: 16_384,
  MAX_SHEET_NAME_LENGTH: 31,
} as const;

/** Rendering defaults */
export const RENDER_LIMITS = {
  MIN_COLUMN_WIDTH: 10,
  MAX_COLUMN_WIDTH: 60,
  COLUMN_WIDTH_PADDING: 2,
} as const;

/** Column type inference: share of non-empty values a type needs to win */
export const DETECTION_THRESHOLDS = {
  TYPE_MAJORITY_RATIO: 0.8,
} as const;

/** Producer-output diagnostics */
export const INGEST_LIMITS = {
  /** Characters of offending input quoted in error details */
  FRAGMENT_LENGTH: 120,
} as const;
