/**
 * Domain types for photo-datestamp
 */

// ============================================================================
// ANCHORS
// ============================================================================

export const ANCHOR_POSITIONS = [
  'top-left',
  'top-center',
  'top-right',
  'center-left',
  'center',
  'center-right',
  'bottom-left',
  'bottom-center',
  'bottom-right',
] as const;

export type AnchorPosition = (typeof ANCHOR_POSITIONS)[number];

export const DEFAULT_ANCHOR: AnchorPosition = 'bottom-right';

export function isAnchorPosition(value: string): value is AnchorPosition {
  return ANCHOR_POSITIONS.some((anchor) => anchor === value);
}

/**
 * Unknown names resolve to the default anchor
 */
export function toAnchorPosition(value: string): AnchorPosition {
  return isAnchorPosition(value) ? value : DEFAULT_ANCHOR;
}

// ============================================================================
// GEOMETRY
// ============================================================================

export interface Size {
  width: number;
  height: number;
}

export interface Point {
  x: number;
  y: number;
}

// ============================================================================
// WATERMARK
// ============================================================================

/**
 * Per-run drawing options, immutable once parsed from the CLI
 */
export interface WatermarkOptions {
  readonly fontSize: number;
  readonly color: string;
  readonly position: AnchorPosition;
}

/**
 * Calendar date rendered as YYYY-MM-DD
 */
export type DateStamp = string;

export type WatermarkResult =
  | {
      status: 'ok';
      source: string;
      output: string;
      date: DateStamp;
    }
  | {
      status: 'failed';
      source: string;
      output: string;
      error: string;
    };

// ============================================================================
// BATCH
// ============================================================================

export interface BatchFailure {
  path: string;
  error: string;
}

export interface BatchSummary {
  outputDir: string;
  processed: string[]; // output paths
  failed: BatchFailure[];
}
