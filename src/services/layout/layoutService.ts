/**
 * Layout Service
 * Top-left placement of the stamp for the nine anchor positions
 */

import { AnchorPosition, Point, Size, toAnchorPosition } from '../../types';

export const DEFAULT_MARGIN = 10;

/**
 * Compute the text box origin inside the image. Edges the anchor touches get
 * `margin` pixels of space; centred axes use floor((image - text) / 2).
 * Unknown anchors behave as bottom-right. Coordinates are not clamped, so text
 * larger than the image yields negative values.
 */
export function computeTextPosition(
  image: Size,
  text: Size,
  anchor: AnchorPosition | string,
  margin: number = DEFAULT_MARGIN
): Point {
  const left = margin;
  const centerX = Math.floor((image.width - text.width) / 2);
  const right = image.width - text.width - margin;

  const top = margin;
  const centerY = Math.floor((image.height - text.height) / 2);
  const bottom = image.height - text.height - margin;

  switch (toAnchorPosition(anchor)) {
    case 'top-left':
      return { x: left, y: top };
    case 'top-center':
      return { x: centerX, y: top };
    case 'top-right':
      return { x: right, y: top };
    case 'center-left':
      return { x: left, y: centerY };
    case 'center':
      return { x: centerX, y: centerY };
    case 'center-right':
      return { x: right, y: centerY };
    case 'bottom-left':
      return { x: left, y: bottom };
    case 'bottom-center':
      return { x: centerX, y: bottom };
    case 'bottom-right':
      return { x: right, y: bottom };
  }
}

export interface ClippedOverlay {
  /** Region of the overlay that lands on the image */
  extract: { left: number; top: number; width: number; height: number };
  /** Where that region goes on the image */
  left: number;
  top: number;
}

/**
 * Clip an overlay placed at `at` to the image bounds. Returns null when no
 * part of it is visible.
 */
export function clipOverlay(image: Size, overlay: Size, at: Point): ClippedOverlay | null {
  const srcLeft = Math.max(0, -at.x);
  const srcTop = Math.max(0, -at.y);
  const srcRight = Math.min(overlay.width, image.width - at.x);
  const srcBottom = Math.min(overlay.height, image.height - at.y);

  const width = srcRight - srcLeft;
  const height = srcBottom - srcTop;
  if (width <= 0 || height <= 0) return null;

  return {
    extract: { left: srcLeft, top: srcTop, width, height },
    left: Math.max(0, at.x),
    top: Math.max(0, at.y),
  };
}
