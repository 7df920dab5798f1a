/**
 * Pure viewport calculation functions.
 * All assume fixed-height lines for O(1) position math.
 */

import type { PartialLineView, ScrollStrategy, VisibleLineRange } from "./types.ts";

/**
 * Candidate line range touched by the viewport:
 * [floor(scrollY / lineHeight), ceil((scrollY + height) / lineHeight)),
 * clipped to `totalLines` when given.
 */
export function calculateVisibleLines(
  scrollY: number,
  viewportHeight: number,
  lineHeight: number,
  totalLines?: number,
): VisibleLineRange {
  let start = Math.max(0, Math.floor(scrollY / lineHeight));
  let end = Math.max(start, Math.ceil((scrollY + viewportHeight) / lineHeight));
  if (totalLines !== undefined) {
    end = Math.min(end, Math.max(0, totalLines));
    start = Math.min(start, end);
  }
  return { start, end };
}

/**
 * Per-line visibility for every candidate line with a positive visible
 * height. Lines cut by the top or bottom edge report their clipped pixels.
 */
export function calculatePartialLines(
  scrollY: number,
  viewportHeight: number,
  lineHeight: number,
  totalLines?: number,
): PartialLineView[] {
  const { start, end } = calculateVisibleLines(scrollY, viewportHeight, lineHeight, totalLines);
  const viewportBottom = scrollY + viewportHeight;
  const views: PartialLineView[] = [];

  for (let lineIndex = start; lineIndex < end; lineIndex++) {
    const lineTop = lineIndex * lineHeight;
    const lineBottom = lineTop + lineHeight;
    const clipTop = Math.max(0, scrollY - lineTop);
    const clipBottom = Math.max(0, lineBottom - viewportBottom);
    const visible = lineHeight - clipTop - clipBottom;
    if (visible <= 0) continue;
    views.push({
      lineIndex,
      yOffset: lineTop - scrollY,
      clipTop,
      clipBottom,
      visibleFraction: visible / lineHeight,
    });
  }
  return views;
}

/**
 * Clamp a scroll offset along one axis to [0, content − viewport], or 0 when
 * the content fits.
 */
export function clampScroll(proposed: number, contentExtent: number, viewportExtent: number): number {
  if (contentExtent <= viewportExtent) return 0;
  return Math.min(Math.max(0, proposed), contentExtent - viewportExtent);
}

/** Total content height in pixels. */
export function calculateContentHeight(totalLines: number, lineHeight: number): number {
  return totalLines * lineHeight;
}

/** Top of a line in content pixels. */
export function lineToY(line: number, lineHeight: number): number {
  return line * lineHeight;
}

/** Line under a content Y coordinate. */
export function yToLine(y: number, lineHeight: number): number {
  return Math.max(0, Math.floor(y / lineHeight));
}

/** Convert pixel X coordinate to a column number. */
export function xToColumn(x: number, charWidth: number, gutterWidth = 0): number {
  return Math.max(0, Math.floor((x - gutterWidth) / charWidth));
}

/**
 * Unclamped scroll top that places `line` according to `strategy`.
 * "nearest" keeps the current offset when the line is already fully visible.
 */
export function calculateScrollTop(
  line: number,
  strategy: ScrollStrategy,
  currentScrollTop: number,
  viewportHeight: number,
  lineHeight: number,
): number {
  const lineTop = lineToY(line, lineHeight);
  switch (strategy) {
    case "top":
      return lineTop;
    case "center":
      return lineTop - (viewportHeight - lineHeight) / 2;
    case "bottom":
      return lineTop + lineHeight - viewportHeight;
    case "nearest": {
      if (lineTop < currentScrollTop) return lineTop;
      const lineBottom = lineTop + lineHeight;
      if (lineBottom > currentScrollTop + viewportHeight) return lineBottom - viewportHeight;
      return currentScrollTop;
    }
  }
}
