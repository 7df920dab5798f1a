/**
 * Viewport geometry types.
 *
 * All lines share one height, so every line ↔ pixel conversion is O(1).
 */

// =============================================================================
// Measurement Types
// =============================================================================

/** Fixed measurements of the monospace grid. */
export interface Measurements {
  /** Height of each line in pixels */
  readonly lineHeight: number;
  /** Width of a single character in pixels */
  readonly charWidth: number;
}

export interface ViewportSize {
  readonly width: number;
  readonly height: number;
}

/** Scroll offset in pixels. Fractional values are allowed. */
export interface ScrollOffset {
  readonly x: number;
  readonly y: number;
}

// =============================================================================
// Visible Lines
// =============================================================================

/** Candidate line range [start, end), end exclusive. */
export interface VisibleLineRange {
  readonly start: number;
  readonly end: number;
}

/** How much of one line shows inside the viewport. */
export interface PartialLineView {
  readonly lineIndex: number;
  /** Line top relative to the viewport top; negative when clipped above. */
  readonly yOffset: number;
  /** Pixels hidden above the viewport top */
  readonly clipTop: number;
  /** Pixels hidden below the viewport bottom */
  readonly clipBottom: number;
  /** Visible height / line height, in (0, 1] */
  readonly visibleFraction: number;
}

/** Where to position a target line when scrolling to it. */
export type ScrollStrategy = "top" | "center" | "bottom" | "nearest";

export interface ViewportOptions {
  readonly width?: number;
  readonly height?: number;
  readonly charWidth?: number;
  readonly lineHeight?: number;
  readonly lineCount?: number;
}
