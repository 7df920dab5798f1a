/**
 * ViewportGeometry: scroll state plus the partial-line layout derived from it.
 *
 * The partial line list is cached and recomputed whenever an input changes
 * (size, scroll offset, character dimensions, line count).
 */

import { debugLog } from "../debug.ts";
import { ViewportError } from "../errors.ts";
import {
  calculateContentHeight,
  calculatePartialLines,
  calculateScrollTop,
  calculateVisibleLines,
  clampScroll,
  lineToY,
} from "./measurement.ts";
import type {
  Measurements,
  PartialLineView,
  ScrollOffset,
  ScrollStrategy,
  ViewportOptions,
  ViewportSize,
  VisibleLineRange,
} from "./types.ts";

export const DEFAULT_VIEWPORT_WIDTH = 800;
export const DEFAULT_VIEWPORT_HEIGHT = 600;
export const DEFAULT_CHAR_WIDTH = 8;
export const DEFAULT_LINE_HEIGHT = 18;

function assertSize(width: number, height: number): void {
  if (!Number.isFinite(width) || !Number.isFinite(height) || width < 0 || height < 0) {
    throw new ViewportError(`Invalid viewport size: ${width}x${height}`);
  }
}

function assertCharDimensions(charWidth: number, lineHeight: number): void {
  if (!Number.isFinite(charWidth) || charWidth <= 0) {
    throw new ViewportError(`Invalid character width: ${charWidth}`);
  }
  if (!Number.isFinite(lineHeight) || lineHeight <= 0) {
    throw new ViewportError(`Invalid line height: ${lineHeight}`);
  }
}

function assertScrollOffset(x: number, y: number): void {
  if (!Number.isFinite(x) || !Number.isFinite(y)) {
    throw new ViewportError(`Invalid scroll offset: ${x}, ${y}`);
  }
}

export class ViewportGeometry {
  private _width: number;
  private _height: number;
  private _charWidth: number;
  private _lineHeight: number;
  private _lineCount: number;
  private _scrollX = 0;
  private _scrollY = 0;
  private _partialLines: readonly PartialLineView[] = [];

  constructor(options: ViewportOptions = {}) {
    const width = options.width ?? DEFAULT_VIEWPORT_WIDTH;
    const height = options.height ?? DEFAULT_VIEWPORT_HEIGHT;
    const charWidth = options.charWidth ?? DEFAULT_CHAR_WIDTH;
    const lineHeight = options.lineHeight ?? DEFAULT_LINE_HEIGHT;
    assertSize(width, height);
    assertCharDimensions(charWidth, lineHeight);
    this._width = width;
    this._height = height;
    this._charWidth = charWidth;
    this._lineHeight = lineHeight;
    this._lineCount = Math.max(1, Math.floor(options.lineCount ?? 1));
    this._recompute();
  }

  // ─── Read side ───────────────────────────────────────────────────

  get size(): ViewportSize {
    return { width: this._width, height: this._height };
  }

  get scrollOffset(): ScrollOffset {
    return { x: this._scrollX, y: this._scrollY };
  }

  get measurements(): Measurements {
    return { lineHeight: this._lineHeight, charWidth: this._charWidth };
  }

  get lineCount(): number {
    return this._lineCount;
  }

  get contentHeight(): number {
    return calculateContentHeight(this._lineCount, this._lineHeight);
  }

  /** Candidate line range [start, end) for the current scroll offset. */
  get visibleLines(): VisibleLineRange {
    return calculateVisibleLines(this._scrollY, this._height, this._lineHeight, this._lineCount);
  }

  get partialLines(): readonly PartialLineView[] {
    return this._partialLines;
  }

  /** True when any part of the line shows. */
  isLineVisible(line: number): boolean {
    return this._partialLines.some((view) => view.lineIndex === line);
  }

  /** True when the character cell at (line, column) is fully inside the viewport. */
  isPositionVisible(line: number, column: number): boolean {
    const top = lineToY(line, this._lineHeight);
    const left = column * this._charWidth;
    return (
      top >= this._scrollY &&
      top + this._lineHeight <= this._scrollY + this._height &&
      left >= this._scrollX &&
      left + this._charWidth <= this._scrollX + this._width
    );
  }

  // ─── Inputs ──────────────────────────────────────────────────────

  setSize(width: number, height: number): void {
    assertSize(width, height);
    this._width = width;
    this._height = height;
    this._recompute();
  }

  /** Set the raw scroll offset. Use clampScrollOffset to keep it in range. */
  setScrollOffset(x: number, y: number): void {
    assertScrollOffset(x, y);
    this._scrollX = x;
    this._scrollY = y;
    this._recompute();
  }

  setCharDimensions(charWidth: number, lineHeight: number): void {
    assertCharDimensions(charWidth, lineHeight);
    this._charWidth = charWidth;
    this._lineHeight = lineHeight;
    this._recompute();
  }

  setLineCount(lineCount: number): void {
    const next = Math.max(1, Math.floor(lineCount));
    if (next === this._lineCount) return;
    this._lineCount = next;
    const clamped = this.clampScrollOffset(this.scrollOffset);
    this._scrollX = clamped.x;
    this._scrollY = clamped.y;
    this._recompute();
  }

  /**
   * Clamp an offset: x never goes negative (line widths are not tracked),
   * y stays within [0, contentHeight − height].
   */
  clampScrollOffset(offset: ScrollOffset): ScrollOffset {
    return {
      x: Math.max(0, offset.x),
      y: clampScroll(offset.y, this.contentHeight, this._height),
    };
  }

  /** Scroll by a delta, clamped. Returns the new offset. */
  scrollBy(deltaX: number, deltaY: number): ScrollOffset {
    assertScrollOffset(deltaX, deltaY);
    const next = this.clampScrollOffset({ x: this._scrollX + deltaX, y: this._scrollY + deltaY });
    this.setScrollOffset(next.x, next.y);
    return next;
  }

  /** Scroll so `line` sits where `strategy` says, clamped. Returns the new scroll top. */
  scrollToLine(line: number, strategy: ScrollStrategy = "top"): number {
    const target = calculateScrollTop(line, strategy, this._scrollY, this._height, this._lineHeight);
    const y = clampScroll(target, this.contentHeight, this._height);
    if (y !== this._scrollY) {
      debugLog(`[Viewport] scroll to line ${line} (${strategy}) → ${y}`);
      this._scrollY = y;
      this._recompute();
    }
    return y;
  }

  private _recompute(): void {
    this._partialLines = calculatePartialLines(
      this._scrollY,
      this._height,
      this._lineHeight,
      this._lineCount,
    );
  }
}
