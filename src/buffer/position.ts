/**
 * Position arithmetic: comparison, validation, and Position ↔ offset
 * resolution against a rope.
 */

import { InvalidPositionError } from "../errors.ts";
import type { Rope } from "./rope.ts";
import type { Position } from "./types.ts";
import { codePointLength, columnToUnits } from "./unicode.ts";

export const ORIGIN: Position = { line: 0, column: 0 };

export function position(line: number, column: number): Position {
  return { line, column };
}

export function comparePositions(a: Position, b: Position): number {
  if (a.line !== b.line) return a.line - b.line;
  return a.column - b.column;
}

export function positionsEqual(a: Position, b: Position): boolean {
  return a.line === b.line && a.column === b.column;
}

/** Non-negative integer coordinates. Anything else cannot be resolved. */
export function isRepresentablePosition(p: Position): boolean {
  return (
    Number.isSafeInteger(p.line) && p.line >= 0 && Number.isSafeInteger(p.column) && p.column >= 0
  );
}

export function assertRepresentablePosition(p: Position): void {
  if (!isRepresentablePosition(p)) {
    throw new InvalidPositionError(p.line, p.column);
  }
}

/**
 * Resolve a position to an offset. The line is clamped to the last line and
 * the column to the line's content length.
 */
export function positionToOffset(rope: Rope, p: Position): number {
  assertRepresentablePosition(p);
  const line = Math.min(p.line, rope.lineCount - 1);
  const start = rope.lineStart(line);
  return start + columnToUnits(rope.slice(start, rope.lineEnd(line)), p.column);
}

/** Position of an offset, clamped into the document. */
export function offsetToPosition(rope: Rope, offset: number): Position {
  const o = Number.isNaN(offset) ? 0 : Math.min(Math.max(0, Math.floor(offset)), rope.length);
  const line = rope.lineOfOffset(o);
  return { line, column: codePointLength(rope.slice(rope.lineStart(line), o)) };
}

export function clampPosition(rope: Rope, p: Position): Position {
  return offsetToPosition(rope, positionToOffset(rope, p));
}
