/**
 * Selection helpers: pure functions over a normalized {start, end} range.
 */

import { comparePositions, positionsEqual } from "../buffer/position.ts";
import type { Position, Selection, TextSnapshot } from "../buffer/types.ts";

/** Build a selection from two positions in either order. */
export function selectionFromPositions(a: Position, b: Position): Selection {
  return comparePositions(a, b) <= 0 ? { start: a, end: b } : { start: b, end: a };
}

export function isSelectionEmpty(selection: Selection): boolean {
  return positionsEqual(selection.start, selection.end);
}

/** Inclusive at both ends. An empty selection contains nothing. */
export function selectionContains(selection: Selection, p: Position): boolean {
  if (isSelectionEmpty(selection)) return false;
  return comparePositions(p, selection.start) >= 0 && comparePositions(p, selection.end) <= 0;
}

/** Widen whichever end `p` lies beyond. */
export function extendSelectionTo(selection: Selection, p: Position): Selection {
  if (comparePositions(p, selection.start) < 0) return { start: p, end: selection.end };
  if (comparePositions(p, selection.end) > 0) return { start: selection.start, end: p };
  return selection;
}

export function selectionsEqual(a: Selection | undefined, b: Selection | undefined): boolean {
  if (!a || !b) return a === b;
  return positionsEqual(a.start, b.start) && positionsEqual(a.end, b.end);
}

/**
 * A whole line including its terminator, ending at the start of the next
 * line. The last line ends at its content end.
 */
export function selectLine(view: TextSnapshot, line: number): Selection | undefined {
  if (!Number.isInteger(line) || line < 0 || line >= view.lineCount) return undefined;
  const start = { line, column: 0 };
  if (line + 1 < view.lineCount) return { start, end: { line: line + 1, column: 0 } };
  return { start, end: view.lineEndPosition(line) };
}

/** The word under `p`, or undefined on a boundary character or at the end. */
export function selectWordAt(view: TextSnapshot, p: Position): Selection | undefined {
  const offset = view.positionToOffset(p);
  const ch = view.charAt(offset);
  if (ch.length === 0 || view.isWordBoundary(ch)) return undefined;

  let start = offset;
  while (start > 0) {
    const prev = view.charBefore(start);
    if (view.isWordBoundary(prev)) break;
    start -= prev.length;
  }
  let end = offset;
  while (end < view.length) {
    const next = view.charAt(end);
    if (view.isWordBoundary(next)) break;
    end += next.length;
  }
  return { start: view.offsetToPosition(start), end: view.offsetToPosition(end) };
}

export function selectAll(view: TextSnapshot): Selection {
  return { start: { line: 0, column: 0 }, end: view.lineEndPosition(view.lineCount - 1) };
}

/** Resolved offsets, ordered. */
export function selectionToOffsets(
  view: TextSnapshot,
  selection: Selection,
): { start: number; end: number } {
  const a = view.positionToOffset(selection.start);
  const b = view.positionToOffset(selection.end);
  return a <= b ? { start: a, end: b } : { start: b, end: a };
}

export function selectionText(view: TextSnapshot, selection: Selection): string {
  if (isSelectionEmpty(selection)) return "";
  const { start, end } = selectionToOffsets(view, selection);
  return view.slice(start, end);
}
