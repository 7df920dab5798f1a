/**
 * TextBuffer: a rope-backed document with bounded undo/redo.
 *
 * Each mutation computes the next rope before touching any state, so a
 * thrown InvalidPositionError leaves the buffer exactly as it was.
 * Snapshots are cheap: a rope is immutable and shares its chunks.
 */

import { debugLog } from "../debug.ts";
import { UndoHistory } from "./history.ts";
import {
  assertRepresentablePosition,
  clampPosition,
  isRepresentablePosition,
  offsetToPosition,
  positionToOffset,
} from "./position.ts";
import { Rope } from "./rope.ts";
import type {
  CursorLike,
  Position,
  Selection,
  TextBuffer,
  TextBufferOptions,
  TextSnapshot,
  TextSummary,
  WordBoundaryPredicate,
} from "./types.ts";
import { codePointLength, utf8ByteLength } from "./unicode.ts";
import { isWordBoundary, nextWordStart, previousWordStart } from "./word-boundary.ts";

// =============================================================================
// Helpers
// =============================================================================

function computeTextSummary(rope: Rope): TextSummary {
  const text = rope.text();
  return {
    lines: rope.lineCount,
    chars: codePointLength(text),
    bytes: utf8ByteLength(text),
    lastLineLength: codePointLength(rope.line(rope.lineCount - 1)),
  };
}

function selectionOffsets(rope: Rope, selection: Selection): { start: number; end: number } {
  const a = positionToOffset(rope, selection.start);
  const b = positionToOffset(rope, selection.end);
  return a <= b ? { start: a, end: b } : { start: b, end: a };
}

// =============================================================================
// TextSnapshot
// =============================================================================

class TextSnapshotImpl implements TextSnapshot {
  readonly isWordBoundary: WordBoundaryPredicate;
  private readonly _rope: Rope;

  constructor(rope: Rope, isBoundary: WordBoundaryPredicate) {
    this._rope = rope;
    this.isWordBoundary = isBoundary;
  }

  get length(): number {
    return this._rope.length;
  }

  get lineCount(): number {
    return this._rope.lineCount;
  }

  text(): string {
    return this._rope.text();
  }

  line(row: number): string {
    return this._rope.line(row);
  }

  lineLength(row: number): number {
    return codePointLength(this._rope.line(row));
  }

  slice(start: number, end: number): string {
    return this._rope.slice(start, end);
  }

  charAt(offset: number): string {
    return this._rope.charAt(offset);
  }

  charBefore(offset: number): string {
    return this._rope.charBefore(offset);
  }

  positionToOffset(position: Position): number {
    return positionToOffset(this._rope, position);
  }

  offsetToPosition(offset: number): Position {
    return offsetToPosition(this._rope, offset);
  }

  clampPosition(position: Position): Position {
    return clampPosition(this._rope, position);
  }

  lineEndPosition(row: number): Position {
    const line = Math.min(Math.max(0, row), this._rope.lineCount - 1);
    return { line, column: this.lineLength(line) };
  }
}

// =============================================================================
// TextBuffer
// =============================================================================

class TextBufferImpl implements TextBuffer {
  private _rope: Rope;
  private _modified = false;
  private readonly _history: UndoHistory;
  private readonly _isBoundary: WordBoundaryPredicate;

  constructor(text: string, options: TextBufferOptions) {
    this._rope = Rope.from(text);
    this._history = new UndoHistory(options.maxUndoLevels);
    this._isBoundary = options.isWordBoundary ?? isWordBoundary;
  }

  get lineCount(): number {
    return this._rope.lineCount;
  }

  get charCount(): number {
    return codePointLength(this._rope.text());
  }

  get isModified(): boolean {
    return this._modified;
  }

  get canUndo(): boolean {
    return this._history.undoDepth > 0;
  }

  get canRedo(): boolean {
    return this._history.redoDepth > 0;
  }

  get undoDepth(): number {
    return this._history.undoDepth;
  }

  get redoDepth(): number {
    return this._history.redoDepth;
  }

  get maxUndoLevels(): number {
    return this._history.maxLevels;
  }

  text(): string {
    return this._rope.text();
  }

  line(row: number): string | undefined {
    if (!Number.isInteger(row) || row < 0 || row >= this._rope.lineCount) return undefined;
    return this._rope.line(row);
  }

  lineLength(row: number): number {
    return codePointLength(this._rope.line(row));
  }

  summary(): TextSummary {
    return computeTextSummary(this._rope);
  }

  snapshot(): TextSnapshot {
    return new TextSnapshotImpl(this._rope, this._isBoundary);
  }

  positionToOffset(position: Position): number {
    return positionToOffset(this._rope, position);
  }

  offsetToPosition(offset: number): Position {
    return offsetToPosition(this._rope, offset);
  }

  markSaved(): void {
    this._modified = false;
  }

  // ─── Insertion ───────────────────────────────────────────────────

  insertChar(position: Position, ch: string, cursor: CursorLike): boolean {
    return this.insertText(position, ch, cursor);
  }

  insertText(position: Position, text: string, cursor: CursorLike): boolean {
    const offset = positionToOffset(this._rope, position);
    if (text.length === 0) return false;
    const next = this._rope.insert(offset, text);
    this._commit(next, cursor);
    cursor.setPosition(offsetToPosition(next, offset + text.length));
    return true;
  }

  // ─── Deletion ────────────────────────────────────────────────────

  deleteChar(position: Position, cursor: CursorLike): boolean {
    const offset = positionToOffset(this._rope, position);
    const ch = this._rope.charAt(offset);
    if (ch.length === 0) return false;
    this._commit(this._rope.delete(offset, offset + ch.length), cursor);
    return true;
  }

  deleteCharBackward(position: Position, cursor: CursorLike): boolean {
    const offset = positionToOffset(this._rope, position);
    const ch = this._rope.charBefore(offset);
    if (ch.length === 0) return false;
    const start = offset - ch.length;
    const next = this._rope.delete(start, offset);
    this._commit(next, cursor);
    cursor.setPosition(offsetToPosition(next, start));
    return true;
  }

  deleteLine(line: number, cursor: CursorLike): boolean {
    assertRepresentablePosition({ line, column: 0 });
    if (line >= this._rope.lineCount) return false;

    const start = this._rope.lineStart(line);
    const isLast = line === this._rope.lineCount - 1;
    const end = isLast ? this._rope.length : this._rope.lineStart(line + 1);
    if (start === end) return false;

    const next = this._rope.delete(start, end);
    this._commit(next, cursor);
    cursor.setPosition({ line: Math.min(line, next.lineCount - 1), column: 0 });
    return true;
  }

  deleteSelection(selection: Selection, cursor: CursorLike): string {
    const { start, end } = selectionOffsets(this._rope, selection);
    if (start === end) return "";
    const removed = this._rope.slice(start, end);
    const next = this._rope.delete(start, end);
    this._commit(next, cursor);
    cursor.setPosition(offsetToPosition(next, start));
    return removed;
  }

  replaceSelection(selection: Selection, text: string, cursor: CursorLike): boolean {
    const { start, end } = selectionOffsets(this._rope, selection);
    if (start === end && text.length === 0) return false;
    const next = this._rope.replace(start, end, text);
    if (next.length === this._rope.length && next.text() === this._rope.text()) return false;
    this._commit(next, cursor);
    cursor.setPosition(offsetToPosition(next, start + text.length));
    return true;
  }

  deleteWordForward(cursor: CursorLike): boolean {
    const start = positionToOffset(this._rope, cursor.position);
    const end = nextWordStart(this._rope, start, this._isBoundary);
    if (end <= start) return false;
    this._commit(this._rope.delete(start, end), cursor);
    return true;
  }

  deleteWordBackward(cursor: CursorLike): boolean {
    const end = positionToOffset(this._rope, cursor.position);
    const start = previousWordStart(this._rope, end, this._isBoundary);
    if (start >= end) return false;
    const next = this._rope.delete(start, end);
    this._commit(next, cursor);
    cursor.setPosition(offsetToPosition(next, start));
    return true;
  }

  deleteToLineEnd(cursor: CursorLike): boolean {
    const start = positionToOffset(this._rope, cursor.position);
    const end = this._rope.lineEnd(this._rope.lineOfOffset(start));
    if (end <= start) return false;
    this._commit(this._rope.delete(start, end), cursor);
    return true;
  }

  deleteToLineStart(cursor: CursorLike): boolean {
    const end = positionToOffset(this._rope, cursor.position);
    const line = this._rope.lineOfOffset(end);
    const start = this._rope.lineStart(line);
    if (start >= end) return false;
    this._commit(this._rope.delete(start, end), cursor);
    cursor.setPosition({ line, column: 0 });
    return true;
  }

  // ─── History ─────────────────────────────────────────────────────

  undo(cursor: CursorLike): boolean {
    const entry = this._history.undo({ rope: this._rope, cursor: cursor.position });
    if (!entry) return false;
    this._rope = entry.rope;
    this._modified = true;
    cursor.setPosition(entry.cursor);
    debugLog(`[TextBuffer] undo (${this._history.undoDepth} left)`);
    return true;
  }

  redo(cursor: CursorLike): boolean {
    const entry = this._history.redo({ rope: this._rope, cursor: cursor.position });
    if (!entry) return false;
    this._rope = entry.rope;
    this._modified = true;
    cursor.setPosition(entry.cursor);
    debugLog(`[TextBuffer] redo (${this._history.redoDepth} left)`);
    return true;
  }

  // ─── Search ──────────────────────────────────────────────────────

  find(pattern: string): Position[] {
    if (pattern.length === 0) return [];
    const results: Position[] = [];
    for (let row = 0; row < this._rope.lineCount; row++) {
      const line = this._rope.line(row);
      let from = 0;
      let index = line.indexOf(pattern, from);
      while (index !== -1) {
        results.push({ line: row, column: codePointLength(line.slice(0, index)) });
        from = index + pattern.length;
        index = line.indexOf(pattern, from);
      }
    }
    return results;
  }

  replaceAll(pattern: string, replacement: string, cursor: CursorLike): number {
    if (pattern.length === 0) return 0;
    const parts = this._rope.text().split(pattern);
    const count = parts.length - 1;
    if (count === 0 || pattern === replacement) return 0;

    const next = Rope.from(parts.join(replacement));
    this._commit(next, cursor);
    const current = cursor.position;
    if (isRepresentablePosition(current)) {
      cursor.setPosition(clampPosition(next, current));
    }
    debugLog(`[TextBuffer] replaced ${count} occurrence(s)`);
    return count;
  }

  private _commit(next: Rope, cursor: CursorLike): void {
    this._history.record({ rope: this._rope, cursor: cursor.position });
    this._rope = next;
    this._modified = true;
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createTextBuffer(text = "", options: TextBufferOptions = {}): TextBuffer {
  return new TextBufferImpl(text, options);
}
