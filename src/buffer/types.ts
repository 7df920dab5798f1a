/**
 * Core types for the text buffer.
 */

// =============================================================================
// Positions & Ranges
// =============================================================================

/**
 * A location in a document. `column` counts characters (code points) from the
 * start of the line, not UTF-16 units and not visual cells.
 */
export interface Position {
  readonly line: number;
  readonly column: number;
}

/**
 * A range between two positions. Built through `selectionFromPositions`,
 * `start` never comes after `end`.
 */
export interface Selection {
  readonly start: Position;
  readonly end: Position;
}

// =============================================================================
// Read Views
// =============================================================================

/** True when a character separates words. */
export type WordBoundaryPredicate = (ch: string) => boolean;

/** Character access by offset, used by word scanning. */
export interface CharSource {
  readonly length: number;
  /** The character starting at an offset, or "" at the end. */
  charAt(offset: number): string;
  /** The character ending at an offset, or "" at the start. */
  charBefore(offset: number): string;
}

/**
 * Immutable read view of a document at one point in time.
 * Positions passed in are clamped; offsets are UTF-16 code units.
 */
export interface TextSnapshot extends CharSource {
  readonly lineCount: number;
  readonly isWordBoundary: WordBoundaryPredicate;
  text(): string;
  /** Line content without terminator, "" out of range. */
  line(row: number): string;
  /** Characters on a line, terminator excluded. 0 out of range. */
  lineLength(row: number): number;
  slice(start: number, end: number): string;
  positionToOffset(position: Position): number;
  offsetToPosition(offset: number): Position;
  clampPosition(position: Position): Position;
  /** Position just past the content of a line. */
  lineEndPosition(row: number): Position;
}

/** Anything that carries a position the buffer repositions after an edit. */
export interface CursorLike {
  readonly position: Position;
  setPosition(position: Position): void;
}

/** Summary statistics of a document. */
export interface TextSummary {
  readonly lines: number;
  /** Characters (code points). */
  readonly chars: number;
  /** UTF-8 byte length. */
  readonly bytes: number;
  /** Characters on the last line. */
  readonly lastLineLength: number;
}

// =============================================================================
// Buffer
// =============================================================================

export interface TextBufferOptions {
  /** Undo entries kept before the oldest is dropped. */
  readonly maxUndoLevels?: number;
  readonly isWordBoundary?: WordBoundaryPredicate;
}

/**
 * A mutable document with bounded undo/redo.
 *
 * Every mutation that changes the text records one undo entry (the previous
 * text plus the cursor position before the edit), marks the buffer modified
 * and clears redo.
 */
export interface TextBuffer {
  readonly lineCount: number;
  /** Characters (code points). */
  readonly charCount: number;
  readonly isModified: boolean;
  readonly canUndo: boolean;
  readonly canRedo: boolean;
  readonly undoDepth: number;
  readonly redoDepth: number;
  readonly maxUndoLevels: number;

  text(): string;
  line(row: number): string | undefined;
  lineLength(row: number): number;
  summary(): TextSummary;
  snapshot(): TextSnapshot;
  positionToOffset(position: Position): number;
  offsetToPosition(offset: number): Position;
  markSaved(): void;

  insertChar(position: Position, ch: string, cursor: CursorLike): boolean;
  insertText(position: Position, text: string, cursor: CursorLike): boolean;
  deleteChar(position: Position, cursor: CursorLike): boolean;
  deleteCharBackward(position: Position, cursor: CursorLike): boolean;
  deleteLine(line: number, cursor: CursorLike): boolean;
  deleteSelection(selection: Selection, cursor: CursorLike): string;
  replaceSelection(selection: Selection, text: string, cursor: CursorLike): boolean;
  deleteWordForward(cursor: CursorLike): boolean;
  deleteWordBackward(cursor: CursorLike): boolean;
  deleteToLineEnd(cursor: CursorLike): boolean;
  deleteToLineStart(cursor: CursorLike): boolean;

  undo(cursor: CursorLike): boolean;
  redo(cursor: CursorLike): boolean;

  find(pattern: string): Position[];
  replaceAll(pattern: string, replacement: string, cursor: CursorLike): number;
}
