/**
 * Bounded, branch-free undo history of whole-document snapshots.
 */

import type { Rope } from "./rope.ts";
import type { Position } from "./types.ts";

export const DEFAULT_MAX_UNDO_LEVELS = 100;

export interface HistoryEntry {
  readonly rope: Rope;
  readonly cursor: Position;
}

export class UndoHistory {
  private readonly _maxLevels: number;
  private readonly _undo: HistoryEntry[] = [];
  private readonly _redo: HistoryEntry[] = [];

  constructor(maxLevels: number = DEFAULT_MAX_UNDO_LEVELS) {
    this._maxLevels = Math.max(1, Math.floor(maxLevels));
  }

  get maxLevels(): number {
    return this._maxLevels;
  }

  get undoDepth(): number {
    return this._undo.length;
  }

  get redoDepth(): number {
    return this._redo.length;
  }

  /** Record the state before an edit. Any new edit invalidates redo. */
  record(entry: HistoryEntry): void {
    this._pushUndo(entry);
    this._redo.length = 0;
  }

  /** Pop the latest entry, parking `current` on the redo stack. */
  undo(current: HistoryEntry): HistoryEntry | undefined {
    const entry = this._undo.pop();
    if (!entry) return undefined;
    this._redo.push(current);
    return entry;
  }

  redo(current: HistoryEntry): HistoryEntry | undefined {
    const entry = this._redo.pop();
    if (!entry) return undefined;
    this._pushUndo(current);
    return entry;
  }

  clear(): void {
    this._undo.length = 0;
    this._redo.length = 0;
  }

  private _pushUndo(entry: HistoryEntry): void {
    this._undo.push(entry);
    if (this._undo.length > this._maxLevels) {
      this._undo.splice(0, this._undo.length - this._maxLevels);
    }
  }
}
