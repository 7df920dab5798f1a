/**
 * Cursor: a position plus the visual column vertical movement aims for.
 *
 * Movement methods take a read view of the document, clamp the current
 * position against it first, and report whether the position changed.
 */

import { ORIGIN, positionsEqual } from "../buffer/position.ts";
import type { CursorLike, Position, TextSnapshot } from "../buffer/types.ts";
import { nextWordStart, previousWordStart } from "../buffer/word-boundary.ts";
import type { Direction, Granularity } from "./types.ts";

export const DEFAULT_TAB_WIDTH = 4;
export const DEFAULT_PAGE_SIZE = 20;

/** Visual column of a character column, expanding tabs to the next tab stop. */
export function charColumnToVisual(line: string, charColumn: number, tabWidth: number): number {
  let visual = 0;
  let index = 0;
  for (const ch of line) {
    if (index >= charColumn) break;
    visual = ch === "\t" ? (Math.floor(visual / tabWidth) + 1) * tabWidth : visual + 1;
    index++;
  }
  return visual;
}

/**
 * Character column at a visual column. A tab spanning the target resolves
 * to the position after the tab.
 */
export function visualColumnToChar(line: string, visualColumn: number, tabWidth: number): number {
  let visual = 0;
  let index = 0;
  for (const ch of line) {
    if (visual >= visualColumn) break;
    visual = ch === "\t" ? (Math.floor(visual / tabWidth) + 1) * tabWidth : visual + 1;
    index++;
  }
  return index;
}

export class Cursor implements CursorLike {
  private _position: Position;
  private _goalColumn: number | undefined = undefined;
  private readonly _tabWidth: number;

  constructor(position: Position = ORIGIN, tabWidth: number = DEFAULT_TAB_WIDTH) {
    this._position = { line: position.line, column: position.column };
    this._tabWidth = tabWidth;
  }

  get position(): Position {
    return this._position;
  }

  /** Visual column kept across consecutive vertical moves. */
  get goalColumn(): number | undefined {
    return this._goalColumn;
  }

  get tabWidth(): number {
    return this._tabWidth;
  }

  setPosition(position: Position): void {
    this._position = { line: position.line, column: position.column };
    this._goalColumn = undefined;
  }

  /** Dispatch a movement by direction and granularity. */
  move(
    view: TextSnapshot,
    direction: Direction,
    granularity: Granularity,
    pageSize: number = DEFAULT_PAGE_SIZE,
  ): boolean {
    switch (granularity) {
      case "character":
        if (direction === "left") return this.moveLeft(view);
        if (direction === "right") return this.moveRight(view);
        return direction === "up" ? this.moveUp(view) : this.moveDown(view);
      case "word":
        if (direction === "left") return this.moveWordLeft(view);
        if (direction === "right") return this.moveWordRight(view);
        return direction === "up" ? this.moveUp(view) : this.moveDown(view);
      case "line":
        if (direction === "left") return this.moveToLineStart(view);
        if (direction === "right") return this.moveToLineEnd(view);
        return direction === "up" ? this.moveUp(view) : this.moveDown(view);
      case "page":
        if (direction === "up") return this.movePageUp(view, pageSize);
        if (direction === "down") return this.movePageDown(view, pageSize);
        return direction === "left" ? this.moveToLineStart(view) : this.moveToLineEnd(view);
      case "buffer":
        return direction === "left" || direction === "up"
          ? this.moveToDocumentStart()
          : this.moveToDocumentEnd(view);
    }
  }

  moveLeft(view: TextSnapshot): boolean {
    const { line, column } = view.clampPosition(this._position);
    if (column > 0) return this._place({ line, column: column - 1 });
    if (line > 0) return this._place(view.lineEndPosition(line - 1));
    return this._place({ line, column });
  }

  moveRight(view: TextSnapshot): boolean {
    const { line, column } = view.clampPosition(this._position);
    if (column < view.lineLength(line)) return this._place({ line, column: column + 1 });
    if (line + 1 < view.lineCount) return this._place({ line: line + 1, column: 0 });
    return this._place({ line, column });
  }

  moveUp(view: TextSnapshot): boolean {
    return this._moveVertically(view, -1);
  }

  moveDown(view: TextSnapshot): boolean {
    return this._moveVertically(view, 1);
  }

  moveWordLeft(view: TextSnapshot): boolean {
    const offset = view.positionToOffset(this._position);
    const target = previousWordStart(view, offset, view.isWordBoundary);
    return this._place(view.offsetToPosition(target));
  }

  moveWordRight(view: TextSnapshot): boolean {
    const offset = view.positionToOffset(this._position);
    const target = nextWordStart(view, offset, view.isWordBoundary);
    return this._place(view.offsetToPosition(target));
  }

  moveToLineStart(view: TextSnapshot): boolean {
    const { line } = view.clampPosition(this._position);
    return this._place({ line, column: 0 });
  }

  moveToLineEnd(view: TextSnapshot): boolean {
    const { line } = view.clampPosition(this._position);
    return this._place(view.lineEndPosition(line));
  }

  moveToDocumentStart(): boolean {
    return this._place(ORIGIN);
  }

  moveToDocumentEnd(view: TextSnapshot): boolean {
    return this._place(view.lineEndPosition(view.lineCount - 1));
  }

  movePageUp(view: TextSnapshot, pageSize: number = DEFAULT_PAGE_SIZE): boolean {
    let moved = false;
    for (let i = 0; i < pageSize; i++) {
      if (!this.moveUp(view)) break;
      moved = true;
    }
    return moved;
  }

  movePageDown(view: TextSnapshot, pageSize: number = DEFAULT_PAGE_SIZE): boolean {
    let moved = false;
    for (let i = 0; i < pageSize; i++) {
      if (!this.moveDown(view)) break;
      moved = true;
    }
    return moved;
  }

  private _moveVertically(view: TextSnapshot, delta: number): boolean {
    const current = view.clampPosition(this._position);
    const target = current.line + delta;
    if (target < 0 || target >= view.lineCount) {
      this._position = current;
      return false;
    }

    const goal =
      this._goalColumn ?? charColumnToVisual(view.line(current.line), current.column, this._tabWidth);
    const column = Math.min(
      visualColumnToChar(view.line(target), goal, this._tabWidth),
      view.lineLength(target),
    );
    this._position = { line: target, column };
    this._goalColumn = goal;
    return true;
  }

  /** Non-vertical moves land here: set the position and forget the goal column. */
  private _place(next: Position): boolean {
    const moved = !positionsEqual(this._position, next);
    this._position = { line: next.line, column: next.column };
    this._goalColumn = undefined;
    return moved;
  }
}
