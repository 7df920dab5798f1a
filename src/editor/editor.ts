/**
 * Editor: the command dispatcher that ties buffer, cursor, selection,
 * clipboard and viewport together.
 *
 * `dispatch` is total: every command yields a response, and anything a
 * handler throws comes back as an `error` response. Handlers validate their
 * input before mutating, so a failed command leaves the state untouched.
 */

import {
  assertRepresentablePosition,
  comparePositions,
  ORIGIN,
  positionsEqual,
} from "../buffer/position.ts";
import { createTextBuffer } from "../buffer/text-buffer.ts";
import type { Position, Selection, TextBuffer } from "../buffer/types.ts";
import { codePointLength } from "../buffer/unicode.ts";
import { createWordBoundaryPredicate } from "../buffer/word-boundary.ts";
import { resolveConfig } from "../config/config.ts";
import type { EditorConfig, EditorConfigInput } from "../config/schema.ts";
import { debugLog, setDebugEnabled } from "../debug.ts";
import { errorMessage } from "../errors.ts";
import { ViewportGeometry } from "../viewport/geometry.ts";
import { Cursor } from "./cursor.ts";
import {
  isSelectionEmpty,
  selectAll,
  selectionFromPositions,
  selectionText,
  selectLine,
  selectWordAt,
} from "./selection.ts";
import type {
  ChangeListener,
  Direction,
  EditorCommand,
  EditorResponse,
  Granularity,
} from "./types.ts";

const SUCCESS: EditorResponse = { type: "success" };
const TEXT_CHANGED: EditorResponse = { type: "textChanged" };

function textResponse(changed: boolean): EditorResponse {
  return changed ? TEXT_CHANGED : SUCCESS;
}

export class Editor {
  readonly config: EditorConfig;
  private _buffer: TextBuffer;
  private readonly _cursor: Cursor;
  private _selection: Selection | undefined = undefined;
  private _clipboard = "";
  private _lastSearch: string | undefined = undefined;
  private readonly _viewport: ViewportGeometry;
  private _onChange: ChangeListener | null = null;

  /** Throws ConfigError when `config` does not match the schema. */
  constructor(text = "", config: EditorConfigInput = {}) {
    this.config = resolveConfig(config);
    if (this.config.debug) setDebugEnabled(true);
    this._buffer = this._createBuffer(text);
    this._cursor = new Cursor(ORIGIN, this.config.tabWidth);
    this._viewport = new ViewportGeometry({
      ...this.config.viewport,
      lineCount: this._buffer.lineCount,
    });
  }

  get text(): string {
    return this._buffer.text();
  }

  get cursor(): Position {
    return this._cursor.position;
  }

  get selection(): Selection | undefined {
    return this._selection;
  }

  get clipboard(): string {
    return this._clipboard;
  }

  get buffer(): TextBuffer {
    return this._buffer;
  }

  get viewport(): ViewportGeometry {
    return this._viewport;
  }

  /** Set a callback notified with the response of every dispatched command. */
  onChange(listener: ChangeListener | null): void {
    this._onChange = listener;
  }

  /** Replace the document. Cursor, selection and history are reset. */
  setText(text: string): void {
    this._buffer = this._createBuffer(text);
    this._cursor.setPosition(ORIGIN);
    this._selection = undefined;
    this._lastSearch = undefined;
    this._viewport.setLineCount(this._buffer.lineCount);
    this._viewport.setScrollOffset(0, 0);
  }

  clear(): void {
    this.setText("");
  }

  /** Execute a command. */
  dispatch(command: EditorCommand): EditorResponse {
    const before = this._cursor.position;
    let response: EditorResponse;
    try {
      response = this._execute(command);
    } catch (err) {
      const message = errorMessage(err);
      debugLog(`[Editor] ${command.type} failed: ${message}`);
      response = { type: "error", message };
    }

    this._viewport.setLineCount(this._buffer.lineCount);
    if (response.type === "textChanged" || !positionsEqual(before, this._cursor.position)) {
      this._viewport.scrollToLine(this._cursor.position.line, "nearest");
    }

    try {
      this._onChange?.(response);
    } catch (err) {
      debugLog(`[Editor] change listener failed: ${errorMessage(err)}`);
    }
    return response;
  }

  private _execute(command: EditorCommand): EditorResponse {
    switch (command.type) {
      case "insertChar":
        return this._insert(command.char);
      case "insertText":
        return this._insert(command.text);
      case "paste":
        return this._insert(this._clipboard);
      case "deleteChar":
        return this._deleteChar("forward");
      case "deleteCharBackward":
        return this._deleteChar("backward");
      case "deleteWordForward":
        return this._edit(() => this._buffer.deleteWordForward(this._cursor));
      case "deleteWordBackward":
        return this._edit(() => this._buffer.deleteWordBackward(this._cursor));
      case "deleteToLineEnd":
        return this._edit(() => this._buffer.deleteToLineEnd(this._cursor));
      case "deleteToLineStart":
        return this._edit(() => this._buffer.deleteToLineStart(this._cursor));
      case "deleteLine":
        return this._edit(() =>
          this._buffer.deleteLine(this._cursor.position.line, this._cursor),
        );
      case "deleteSelection":
        return this._deleteSelection();
      case "moveCursor":
        return this._moveCursor(command.direction, command.granularity);
      case "moveCursorWithSelection":
        return this._extendSelection(command.direction, command.granularity);
      case "moveCursorTo":
        return this._moveCursorTo(command.position);
      case "setSelection":
        return this._setSelection(command.start, command.end);
      case "startSelection":
        this._selection = { start: this._cursor.position, end: this._cursor.position };
        return SUCCESS;
      case "endSelection":
        return this._endSelection();
      case "selectAll":
        return this._select(selectAll(this._buffer.snapshot()));
      case "selectLine":
        return this._selectLine();
      case "selectWord": {
        const word = selectWordAt(this._buffer.snapshot(), this._cursor.position);
        return word ? this._select(word) : SUCCESS;
      }
      case "clearSelection":
        this._selection = undefined;
        return { type: "selectionChanged", selection: undefined };
      case "undo":
        return textResponse(this._buffer.undo(this._cursor));
      case "redo":
        return textResponse(this._buffer.redo(this._cursor));
      case "cut":
        return this._cut();
      case "copy":
        if (this._selection && !isSelectionEmpty(this._selection)) {
          this._clipboard = selectionText(this._buffer.snapshot(), this._selection);
        }
        return SUCCESS;
      case "find":
        if (command.pattern.length > 0) this._lastSearch = command.pattern;
        return { type: "searchResults", positions: this._buffer.find(command.pattern) };
      case "findNext":
        return this._findAdjacent("next");
      case "findPrevious":
        return this._findAdjacent("previous");
      case "replaceAll":
        return this._edit(
          () => this._buffer.replaceAll(command.pattern, command.replacement, this._cursor) > 0,
        );
      case "scroll":
        this._viewport.scrollBy(command.deltaX, command.deltaY);
        return SUCCESS;
      case "scrollToLine":
        return this._scrollToLine(command.line);
      case "resizeViewport": {
        this._viewport.setSize(command.width, command.height);
        const clamped = this._viewport.clampScrollOffset(this._viewport.scrollOffset);
        this._viewport.setScrollOffset(clamped.x, clamped.y);
        return SUCCESS;
      }
      case "command":
        debugLog(`[Editor] custom command ${command.name}(${command.args.join(", ")})`);
        return SUCCESS;
    }
  }

  // ─── Editing ─────────────────────────────────────────────────────

  /** Insert at the cursor, typing over a non-empty selection as one undo step. */
  private _insert(text: string): EditorResponse {
    const selection = this._selection;
    this._selection = undefined;
    if (selection && !isSelectionEmpty(selection)) {
      return textResponse(this._buffer.replaceSelection(selection, text, this._cursor));
    }
    return textResponse(this._buffer.insertText(this._cursor.position, text, this._cursor));
  }

  private _deleteChar(direction: "forward" | "backward"): EditorResponse {
    const selection = this._selection;
    this._selection = undefined;
    if (selection && !isSelectionEmpty(selection)) {
      if (this._buffer.deleteSelection(selection, this._cursor).length > 0) return TEXT_CHANGED;
    }
    const position = this._cursor.position;
    return textResponse(
      direction === "forward"
        ? this._buffer.deleteChar(position, this._cursor)
        : this._buffer.deleteCharBackward(position, this._cursor),
    );
  }

  private _deleteSelection(): EditorResponse {
    const selection = this._selection;
    if (!selection) return SUCCESS;
    this._selection = undefined;
    return textResponse(this._buffer.deleteSelection(selection, this._cursor).length > 0);
  }

  /** Run an edit that does not consume the selection; a text change drops it. */
  private _edit(apply: () => boolean): EditorResponse {
    const changed = apply();
    if (changed) this._selection = undefined;
    return textResponse(changed);
  }

  private _cut(): EditorResponse {
    const selection = this._selection;
    if (!selection || isSelectionEmpty(selection)) return SUCCESS;
    this._clipboard = selectionText(this._buffer.snapshot(), selection);
    this._selection = undefined;
    return textResponse(this._buffer.deleteSelection(selection, this._cursor).length > 0);
  }

  // ─── Cursor & Selection ──────────────────────────────────────────

  private _moveCursor(direction: Direction, granularity: Granularity): EditorResponse {
    const moved = this._cursor.move(
      this._buffer.snapshot(),
      direction,
      granularity,
      this.config.pageSize,
    );
    if (this._clearSelectionOnMove()) {
      return { type: "selectionChanged", selection: undefined };
    }
    return moved ? { type: "cursorMoved", position: this._cursor.position } : SUCCESS;
  }

  /**
   * Move while keeping the far end of the selection fixed. Without a
   * selection the pre-move cursor becomes that end.
   */
  private _extendSelection(direction: Direction, granularity: Granularity): EditorResponse {
    const before = this._cursor.position;
    const anchor = this._selectionAnchor(before);
    this._cursor.move(this._buffer.snapshot(), direction, granularity, this.config.pageSize);
    this._selection = selectionFromPositions(anchor, this._cursor.position);
    return { type: "selectionChanged", selection: this._selection };
  }

  private _selectionAnchor(cursor: Position): Position {
    const selection = this._selection;
    if (!selection) return cursor;
    return positionsEqual(selection.start, cursor) ? selection.end : selection.start;
  }

  private _moveCursorTo(position: Position): EditorResponse {
    assertRepresentablePosition(position);
    const clamped = this._buffer.snapshot().clampPosition(position);
    this._cursor.setPosition(clamped);
    if (this._clearSelectionOnMove()) {
      return { type: "selectionChanged", selection: undefined };
    }
    return { type: "cursorMoved", position: clamped };
  }

  /**
   * Plain movement drops a non-empty selection. An empty one is a pending
   * anchor left by `startSelection` and survives until `endSelection`.
   */
  private _clearSelectionOnMove(): boolean {
    if (!this._selection || isSelectionEmpty(this._selection)) return false;
    this._selection = undefined;
    return true;
  }

  private _setSelection(start: Position, end: Position): EditorResponse {
    assertRepresentablePosition(start);
    assertRepresentablePosition(end);
    const snapshot = this._buffer.snapshot();
    const head = snapshot.clampPosition(end);
    this._selection = selectionFromPositions(snapshot.clampPosition(start), head);
    this._cursor.setPosition(head);
    return { type: "selectionChanged", selection: this._selection };
  }

  private _endSelection(): EditorResponse {
    const selection = this._selection;
    if (!selection) return SUCCESS;
    this._selection = selectionFromPositions(selection.start, this._cursor.position);
    return { type: "selectionChanged", selection: this._selection };
  }

  /** Make `selection` current, with the cursor at its end. */
  private _select(selection: Selection): EditorResponse {
    this._selection = selection;
    this._cursor.setPosition(selection.end);
    return { type: "selectionChanged", selection };
  }

  private _selectLine(): EditorResponse {
    const line = this._cursor.position.line;
    const selection = selectLine(this._buffer.snapshot(), line);
    if (!selection) return { type: "error", message: `Invalid line: ${line}` };
    return this._select(selection);
  }

  // ─── Search ──────────────────────────────────────────────────────

  /**
   * Select the match after the cursor (or before the selection start),
   * wrapping around the document.
   */
  private _findAdjacent(direction: "next" | "previous"): EditorResponse {
    const pattern = this._lastSearch;
    if (pattern === undefined) return SUCCESS;
    const matches = this._buffer.find(pattern);
    if (matches.length === 0) return SUCCESS;

    let match: Position | undefined;
    if (direction === "next") {
      const from = this._cursor.position;
      match = matches.find((m) => comparePositions(m, from) >= 0) ?? matches[0];
    } else {
      const from = this._selection?.start ?? this._cursor.position;
      match = matches.filter((m) => comparePositions(m, from) < 0).pop() ?? matches[matches.length - 1];
    }
    if (!match) return SUCCESS;

    const end = { line: match.line, column: match.column + codePointLength(pattern) };
    return this._select({ start: match, end });
  }

  // ─── Viewport ────────────────────────────────────────────────────

  private _scrollToLine(line: number): EditorResponse {
    assertRepresentablePosition({ line, column: 0 });
    const target = Math.min(line, this._buffer.lineCount - 1);
    this._viewport.scrollToLine(target, "top");
    const position = { line: target, column: 0 };
    this._cursor.setPosition(position);
    return { type: "cursorMoved", position };
  }

  private _createBuffer(text: string): TextBuffer {
    return createTextBuffer(text, {
      maxUndoLevels: this.config.maxUndoLevels,
      isWordBoundary: createWordBoundaryPredicate(this.config.wordBoundaryCharacters),
    });
  }
}
