/**
 * Editor command and response types.
 *
 * Both are closed unions discriminated by `type`; the editor handles every
 * command in one exhaustive switch.
 */

import type { Position, Selection } from "../buffer/types.ts";

/** Direction for cursor movement and selection extension. */
export type Direction = "left" | "right" | "up" | "down";

/**
 * Granularity of movement.
 *
 * - character: one code point horizontally, one line vertically
 * - word: word runs horizontally
 * - line: line start (left) / line end (right)
 * - page: a page of line steps (up/down)
 * - buffer: document start (left/up) / document end (right/down)
 */
export type Granularity = "character" | "word" | "line" | "page" | "buffer";

/** All editor commands. */
export type EditorCommand =
  // Editing
  | { type: "insertChar"; char: string }
  | { type: "insertText"; text: string }
  | { type: "deleteChar" }
  | { type: "deleteCharBackward" }
  | { type: "deleteWordForward" }
  | { type: "deleteWordBackward" }
  | { type: "deleteToLineEnd" }
  | { type: "deleteToLineStart" }
  | { type: "deleteLine" }
  | { type: "deleteSelection" }
  // Cursor
  | { type: "moveCursor"; direction: Direction; granularity: Granularity }
  | { type: "moveCursorWithSelection"; direction: Direction; granularity: Granularity }
  | { type: "moveCursorTo"; position: Position }
  // Selection
  | { type: "setSelection"; start: Position; end: Position }
  | { type: "startSelection" }
  | { type: "endSelection" }
  | { type: "selectAll" }
  | { type: "selectLine" }
  | { type: "selectWord" }
  | { type: "clearSelection" }
  // History
  | { type: "undo" }
  | { type: "redo" }
  // Clipboard
  | { type: "cut" }
  | { type: "copy" }
  | { type: "paste" }
  // Search
  | { type: "find"; pattern: string }
  | { type: "findNext" }
  | { type: "findPrevious" }
  | { type: "replaceAll"; pattern: string; replacement: string }
  // Viewport
  | { type: "scroll"; deltaX: number; deltaY: number }
  | { type: "scrollToLine"; line: number }
  | { type: "resizeViewport"; width: number; height: number }
  // Host extension point
  | { type: "command"; name: string; args: readonly string[] };

export type EditorCommandType = EditorCommand["type"];

/** What a dispatched command did. */
export type EditorResponse =
  | { type: "success" }
  | { type: "error"; message: string }
  | { type: "textChanged" }
  | { type: "cursorMoved"; position: Position }
  | { type: "selectionChanged"; selection: Selection | undefined }
  | { type: "searchResults"; positions: readonly Position[] };

/** Listener notified with every response. */
export type ChangeListener = (response: EditorResponse) => void;
