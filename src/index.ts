/**
 * editcore: the editing core of a text editor.
 *
 * A rope-backed buffer with bounded undo/redo, cursor and selection
 * semantics, a key-event → command table, and the viewport geometry a
 * renderer needs to decide what to draw.
 */

export * from "./buffer/index.ts";
export * from "./config/index.ts";
export { debugLog, isDebugEnabled, setDebugEnabled, setDebugSink } from "./debug.ts";
export type { DebugSink } from "./debug.ts";
export * from "./editor/index.ts";
export {
  EditcoreError,
  errorMessage,
  InvalidPositionError,
  ShortcutParseError,
  ViewportError,
} from "./errors.ts";
export type { EditcoreErrorCode } from "./errors.ts";
export * from "./viewport/index.ts";
