export { DEFAULT_MAX_UNDO_LEVELS, UndoHistory } from "./history.ts";
export type { HistoryEntry } from "./history.ts";
export {
  assertRepresentablePosition,
  clampPosition,
  comparePositions,
  isRepresentablePosition,
  offsetToPosition,
  ORIGIN,
  position,
  positionsEqual,
  positionToOffset,
} from "./position.ts";
export { Rope } from "./rope.ts";
export { createTextBuffer } from "./text-buffer.ts";
export type {
  CharSource,
  CursorLike,
  Position,
  Selection,
  TextBuffer,
  TextBufferOptions,
  TextSnapshot,
  TextSummary,
  WordBoundaryPredicate,
} from "./types.ts";
export { codePointLength, columnToUnits, utf8ByteLength } from "./unicode.ts";
export {
  createWordBoundaryPredicate,
  DEFAULT_WORD_BOUNDARY_CHARACTERS,
  isWordBoundary,
  nextWordStart,
  previousWordStart,
} from "./word-boundary.ts";
