export {
  charColumnToVisual,
  Cursor,
  DEFAULT_PAGE_SIZE,
  DEFAULT_TAB_WIDTH,
  visualColumnToChar,
} from "./cursor.ts";
export { Editor } from "./editor.ts";
export {
  BindableCommandSchema,
  DefaultKeymapSchema,
  KeymapEntrySchema,
  KeymapSchema,
} from "./keymap.ts";
export type { BindableCommand, KeymapEntry } from "./keymap.ts";
export {
  characterKey,
  hasNoModifiers,
  isNamedKey,
  isTypingModifiers,
  keyEvent,
  keyToken,
  modifiers,
  NAMED_KEYS,
  namedKey,
  namedKeyForToken,
  NO_MODIFIERS,
} from "./keys.ts";
export type { Key, KeyEvent, Modifiers, NamedKey } from "./keys.ts";
export {
  extendSelectionTo,
  isSelectionEmpty,
  selectAll,
  selectionContains,
  selectionFromPositions,
  selectionsEqual,
  selectionText,
  selectionToOffsets,
  selectLine,
  selectWordAt,
} from "./selection.ts";
export { defaultBindings, formatShortcut, parseShortcut, ShortcutTable } from "./shortcuts.ts";
export type { KeyBinding, Platform, Shortcut, ShortcutTableOptions } from "./shortcuts.ts";
export type {
  ChangeListener,
  Direction,
  EditorCommand,
  EditorCommandType,
  EditorResponse,
  Granularity,
} from "./types.ts";
