/**
 * Logical key vocabulary.
 *
 * Platform keyboard events are translated into these by the host; the core
 * never sees raw key codes.
 */

export const NAMED_KEYS = [
  "ArrowLeft",
  "ArrowRight",
  "ArrowUp",
  "ArrowDown",
  "F1",
  "F2",
  "F3",
  "F4",
  "F5",
  "F6",
  "F7",
  "F8",
  "F9",
  "F10",
  "F11",
  "F12",
  "Backspace",
  "Delete",
  "Enter",
  "Escape",
  "Tab",
  "Space",
  "Home",
  "End",
  "PageUp",
  "PageDown",
  "Insert",
] as const;

export type NamedKey = (typeof NAMED_KEYS)[number];

export type Key =
  | { readonly kind: "character"; readonly char: string }
  | { readonly kind: "named"; readonly name: NamedKey };

export interface Modifiers {
  readonly shift: boolean;
  readonly control: boolean;
  readonly alt: boolean;
  /** Cmd on macOS, the Windows key elsewhere. */
  readonly super: boolean;
}

export interface KeyEvent {
  readonly key: Key;
  readonly modifiers: Modifiers;
}

export const NO_MODIFIERS: Modifiers = { shift: false, control: false, alt: false, super: false };

export function modifiers(partial: Partial<Modifiers> = {}): Modifiers {
  return { ...NO_MODIFIERS, ...partial };
}

export function hasNoModifiers(m: Modifiers): boolean {
  return !m.shift && !m.control && !m.alt && !m.super;
}

/** Shift alone (or nothing) still types a character. */
export function isTypingModifiers(m: Modifiers): boolean {
  return !m.control && !m.alt && !m.super;
}

export function characterKey(char: string): Key {
  return { kind: "character", char };
}

export function namedKey(name: NamedKey): Key {
  return { kind: "named", name };
}

export function keyEvent(key: Key, mods: Partial<Modifiers> = {}): KeyEvent {
  return { key, modifiers: modifiers(mods) };
}

export function isNamedKey(value: string): value is NamedKey {
  return NAMED_KEYS.some((name) => name === value);
}

// Lower-case tokens used in shortcut strings.
const TOKEN_BY_NAME: Record<NamedKey, string> = {
  ArrowLeft: "left",
  ArrowRight: "right",
  ArrowUp: "up",
  ArrowDown: "down",
  F1: "f1",
  F2: "f2",
  F3: "f3",
  F4: "f4",
  F5: "f5",
  F6: "f6",
  F7: "f7",
  F8: "f8",
  F9: "f9",
  F10: "f10",
  F11: "f11",
  F12: "f12",
  Backspace: "backspace",
  Delete: "delete",
  Enter: "enter",
  Escape: "escape",
  Tab: "tab",
  Space: "space",
  Home: "home",
  End: "end",
  PageUp: "pageup",
  PageDown: "pagedown",
  Insert: "insert",
};

const NAME_BY_TOKEN = new Map<string, NamedKey>(
  NAMED_KEYS.map((name) => [TOKEN_BY_NAME[name], name]),
);

// Alternate spellings accepted when parsing.
NAME_BY_TOKEN.set("arrowleft", "ArrowLeft");
NAME_BY_TOKEN.set("arrowright", "ArrowRight");
NAME_BY_TOKEN.set("arrowup", "ArrowUp");
NAME_BY_TOKEN.set("arrowdown", "ArrowDown");
NAME_BY_TOKEN.set("esc", "Escape");
NAME_BY_TOKEN.set("del", "Delete");
NAME_BY_TOKEN.set("return", "Enter");

export function keyToken(key: Key): string {
  return key.kind === "named" ? TOKEN_BY_NAME[key.name] : key.char;
}

/** Named key for a token such as "pageup" or "esc". */
export function namedKeyForToken(token: string): NamedKey | undefined {
  return NAME_BY_TOKEN.get(token.toLowerCase());
}
