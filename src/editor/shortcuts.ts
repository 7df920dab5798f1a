/**
 * Shortcut table: maps logical key events to editor commands.
 *
 * Shortcuts have a string form, "ctrl+alt+shift+super+key", with modifiers
 * always written in that order. Default bindings come from
 * default-keymap.json and are validated like any host-supplied keymap.
 */

import { codePointLength } from "../buffer/unicode.ts";
import { assertValid } from "../config/typebox-helpers.ts";
import { debugLog } from "../debug.ts";
import { ShortcutParseError } from "../errors.ts";
import defaultKeymapJson from "./default-keymap.json";
import type { BindableCommand, KeymapEntry } from "./keymap.ts";
import { DefaultKeymapSchema, KeymapSchema } from "./keymap.ts";
import type { Key, KeyEvent, Modifiers } from "./keys.ts";
import {
  characterKey,
  hasNoModifiers,
  isTypingModifiers,
  keyToken,
  namedKey,
  namedKeyForToken,
} from "./keys.ts";
import type { EditorCommand } from "./types.ts";

export interface Shortcut {
  readonly key: Key;
  readonly modifiers: Modifiers;
}

export interface KeyBinding {
  readonly shortcut: Shortcut;
  readonly command: BindableCommand;
  readonly description: string;
}

export type Platform = "mac" | "other";

export interface ShortcutTableOptions {
  /** "mac" adds Cmd (super) bindings on top of the common set. */
  readonly platform?: Platform;
  /** Load the default keymap. Defaults to true. */
  readonly defaults?: boolean;
}

// ─── String form ─────────────────────────────────────────────────

export function formatShortcut(shortcut: Shortcut): string {
  const parts: string[] = [];
  if (shortcut.modifiers.control) parts.push("ctrl");
  if (shortcut.modifiers.alt) parts.push("alt");
  if (shortcut.modifiers.shift) parts.push("shift");
  if (shortcut.modifiers.super) parts.push("super");
  parts.push(keyToken(shortcut.key).toLowerCase());
  return parts.join("+");
}

export function parseShortcut(description: string): Shortcut {
  const parts = description.trim().split("+");
  let token = (parts.pop() ?? "").trim();
  // "ctrl++" binds the plus key itself.
  if (token === "" && parts.length > 0 && parts[parts.length - 1] === "") {
    parts.pop();
    token = "+";
  }
  if (token === "") {
    throw new ShortcutParseError(description, "missing key");
  }

  const mods = { shift: false, control: false, alt: false, super: false };
  for (const part of parts) {
    switch (part.trim().toLowerCase()) {
      case "ctrl":
      case "control":
        mods.control = true;
        break;
      case "alt":
      case "option":
        mods.alt = true;
        break;
      case "shift":
        mods.shift = true;
        break;
      case "super":
      case "cmd":
      case "meta":
        mods.super = true;
        break;
      default:
        throw new ShortcutParseError(description, `unknown modifier "${part.trim()}"`);
    }
  }

  const named = namedKeyForToken(token);
  if (named) return { key: namedKey(named), modifiers: mods };
  if (codePointLength(token) === 1) {
    return { key: characterKey(token.toLowerCase()), modifiers: mods };
  }
  throw new ShortcutParseError(description, `unknown key "${token}"`);
}

function toShortcut(shortcut: Shortcut | string): Shortcut {
  return typeof shortcut === "string" ? parseShortcut(shortcut) : shortcut;
}

/** Bindings shipped in default-keymap.json for a platform. */
export function defaultBindings(platform: Platform): KeymapEntry[] {
  const data: unknown = defaultKeymapJson;
  assertValid(DefaultKeymapSchema, data, "Invalid default keymap");
  return platform === "mac" ? [...data.common, ...data.mac] : [...data.common];
}

// ─── Table ───────────────────────────────────────────────────────

export class ShortcutTable {
  readonly platform: Platform;
  private readonly _bindings = new Map<string, KeyBinding>();

  constructor(options: ShortcutTableOptions = {}) {
    this.platform = options.platform ?? "other";
    if (options.defaults ?? true) {
      this.loadBindings(defaultBindings(this.platform));
    }
  }

  get size(): number {
    return this._bindings.size;
  }

  /** Bind a shortcut, replacing any existing binding for it. */
  bind(shortcut: Shortcut | string, command: BindableCommand, description = ""): void {
    const parsed = toShortcut(shortcut);
    this._bindings.set(formatShortcut(parsed), { shortcut: parsed, command, description });
  }

  unbind(shortcut: Shortcut | string): boolean {
    return this._bindings.delete(formatShortcut(toShortcut(shortcut)));
  }

  /** Exact lookup, no fallbacks. */
  lookup(shortcut: Shortcut | string): BindableCommand | undefined {
    return this._bindings.get(formatShortcut(toShortcut(shortcut)))?.command;
  }

  /**
   * Resolve a key event. Bound shortcuts win; otherwise a character typed
   * with no modifier (or shift alone) inserts itself, and Enter, Tab and
   * Space with no modifiers insert their characters.
   */
  handleKeyEvent(event: KeyEvent): EditorCommand | undefined {
    const bound = this.lookup(event);
    if (bound) return bound;

    const { key, modifiers } = event;
    if (key.kind === "character") {
      return isTypingModifiers(modifiers) ? { type: "insertChar", char: key.char } : undefined;
    }
    if (!hasNoModifiers(modifiers)) return undefined;
    switch (key.name) {
      case "Enter":
        return { type: "insertChar", char: "\n" };
      case "Tab":
        return { type: "insertChar", char: "\t" };
      case "Space":
        return { type: "insertChar", char: " " };
      default:
        return undefined;
    }
  }

  /** All bindings in keymap form, sorted by shortcut string. */
  bindings(): KeymapEntry[] {
    return [...this._bindings.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([shortcut, binding]) => ({
        shortcut,
        command: binding.command,
        description: binding.description,
      }));
  }

  /**
   * Load bindings in keymap form. The whole list is validated (and every
   * shortcut parsed) before anything is bound. Returns the number loaded.
   */
  loadBindings(data: unknown): number {
    assertValid(KeymapSchema, data, "Invalid keymap");
    const parsed = data.map((entry) => ({ entry, shortcut: parseShortcut(entry.shortcut) }));
    for (const { entry, shortcut } of parsed) {
      this.bind(shortcut, entry.command, entry.description ?? "");
    }
    debugLog(`[ShortcutTable] loaded ${parsed.length} binding(s)`);
    return parsed.length;
  }
}
