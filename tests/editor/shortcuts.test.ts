import { afterEach, describe, expect, test } from "vitest";
import { ConfigError } from "../../src/config/typebox-helpers.ts";
import { setDebugEnabled, setDebugSink } from "../../src/debug.ts";
import { ShortcutParseError } from "../../src/errors.ts";
import { characterKey, keyEvent, namedKey } from "../../src/editor/keys.ts";
import {
  defaultBindings,
  formatShortcut,
  parseShortcut,
  ShortcutTable,
} from "../../src/editor/shortcuts.ts";

describe("Shortcuts - Parsing", () => {
  test("modifiers and named keys", () => {
    const s = parseShortcut("ctrl+shift+left");
    expect(s.key).toEqual(namedKey("ArrowLeft"));
    expect(s.modifiers).toEqual({ shift: true, control: true, alt: false, super: false });
  });

  test("modifier aliases and case", () => {
    expect(formatShortcut(parseShortcut("Cmd+Option+Z"))).toBe("alt+super+z");
    expect(formatShortcut(parseShortcut("control+meta+a"))).toBe("ctrl+super+a");
    expect(formatShortcut(parseShortcut(" Esc "))).toBe("escape");
    expect(formatShortcut(parseShortcut("shift+ArrowDown"))).toBe("shift+down");
  });

  test("format writes modifiers in a fixed order", () => {
    expect(formatShortcut(parseShortcut("super+shift+alt+ctrl+x"))).toBe("ctrl+alt+shift+super+x");
  });

  test("the plus key", () => {
    const s = parseShortcut("ctrl++");
    expect(s.key).toEqual(characterKey("+"));
    expect(formatShortcut(s)).toBe("ctrl++");
  });

  test("function keys", () => {
    expect(parseShortcut("shift+F3").key).toEqual(namedKey("F3"));
  });

  test("errors name the problem", () => {
    expect(() => parseShortcut("")).toThrow('Cannot parse shortcut "": missing key');
    expect(() => parseShortcut("hyper+a")).toThrow(
      'Cannot parse shortcut "hyper+a": unknown modifier "hyper"',
    );
    expect(() => parseShortcut("ctrl+banana")).toThrow(
      'Cannot parse shortcut "ctrl+banana": unknown key "banana"',
    );
    expect(() => parseShortcut("ctrl+")).toThrow(ShortcutParseError);
  });
});

describe("ShortcutTable - Defaults", () => {
  test("common bindings", () => {
    const table = new ShortcutTable();
    expect(table.platform).toBe("other");
    expect(table.size).toBe(41);
    expect(table.lookup("ctrl+z")).toEqual({ type: "undo" });
    expect(table.lookup("ctrl+shift+z")).toEqual({ type: "redo" });
    expect(table.lookup("home")).toEqual({
      type: "moveCursor",
      direction: "left",
      granularity: "line",
    });
    expect(table.lookup("super+z")).toBeUndefined();
  });

  test("mac adds Cmd bindings", () => {
    const table = new ShortcutTable({ platform: "mac" });
    expect(table.size).toBe(65);
    expect(table.lookup("cmd+z")).toEqual({ type: "undo" });
    expect(table.lookup("alt+left")).toEqual({
      type: "moveCursor",
      direction: "left",
      granularity: "word",
    });
    expect(table.lookup("ctrl+z")).toEqual({ type: "undo" });
  });

  test("defaults can be skipped", () => {
    expect(new ShortcutTable({ defaults: false }).size).toBe(0);
  });

  test("default keymap entries all parse", () => {
    for (const entry of defaultBindings("mac")) {
      expect(() => parseShortcut(entry.shortcut)).not.toThrow();
    }
  });
});

describe("ShortcutTable - Key Events", () => {
  const table = new ShortcutTable();

  test("a bound shortcut wins", () => {
    expect(table.handleKeyEvent(keyEvent(characterKey("a"), { control: true }))).toEqual({
      type: "selectAll",
    });
    expect(table.handleKeyEvent(keyEvent(namedKey("Backspace")))).toEqual({
      type: "deleteCharBackward",
    });
  });

  test("unbound characters insert themselves", () => {
    expect(table.handleKeyEvent(keyEvent(characterKey("q")))).toEqual({
      type: "insertChar",
      char: "q",
    });
    expect(table.handleKeyEvent(keyEvent(characterKey("Q"), { shift: true }))).toEqual({
      type: "insertChar",
      char: "Q",
    });
  });

  test("enter, tab and space insert their characters", () => {
    expect(table.handleKeyEvent(keyEvent(namedKey("Enter")))).toEqual({
      type: "insertChar",
      char: "\n",
    });
    expect(table.handleKeyEvent(keyEvent(namedKey("Tab")))).toEqual({
      type: "insertChar",
      char: "\t",
    });
    expect(table.handleKeyEvent(keyEvent(namedKey("Space")))).toEqual({
      type: "insertChar",
      char: " ",
    });
  });

  test("unbound chords do nothing", () => {
    expect(table.handleKeyEvent(keyEvent(characterKey("q"), { control: true }))).toBeUndefined();
    expect(table.handleKeyEvent(keyEvent(namedKey("Enter"), { alt: true }))).toBeUndefined();
    expect(table.handleKeyEvent(keyEvent(namedKey("Insert")))).toBeUndefined();
  });
});

describe("ShortcutTable - Custom Bindings", () => {
  afterEach(() => {
    setDebugEnabled(false);
    setDebugSink(undefined);
  });

  test("bind, rebind and unbind", () => {
    const table = new ShortcutTable({ defaults: false });
    table.bind("ctrl+s", { type: "command", name: "save", args: [] }, "Save");
    table.bind("Control+S", { type: "command", name: "saveAll", args: [] });
    expect(table.size).toBe(1);
    expect(table.lookup("ctrl+s")).toEqual({ type: "command", name: "saveAll", args: [] });
    expect(table.unbind("ctrl+s")).toBe(true);
    expect(table.unbind("ctrl+s")).toBe(false);
  });

  test("bindings round trip through keymap form", () => {
    const table = new ShortcutTable({ defaults: false });
    table.bind("shift+f3", { type: "findPrevious" }, "Previous");
    table.bind("alt+x", { type: "insertText", text: "×" });
    const entries = table.bindings();
    expect(entries).toEqual([
      { shortcut: "alt+x", command: { type: "insertText", text: "×" }, description: "" },
      { shortcut: "shift+f3", command: { type: "findPrevious" }, description: "Previous" },
    ]);

    const copy = new ShortcutTable({ defaults: false });
    expect(copy.loadBindings(entries)).toBe(2);
    expect(copy.bindings()).toEqual(entries);
  });

  test("loading logs the count when debugging", () => {
    const lines: string[] = [];
    setDebugSink((line) => lines.push(line));
    setDebugEnabled(true);
    new ShortcutTable({ defaults: false }).loadBindings([
      { shortcut: "f5", command: { type: "find", pattern: "x" } },
    ]);
    expect(lines).toEqual(["[ShortcutTable] loaded 1 binding(s)"]);
  });

  test("invalid keymaps are rejected whole", () => {
    const table = new ShortcutTable({ defaults: false });
    expect(() => table.loadBindings([{ shortcut: "f5", command: { type: "explode" } }])).toThrow(
      ConfigError,
    );
    expect(() =>
      table.loadBindings([
        { shortcut: "f5", command: { type: "undo" } },
        { shortcut: "hyper+q", command: { type: "redo" } },
      ]),
    ).toThrow(ShortcutParseError);
    expect(table.size).toBe(0);
  });

  test("validation errors carry the keymap label", () => {
    const table = new ShortcutTable({ defaults: false });
    expect(() => table.loadBindings({ shortcut: "f5" })).toThrow(/^Invalid keymap\n/);
  });
});
