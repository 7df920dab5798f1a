import { describe, expect, test } from "vitest";
import {
  DEFAULT_CONFIG,
  isEditorConfigInput,
  parseConfig,
  resolveConfig,
} from "../../src/config/config.ts";
import { ViewportConfigSchema } from "../../src/config/schema.ts";
import { ConfigError, validate } from "../../src/config/typebox-helpers.ts";

describe("resolveConfig", () => {
  test("empty input gives the defaults", () => {
    expect(resolveConfig()).toEqual(DEFAULT_CONFIG);
    expect(resolveConfig({})).toEqual(DEFAULT_CONFIG);
  });

  test("fields override defaults, nested viewport fields one by one", () => {
    const config = resolveConfig({ tabWidth: 2, viewport: { lineHeight: 20 } });
    expect(config.tabWidth).toBe(2);
    expect(config.maxUndoLevels).toBe(100);
    expect(config.viewport).toEqual({ width: 800, height: 600, charWidth: 8, lineHeight: 20 });
  });

  test("unknown keys are rejected", () => {
    expect(() => resolveConfig({ tabwidth: 2 })).toThrow(ConfigError);
    expect(() => resolveConfig({ viewport: { zoom: 2 } })).toThrow(ConfigError);
  });

  test("out-of-range values are rejected with their path", () => {
    try {
      resolveConfig({ tabWidth: 0 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.code).toBe("INVALID_CONFIG");
        expect(err.issues.map((issue) => issue.path)).toContain("/tabWidth");
        expect(err.message.startsWith("Invalid editor config\n/tabWidth: ")).toBe(true);
      }
    }
  });

  test("non-integer undo levels and zero line height are rejected", () => {
    expect(() => resolveConfig({ maxUndoLevels: 1.5 })).toThrow(ConfigError);
    expect(() => resolveConfig({ viewport: { lineHeight: 0 } })).toThrow(ConfigError);
  });

  test("non-object input is rejected", () => {
    expect(() => resolveConfig("tabWidth=2")).toThrow(/^Invalid editor config\n\/: /);
  });
});

describe("parseConfig", () => {
  test("JSON documents", () => {
    expect(parseConfig('{"pageSize": 10, "debug": true}')).toEqual({
      ...DEFAULT_CONFIG,
      pageSize: 10,
      debug: true,
    });
  });

  test("malformed JSON is a config error", () => {
    expect(() => parseConfig("{")).toThrow(ConfigError);
    expect(() => parseConfig("{")).toThrow(/^Invalid editor config JSON: /);
  });
});

describe("validators", () => {
  test("type guard", () => {
    expect(isEditorConfigInput({ wordBoundaryCharacters: ".," })).toBe(true);
    expect(isEditorConfigInput({ debug: "yes" })).toBe(false);
  });

  test("validate returns the typed value", () => {
    const viewport = validate(ViewportConfigSchema, {
      width: 10,
      height: 10,
      charWidth: 1,
      lineHeight: 1,
    });
    expect(viewport.width).toBe(10);
    expect(() => validate(ViewportConfigSchema, { width: 10 })).toThrow(
      /^Schema validation failed\n/,
    );
  });
});
