/**
 * Resolving editor configuration: validate the caller's partial config,
 * then fill in defaults.
 */

import { DEFAULT_WORD_BOUNDARY_CHARACTERS } from "../buffer/word-boundary.ts";
import { errorMessage } from "../errors.ts";
import type { EditorConfig } from "./schema.ts";
import { EditorConfigInputSchema } from "./schema.ts";
import { assertValid, ConfigError, createValidator } from "./typebox-helpers.ts";

export const DEFAULT_CONFIG: EditorConfig = {
  tabWidth: 4,
  maxUndoLevels: 100,
  pageSize: 20,
  wordBoundaryCharacters: DEFAULT_WORD_BOUNDARY_CHARACTERS,
  viewport: { width: 800, height: 600, charWidth: 8, lineHeight: 18 },
  debug: false,
};

export const isEditorConfigInput = createValidator(EditorConfigInputSchema);

/** Validate a partial config and fill in defaults. Throws ConfigError. */
export function resolveConfig(input: unknown = {}): EditorConfig {
  assertValid(EditorConfigInputSchema, input, "Invalid editor config");
  return {
    tabWidth: input.tabWidth ?? DEFAULT_CONFIG.tabWidth,
    maxUndoLevels: input.maxUndoLevels ?? DEFAULT_CONFIG.maxUndoLevels,
    pageSize: input.pageSize ?? DEFAULT_CONFIG.pageSize,
    wordBoundaryCharacters: input.wordBoundaryCharacters ?? DEFAULT_CONFIG.wordBoundaryCharacters,
    viewport: {
      width: input.viewport?.width ?? DEFAULT_CONFIG.viewport.width,
      height: input.viewport?.height ?? DEFAULT_CONFIG.viewport.height,
      charWidth: input.viewport?.charWidth ?? DEFAULT_CONFIG.viewport.charWidth,
      lineHeight: input.viewport?.lineHeight ?? DEFAULT_CONFIG.viewport.lineHeight,
    },
    debug: input.debug ?? DEFAULT_CONFIG.debug,
  };
}

/** Parse a JSON document and resolve it as a config. */
export function parseConfig(json: string): EditorConfig {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (err) {
    throw new ConfigError(`Invalid editor config JSON: ${errorMessage(err)}`);
  }
  return resolveConfig(data);
}
