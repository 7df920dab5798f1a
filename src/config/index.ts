export { DEFAULT_CONFIG, isEditorConfigInput, parseConfig, resolveConfig } from "./config.ts";
export {
  EditorConfigInputSchema,
  EditorConfigSchema,
  ViewportConfigSchema,
} from "./schema.ts";
export type { EditorConfig, EditorConfigInput, ViewportConfig } from "./schema.ts";
export { assertValid, ConfigError, createValidator, StrictObject, validate } from "./typebox-helpers.ts";
export type { ConfigIssue, RuntimeValidator } from "./typebox-helpers.ts";
