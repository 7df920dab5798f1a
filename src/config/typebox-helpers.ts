import { Type } from "@sinclair/typebox";
import type { ObjectOptions, Static, TObject, TSchema } from "@sinclair/typebox";
import type { ValueError } from "@sinclair/typebox/errors";
import { Value } from "@sinclair/typebox/value";
import { EditcoreError } from "../errors.ts";

type StrictObjectOptions = Omit<ObjectOptions, "additionalProperties">;

type SchemaRecord = Record<string, TSchema>;

/**
 * Closed object type (no `additionalProperties`), so a misspelled key is
 * reported instead of ignored.
 */
export const StrictObject = <TProps extends SchemaRecord>(
  properties: TProps,
  options?: StrictObjectOptions,
): TObject<TProps> =>
  Type.Object(properties, {
    additionalProperties: false,
    ...options,
  });

export type RuntimeValidator<T extends TSchema> = (data: unknown) => data is Static<T>;

export interface ConfigIssue {
  readonly path: string;
  readonly message: string;
}

/** Configuration or keymap data that does not match its schema. */
export class ConfigError extends EditcoreError {
  readonly issues: readonly ConfigIssue[];

  constructor(label: string, issues: readonly ConfigIssue[] = []) {
    const issueSummary = issues.map((issue) => `${issue.path}: ${issue.message}`).join("\n");
    super("INVALID_CONFIG", issueSummary ? `${label}\n${issueSummary}` : label);
    this.issues = issues;
  }
}

function toIssue(error: ValueError): ConfigIssue {
  return { path: error.path === "" ? "/" : error.path, message: error.message };
}

export const createValidator = <T extends TSchema>(schema: T): RuntimeValidator<T> => {
  return (data: unknown): data is Static<T> => Value.Check(schema, data);
};

export function assertValid<T extends TSchema>(
  schema: T,
  data: unknown,
  message?: string,
): asserts data is Static<T> {
  const issues = Array.from(Value.Errors(schema, data));
  if (issues.length > 0) {
    throw new ConfigError(message ?? "Schema validation failed", issues.map(toIssue));
  }
}

export const validate = <T extends TSchema>(schema: T, data: unknown, message?: string): Static<T> => {
  assertValid(schema, data, message);
  return data;
};
