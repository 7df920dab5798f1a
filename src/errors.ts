/**
 * Error types raised by the editing core.
 *
 * Only a narrow set of conditions are errors. Edge conditions such as
 * deleting at the document start or undoing with an empty history are
 * successful no-ops and never throw.
 */

export type EditcoreErrorCode =
  | "INVALID_POSITION"
  | "INVALID_CONFIG"
  | "INVALID_SHORTCUT"
  | "INVALID_VIEWPORT";

export class EditcoreError extends Error {
  readonly code: EditcoreErrorCode;

  constructor(code: EditcoreErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A position whose line or column cannot be represented (negative, fractional, non-finite). */
export class InvalidPositionError extends EditcoreError {
  readonly line: number;
  readonly column: number;

  constructor(line: number, column: number) {
    super("INVALID_POSITION", `Invalid position: line ${line}, column ${column}`);
    this.line = line;
    this.column = column;
  }
}

export class ShortcutParseError extends EditcoreError {
  readonly description: string;

  constructor(description: string, reason: string) {
    super("INVALID_SHORTCUT", `Cannot parse shortcut "${description}": ${reason}`);
    this.description = description;
  }
}

export class ViewportError extends EditcoreError {
  constructor(message: string) {
    super("INVALID_VIEWPORT", message);
  }
}

/** Extract a human-readable message from anything thrown. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
