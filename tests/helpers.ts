/**
 * Test helpers and utilities.
 */

import { expect } from "vitest";
import type { CursorLike, Position, Selection } from "../src/buffer/types.ts";
import { Editor } from "../src/editor/editor.ts";
import type { EditorCommand, EditorResponse } from "../src/editor/types.ts";

// =============================================================================
// Constructors
// =============================================================================

export function pos(line: number, column: number): Position {
  return { line, column };
}

export function sel(startLine: number, startCol: number, endLine: number, endCol: number): Selection {
  return { start: pos(startLine, startCol), end: pos(endLine, endCol) };
}

/** A bare CursorLike for driving the buffer without the editor. */
export function testCursor(line = 0, column = 0): CursorLike {
  let current = pos(line, column);
  return {
    get position() {
      return current;
    },
    setPosition(next: Position) {
      current = next;
    },
  };
}

// =============================================================================
// Test Data Generators
// =============================================================================

/**
 * Generate lines of text for testing.
 */
export function generateLines(count: number, prefix = "Line"): string[] {
  return Array.from({ length: count }, (_, i) => `${prefix} ${i + 1}`);
}

/**
 * Generate a text blob with N lines.
 */
export function generateText(lineCount: number, prefix = "Line"): string {
  return generateLines(lineCount, prefix).join("\n");
}

// =============================================================================
// Editor Helpers
// =============================================================================

/** Dispatch a sequence of commands, returning the last response. */
export function run(editor: Editor, ...commands: EditorCommand[]): EditorResponse {
  let last: EditorResponse = { type: "success" };
  for (const command of commands) {
    last = editor.dispatch(command);
  }
  return last;
}

export function editorWith(text: string, cursor?: Position): Editor {
  const editor = new Editor(text);
  if (cursor) editor.dispatch({ type: "moveCursorTo", position: cursor });
  return editor;
}

// =============================================================================
// Assertion Helpers
// =============================================================================

export function expectPosition(actual: Position, line: number, column: number): void {
  expect({ line: actual.line, column: actual.column }).toEqual({ line, column });
}
