/**
 * Word boundary classification and word-run scanning.
 *
 * Whitespace always separates words. The punctuation set is configurable;
 * the default leaves out `_` and `-` so identifiers like `snake_case` and
 * `kebab-case` move as one word.
 */

import type { CharSource, WordBoundaryPredicate } from "./types.ts";

export const DEFAULT_WORD_BOUNDARY_CHARACTERS = ".,;:!?\"'()[]{}<>|\\/@#$%^&*+=~`";

const WHITESPACE = /^\s$/u;

export function createWordBoundaryPredicate(
  characters: string = DEFAULT_WORD_BOUNDARY_CHARACTERS,
): WordBoundaryPredicate {
  const punctuation = new Set(Array.from(characters));
  return (ch) => WHITESPACE.test(ch) || punctuation.has(ch);
}

export const isWordBoundary: WordBoundaryPredicate = createWordBoundaryPredicate();

/** Skip the word run at `offset`, then the boundary run after it. */
export function nextWordStart(
  source: CharSource,
  offset: number,
  isBoundary: WordBoundaryPredicate,
): number {
  let pos = offset;
  while (pos < source.length) {
    const ch = source.charAt(pos);
    if (isBoundary(ch)) break;
    pos += ch.length;
  }
  while (pos < source.length) {
    const ch = source.charAt(pos);
    if (!isBoundary(ch)) break;
    pos += ch.length;
  }
  return pos;
}

/** Skip the boundary run before `offset`, then the word run before that. */
export function previousWordStart(
  source: CharSource,
  offset: number,
  isBoundary: WordBoundaryPredicate,
): number {
  let pos = offset;
  while (pos > 0) {
    const ch = source.charBefore(pos);
    if (!isBoundary(ch)) break;
    pos -= ch.length;
  }
  while (pos > 0) {
    const ch = source.charBefore(pos);
    if (isBoundary(ch)) break;
    pos -= ch.length;
  }
  return pos;
}
