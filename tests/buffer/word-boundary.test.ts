import { describe, expect, test } from "vitest";
import { Rope } from "../../src/buffer/rope.ts";
import {
  createWordBoundaryPredicate,
  isWordBoundary,
  nextWordStart,
  previousWordStart,
} from "../../src/buffer/word-boundary.ts";

describe("Word boundary - classification", () => {
  test("whitespace is a boundary", () => {
    expect(isWordBoundary(" ")).toBe(true);
    expect(isWordBoundary("\t")).toBe(true);
    expect(isWordBoundary("\n")).toBe(true);
  });

  test("punctuation is a boundary except underscore and hyphen", () => {
    for (const ch of [".", ",", ";", "(", "}", "\\", "/", "`", "~", '"']) {
      expect(isWordBoundary(ch)).toBe(true);
    }
    expect(isWordBoundary("_")).toBe(false);
    expect(isWordBoundary("-")).toBe(false);
  });

  test("letters, digits and other characters are word characters", () => {
    for (const ch of ["a", "Z", "7", "é", "世", "😀"]) {
      expect(isWordBoundary(ch)).toBe(false);
    }
  });

  test("custom punctuation set", () => {
    const isBoundary = createWordBoundaryPredicate("-");
    expect(isBoundary("-")).toBe(true);
    expect(isBoundary(".")).toBe(false);
    expect(isBoundary(" ")).toBe(true);
  });
});

describe("Word boundary - scanning", () => {
  const text = Rope.from("snake_case kebab-case normal");

  test("next word start skips the word, then the boundary run", () => {
    expect(nextWordStart(text, 0, isWordBoundary)).toBe(11);
    expect(nextWordStart(text, 11, isWordBoundary)).toBe(22);
    expect(nextWordStart(text, 22, isWordBoundary)).toBe(28);
    expect(nextWordStart(text, 28, isWordBoundary)).toBe(28);
  });

  test("previous word start skips the boundary run, then the word", () => {
    expect(previousWordStart(text, 28, isWordBoundary)).toBe(22);
    expect(previousWordStart(text, 22, isWordBoundary)).toBe(11);
    expect(previousWordStart(text, 11, isWordBoundary)).toBe(0);
    expect(previousWordStart(text, 0, isWordBoundary)).toBe(0);
  });

  test("newlines are crossed like any whitespace", () => {
    const rope = Rope.from("foo\n  bar");
    expect(nextWordStart(rope, 0, isWordBoundary)).toBe(6);
    expect(previousWordStart(rope, 6, isWordBoundary)).toBe(0);
  });

  test("punctuation ends a word", () => {
    const rope = Rope.from("foo.bar");
    expect(nextWordStart(rope, 0, isWordBoundary)).toBe(4);
    expect(previousWordStart(rope, 7, isWordBoundary)).toBe(4);
  });

  test("astral characters are stepped over whole", () => {
    const rope = Rope.from("a😀b c");
    expect(nextWordStart(rope, 0, isWordBoundary)).toBe(5);
    expect(previousWordStart(rope, 4, isWordBoundary)).toBe(0);
  });
});
