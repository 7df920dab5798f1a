/**
 * Rope data structure tests.
 *
 * Large-text cases compare against plain string operations on the same text.
 */

import { describe, expect, test } from "vitest";
import { Rope } from "../../src/buffer/rope.ts";
import { generateText } from "../helpers.ts";

/** 30 lines of 99 characters; every 10 lines fill one chunk exactly. */
function blockText(): string {
  return Array.from({ length: 30 }, (_, i) => String(i).padStart(2, "0") + "x".repeat(97)).join(
    "\n",
  );
}

describe("Rope - Construction", () => {
  test("empty rope", () => {
    const r = Rope.from("");
    expect(r.length).toBe(0);
    expect(r.lineCount).toBe(1);
    expect(r.text()).toBe("");
    expect(r.line(0)).toBe("");
  });

  test("single line", () => {
    const r = Rope.from("Hello, world!");
    expect(r.length).toBe(13);
    expect(r.lineCount).toBe(1);
    expect(r.text()).toBe("Hello, world!");
  });

  test("trailing newline adds an empty last line", () => {
    const r = Rope.from("A\nB\n");
    expect(r.lineCount).toBe(3);
    expect(r.line(2)).toBe("");
  });

  test("large text splits into chunks", () => {
    const text = generateText(1000);
    const r = Rope.from(text);
    expect(r.chunkCount).toBeGreaterThan(1);
    expect(r.text()).toBe(text);
    expect(r.lineCount).toBe(1000);
  });

  test("chunks break after a newline", () => {
    const r = Rope.from(blockText());
    expect(r.chunkCount).toBe(3);
    expect(r.lineStart(10)).toBe(1000);
    expect(r.lineStart(20)).toBe(2000);
    expect(r.line(10)).toBe(`10${"x".repeat(97)}`);
  });

  test("chunk boundary never splits a surrogate pair", () => {
    const text = `${"a".repeat(1023)}😀b`;
    const r = Rope.from(text);
    expect(r.chunkCount).toBe(2);
    expect(r.charAt(1023)).toBe("😀");
    expect(r.codePointAt(1023)).toBe(0x1f600);
    expect(r.charBefore(1025)).toBe("😀");
    expect(r.text()).toBe(text);
  });
});

describe("Rope - Line Access", () => {
  test("line by index", () => {
    const r = Rope.from("AAA\nBBB\nCCC\nDDD");
    expect(r.line(0)).toBe("AAA");
    expect(r.line(3)).toBe("DDD");
    expect(r.line(4)).toBe("");
    expect(r.line(-1)).toBe("");
  });

  test("line range", () => {
    const r = Rope.from("A\nB\nC\nD\nE");
    expect(r.lines(1, 4)).toEqual(["B", "C", "D"]);
    expect(r.lines(3, 99)).toEqual(["D", "E"]);
  });

  test("line start and end offsets", () => {
    const r = Rope.from("ab\ncde\n\nf");
    expect(r.lineStart(0)).toBe(0);
    expect(r.lineStart(1)).toBe(3);
    expect(r.lineStart(2)).toBe(7);
    expect(r.lineStart(3)).toBe(8);
    expect(r.lineEnd(0)).toBe(2);
    expect(r.lineEnd(1)).toBe(6);
    expect(r.lineEnd(2)).toBe(7);
    expect(r.lineEnd(3)).toBe(9);
    expect(r.lineStart(4)).toBe(9);
  });

  test("every line of a multi-chunk rope matches split", () => {
    const text = generateText(500, "Row");
    const r = Rope.from(text);
    const expected = text.split("\n");
    for (let i = 0; i < expected.length; i++) {
      expect(r.line(i)).toBe(expected[i]);
    }
  });
});

describe("Rope - Offsets", () => {
  test("offsetToLineCol", () => {
    const r = Rope.from("ab\ncde\nf");
    expect(r.offsetToLineCol(0)).toEqual({ line: 0, col: 0 });
    expect(r.offsetToLineCol(2)).toEqual({ line: 0, col: 2 });
    expect(r.offsetToLineCol(3)).toEqual({ line: 1, col: 0 });
    expect(r.offsetToLineCol(5)).toEqual({ line: 1, col: 2 });
    expect(r.offsetToLineCol(8)).toEqual({ line: 2, col: 1 });
  });

  test("offsetToLineCol clamps", () => {
    const r = Rope.from("ab\ncd");
    expect(r.offsetToLineCol(-5)).toEqual({ line: 0, col: 0 });
    expect(r.offsetToLineCol(99)).toEqual({ line: 1, col: 2 });
  });

  test("offset at end after trailing newline is on the empty last line", () => {
    const r = Rope.from("ab\n");
    expect(r.offsetToLineCol(3)).toEqual({ line: 1, col: 0 });
  });

  test("lineColToOffset clamps the column to the line", () => {
    const r = Rope.from("ab\ncde");
    expect(r.lineColToOffset(1, 2)).toBe(5);
    expect(r.lineColToOffset(0, 10)).toBe(2);
    expect(r.lineColToOffset(5, 0)).toBe(6);
  });

  test("lineOfOffset across chunks", () => {
    const r = Rope.from(blockText());
    expect(r.lineOfOffset(999)).toBe(9);
    expect(r.lineOfOffset(1000)).toBe(10);
    expect(r.lineOfOffset(2999)).toBe(29);
  });
});

describe("Rope - Slicing", () => {
  test("slice within and across chunks", () => {
    const text = blockText();
    const r = Rope.from(text);
    expect(r.slice(995, 1005)).toBe(text.slice(995, 1005));
    expect(r.slice(0, text.length)).toBe(text);
  });

  test("slice clamps and handles empty ranges", () => {
    const r = Rope.from("hello");
    expect(r.slice(3, 99)).toBe("lo");
    expect(r.slice(-2, 2)).toBe("he");
    expect(r.slice(4, 2)).toBe("");
  });

  test("charCodeAt out of range is NaN", () => {
    const r = Rope.from("a");
    expect(r.charCodeAt(0)).toBe(97);
    expect(Number.isNaN(r.charCodeAt(1))).toBe(true);
    expect(r.codePointAt(1)).toBeUndefined();
    expect(r.charAt(1)).toBe("");
    expect(r.charBefore(0)).toBe("");
  });
});

describe("Rope - Editing", () => {
  test("insert returns a new rope", () => {
    const r = Rope.from("Hello world");
    const r2 = r.insert(5, ",");
    expect(r.text()).toBe("Hello world");
    expect(r2.text()).toBe("Hello, world");
  });

  test("insert newline increases line count", () => {
    const r = Rope.from("ab").insert(1, "\n");
    expect(r.lineCount).toBe(2);
    expect(r.line(1)).toBe("b");
  });

  test("delete range", () => {
    expect(Rope.from("Hello, world").delete(5, 7).text()).toBe("Helloworld");
  });

  test("replace range", () => {
    expect(Rope.from("Hello world").replace(6, 11, "there").text()).toBe("Hello there");
  });

  test("empty edits return the same rope", () => {
    const r = Rope.from("abc");
    expect(r.insert(1, "")).toBe(r);
    expect(r.delete(2, 2)).toBe(r);
  });

  test("deleting everything leaves an empty rope", () => {
    const r = Rope.from(blockText());
    const empty = r.delete(0, r.length);
    expect(empty.length).toBe(0);
    expect(empty.lineCount).toBe(1);
    expect(empty.chunkCount).toBe(1);
  });

  test("edits across chunk boundaries match string edits", () => {
    let model = blockText();
    let r = Rope.from(model);
    const edits: Array<[number, number, string]> = [
      [990, 1010, "<joined>"],
      [0, 0, "start\n"],
      [1500, 2600, ""],
      [model.length - 10, model.length - 10, "\nnew\nlines\n"],
      [500, 501, "😀"],
    ];
    for (const [start, end, text] of edits) {
      model = model.slice(0, start) + text + model.slice(end);
      r = r.replace(start, end, text);
      expect(r.text()).toBe(model);
      expect(r.lineCount).toBe(model.split("\n").length);
    }
    const lines = model.split("\n");
    for (let i = 0; i < lines.length; i++) {
      expect(r.line(i)).toBe(lines[i]);
    }
  });

  test("many small edits keep lookups consistent", () => {
    let model = generateText(200);
    let r = Rope.from(model);
    for (let i = 0; i < 150; i++) {
      const at = (i * 37) % model.length;
      model = `${model.slice(0, at)}${i % 3 === 0 ? "\n" : "z"}${model.slice(at)}`;
      r = r.insert(at, i % 3 === 0 ? "\n" : "z");
    }
    expect(r.text()).toBe(model);
    const lines = model.split("\n");
    expect(r.lineCount).toBe(lines.length);
    let offset = 0;
    for (let i = 0; i < lines.length; i++) {
      expect(r.lineStart(i)).toBe(offset);
      offset += (lines[i] ?? "").length + 1;
    }
  });
});
