/**
 * Rope: an immutable sequence of text chunks.
 *
 * insert/delete/replace return new ropes that share every chunk outside the
 * edited range, so keeping old ropes around (undo history) costs only the
 * chunk array. Per-chunk offsets and newline prefix sums give O(log n)
 * offset ↔ line lookups.
 *
 * Offsets are UTF-16 code units. Chunk boundaries never fall inside a
 * surrogate pair.
 */

import { isHighSurrogate, isLowSurrogate } from "./unicode.ts";

const TARGET_CHUNK_SIZE = 1024;
const MIN_CHUNK_SIZE = TARGET_CHUNK_SIZE / 4;

interface Chunk {
  readonly text: string;
  readonly newlines: number;
}

function countNewlines(text: string): number {
  let count = 0;
  for (let i = 0; i < text.length; i++) {
    if (text.charCodeAt(i) === 10) count++;
  }
  return count;
}

function makeChunk(text: string): Chunk {
  return { text, newlines: countNewlines(text) };
}

/**
 * Split text into chunks of roughly TARGET_CHUNK_SIZE, breaking after a
 * newline when one falls in the back half of the chunk.
 */
function textToChunks(text: string): Chunk[] {
  if (text.length <= TARGET_CHUNK_SIZE) return [makeChunk(text)];

  const chunks: Chunk[] = [];
  let pos = 0;
  while (pos < text.length) {
    let end = Math.min(pos + TARGET_CHUNK_SIZE, text.length);
    if (end < text.length) {
      const newlinePos = text.lastIndexOf("\n", end - 1);
      if (newlinePos >= pos + TARGET_CHUNK_SIZE / 2) {
        end = newlinePos + 1;
      } else if (isHighSurrogate(text.charCodeAt(end - 1))) {
        end--;
      }
    }
    chunks.push(makeChunk(text.slice(pos, end)));
    pos = end;
  }
  return chunks;
}

export class Rope {
  private readonly _chunks: readonly Chunk[];
  private readonly _length: number;
  private readonly _newlineCount: number;
  /** _chunkOffsets[i] = offset where chunk i starts. */
  private readonly _chunkOffsets: readonly number[];
  /** _chunkNewlinePrefixes[i] = newlines in chunks 0..i-1. */
  private readonly _chunkNewlinePrefixes: readonly number[];

  private constructor(chunks: readonly Chunk[]) {
    this._chunks = chunks;
    let length = 0;
    let newlines = 0;
    const offsets: number[] = [];
    const nlPrefixes: number[] = [0];
    for (const c of chunks) {
      offsets.push(length);
      length += c.text.length;
      newlines += c.newlines;
      nlPrefixes.push(newlines);
    }
    this._chunkOffsets = offsets;
    this._chunkNewlinePrefixes = nlPrefixes;
    this._length = length;
    this._newlineCount = newlines;
  }

  static from(text: string): Rope {
    return new Rope(textToChunks(text));
  }

  get length(): number {
    return this._length;
  }

  get lineCount(): number {
    return this._newlineCount + 1;
  }

  get chunkCount(): number {
    return this._chunks.length;
  }

  /** Get the full text. O(n). */
  text(): string {
    if (this._chunks.length === 1) return this._chunks[0]?.text ?? "";
    let result = "";
    for (const c of this._chunks) {
      result += c.text;
    }
    return result;
  }

  /** A single line by 0-based index, without its terminator. "" out of range. */
  line(row: number): string {
    if (row < 0 || row >= this.lineCount) return "";
    return this.slice(this.lineStart(row), this.lineEnd(row));
  }

  /** Lines in range [startRow, endRow). */
  lines(startRow: number, endRow: number): string[] {
    const result: string[] = [];
    const last = Math.min(endRow, this.lineCount);
    for (let row = Math.max(0, startRow); row < last; row++) {
      result.push(this.line(row));
    }
    return result;
  }

  /** Offset of the first character of a line. Rows past the end map to `length`. */
  lineStart(row: number): number {
    if (row <= 0) return 0;
    if (row > this._newlineCount) return this._length;

    // Chunk holding the row-th newline: first chunk whose prefix reaches `row`.
    let lo = 0;
    let hi = this._chunks.length - 1;
    while (lo < hi) {
      const mid = (lo + hi) >> 1;
      if ((this._chunkNewlinePrefixes[mid + 1] ?? 0) >= row) {
        hi = mid;
      } else {
        lo = mid + 1;
      }
    }

    const text = this._chunks[lo]?.text ?? "";
    const chunkStart = this._chunkOffsets[lo] ?? 0;
    let remaining = row - (this._chunkNewlinePrefixes[lo] ?? 0);
    let pos = -1;
    while (remaining > 0) {
      pos = text.indexOf("\n", pos + 1);
      if (pos === -1) return chunkStart + text.length;
      remaining--;
    }
    return chunkStart + pos + 1;
  }

  /** Offset just past a line's content, before its terminator. */
  lineEnd(row: number): number {
    const r = Math.max(0, row);
    if (r >= this._newlineCount) return this._length;
    return this.lineStart(r + 1) - 1;
  }

  /** Substring over the offset range [start, end), clamped to the rope. */
  slice(start: number, end: number): string {
    const from = Math.max(0, start);
    const to = Math.min(end, this._length);
    if (from >= to) return "";

    let result = "";
    for (let ci = this._findChunkByOffset(from); ci < this._chunks.length; ci++) {
      const chunkStart = this._chunkOffsets[ci] ?? 0;
      if (chunkStart >= to) break;
      const text = this._chunks[ci]?.text ?? "";
      result += text.slice(Math.max(0, from - chunkStart), Math.min(text.length, to - chunkStart));
    }
    return result;
  }

  /** UTF-16 code unit at an offset, NaN out of range (as String#charCodeAt). */
  charCodeAt(offset: number): number {
    if (offset < 0 || offset >= this._length) return Number.NaN;
    const ci = this._findChunkByOffset(offset);
    const text = this._chunks[ci]?.text ?? "";
    return text.charCodeAt(offset - (this._chunkOffsets[ci] ?? 0));
  }

  /** Code point starting at an offset; a surrogate pair is combined. */
  codePointAt(offset: number): number | undefined {
    const first = this.charCodeAt(offset);
    if (Number.isNaN(first)) return undefined;
    if (isHighSurrogate(first)) {
      const second = this.charCodeAt(offset + 1);
      if (isLowSurrogate(second)) {
        return (first - 0xd800) * 0x400 + (second - 0xdc00) + 0x10000;
      }
    }
    return first;
  }

  /** The character starting at an offset, or "" at the end. */
  charAt(offset: number): string {
    const cp = this.codePointAt(offset);
    return cp === undefined ? "" : String.fromCodePoint(cp);
  }

  /** The character ending at an offset, or "" at the start. */
  charBefore(offset: number): string {
    if (offset <= 0 || offset > this._length) return "";
    const last = this.charCodeAt(offset - 1);
    if (isLowSurrogate(last) && offset >= 2) {
      const first = this.charCodeAt(offset - 2);
      if (isHighSurrogate(first)) return String.fromCharCode(first, last);
    }
    return String.fromCharCode(last);
  }

  /** Insert text at an offset. Returns a new rope. */
  insert(offset: number, text: string): Rope {
    return this.replace(offset, offset, text);
  }

  /** Delete a range [start, end). Returns a new rope. */
  delete(start: number, end: number): Rope {
    return this.replace(start, end, "");
  }

  /**
   * Replace a range [start, end) with text. Only the chunks overlapping the
   * range are rebuilt; a small result absorbs its right neighbour so chunks
   * do not fragment under repeated edits.
   */
  replace(start: number, end: number, text: string): Rope {
    const from = Math.min(Math.max(0, start), this._length);
    const to = Math.min(Math.max(from, end), this._length);
    if (from === to && text.length === 0) return this;

    const first = this._findChunkByOffset(from);
    let last = to > from ? this._findChunkByOffset(to - 1) : first;

    const head = (this._chunks[first]?.text ?? "").slice(0, from - (this._chunkOffsets[first] ?? 0));
    const tail = (this._chunks[last]?.text ?? "").slice(to - (this._chunkOffsets[last] ?? 0));
    let merged = head + text + tail;

    const next = this._chunks[last + 1];
    if (merged.length < MIN_CHUNK_SIZE && next) {
      merged += next.text;
      last++;
    }

    const chunks = [
      ...this._chunks.slice(0, first),
      ...(merged.length > 0 ? textToChunks(merged) : []),
      ...this._chunks.slice(last + 1),
    ];
    return new Rope(chunks.length > 0 ? chunks : [makeChunk("")]);
  }

  /** Line containing an offset (clamped). */
  lineOfOffset(offset: number): number {
    const o = Math.min(Math.max(0, offset), this._length);
    const ci = this._findChunkByOffset(o);
    const text = this._chunks[ci]?.text ?? "";
    const posInChunk = o - (this._chunkOffsets[ci] ?? 0);
    let line = this._chunkNewlinePrefixes[ci] ?? 0;
    for (let i = 0; i < posInChunk; i++) {
      if (text.charCodeAt(i) === 10) line++;
    }
    return line;
  }

  /** Convert an offset to {line, col}, where col counts code units. */
  offsetToLineCol(offset: number): { line: number; col: number } {
    const o = Math.min(Math.max(0, offset), this._length);
    const line = this.lineOfOffset(o);
    return { line, col: o - this.lineStart(line) };
  }

  /** Convert {line, col} to an offset; col is clamped to the line's content. */
  lineColToOffset(line: number, col: number): number {
    if (line >= this.lineCount) return this._length;
    const start = this.lineStart(line);
    return Math.min(start + Math.max(0, col), this.lineEnd(line));
  }

  /** Binary search: last chunk starting at or before the offset. */
  private _findChunkByOffset(offset: number): number {
    let lo = 0;
    let hi = this._chunks.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if ((this._chunkOffsets[mid] ?? 0) <= offset) {
        lo = mid;
      } else {
        hi = mid - 1;
      }
    }
    return lo;
  }
}
