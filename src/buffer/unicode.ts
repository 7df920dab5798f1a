/**
 * UTF-16 helpers. Columns count code points; offsets count UTF-16 code units.
 */

export function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

export function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

/** Number of code points in a string. A lone surrogate counts as one. */
export function codePointLength(text: string): number {
  let count = 0;
  for (let i = 0; i < text.length; i++) {
    if (isHighSurrogate(text.charCodeAt(i)) && isLowSurrogate(text.charCodeAt(i + 1))) {
      i++;
    }
    count++;
  }
  return count;
}

/**
 * Code units spanned by the first `column` code points of `text`.
 * Clamps to the text length.
 */
export function columnToUnits(text: string, column: number): number {
  let units = 0;
  let remaining = column;
  while (remaining > 0 && units < text.length) {
    const pair =
      isHighSurrogate(text.charCodeAt(units)) && isLowSurrogate(text.charCodeAt(units + 1));
    units += pair ? 2 : 1;
    remaining--;
  }
  return units;
}

/** UTF-8 byte length without allocating a Uint8Array. */
export function utf8ByteLength(str: string): number {
  let bytes = 0;
  for (let i = 0; i < str.length; i++) {
    const code = str.charCodeAt(i);
    if (code <= 0x7f) {
      bytes += 1;
    } else if (code <= 0x7ff) {
      bytes += 2;
    } else if (isHighSurrogate(code) && isLowSurrogate(str.charCodeAt(i + 1))) {
      // Surrogate pair encodes a 4-byte sequence.
      bytes += 4;
      i++;
    } else {
      bytes += 3;
    }
  }
  return bytes;
}
