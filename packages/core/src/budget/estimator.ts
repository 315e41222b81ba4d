/**
 * Size estimation
 *
 * Heuristic cost of a text fragment: CJK ideographs count 1.5 each and
 * every whitespace-delimited ASCII-only token counts 1. Tokens mixing
 * ASCII with other characters count nothing.
 */

const WIDE_RANGE_START = 0x4e00;
const WIDE_RANGE_END = 0x9fff;

const ASCII_ONLY = /^[\x00-\x7f]+$/;

/** Number of characters in the CJK unified ideographs block */
export function countWideChars(text: string): number {
  let count = 0;
  for (const char of text) {
    const code = char.codePointAt(0) ?? 0;
    if (code >= WIDE_RANGE_START && code <= WIDE_RANGE_END) {
      count += 1;
    }
  }
  return count;
}

/** Number of whitespace-delimited tokens made only of ASCII characters */
export function countNarrowWords(text: string): number {
  return text
    .split(/\s+/)
    .filter((token) => token.length > 0 && ASCII_ONLY.test(token)).length;
}

/**
 * Estimate the size cost of a text fragment
 *
 * `floor(wideChars * 1.5 + narrowWords)`
 */
export function estimateSize(text: string): number {
  return Math.floor(countWideChars(text) * 1.5 + countNarrowWords(text));
}
