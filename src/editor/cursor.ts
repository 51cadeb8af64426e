/**
 * Cursor movement: pure functions that compute a new point from the
 * current one. The editor decides what to do when there is nowhere to go.
 */

import type { TextReader } from "../text/text.ts";
import type { Direction } from "./types.ts";

function isHighSurrogate(ch: string): boolean {
  const code = ch.charCodeAt(0);
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(ch: string): boolean {
  const code = ch.charCodeAt(0);
  return code >= 0xdc00 && code <= 0xdfff;
}

/** Start of the code point before pos; a surrogate pair is one step. */
export function prevCodePoint(text: TextReader, pos: number): number {
  if (pos >= 2 && isLowSurrogate(text.charAt(pos - 1)) && isHighSurrogate(text.charAt(pos - 2))) {
    return pos - 2;
  }
  return pos - 1;
}

/** End of the code point starting at pos. */
export function nextCodePoint(text: TextReader, pos: number): number {
  if (isHighSurrogate(text.charAt(pos)) && isLowSurrogate(text.charAt(pos + 1))) {
    return pos + 2;
  }
  return pos + 1;
}

/**
 * The point a move in `direction` would reach, or undefined when the move
 * would leave the buffer. `goalColumn` is only consulted by vertical moves.
 */
export function moveTarget(
  text: TextReader,
  point: number,
  direction: Direction,
  goalColumn: () => number,
  pageSize: number,
): number | undefined {
  const row = text.getRow(point);

  switch (direction) {
    case "left":
      return point > 0 ? prevCodePoint(text, point) : undefined;
    case "right":
      return point < text.length ? nextCodePoint(text, point) : undefined;
    case "up": {
      // Resolve the goal even at the top, so it survives to the next move
      const column = goalColumn();
      return row > 0 ? text.getPos(row - 1, column) : undefined;
    }
    case "down": {
      const column = goalColumn();
      return row + 1 < text.numLines ? text.getPos(row + 1, column) : undefined;
    }
    case "home":
      return text.lineStart(row);
    case "end":
      return text.lineEnd(row);
    case "bufferStart":
      return 0;
    case "bufferEnd":
      return text.length;
    case "pageUp":
      return text.getPos(row - pageSize, 0);
    case "pageDown":
      return text.getPos(row + pageSize, 0);
  }

  throw new RangeError(`Bad direction: ${String(direction)}`);
}

/** Letters and digits in any script. */
export function isWordChar(ch: string): boolean {
  return /^[\p{L}\p{N}]$/u.test(ch);
}

/**
 * The maximal run of word characters containing pos, as [start, end),
 * or undefined if the character at pos is not a word character.
 */
export function wordAt(
  text: TextReader,
  pos: number,
): { start: number; end: number } | undefined {
  if (pos >= text.length || !isWordChar(text.charAt(pos))) return undefined;

  let start = pos;
  while (start > 0 && isWordChar(text.charAt(start - 1))) start--;
  let end = pos + 1;
  while (end < text.length && isWordChar(text.charAt(end))) end++;
  return { start, end };
}
