/**
 * Rope: text held as a flat array of chunks of roughly TARGET_CHUNK_SIZE chars.
 *
 * Immutable: insert/delete/replace return new ropes. Each chunk caches its
 * newline count, and the rope keeps prefix sums of chunk offsets and newlines,
 * so offset → row and row → offset lookups binary-search the chunk list and
 * only scan inside a single chunk.
 */

export const TARGET_CHUNK_SIZE = 1024;

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
 * Split text into chunks, breaking after a newline when one falls inside
 * the chunk window. Lines longer than a chunk are split mid-line.
 */
function textToChunks(text: string): Chunk[] {
  if (text.length <= TARGET_CHUNK_SIZE) return [makeChunk(text)];

  const chunks: Chunk[] = [];
  let pos = 0;
  while (pos < text.length) {
    let end = Math.min(pos + TARGET_CHUNK_SIZE, text.length);
    if (end < text.length) {
      const newlinePos = text.lastIndexOf("\n", end - 1);
      if (newlinePos >= pos) end = newlinePos + 1;
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
  /** _chunkNewlinePrefixes[i] = newlines in chunks 0..i-1 (one extra entry at the end). */
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

  /** Number of rows; text ending in a newline has an empty last row. */
  get lineCount(): number {
    return this._newlineCount + 1;
  }

  /** Get the full text. O(n). */
  text(): string {
    let result = "";
    for (const c of this._chunks) {
      result += c.text;
    }
    return result;
  }

  /** The character at an offset, or "" outside [0, length). */
  charAt(offset: number): string {
    if (offset < 0 || offset >= this._length) return "";
    const ci = this._findChunkByOffset(offset);
    const chunk = this._chunks[ci];
    if (!chunk) return "";
    return chunk.text.charAt(offset - (this._chunkOffsets[ci] ?? 0));
  }

  /** Get a substring by offset range [start, end). */
  slice(start: number, end: number): string {
    if (start >= end || start >= this._length) return "";

    let result = "";
    const first = this._findChunkByOffset(Math.max(0, start));
    for (let ci = first; ci < this._chunks.length; ci++) {
      const chunk = this._chunks[ci];
      if (!chunk) break;
      const offset = this._chunkOffsets[ci] ?? 0;
      if (offset >= end) break;
      const sliceStart = Math.max(0, start - offset);
      const sliceEnd = Math.min(chunk.text.length, end - offset);
      result += chunk.text.slice(sliceStart, sliceEnd);
    }
    return result;
  }

  /** Offset of the first character of a row. Rows past the end map to length. */
  lineStart(row: number): number {
    if (row <= 0) return 0;
    if (row >= this.lineCount) return this._length;

    // Row r starts just after the r-th newline. Find the chunk holding it.
    const ci = this._findChunkByNewline(row);
    const chunk = this._chunks[ci];
    if (!chunk) return this._length;

    const chunkStart = this._chunkOffsets[ci] ?? 0;
    let remaining = row - (this._chunkNewlinePrefixes[ci] ?? 0);
    for (let i = 0; i < chunk.text.length; i++) {
      if (chunk.text.charCodeAt(i) === 10) {
        remaining--;
        if (remaining === 0) return chunkStart + i + 1;
      }
    }
    return chunkStart + chunk.text.length;
  }

  /** Offset of the newline ending a row, or length for the last row. */
  lineEnd(row: number): number {
    if (row < 0) return this.lineEnd(0);
    if (row + 1 >= this.lineCount) return this._length;
    return this.lineStart(row + 1) - 1;
  }

  /** Get a single row's content without its newline. */
  line(row: number): string {
    if (row < 0 || row >= this.lineCount) return "";
    return this.slice(this.lineStart(row), this.lineEnd(row));
  }

  /** Insert text at an offset. Returns a new rope. */
  insert(offset: number, text: string): Rope {
    if (text.length === 0) return this;
    return this.replace(offset, offset, text);
  }

  /** Delete a range [start, end). Returns a new rope. */
  delete(start: number, end: number): Rope {
    if (start >= end) return this;
    return this.replace(start, end, "");
  }

  /** Replace a range [start, end) with text. Returns a new rope. */
  replace(start: number, end: number, text: string): Rope {
    const before = this.slice(0, start);
    const after = this.slice(end, this._length);
    return Rope.from(before + text + after);
  }

  /** Convert an offset (clamped to [0, length]) to {line, col}. */
  offsetToLineCol(offset: number): { line: number; col: number } {
    const clamped = Math.max(0, Math.min(offset, this._length));
    const ci = this._findChunkByOffset(clamped);
    const chunk = this._chunks[ci];
    if (!chunk) return { line: 0, col: 0 };

    const chunkStart = this._chunkOffsets[ci] ?? 0;
    let line = this._chunkNewlinePrefixes[ci] ?? 0;
    for (let i = 0; i < clamped - chunkStart; i++) {
      if (chunk.text.charCodeAt(i) === 10) line++;
    }
    return { line, col: clamped - this.lineStart(line) };
  }

  /**
   * Convert {line, col} to an offset. The row is clamped to the text and the
   * column to the row's content, so the result never lands past a newline.
   */
  lineColToOffset(line: number, col: number): number {
    const row = Math.max(0, Math.min(line, this.lineCount - 1));
    const start = this.lineStart(row);
    const end = this.lineEnd(row);
    return start + Math.max(0, Math.min(col, end - start));
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

  /** Binary search: first chunk whose cumulative newline count reaches n. */
  private _findChunkByNewline(n: number): number {
    let lo = 0;
    let hi = this._chunks.length - 1;
    while (lo < hi) {
      const mid = (lo + hi) >> 1;
      if ((this._chunkNewlinePrefixes[mid + 1] ?? 0) >= n) {
        hi = mid;
      } else {
        lo = mid + 1;
      }
    }
    return lo;
  }
}
