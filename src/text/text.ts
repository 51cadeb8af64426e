/**
 * TextStore: mutable character storage for the edit buffer.
 *
 * Wraps an immutable Rope and swaps in a new rope on every edit.
 * Offsets count UTF-16 code units; rows are separated by "\n".
 */

import { readFile, writeFile } from "node:fs/promises";
import { Rope } from "./rope.ts";

/** Read-only access to text by offset and by row/column. */
export interface TextReader {
  readonly length: number;
  readonly numLines: number;
  charAt(pos: number): string;
  getRange(pos: number, len: number): string;
  getRow(pos: number): number;
  getColumn(pos: number): number;
  /** Offset of (row, col), clamped to the text and to the row's content. */
  getPos(row: number, col: number): number;
  lineStart(row: number): number;
  /** Offset of the newline ending the row, or length on the last row. */
  lineEnd(row: number): number;
  /** Characters in the row, not counting its newline. */
  getLineLength(row: number): number;
  fetchLine(row: number): string;
}

export class TextStore implements TextReader {
  private _rope: Rope;

  constructor(text = "") {
    this._rope = Rope.from(text);
  }

  get length(): number {
    return this._rope.length;
  }

  get numLines(): number {
    return this._rope.lineCount;
  }

  text(): string {
    return this._rope.text();
  }

  charAt(pos: number): string {
    return this._rope.charAt(pos);
  }

  getRange(pos: number, len: number): string {
    return this._rope.slice(pos, pos + len);
  }

  getRow(pos: number): number {
    return this._rope.offsetToLineCol(pos).line;
  }

  getColumn(pos: number): number {
    return this._rope.offsetToLineCol(pos).col;
  }

  getPos(row: number, col: number): number {
    return this._rope.lineColToOffset(row, col);
  }

  lineStart(row: number): number {
    return this._rope.lineStart(row);
  }

  lineEnd(row: number): number {
    return this._rope.lineEnd(row);
  }

  getLineLength(row: number): number {
    if (row < 0 || row >= this.numLines) return 0;
    return this._rope.lineEnd(row) - this._rope.lineStart(row);
  }

  fetchLine(row: number): string {
    return this._rope.line(row);
  }

  /** Overwrite the character at pos. */
  set(pos: number, ch: string): void {
    this._checkRange(pos, 1);
    if (ch.length !== 1) {
      throw new RangeError(`Expected a single character, got ${JSON.stringify(ch)}`);
    }
    this._rope = this._rope.replace(pos, pos + 1, ch);
  }

  insert(pos: number, text: string): void {
    this._checkRange(pos, 0);
    this._rope = this._rope.insert(pos, text);
  }

  deleteRange(pos: number, len: number): void {
    this._checkRange(pos, len);
    this._rope = this._rope.delete(pos, pos + len);
  }

  /** Replace the whole text. */
  replace(text: string): void {
    this._rope = Rope.from(text);
  }

  /**
   * Replace the contents with a file's text. The file is read completely
   * before anything changes, so a failed read leaves the store as it was.
   */
  async readFile(path: string): Promise<void> {
    const text = await readFile(path, "utf8");
    this.replace(text);
  }

  async writeFile(path: string): Promise<void> {
    await writeFile(path, this._rope.text(), "utf8");
  }

  private _checkRange(pos: number, len: number): void {
    if (pos < 0 || len < 0 || pos + len > this.length) {
      throw new RangeError(
        `Range [${pos}, ${pos + len}) is outside text of length ${this.length}`,
      );
    }
  }
}
