/**
 * EditBuffer: the state of an editing session.
 *
 * Owns the text, point, mark, filename, modified flag and the damage the
 * display has not seen yet. Every mutation notes damage first, then shifts
 * the mark, then edits the text, then sets the modified flag.
 */

import { TextStore, type TextReader } from "../text/text.ts";
import { Damage, type Display, type Memento, type TextView } from "./types.ts";

export class EditBuffer implements TextReader, TextView {
  private readonly _text = new TextStore();
  private readonly _display: Display;

  // Restored by undo and redo
  private _point = 0;
  /** Raw mark; read through `mark`, which replaces out-of-range values. */
  private _mark = 0;

  // Not restored by undo and redo
  private _filename = "";
  private _modified = false;

  private _damage: Damage = Damage.Clean;
  /** The row being rewritten when damage is RewriteLine. */
  private _damageLine = 0;

  constructor(display: Display) {
    this._display = display;
  }

  // ===========================================================================
  // Accessors
  // ===========================================================================

  get point(): number {
    return this._point;
  }

  /**
   * Move the cursor. Leaving the row that is queued for a line rewrite
   * escalates the damage to a full rewrite.
   */
  setPoint(pos: number): void {
    if (this._damage === Damage.RewriteLine && this.getRow(pos) !== this._damageLine) {
      this._damage = Damage.Rewrite;
    }
    this._point = pos;
  }

  /** Always within [0, length]; an out-of-range stored mark reads as point. */
  get mark(): number {
    if (this._mark >= 0 && this._mark <= this.length) return this._mark;
    return this._point;
  }

  setMark(pos: number): void {
    this._mark = pos;
  }

  get filename(): string {
    return this._filename;
  }

  get modified(): boolean {
    return this._modified;
  }

  get damage(): Damage {
    return this._damage;
  }

  // ===========================================================================
  // Text delegates
  // ===========================================================================

  get length(): number {
    return this._text.length;
  }

  get numLines(): number {
    return this._text.numLines;
  }

  text(): string {
    return this._text.text();
  }

  charAt(pos: number): string {
    return this._text.charAt(pos);
  }

  getRange(pos: number, len: number): string {
    return this._text.getRange(pos, len);
  }

  getRow(pos: number): number {
    return this._text.getRow(pos);
  }

  getColumn(pos: number): number {
    return this._text.getColumn(pos);
  }

  getPos(row: number, col: number): number {
    return this._text.getPos(row, col);
  }

  lineStart(row: number): number {
    return this._text.lineStart(row);
  }

  lineEnd(row: number): number {
    return this._text.lineEnd(row);
  }

  getLineLength(row: number): number {
    return this._text.getLineLength(row);
  }

  fetchLine(row: number): string {
    return this._text.fetchLine(row);
  }

  // ===========================================================================
  // Display update
  // ===========================================================================

  /**
   * Raise the damage level. The line to rewrite is the point's row at the
   * first damage since the last flush; touching any other row, or any
   * newline, needs a full rewrite.
   */
  private _noteDamage(rewrite: boolean, row = this.getRow(this._point)): void {
    if (this._damage === Damage.Clean) {
      this._damageLine = this.getRow(this._point);
    }
    const level = rewrite || row !== this._damageLine ? Damage.Rewrite : Damage.RewriteLine;
    if (level > this._damage) this._damage = level;
  }

  forceRewrite(): void {
    this._noteDamage(true);
  }

  /** Send accumulated damage and the cursor position to the display. */
  update(): void {
    this._display.refresh(this._damage, this.getRow(this._point), this.getColumn(this._point));
    this._damage = Damage.Clean;
  }

  initDisplay(): void {
    this.forceRewrite();
    this.update();
  }

  // ===========================================================================
  // Mutators
  // ===========================================================================

  insert(pos: number, text: string): void {
    if (text.length === 0) return;
    this._noteDamage(text.includes("\n"), this.getRow(pos));
    const mark = this.mark;
    if (pos <= mark) this._mark = mark + text.length;
    this._text.insert(pos, text);
    this._modified = true;
  }

  deleteChar(pos: number): void {
    this.deleteRange(pos, 1);
  }

  /** Delete len characters at pos; a mark inside the range moves to pos. */
  deleteRange(pos: number, len: number): void {
    if (len <= 0) return;
    const deleted = this._text.getRange(pos, len);
    this._noteDamage(deleted.includes("\n"), this.getRow(pos));
    const mark = this.mark;
    if (mark >= pos + len) {
      this._mark = mark - len;
    } else if (mark > pos) {
      this._mark = pos;
    }
    this._text.deleteRange(pos, len);
    this._modified = true;
  }

  setChar(pos: number, ch: string): void {
    this._noteDamage(ch === "\n" || this.charAt(pos) === "\n", this.getRow(pos));
    this._text.set(pos, ch);
    this._modified = true;
  }

  /**
   * Swap the two characters either side of pos and leave point after them.
   * At the start of a line the swap happens one place right, at the end one
   * place left. Returns false, changing nothing, when the line has fewer
   * than two characters.
   */
  transpose(pos: number): boolean {
    const row = this.getRow(pos);
    const start = this.lineStart(row);
    const end = this.lineEnd(row);
    if (end - start < 2) return false;

    const at = pos === start ? pos + 1 : pos === end ? pos - 1 : pos;
    this._noteDamage(false, row);
    const ch = this.charAt(at - 1);
    this._text.set(at - 1, this.charAt(at));
    this._text.set(at, ch);
    this.setPoint(at + 1);
    this._modified = true;
    return true;
  }

  // ===========================================================================
  // State snapshots
  // ===========================================================================

  getState(): Memento {
    return { point: this._point, mark: this.mark };
  }

  restore(memento: Memento): void {
    this.setPoint(memento.point);
    this._mark = memento.mark;
  }

  // ===========================================================================
  // Files
  // ===========================================================================

  /** Replace the contents with text, as a successful load does. */
  loadText(text: string): void {
    this._text.replace(text);
    this._resetAfterLoad();
    this._noteDamage(true);
  }

  /**
   * Load a file. On failure the contents stay as they were and a message is
   * shown. The display is rewritten either way.
   */
  async loadFile(name: string): Promise<boolean> {
    this._filename = name;
    let loaded = false;
    try {
      await this._text.readFile(name);
      this._resetAfterLoad();
      loaded = true;
    } catch {
      this._display.setMessage(`Couldn't read file '${name}'`);
    }
    this._noteDamage(true);
    return loaded;
  }

  /** Save the contents. The modified flag is only cleared on success. */
  async saveFile(name: string): Promise<boolean> {
    this._filename = name;
    try {
      await this._text.writeFile(name);
      this._modified = false;
      return true;
    } catch {
      this._display.setMessage(`Couldn't write '${name}'`);
      return false;
    }
  }

  private _resetAfterLoad(): void {
    this._point = 0;
    this._mark = 0;
    this._modified = false;
  }
}
