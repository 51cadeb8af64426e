/**
 * Editor: the command layer over an EditBuffer.
 *
 * Every key runs through perform → obey: obey snapshots point and mark
 * around the command, flushes damage to the display, and wraps whatever
 * the command changed into a composite change for the history.
 */

import { EditBuffer } from "./buffer.ts";
import {
  type Change,
  changeOps,
  composite,
  deletion,
  insertion,
  mergeableInsertion,
  toUpperText,
  transposition,
  uppercase,
} from "./change.ts";
import { moveTarget, nextCodePoint, prevCodePoint, wordAt } from "./cursor.ts";
import { History } from "./history.ts";
import { lookupCommand } from "./keymap.ts";
import type { Command, Direction, Display, Keymap } from "./types.ts";

/** Rows kept in view from the previous page on PageUp/PageDown. */
export const SCROLL_MARGIN = 3;

/** What the Tab key inserts. */
export const TAB_TEXT = "  ";

export class Editor {
  readonly buffer: EditBuffer;
  readonly history: History<Command, Change>;
  private readonly _display: Display;
  private _alive = true;
  /**
   * Goal column for vertical motion. Resolved at most once per command;
   * the previous command's value is reused only by a following UP/DOWN.
   */
  private _goal: number | undefined = undefined;
  private _prevGoal: number | undefined = undefined;

  constructor(display: Display) {
    this._display = display;
    this.buffer = new EditBuffer(display);
    this.history = new History<Command, Change>(
      (command) => this.obey(command),
      changeOps(this.buffer),
    );
  }

  get alive(): boolean {
    return this._alive;
  }

  /** Show the buffer on the display and draw it in full. */
  activate(): void {
    this._display.show(this.buffer);
    this.buffer.initDisplay();
  }

  loadFile(name: string): Promise<boolean> {
    return this.buffer.loadFile(name);
  }

  // ===========================================================================
  // Command execution protocol
  // ===========================================================================

  /** Execute a command and record its change in the history. */
  perform(command: Command): Promise<boolean> {
    return this.history.perform(command);
  }

  /** Run a command, wrapping it in the actions common to all commands. */
  async obey(command: Command): Promise<Change | undefined> {
    this._prevGoal = this._goal;
    this._goal = undefined;
    this._display.setMessage(undefined);
    const before = this.buffer.getState();
    const change = await command(this);
    const after = this.buffer.getState();
    this.buffer.update();
    return change === undefined ? undefined : composite(before, change, after);
  }

  /** Read keys and run their commands until a quit command succeeds. */
  async run(keymap: Keymap): Promise<void> {
    this.activate();
    while (this._alive) {
      const key = await this._display.getKey();
      const command = lookupCommand(keymap, key);
      if (command) {
        await this.perform(command);
      } else {
        this.beep();
      }
    }
  }

  beep(): void {
    this._display.beep();
  }

  /** Ask for confirmation if the buffer has unsaved changes. */
  checkClean(action: string): Promise<boolean> {
    if (!this.buffer.modified) return Promise.resolve(true);
    return this._display.ask(`Buffer modified -- really ${action}?`);
  }

  private _goalColumn(): number {
    if (this._goal === undefined) {
      this._goal = this._prevGoal ?? this.buffer.getColumn(this.buffer.point);
    }
    return this._goal;
  }

  private _scrollAmount(): number {
    return Math.max(1, this._display.height - SCROLL_MARGIN);
  }

  private _fail(): undefined {
    this.beep();
    return undefined;
  }

  // ===========================================================================
  // Commands
  // ===========================================================================

  /** Move the cursor; beeps when the move would leave the buffer. */
  moveCommand(direction: Direction): void {
    const amount = this._scrollAmount();
    const target = moveTarget(
      this.buffer,
      this.buffer.point,
      direction,
      () => this._goalColumn(),
      amount,
    );
    if (target === undefined) {
      this.beep();
      return;
    }
    if (direction === "pageDown") this._display.scroll(amount);
    if (direction === "pageUp") this._display.scroll(-amount);
    this.buffer.setPoint(target);
  }

  insertCommand(ch: string): Change {
    const p = this.buffer.point;
    this.buffer.insert(p, ch);
    this.buffer.setPoint(p + ch.length);
    return mergeableInsertion(p, ch);
  }

  insertTabCommand(): Change {
    const p = this.buffer.point;
    this.buffer.insert(p, TAB_TEXT);
    this.buffer.setPoint(p + TAB_TEXT.length);
    return insertion(p, TAB_TEXT);
  }

  /**
   * Delete the code point before point (left) or at point (right), or the
   * rest of the line (end). At the end of a line, end joins the next line.
   */
  deleteCommand(direction: Direction): Change | undefined {
    const buffer = this.buffer;
    let p = buffer.point;
    let deleted: string;

    switch (direction) {
      case "left": {
        if (p === 0) return this._fail();
        const start = prevCodePoint(buffer, p);
        deleted = buffer.getRange(start, p - start);
        p = start;
        buffer.deleteRange(p, deleted.length);
        buffer.setPoint(p);
        break;
      }
      case "right":
        if (p === buffer.length) return this._fail();
        deleted = buffer.getRange(p, nextCodePoint(buffer, p) - p);
        buffer.deleteRange(p, deleted.length);
        break;
      case "end": {
        if (p === buffer.length) return this._fail();
        const lineEnd = buffer.lineEnd(buffer.getRow(p));
        const count = p === lineEnd ? 1 : lineEnd - p;
        deleted = buffer.getRange(p, count);
        buffer.deleteRange(p, count);
        break;
      }
      default:
        throw new RangeError(`Cannot delete in direction '${direction}'`);
    }

    return deletion(p, deleted);
  }

  transposeCommand(): Change | undefined {
    const p = this.buffer.point;
    if (!this.buffer.transpose(p)) return this._fail();
    return transposition(p);
  }

  /** Uppercase the word under the cursor in place. */
  toUpperCommand(): Change | undefined {
    const word = wordAt(this.buffer, this.buffer.point);
    if (!word) return this._fail();

    const original = this.buffer.getRange(word.start, word.end - word.start);
    const upper = toUpperText(original);
    for (let i = 0; i < original.length; i++) {
      this.buffer.setChar(word.start + i, upper.charAt(i));
    }
    return uppercase(word.start, original);
  }

  markCommand(): void {
    this.buffer.setMark(this.buffer.point);
  }

  switchMarkCommand(): void {
    const tmp = this.buffer.point;
    this.buffer.setPoint(this.buffer.mark);
    this.buffer.setMark(tmp);
  }

  async saveFileCommand(): Promise<void> {
    const name = await this._display.readString("Write file", this.buffer.filename);
    if (name !== undefined && name.length > 0) {
      await this.buffer.saveFile(name);
    }
  }

  /** Prompt for a file to read into the buffer, replacing its contents. */
  async replaceFileCommand(): Promise<void> {
    if (!(await this.checkClean("overwrite"))) return;
    const name = await this._display.readString("Read file", this.buffer.filename);
    if (name === undefined || name.length === 0) return;
    if (await this.buffer.loadFile(name)) {
      this.history.reset();
    }
  }

  /** Recenter and rewrite the display. */
  chooseOrigin(): void {
    this._display.chooseOrigin();
    this.buffer.forceRewrite();
  }

  async quit(): Promise<void> {
    if (await this.checkClean("quit")) this._alive = false;
  }

  undo(): void {
    if (!this.history.undo()) this.beep();
  }

  redo(): void {
    if (!this.history.redo()) this.beep();
  }
}
