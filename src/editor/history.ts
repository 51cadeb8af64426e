/**
 * History: an undo stack with a redo tail.
 *
 * Generic over the action type it executes and the change type it records.
 * The executor runs an action and reports the change it made; the change
 * operations know how to undo, redo and merge changes.
 */

/** How a History applies and merges its recorded changes. */
export interface ChangeOps<C> {
  undo(change: C): void;
  redo(change: C): void;
  /** Merge `next` into `previous`, returning false if they must stay separate. */
  amalgamate(previous: C, next: C): boolean;
}

/** Runs an action and returns the change it made, or undefined for none. */
export type Executor<A, C> = (action: A) => C | undefined | Promise<C | undefined>;

export class History<A, C> {
  private readonly _execute: Executor<A, C>;
  private readonly _ops: ChangeOps<C>;
  /** Entries [0, _cursor) are done; [_cursor, length) have been undone. */
  private readonly _entries: C[] = [];
  private _cursor = 0;
  /**
   * Whether the next change may merge with the last entry.
   * Set by every recorded change, cleared by every action that records none.
   */
  private _amalgamating = false;

  constructor(execute: Executor<A, C>, ops: ChangeOps<C>) {
    this._execute = execute;
    this._ops = ops;
  }

  get entries(): readonly C[] {
    return this._entries;
  }

  get length(): number {
    return this._entries.length;
  }

  /** Number of entries that are currently done. */
  get position(): number {
    return this._cursor;
  }

  get amalgamating(): boolean {
    return this._amalgamating;
  }

  get canUndo(): boolean {
    return this._cursor > 0;
  }

  get canRedo(): boolean {
    return this._cursor < this._entries.length;
  }

  /**
   * Execute an action and record its change. Returns true if the action
   * changed the text, whether it got a new entry or merged into the last one.
   */
  async perform(action: A): Promise<boolean> {
    const change = await this._execute(action);
    if (change === undefined) {
      this._amalgamating = false;
      return false;
    }

    // A new edit discards whatever had been undone.
    this._entries.length = this._cursor;

    const last = this._entries[this._entries.length - 1];
    if (this._amalgamating && last !== undefined && this._ops.amalgamate(last, change)) {
      return true;
    }

    this._entries.push(change);
    this._cursor++;
    this._amalgamating = true;
    return true;
  }

  /** Undo the latest done entry. Returns false if there is none. */
  undo(): boolean {
    const change = this._entries[this._cursor - 1];
    if (this._cursor === 0 || change === undefined) return false;
    this._cursor--;
    this._ops.undo(change);
    return true;
  }

  /** Redo the next undone entry. Returns false if there is none. */
  redo(): boolean {
    const change = this._entries[this._cursor];
    if (change === undefined) return false;
    this._ops.redo(change);
    this._cursor++;
    return true;
  }

  /** Forget everything, e.g. after loading a new file. */
  reset(): void {
    this._entries.length = 0;
    this._cursor = 0;
    this._amalgamating = false;
  }
}
