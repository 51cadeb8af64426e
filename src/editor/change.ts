/**
 * Changes: the entries of the undo history.
 *
 * A closed union discriminated by `kind`. Undo, redo and amalgamation are
 * switches over the kind; each change knows only offsets and text, and acts
 * on whichever buffer it is applied to.
 */

import type { EditBuffer } from "./buffer.ts";
import type { ChangeOps } from "./history.ts";
import type { Memento } from "./types.ts";

export interface Insertion {
  readonly kind: "insertion";
  readonly pos: number;
  readonly text: string;
}

/** An insertion that absorbs the characters typed straight after it. */
export interface MergeableInsertion {
  readonly kind: "mergeableInsertion";
  readonly pos: number;
  /** Grows as later insertions are merged in. */
  text: string;
}

export interface Deletion {
  readonly kind: "deletion";
  readonly pos: number;
  readonly deleted: string;
}

/** Self-inverse: applying it twice restores the text. */
export interface Transposition {
  readonly kind: "transposition";
  readonly pos: number;
}

/** Uppercasing done in place with setChar; keeps the original case. */
export interface Uppercase {
  readonly kind: "uppercase";
  readonly pos: number;
  readonly original: string;
}

/** A text change plus the point/mark before and after the command. */
export interface Composite {
  readonly kind: "composite";
  readonly before: Memento;
  readonly inner: Change;
  /** Replaced when a later command is merged in. */
  after: Memento;
}

export type Change =
  | Insertion
  | MergeableInsertion
  | Deletion
  | Transposition
  | Uppercase
  | Composite;

// =============================================================================
// Constructors
// =============================================================================

export function insertion(pos: number, text: string): Insertion {
  return { kind: "insertion", pos, text };
}

export function mergeableInsertion(pos: number, text: string): MergeableInsertion {
  return { kind: "mergeableInsertion", pos, text };
}

export function deletion(pos: number, deleted: string): Deletion {
  return { kind: "deletion", pos, deleted };
}

export function transposition(pos: number): Transposition {
  return { kind: "transposition", pos };
}

export function uppercase(pos: number, original: string): Uppercase {
  return { kind: "uppercase", pos, original };
}

export function composite(before: Memento, inner: Change, after: Memento): Composite {
  return { kind: "composite", before, inner, after };
}

// =============================================================================
// Application
// =============================================================================

/**
 * Uppercase a single character. Characters whose uppercase form is longer
 * (such as "ß") are left alone so the text length never changes.
 */
export function toUpperChar(ch: string): string {
  const upper = ch.toUpperCase();
  return upper.length === ch.length ? upper : ch;
}

/** Uppercase text one code unit at a time, keeping its length. */
export function toUpperText(text: string): string {
  let result = "";
  for (let i = 0; i < text.length; i++) {
    result += toUpperChar(text.charAt(i));
  }
  return result;
}

function writeChars(buffer: EditBuffer, pos: number, text: string): void {
  for (let i = 0; i < text.length; i++) {
    buffer.setChar(pos + i, text.charAt(i));
  }
}

/** Put the buffer back to the state before the change. */
export function undoChange(buffer: EditBuffer, change: Change): void {
  switch (change.kind) {
    case "insertion":
    case "mergeableInsertion":
      buffer.deleteRange(change.pos, change.text.length);
      return;
    case "deletion":
      buffer.insert(change.pos, change.deleted);
      return;
    case "transposition":
      buffer.transpose(change.pos);
      return;
    case "uppercase":
      writeChars(buffer, change.pos, change.original);
      return;
    case "composite":
      undoChange(buffer, change.inner);
      buffer.restore(change.before);
      return;
  }
}

/** Put the buffer into the state after the change. */
export function redoChange(buffer: EditBuffer, change: Change): void {
  switch (change.kind) {
    case "insertion":
    case "mergeableInsertion":
      buffer.insert(change.pos, change.text);
      return;
    case "deletion":
      buffer.deleteRange(change.pos, change.deleted.length);
      return;
    case "transposition":
      buffer.transpose(change.pos);
      return;
    case "uppercase":
      writeChars(buffer, change.pos, toUpperText(change.original));
      return;
    case "composite":
      redoChange(buffer, change.inner);
      buffer.restore(change.after);
      return;
  }
}

/**
 * Try to merge a later change into an earlier one. Returns true and updates
 * `target` in place on success; leaves both untouched otherwise.
 *
 * Typing runs merge until the run ends in a newline or the next character is
 * not inserted directly after it. Composites merge when their inner changes
 * do. A composite can only be merged with another composite.
 */
export function amalgamateChange(target: Change, other: Change): boolean {
  switch (target.kind) {
    case "mergeableInsertion":
      if (other.kind !== "mergeableInsertion") return false;
      if (target.text.endsWith("\n")) return false;
      if (other.pos !== target.pos + target.text.length) return false;
      target.text += other.text;
      return true;
    case "composite":
      if (other.kind !== "composite") {
        throw new TypeError(`Cannot amalgamate a composite change with a ${other.kind} change`);
      }
      if (!amalgamateChange(target.inner, other.inner)) return false;
      target.after = other.after;
      return true;
    default:
      return false;
  }
}

/** Bind change application to a buffer for use by a History. */
export function changeOps(buffer: EditBuffer): ChangeOps<Change> {
  return {
    undo: (change) => undoChange(buffer, change),
    redo: (change) => redoChange(buffer, change),
    amalgamate: amalgamateChange,
  };
}
