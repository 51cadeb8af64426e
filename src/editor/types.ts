/**
 * Editor types: damage levels, directions, keys, mementos and the display
 * collaborator the editor drives.
 */

import type { Change } from "./change.ts";
import type { Editor } from "./editor.ts";

// =============================================================================
// Damage
// =============================================================================

/**
 * How much of the display is out of date.
 * Ordered: a command's damage only ever moves up until it is flushed.
 */
export const Damage = {
  Clean: 0,
  RewriteLine: 1,
  Rewrite: 2,
} as const;

export type Damage = (typeof Damage)[keyof typeof Damage];

// =============================================================================
// Commands
// =============================================================================

/** Direction argument for moveCommand and deleteCommand. */
export type Direction =
  | "left"
  | "right"
  | "up"
  | "down"
  | "home"
  | "end"
  | "pageUp"
  | "pageDown"
  | "bufferStart"
  | "bufferEnd";

/**
 * A command runs against the editor and returns the change it made, or
 * undefined when the text was not altered (motion, mark, prompts, undo).
 */
export type Command = (
  editor: Editor,
) => Change | undefined | Promise<Change | undefined>;

/**
 * A key as delivered by the display: the character itself for printable
 * keys, otherwise a name such as "ArrowLeft" or "Ctrl+Q".
 */
export type Key = string;

export const Keys = {
  ArrowLeft: "ArrowLeft",
  ArrowRight: "ArrowRight",
  ArrowUp: "ArrowUp",
  ArrowDown: "ArrowDown",
  Home: "Home",
  End: "End",
  CtrlHome: "Ctrl+Home",
  CtrlEnd: "Ctrl+End",
  PageUp: "PageUp",
  PageDown: "PageDown",
  Enter: "Enter",
  Tab: "Tab",
  Backspace: "Backspace",
  Delete: "Delete",
  Escape: "Escape",
} as const;

/** The key name for Ctrl plus a letter, e.g. ctrl("q") → "Ctrl+Q". */
export function ctrl(letter: string): Key {
  return `Ctrl+${letter.toUpperCase()}`;
}

/** True for a single code point that inserts itself (emoji included). */
export function isPrintable(key: Key): boolean {
  const code = key.codePointAt(0);
  if (code === undefined || Array.from(key).length !== 1) return false;
  if (code >= 0xd800 && code <= 0xdfff) return false;
  return code >= 32 && code !== 127 && !(code >= 0x80 && code < 0xa0);
}

// =============================================================================
// State snapshots
// =============================================================================

/** Point and mark at one moment. Never refers to text content. */
export interface Memento {
  readonly point: number;
  readonly mark: number;
}

// =============================================================================
// Display
// =============================================================================

/** What a display needs to draw the buffer. */
export interface TextView {
  readonly numLines: number;
  readonly filename: string;
  readonly modified: boolean;
  fetchLine(row: number): string;
}

/**
 * The terminal-side collaborator. Drawing is synchronous; reading keys
 * and prompting wait for the user.
 */
export interface Display {
  /** Rows available for text. */
  readonly height: number;
  show(view: TextView): void;
  getKey(): Promise<Key>;
  /** Redraw as much as damage requires and put the cursor at (row, column). */
  refresh(damage: Damage, row: number, column: number): void;
  /** Move the viewport by a number of rows. */
  scroll(amount: number): void;
  /** Recenter the viewport on the cursor. */
  chooseOrigin(): void;
  /** Show a transient message; undefined clears it. */
  setMessage(message: string | undefined): void;
  beep(): void;
  /** Ask a yes/no question. */
  ask(question: string): Promise<boolean>;
  /** Read a line of text, or undefined if the user cancelled. */
  readString(prompt: string, initial: string): Promise<string | undefined>;
}

/** Key → command table, built once at startup. */
export type Keymap = ReadonlyMap<Key, Command>;
