/**
 * Test helpers: an in-memory display and editor setup.
 */

import { mkdtemp } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Editor } from "../src/editor/editor.ts";
import { createKeymap, lookupCommand } from "../src/editor/keymap.ts";
import type { Command, Damage, Display, Key, Keymap, TextView } from "../src/editor/types.ts";

// =============================================================================
// Fake display
// =============================================================================

export interface RefreshCall {
  readonly damage: Damage;
  readonly row: number;
  readonly column: number;
}

/**
 * A display that records what the editor asks of it. Keys, yes/no answers
 * and prompt replies are scripted up front.
 */
export class FakeDisplay implements Display {
  height = 20;
  view: TextView | undefined = undefined;
  message: string | undefined = undefined;
  readonly messages: string[] = [];
  readonly refreshes: RefreshCall[] = [];
  readonly scrolls: number[] = [];
  readonly questions: string[] = [];
  readonly prompts: { prompt: string; initial: string }[] = [];
  beeps = 0;
  origins = 0;

  keys: Key[] = [];
  answers: boolean[] = [];
  replies: (string | undefined)[] = [];

  show(view: TextView): void {
    this.view = view;
  }

  getKey(): Promise<Key> {
    const key = this.keys.shift();
    if (key === undefined) return Promise.reject(new Error("no more scripted keys"));
    return Promise.resolve(key);
  }

  refresh(damage: Damage, row: number, column: number): void {
    this.refreshes.push({ damage, row, column });
  }

  scroll(amount: number): void {
    this.scrolls.push(amount);
  }

  chooseOrigin(): void {
    this.origins++;
  }

  setMessage(message: string | undefined): void {
    this.message = message;
    if (message !== undefined) this.messages.push(message);
  }

  beep(): void {
    this.beeps++;
  }

  ask(question: string): Promise<boolean> {
    this.questions.push(question);
    return Promise.resolve(this.answers.shift() ?? false);
  }

  readString(prompt: string, initial: string): Promise<string | undefined> {
    this.prompts.push({ prompt, initial });
    return Promise.resolve(this.replies.shift());
  }

  lastRefresh(): RefreshCall | undefined {
    return this.refreshes[this.refreshes.length - 1];
  }

  /** Forget recorded calls (scripted input is kept). */
  clear(): void {
    this.refreshes.length = 0;
    this.scrolls.length = 0;
    this.messages.length = 0;
    this.beeps = 0;
    this.origins = 0;
  }
}

// =============================================================================
// Editor setup
// =============================================================================

export interface Setup {
  display: FakeDisplay;
  editor: Editor;
  keymap: Keymap;
}

/** An activated editor holding `text`, with the display's records cleared. */
export function setup(text = ""): Setup {
  const display = new FakeDisplay();
  const editor = new Editor(display);
  editor.buffer.loadText(text);
  editor.activate();
  display.clear();
  return { display, editor, keymap: createKeymap() };
}

/** Look up a key and perform its command, as the command loop does. */
export async function press(s: Setup, ...keys: Key[]): Promise<void> {
  for (const key of keys) {
    const command = lookupCommand(s.keymap, key);
    if (!command) throw new Error(`no command for key ${key}`);
    await s.editor.perform(command);
  }
}

/** Type each character of text as its own key press. */
export async function typeText(s: Setup, text: string): Promise<void> {
  await press(s, ...Array.from(text, (ch) => (ch === "\n" ? "Enter" : ch)));
}

/** Perform a command directly. */
export function run(s: Setup, command: Command): Promise<boolean> {
  return s.editor.perform(command);
}

/** Put point at (row, column) without recording anything. */
export function moveTo(s: Setup, row: number, column: number): void {
  const buffer = s.editor.buffer;
  buffer.setPoint(buffer.getPos(row, column));
}

/** A fresh temporary directory for file tests. */
export function tempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), "tern-test-"));
}
