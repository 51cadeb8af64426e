/**
 * TerminalDisplay: the editor's display on an ANSI terminal.
 *
 * The top `height` rows show the text from `origin` down; the last row is
 * the status line, which also hosts prompts. Redraws follow the damage
 * level the buffer reports: everything, the cursor's row, or nothing.
 */

import { emitKeypressEvents } from "node:readline";
import stringWidth from "string-width";
import {
  Damage,
  type Display,
  type Key,
  Keys,
  type TextView,
  ctrl,
  isPrintable,
} from "../editor/types.ts";
import { type KeypressInfo, decodeKeypress } from "./keys.ts";

const DEFAULT_ROWS = 24;
const DEFAULT_COLUMNS = 80;

const CSI = "\x1b[";
const CLEAR_LINE = `${CSI}2K`;
const INVERSE = `${CSI}7m`;
const RESET = `${CSI}0m`;
const ALT_SCREEN_ON = `${CSI}?1049h${CSI}H${CSI}2J`;
const ALT_SCREEN_OFF = `${CSI}?1049l`;
const BELL = "\x07";

function moveTo(row: number, column: number): string {
  return `${CSI}${row + 1};${column + 1}H`;
}

/** Keyboard side of the terminal: process.stdin or a stand-in. */
export type TerminalInput = NodeJS.ReadableStream & {
  isTTY?: boolean;
  setRawMode?: (mode: boolean) => unknown;
};

/** Screen side of the terminal: process.stdout or a stand-in. */
export interface TerminalOutput {
  readonly rows?: number;
  readonly columns?: number;
  write(data: string): boolean;
}

export interface TerminalOptions {
  readonly input: TerminalInput;
  readonly output: TerminalOutput;
  /** Shown at the start of the status line. */
  readonly title?: string;
}

/** One character as it goes on screen: tab becomes a space, other controls "?". */
function displayChar(ch: string): string {
  if (ch === "\t") return " ";
  const code = ch.charCodeAt(0);
  return code < 32 || code === 127 ? "?" : ch;
}

/**
 * One row of text as it goes on screen, cut at `width` terminal cells.
 * Wide characters (CJK, most emoji) take two cells.
 */
export function renderLine(line: string, width: number): string {
  let result = "";
  let cells = 0;
  for (const ch of line) {
    const shown = displayChar(ch);
    const charWidth = stringWidth(shown);
    if (cells + charWidth > width) break;
    result += shown;
    cells += charWidth;
  }
  return result;
}

/** Terminal cells taken by the first `column` code units of a row. */
export function screenColumn(line: string, column: number): number {
  return stringWidth(renderLine(line.slice(0, column), Number.POSITIVE_INFINITY));
}

export class TerminalDisplay implements Display {
  private readonly _input: TerminalInput;
  private readonly _output: TerminalOutput;
  private readonly _title: string;
  /** Keys typed before anyone asked for them. */
  private readonly _pending: Key[] = [];
  /** getKey calls still waiting for a key. */
  private readonly _waiting: ((key: Key) => void)[] = [];
  private _view: TextView | undefined = undefined;
  /** First buffer row on screen. */
  private _origin = 0;
  /** Set when the whole screen must be redrawn regardless of damage. */
  private _stale = true;
  private _message: string | undefined = undefined;
  private _row = 0;
  private _column = 0;

  private readonly _onKeypress = (str: string | undefined, key: KeypressInfo | undefined): void => {
    const decoded = decodeKeypress(str, key);
    if (decoded === undefined) {
      this.beep();
      return;
    }
    const waiter = this._waiting.shift();
    if (waiter) {
      waiter(decoded);
    } else {
      this._pending.push(decoded);
    }
  };

  constructor(options: TerminalOptions) {
    this._input = options.input;
    this._output = options.output;
    this._title = options.title ?? "tern";
  }

  get height(): number {
    return Math.max(1, (this._output.rows ?? DEFAULT_ROWS) - 1);
  }

  get width(): number {
    return Math.max(1, this._output.columns ?? DEFAULT_COLUMNS);
  }

  get origin(): number {
    return this._origin;
  }

  /** Take over the terminal: raw keyboard input and the alternate screen. */
  open(): void {
    emitKeypressEvents(this._input);
    this._input.setRawMode?.(true);
    this._input.on("keypress", this._onKeypress);
    this._input.resume();
    this._output.write(ALT_SCREEN_ON);
  }

  /** Give the terminal back. */
  close(): void {
    this._input.off("keypress", this._onKeypress);
    this._input.setRawMode?.(false);
    this._input.pause();
    this._output.write(ALT_SCREEN_OFF);
  }

  show(view: TextView): void {
    this._view = view;
    this._origin = 0;
    this._stale = true;
  }

  getKey(): Promise<Key> {
    const key = this._pending.shift();
    if (key !== undefined) return Promise.resolve(key);
    return new Promise((resolve) => {
      this._waiting.push(resolve);
    });
  }

  refresh(damage: Damage, row: number, column: number): void {
    const view = this._view;
    if (!view) return;

    if (row < this._origin || row >= this._origin + this.height) {
      this._origin = Math.max(0, row - Math.floor(this.height / 2));
      this._stale = true;
    }

    let out = "";
    if (this._stale || damage === Damage.Rewrite) {
      for (let r = 0; r < this.height; r++) out += this._drawRow(view, r);
      this._stale = false;
    } else if (damage === Damage.RewriteLine) {
      out += this._drawRow(view, row - this._origin);
    }

    this._row = row;
    this._column = column;
    out += this._drawStatus();
    out += this._cursor();
    this._output.write(out);
  }

  scroll(amount: number): void {
    const lastRow = Math.max(0, (this._view?.numLines ?? 1) - 1);
    this._origin = Math.max(0, Math.min(this._origin + amount, lastRow));
    this._stale = true;
  }

  chooseOrigin(): void {
    this._origin = Math.max(0, this._row - Math.floor(this.height / 2));
    this._stale = true;
  }

  setMessage(message: string | undefined): void {
    this._message = message;
  }

  beep(): void {
    this._output.write(BELL);
  }

  async ask(question: string): Promise<boolean> {
    while (true) {
      this._prompt(`${question} (y/n) `);
      const key = await this.getKey();
      if (key === "y" || key === "Y") return this._endPrompt(true);
      if (key === "n" || key === "N" || key === ctrl("g") || key === Keys.Escape) {
        return this._endPrompt(false);
      }
      this.beep();
    }
  }

  async readString(prompt: string, initial: string): Promise<string | undefined> {
    let value = initial;
    while (true) {
      this._prompt(`${prompt}: ${value}`);
      const key = await this.getKey();
      if (key === Keys.Enter) return this._endPrompt(value);
      if (key === ctrl("g") || key === Keys.Escape) return this._endPrompt(undefined);
      if (key === Keys.Backspace) {
        value = value.slice(0, -1);
      } else if (isPrintable(key)) {
        value += key;
      } else {
        this.beep();
      }
    }
  }

  private _drawRow(view: TextView, screenRow: number): string {
    const row = this._origin + screenRow;
    const text = row < view.numLines ? renderLine(view.fetchLine(row), this.width) : "";
    return moveTo(screenRow, 0) + CLEAR_LINE + text;
  }

  private _statusText(): string {
    if (this._message !== undefined) return this._message;
    const view = this._view;
    if (!view) return "";
    const name = view.filename.length > 0 ? view.filename : "[no file]";
    return `${this._title}: ${name}${view.modified ? " [modified]" : ""}`;
  }

  private _drawStatus(): string {
    const text = renderLine(this._statusText(), this.width);
    const padding = " ".repeat(Math.max(0, this.width - stringWidth(text)));
    return moveTo(this.height, 0) + CLEAR_LINE + INVERSE + text + padding + RESET;
  }

  private _cursor(): string {
    const line = this._view?.fetchLine(this._row) ?? "";
    const column = screenColumn(line, this._column);
    return moveTo(this._row - this._origin, Math.min(column, this.width - 1));
  }

  private _prompt(text: string): void {
    const shown = renderLine(text, this.width);
    this._output.write(moveTo(this.height, 0) + CLEAR_LINE + shown);
  }

  private _endPrompt<T>(result: T): T {
    this._output.write(this._drawStatus() + this._cursor());
    return result;
  }
}
