/**
 * Map keypress events, as emitted by node:readline, to editor keys.
 */

import { type Key, Keys, ctrl, isPrintable } from "../editor/types.ts";

/** The key object readline attaches to a "keypress" event. */
export interface KeypressInfo {
  readonly sequence?: string;
  readonly name?: string;
  readonly ctrl?: boolean;
  readonly meta?: boolean;
  readonly shift?: boolean;
}

const NAMED_KEYS: ReadonlyMap<string, Key> = new Map([
  ["left", Keys.ArrowLeft],
  ["right", Keys.ArrowRight],
  ["up", Keys.ArrowUp],
  ["down", Keys.ArrowDown],
  ["home", Keys.Home],
  ["end", Keys.End],
  ["pageup", Keys.PageUp],
  ["pagedown", Keys.PageDown],
  ["return", Keys.Enter],
  ["enter", Keys.Enter],
  ["tab", Keys.Tab],
  ["backspace", Keys.Backspace],
  ["delete", Keys.Delete],
  ["escape", Keys.Escape],
]);

/**
 * Decode one keypress, or return undefined for sequences the editor has no
 * name for (function keys, Alt combinations).
 */
export function decodeKeypress(
  str: string | undefined,
  key: KeypressInfo | undefined,
): Key | undefined {
  const name = key?.name;

  if (name === "home" && key?.ctrl) return Keys.CtrlHome;
  if (name === "end" && key?.ctrl) return Keys.CtrlEnd;

  if (name !== undefined) {
    const named = NAMED_KEYS.get(name);
    if (named !== undefined) return named;
    if (key?.ctrl && /^[a-z]$/.test(name)) return ctrl(name);
  }

  if (key?.meta) return undefined;
  if (str !== undefined && isPrintable(str)) return str;
  return undefined;
}
