/**
 * Key bindings.
 *
 * The keymap is built once at startup and handed to the command loop.
 * Printable keys that have no binding insert themselves.
 */

import type { Editor } from "./editor.ts";
import { type Command, type Key, type Keymap, Keys, ctrl, isPrintable } from "./types.ts";

/** Wrap an editor method that never changes the text. */
function noChange(run: (editor: Editor) => void): Command {
  return (editor) => {
    run(editor);
    return undefined;
  };
}

/** Same as noChange, for methods that prompt or touch files. */
function noChangeAsync(run: (editor: Editor) => Promise<void>): Command {
  return async (editor) => {
    await run(editor);
    return undefined;
  };
}

const insertNewline: Command = (ed) => ed.insertCommand("\n");

export function createKeymap(): Keymap {
  const bindings: [Key, Command][] = [
    [Keys.Enter, insertNewline],
    [Keys.Tab, (ed) => ed.insertTabCommand()],
    [Keys.ArrowLeft, noChange((ed) => ed.moveCommand("left"))],
    [Keys.ArrowRight, noChange((ed) => ed.moveCommand("right"))],
    [Keys.ArrowUp, noChange((ed) => ed.moveCommand("up"))],
    [Keys.ArrowDown, noChange((ed) => ed.moveCommand("down"))],
    [Keys.Home, noChange((ed) => ed.moveCommand("home"))],
    [Keys.End, noChange((ed) => ed.moveCommand("end"))],
    [Keys.CtrlHome, noChange((ed) => ed.moveCommand("bufferStart"))],
    [Keys.CtrlEnd, noChange((ed) => ed.moveCommand("bufferEnd"))],
    [Keys.PageUp, noChange((ed) => ed.moveCommand("pageUp"))],
    [Keys.PageDown, noChange((ed) => ed.moveCommand("pageDown"))],
    [Keys.Backspace, (ed) => ed.deleteCommand("left")],
    [Keys.Delete, (ed) => ed.deleteCommand("right")],
    [ctrl("a"), noChange((ed) => ed.moveCommand("home"))],
    [ctrl("b"), noChange((ed) => ed.moveCommand("left"))],
    [ctrl("d"), (ed) => ed.deleteCommand("right")],
    [ctrl("e"), noChange((ed) => ed.moveCommand("end"))],
    [ctrl("f"), noChange((ed) => ed.moveCommand("right"))],
    [ctrl("g"), noChange((ed) => ed.beep())],
    [ctrl("k"), (ed) => ed.deleteCommand("end")],
    [ctrl("l"), noChange((ed) => ed.chooseOrigin())],
    [ctrl("n"), noChange((ed) => ed.moveCommand("down"))],
    [ctrl("o"), noChange((ed) => ed.switchMarkCommand())],
    [ctrl("p"), noChange((ed) => ed.moveCommand("up"))],
    [ctrl("q"), noChangeAsync((ed) => ed.quit())],
    [ctrl("r"), noChangeAsync((ed) => ed.replaceFileCommand())],
    [ctrl("t"), (ed) => ed.transposeCommand()],
    [ctrl("u"), (ed) => ed.toUpperCommand()],
    [ctrl("w"), noChangeAsync((ed) => ed.saveFileCommand())],
    // Terminals send Ctrl+M as Enter, so the mark lives on Ctrl+X.
    [ctrl("x"), noChange((ed) => ed.markCommand())],
    [ctrl("y"), noChange((ed) => ed.redo())],
    [ctrl("z"), noChange((ed) => ed.undo())],
  ];
  return new Map(bindings);
}

/** The command for a key, or undefined if the key is not bound. */
export function lookupCommand(keymap: Keymap, key: Key): Command | undefined {
  const command = keymap.get(key);
  if (command) return command;
  if (isPrintable(key)) return (ed) => ed.insertCommand(key);
  return undefined;
}
