/**
 * Command-line entry: `tern [file]`.
 */

import { Editor } from "./editor/editor.ts";
import { createKeymap } from "./editor/keymap.ts";
import { type TerminalInput, type TerminalOutput, TerminalDisplay } from "./terminal/terminal.ts";

export const USAGE = "Usage: tern [file]";

export interface CliStreams {
  readonly input: TerminalInput;
  readonly output: TerminalOutput;
}

/** Run the editor on the terminal and return the process exit code. */
export async function main(args: readonly string[], streams?: CliStreams): Promise<number> {
  if (args.length > 1) {
    console.error(USAGE);
    return 2;
  }

  const display = new TerminalDisplay(streams ?? { input: process.stdin, output: process.stdout });
  const editor = new Editor(display);
  const keymap = createKeymap();

  display.open();
  try {
    const file = args[0];
    if (file !== undefined) await editor.loadFile(file);
    await editor.run(keymap);
  } finally {
    display.close();
  }
  return 0;
}
