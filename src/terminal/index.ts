export type { KeypressInfo } from "./keys.ts";
export { decodeKeypress } from "./keys.ts";
export type { TerminalInput, TerminalOptions, TerminalOutput } from "./terminal.ts";
export { TerminalDisplay, renderLine, screenColumn } from "./terminal.ts";
