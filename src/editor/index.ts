export { EditBuffer } from "./buffer.ts";
export type {
  Change,
  Composite,
  Deletion,
  Insertion,
  MergeableInsertion,
  Transposition,
  Uppercase,
} from "./change.ts";
export {
  amalgamateChange,
  changeOps,
  composite,
  deletion,
  insertion,
  mergeableInsertion,
  redoChange,
  toUpperChar,
  toUpperText,
  transposition,
  undoChange,
  uppercase,
} from "./change.ts";
export { isWordChar, moveTarget, nextCodePoint, prevCodePoint, wordAt } from "./cursor.ts";
export { Editor, SCROLL_MARGIN, TAB_TEXT } from "./editor.ts";
export type { ChangeOps, Executor } from "./history.ts";
export { History } from "./history.ts";
export { createKeymap, lookupCommand } from "./keymap.ts";
export type { Command, Direction, Display, Key, Keymap, Memento, TextView } from "./types.ts";
export { Damage, Keys, ctrl, isPrintable } from "./types.ts";
