export { Rope, TARGET_CHUNK_SIZE } from "./rope.ts";
export type { TextReader } from "./text.ts";
export { TextStore } from "./text.ts";
