export * from "./editor/index.ts";
export * from "./terminal/index.ts";
export * from "./text/index.ts";
export { main, USAGE } from "./cli.ts";
