export * from "./types";
export * from "./values";
export { unify, inspect } from "./utils/unify";
export { stdout, stderr, BufferWriter } from "./io";
