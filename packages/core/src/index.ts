export * from "./types.js";
export * from "./errors.js";
export * from "./interfaces.js";
export * from "./lifecycle.js";
export * from "./validation.js";
export * from "./search.js";
export { joinUri, newRunId } from "./ids.js";
