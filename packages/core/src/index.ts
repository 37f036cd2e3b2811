export * from "./types.js";
export * from "./errors.js";
export * from "./color.js";
export * from "./image.js";
export * from "./bounds.js";
export * from "./grid.js";
export * from "./codec.js";
export * from "./hash.js";
