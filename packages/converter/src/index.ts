export * from "./options.js";
export * from "./config.js";
export * from "./convert.js";
