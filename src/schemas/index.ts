export * from "./package.js";
export * from "./backup.js";
export * from "./config.js";
export * from "./event.js";
