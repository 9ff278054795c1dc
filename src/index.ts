/**
 * bert: a friendly package assistant on top of Homebrew and the Node package managers.
 */

export * from "./schemas/index.js";
export * from "./backends/index.js";
export * from "./backup/index.js";
export * from "./config/index.js";
export * from "./errors.js";
export { EventLogger } from "./events/index.js";
export * from "./exec/runner.js";
export * from "./platform/platform.js";
export { executeWithAutoInstall } from "./runner/auto-install.js";
export type { ExecuteOptions, ExecuteResult } from "./runner/auto-install.js";
export * from "./packaging/index.js";
export { createContext } from "./context.js";
export type { BertContext, CreateContextOptions } from "./context.js";
export { createProgram } from "./cli/program.js";
export type { ContextFactory, ProgramDeps } from "./cli/program.js";
export { VERSION } from "./version.js";
