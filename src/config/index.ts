export { loadConfig, saveConfig, getConfigValue, setConfigValue, validateConfig } from "./manager.js";
export type { ConfigChange, ConfigIssue } from "./manager.js";
export { resolvePaths, expandHome } from "./paths.js";
export type { BertPaths } from "./paths.js";
