export type { PackageBackend, TapSource } from "./types.js";
export { hasTaps } from "./types.js";
export { HomebrewBackend, parseSearchOutput, parseVersionsListing } from "./homebrew.js";
export type { HomebrewBackendOptions } from "./homebrew.js";
export { lookupFormula, resolveInstallName } from "./homebrew-api.js";
export type { Formula } from "./homebrew-api.js";
export { NodeBackend, parseJsonListing, parseTextListing } from "./node.js";
export type { NodeBackendOptions } from "./node.js";
export { nodeManager, parseNodeManagerName } from "./node-managers.js";
export type { NodeManagerCommands } from "./node-managers.js";
export { BackendRegistry, backendKindFor, createDefaultRegistry } from "./registry.js";
export type { DefaultBackendOptions } from "./registry.js";
