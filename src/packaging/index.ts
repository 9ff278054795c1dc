export { selfUpdate, fetchLatestRelease } from "./updater.js";
export type { UpdateOptions, UpdateResult, GithubRelease } from "./updater.js";
