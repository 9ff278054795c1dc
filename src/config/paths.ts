import { isAbsolute, join, resolve } from "node:path";

/** Filesystem locations bert reads and writes, all derived from one home directory. */
export interface BertPaths {
  homeDir: string;
  bertDir: string;
  configPath: string;
  backupDir: string;
  logDir: string;
}

export function resolvePaths(homeDir: string, backupDirOverride?: string): BertPaths {
  const bertDir = join(homeDir, ".bert");
  return {
    homeDir,
    bertDir,
    configPath: join(bertDir, "config.yaml"),
    backupDir: backupDirOverride ? expandHome(backupDirOverride, homeDir) : join(bertDir, "backups"),
    logDir: join(bertDir, "logs"),
  };
}

/** Expand a leading `~` and make the path absolute. */
export function expandHome(path: string, homeDir: string): string {
  if (path === "~") return homeDir;
  if (path.startsWith("~/") || path.startsWith("~\\")) return join(homeDir, path.slice(2));
  return isAbsolute(path) ? path : resolve(path);
}
