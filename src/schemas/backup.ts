import { z } from "zod";
import { InstalledPackage } from "./package.js";

export const BACKUP_SCHEMA_VERSION = 1;

/** Platform the snapshot was taken on. */
export const BackupPlatform = z.object({
  os: z.enum(["darwin", "linux", "win32"]),
  arch: z.string(),
});
export type BackupPlatform = z.infer<typeof BackupPlatform>;

/**
 * Backup file schema: a point-in-time record of installed packages.
 *
 * Written once by `bert backup` and never modified afterwards.
 * Location: ~/.bert/backups/bert_backup_<YYYYMMDD_HHMMSS>.json
 */
export const BackupFile = z.object({
  schemaVersion: z.literal(BACKUP_SCHEMA_VERSION),
  /** ISO-8601 timestamp of capture. */
  createdAt: z.string().datetime({ offset: true }),
  platform: BackupPlatform,
  /** Homebrew taps, restored before any package. */
  taps: z.array(z.string()).default([]),
  /** Packages in listing order: formulae, casks, then language packages. */
  packages: z.array(InstalledPackage).default([]),
});
export type BackupFile = z.infer<typeof BackupFile>;
