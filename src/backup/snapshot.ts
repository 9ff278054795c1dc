/**
 * Snapshot capture — enumerate installed packages across backends.
 */

import { errorMessage } from "../errors.js";
import type { PlatformInfo } from "../platform/platform.js";
import { hasTaps, type PackageBackend } from "../backends/types.js";
import { BACKUP_SCHEMA_VERSION, type BackupFile } from "../schemas/backup.js";
import type { InstalledPackage } from "../schemas/package.js";

export interface SnapshotResult {
  backup: BackupFile;
  /** Backends, or parts of them, that could not be read. */
  warnings: string[];
}

export interface SnapshotSummary {
  taps: number;
  formulae: number;
  casks: number;
  language: number;
}

export async function captureSnapshot(
  backends: readonly PackageBackend[],
  platform: PlatformInfo,
  now: Date = new Date(),
): Promise<SnapshotResult> {
  const warnings: string[] = [];
  const packages: InstalledPackage[] = [];
  const taps: string[] = [];

  for (const backend of backends) {
    if (!(await backend.isAvailable())) {
      warnings.push(`${backend.displayName} is not installed; skipping its packages`);
      continue;
    }

    if (hasTaps(backend)) {
      try {
        taps.push(...(await backend.listTaps()));
      } catch (error) {
        warnings.push(`Could not list ${backend.displayName} taps: ${errorMessage(error)}`);
      }
    }
    try {
      packages.push(...(await backend.listInstalled()));
    } catch (error) {
      warnings.push(`Could not list ${backend.displayName} packages: ${errorMessage(error)}`);
    }
  }

  return {
    backup: {
      schemaVersion: BACKUP_SCHEMA_VERSION,
      createdAt: now.toISOString(),
      platform: { os: platform.os, arch: platform.arch },
      taps,
      packages,
    },
    warnings,
  };
}

export function summarize(backup: BackupFile): SnapshotSummary {
  return {
    taps: backup.taps.length,
    formulae: backup.packages.filter(p => p.backend === "system" && !p.isCask).length,
    casks: backup.packages.filter(p => p.backend === "system" && p.isCask).length,
    language: backup.packages.filter(p => p.backend === "language").length,
  };
}

/** `bert_backup_YYYYMMDD_HHMMSS.json` in local time. */
export function backupFileName(now: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `bert_backup_${date}_${time}.json`;
}
