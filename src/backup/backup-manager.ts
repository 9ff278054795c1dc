/**
 * Backup and restore of installed packages.
 *
 * Backup writes one immutable JSON snapshot per run. Restore reinstalls every
 * record through its own backend; a failing item is recorded and the loop
 * moves on, so one bad package never blocks the rest.
 */

import { mkdir, readdir, readFile, stat } from "node:fs/promises";
import { dirname, join } from "node:path";
import writeFileAtomic from "write-file-atomic";
import type { BackendRegistry } from "../backends/registry.js";
import { hasTaps, type PackageBackend } from "../backends/types.js";
import { BertError, errorMessage } from "../errors.js";
import type { EventLogger } from "../events/logger.js";
import type { PlatformInfo } from "../platform/platform.js";
import { BackupFile } from "../schemas/backup.js";
import type { BackendKind, InstalledPackage, PackageSpec } from "../schemas/package.js";
import { backupFileName, captureSnapshot, summarize, type SnapshotSummary } from "./snapshot.js";

export interface CreateBackupOptions {
  backends: readonly PackageBackend[];
  platform: PlatformInfo;
  backupDir: string;
  /** Explicit output file; defaults to a timestamped file in backupDir. */
  output?: string;
  logger?: EventLogger;
  now?: Date;
}

export interface CreateBackupResult {
  path: string;
  backup: BackupFile;
  summary: SnapshotSummary;
  warnings: string[];
}

export type RestoreStatus = "ok" | "failed" | "skipped";

export interface RestoreOutcome {
  /** Package name, or tap name when `kind` is "tap". */
  name: string;
  kind: "tap" | "package";
  backend: BackendKind;
  isCask: boolean;
  status: RestoreStatus;
  message?: string;
}

export interface RestoreOptions {
  backends: BackendRegistry;
  backupDir: string;
  /** Backup file; defaults to the newest file in backupDir. */
  input?: string;
  /** Reinstall the recorded versions instead of the latest. */
  pin?: boolean;
  logger?: EventLogger;
}

export interface RestoreResult {
  path: string;
  backup: BackupFile;
  outcomes: RestoreOutcome[];
  /** Items that did not end up installed (failed or skipped). */
  failed: number;
}

export async function createBackup(opts: CreateBackupOptions): Promise<CreateBackupResult> {
  const now = opts.now ?? new Date();
  const { backup, warnings } = await captureSnapshot(opts.backends, opts.platform, now);
  const path = opts.output ?? join(opts.backupDir, backupFileName(now));

  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFileAtomic(path, JSON.stringify(backup, null, 2) + "\n", "utf-8");
  } catch (error) {
    throw new BertError("BACKUP_WRITE_FAILED", `Failed to write backup to ${path}: ${errorMessage(error)}`, { path }, { cause: error });
  }

  const summary = summarize(backup);
  await opts.logger?.log("backup.created", { path, ...summary });
  return { path, backup, summary, warnings };
}

/**
 * The backup to restore: the explicit path, or the most recently modified
 * `*.json` file in the backup directory.
 */
export async function resolveBackupPath(input: string | undefined, backupDir: string): Promise<string> {
  if (input) return input;

  let entries: string[];
  try {
    entries = await readdir(backupDir);
  } catch {
    throw new BertError("RESTORE_READ_FAILED", `No backup files found in ${backupDir}`, { backupDir });
  }

  let latest: { path: string; mtimeMs: number } | undefined;
  for (const entry of entries.filter(e => e.endsWith(".json"))) {
    const path = join(backupDir, entry);
    // Dangling symlinks and entries removed mid-scan are not candidates
    const info = await stat(path).catch(() => null);
    if (!info?.isFile()) continue;
    if (!latest || info.mtimeMs > latest.mtimeMs) {
      latest = { path, mtimeMs: info.mtimeMs };
    }
  }

  if (!latest) {
    throw new BertError("RESTORE_READ_FAILED", `No backup files found in ${backupDir}`, { backupDir });
  }
  return latest.path;
}

export async function readBackup(path: string): Promise<BackupFile> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    throw new BertError("RESTORE_READ_FAILED", `Cannot read backup ${path}: ${errorMessage(error)}`, { path }, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new BertError("RESTORE_READ_FAILED", `Backup ${path} is not valid JSON: ${errorMessage(error)}`, { path }, { cause: error });
  }

  const parsed = BackupFile.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .slice(0, 3)
      .map(i => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new BertError("RESTORE_READ_FAILED", `Backup ${path} is malformed: ${detail}`, { path });
  }
  return parsed.data;
}

export async function restoreBackup(opts: RestoreOptions): Promise<RestoreResult> {
  const path = await resolveBackupPath(opts.input, opts.backupDir);
  const backup = await readBackup(path);
  const outcomes: RestoreOutcome[] = [];
  const readiness = new Map<BackendKind, string | null>();

  console.log(`Reading backup from: ${path}`);
  console.log(`Backup created at: ${backup.createdAt}`);

  const ensureReady = async (kind: BackendKind): Promise<PackageBackend | string> => {
    const cached = readiness.get(kind);
    if (typeof cached === "string") return cached;
    const backend = opts.backends.has(kind) ? opts.backends.get(kind) : null;
    if (!backend) {
      const reason = `no backend for '${kind}' packages`;
      readiness.set(kind, reason);
      return reason;
    }
    if (cached === null) return backend;
    try {
      await backend.ensureAvailable();
      readiness.set(kind, null);
      return backend;
    } catch (error) {
      const reason = errorMessage(error);
      readiness.set(kind, reason);
      return reason;
    }
  };

  if (backup.taps.length > 0) {
    console.log("\nRestoring taps:");
    const system = await ensureReady("system");
    for (const tap of backup.taps) {
      const outcome: RestoreOutcome = { name: tap, kind: "tap", backend: "system", isCask: false, status: "ok" };
      if (typeof system === "string") {
        outcome.status = "skipped";
        outcome.message = system;
      } else if (hasTaps(system)) {
        try {
          await system.addTap(tap);
        } catch (error) {
          outcome.status = "failed";
          outcome.message = errorMessage(error);
        }
      }
      report(outcome);
      outcomes.push(outcome);
    }
  }

  if (backup.packages.length > 0) {
    console.log("\nRestoring packages:");
  }
  for (const record of backup.packages) {
    const outcome: RestoreOutcome = {
      name: record.name,
      kind: "package",
      backend: record.backend,
      isCask: record.isCask,
      status: "ok",
    };

    const backend = await ensureReady(record.backend);
    if (typeof backend === "string") {
      outcome.status = "skipped";
      outcome.message = backend;
    } else {
      try {
        await backend.install(toRestoreSpec(record, opts.pin ?? false));
        await opts.logger?.logInstall(record.name, record.backend, { source: "restore" });
      } catch (error) {
        outcome.status = "failed";
        outcome.message = errorMessage(error);
        await opts.logger?.logInstallFailure(record.name, record.backend, outcome.message);
      }
    }

    report(outcome);
    outcomes.push(outcome);
  }

  const failed = outcomes.filter(o => o.status !== "ok").length;
  await opts.logger?.log("restore.completed", { path, total: outcomes.length, failed });
  return { path, backup, outcomes, failed };
}

export function toRestoreSpec(record: InstalledPackage, pin: boolean): PackageSpec {
  const spec: PackageSpec = { name: record.name, backend: record.backend, isCask: record.isCask };
  if (pin && record.version) spec.version = record.version;
  return spec;
}

function report(outcome: RestoreOutcome): void {
  const label = outcome.isCask ? `${outcome.name} (cask)` : outcome.name;
  const mark = outcome.status === "ok" ? "✓" : outcome.status === "skipped" ? "-" : "✗";
  const suffix = outcome.message ? `  ${outcome.message}` : "";
  console.log(`  ${label.padEnd(40)} ${mark}${suffix}`);
}
