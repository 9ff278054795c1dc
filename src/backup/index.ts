export { createBackup, readBackup, resolveBackupPath, restoreBackup, toRestoreSpec } from "./backup-manager.js";
export type {
  CreateBackupOptions,
  CreateBackupResult,
  RestoreOptions,
  RestoreOutcome,
  RestoreResult,
  RestoreStatus,
} from "./backup-manager.js";
export { backupFileName, captureSnapshot, summarize } from "./snapshot.js";
export type { SnapshotResult, SnapshotSummary } from "./snapshot.js";
