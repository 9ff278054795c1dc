/**
 * Typed failures raised by bert operations.
 *
 * Every domain error carries a stable `code` so the CLI boundary (and tests)
 * can tell failure kinds apart without matching on message text.
 */

export type BertErrorCode =
  | "COMMAND_NOT_FOUND"
  | "BACKEND_UNAVAILABLE"
  | "BACKEND_COMMAND_FAILED"
  | "PACKAGE_NOT_FOUND"
  | "BACKUP_WRITE_FAILED"
  | "RESTORE_READ_FAILED"
  | "PARTIAL_RESTORE"
  | "UPDATE_FAILED"
  | "INVALID_ARGUMENT";

export class BertError extends Error {
  readonly code: BertErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: BertErrorCode, message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BertError";
    this.code = code;
    if (details) this.details = details;
  }
}

/** Raised when a backend process exits non-zero. */
export class BackendCommandError extends BertError {
  readonly command: string;
  readonly exitCode: number;
  readonly stderr: string;

  constructor(command: string, exitCode: number, stderr = "", summary?: string) {
    const detail = stderr.trim();
    const head = summary ?? `\`${command}\` exited with code ${exitCode}`;
    super("BACKEND_COMMAND_FAILED", detail ? `${head}: ${detail}` : head, { command, exitCode });
    this.name = "BackendCommandError";
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export function isBertError(error: unknown, code?: BertErrorCode): error is BertError {
  return error instanceof BertError && (code === undefined || error.code === code);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
