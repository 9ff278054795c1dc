import { BackendCommandError } from "../errors.js";
import type { CapturedResult, CommandRunner } from "../exec/runner.js";

/** Run interactively; the child's own stderr has already reached the user. */
export async function runChecked(
  runner: CommandRunner,
  command: string,
  args: readonly string[],
  summary?: string,
): Promise<void> {
  const exitCode = await runner.run(command, args);
  if (exitCode !== 0) {
    throw new BackendCommandError([command, ...args].join(" "), exitCode, "", summary);
  }
}

/** Capture output; a non-zero exit carries the backend's stderr into the error. */
export async function captureChecked(
  runner: CommandRunner,
  command: string,
  args: readonly string[],
  summary?: string,
): Promise<CapturedResult> {
  const result = await runner.capture(command, args);
  if (result.exitCode !== 0) {
    throw new BackendCommandError([command, ...args].join(" "), result.exitCode, result.stderr, summary);
  }
  return result;
}

export function nonEmptyLines(text: string): string[] {
  return text.split(/\r?\n/).map(line => line.trim()).filter(Boolean);
}
