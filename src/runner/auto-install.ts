/**
 * Command-not-found fallback.
 *
 * `bert <command> [args...]` runs the command from PATH. When it is missing,
 * the backend is asked which package provides it; that package is installed
 * (unless it already is) and the command is run with the original arguments.
 * The child's exit code is returned unchanged.
 */

import type { PackageBackend } from "../backends/types.js";
import { BertError } from "../errors.js";
import type { EventLogger } from "../events/logger.js";
import type { CommandRunner } from "../exec/runner.js";
import { executableName, type PlatformInfo } from "../platform/platform.js";

export interface ExecuteOptions {
  runner: CommandRunner;
  backend: PackageBackend;
  platform: PlatformInfo;
  logger?: EventLogger;
}

export interface ExecuteResult {
  exitCode: number;
  /** Resolved path that was executed. */
  executable: string;
  /** Package installed on the way, if any. */
  installed?: string;
}

export async function executeWithAutoInstall(argv: readonly string[], opts: ExecuteOptions): Promise<ExecuteResult> {
  const [command, ...args] = argv;
  if (!command) {
    throw new BertError("INVALID_ARGUMENT", "No command given");
  }

  const { runner, backend, platform, logger } = opts;
  let executable = await resolveCommand(runner, command, platform);
  let installed: string | undefined;

  if (!executable) {
    console.log(`⚠️  ${command} not found. Attempting to install...`);

    const provider = await backend.findProvider(command);
    if (!provider) {
      throw new BertError("COMMAND_NOT_FOUND", `command/package not found: ${command}`, { command });
    }

    if (await backend.isInstalled(provider.name, provider.isCask)) {
      console.log(`${provider.name} is already installed but does not put \`${command}\` on PATH.`);
    } else {
      console.log(`Found package: ${provider.name}`);
      await backend.install(provider);
      installed = provider.name;
      await logger?.log("command.auto_installed", { command, package: provider.name, backend: backend.kind });
      console.log(`✅ Successfully installed ${provider.name}`);
    }

    executable = await resolveCommand(runner, command, platform);
    if (!executable) {
      throw new BertError(
        "COMMAND_NOT_FOUND",
        `command/package not found: ${command} (package ${provider.name} does not provide it on PATH)`,
        { command, package: provider.name },
      );
    }
  }

  const exitCode = await runner.run(executable, args);
  return installed ? { exitCode, executable, installed } : { exitCode, executable };
}

async function resolveCommand(runner: CommandRunner, command: string, platform: PlatformInfo): Promise<string | null> {
  const direct = await runner.which(command);
  if (direct) return direct;
  const exe = executableName(command, platform);
  return exe === command ? null : runner.which(exe);
}
