/**
 * The `bert` program: subcommands plus the fallback that runs any other
 * command, installing its package first when it is missing.
 */

import { Command } from "commander";
import { backendKindFor } from "../backends/registry.js";
import { resolvePaths, type BertPaths } from "../config/paths.js";
import { createContext, resolveHomeDir, type BertContext, type CreateContextOptions } from "../context.js";
import { executeWithAutoInstall } from "../runner/auto-install.js";
import { VERSION } from "../version.js";
import { registerBackupCommands } from "./commands/backup-commands.js";
import { registerConfigCommands } from "./commands/config-commands.js";
import { registerPackageCommands } from "./commands/package-commands.js";
import { registerSelfUpdateCommand } from "./commands/self-update.js";
import { withErrorBoundary } from "./errors.js";

export type ContextFactory = (opts: CreateContextOptions) => Promise<BertContext>;
export type ContextProvider = () => Promise<BertContext>;
/** Locations under ~/.bert, resolved without reading the config. */
export type PathsProvider = () => BertPaths;

interface RootOptions {
  home?: string;
  yes: boolean;
  node: boolean;
}

export interface ProgramDeps {
  createContext?: ContextFactory;
}

export function createProgram(deps: ProgramDeps = {}): Command {
  const program = new Command();
  const factory = deps.createContext ?? createContext;

  let cached: Promise<BertContext> | undefined;
  const context: ContextProvider = () => {
    if (!cached) {
      const opts = program.opts<RootOptions>();
      cached = factory({ homeDir: opts.home, assumeYes: opts.yes });
    }
    return cached;
  };
  const paths: PathsProvider = () => resolvePaths(resolveHomeDir(program.opts<RootOptions>().home));

  program
    .name("bert")
    .description("A friendly package assistant built on top of Homebrew 🐕")
    .version(VERSION)
    .option("--home <dir>", "Use <dir> instead of the home directory for ~/.bert")
    .option("-y, --yes", "Answer yes to prompts (e.g. installing Homebrew)", false)
    .option("--node", "Resolve a missing command from a Node package", false)
    .enablePositionalOptions()
    .passThroughOptions()
    .argument("[command...]", "Command to run; its package is installed first when missing")
    .action(withErrorBoundary(async (argv: string[]) => {
      if (argv.length === 0) {
        program.outputHelp();
        return;
      }

      const ctx = await context();
      const result = await executeWithAutoInstall(argv, {
        runner: ctx.runner,
        backend: ctx.backends.get(backendKindFor(program.opts<RootOptions>())),
        platform: ctx.platform,
        logger: ctx.logger,
      });
      process.exitCode = result.exitCode;
    }));

  registerPackageCommands(program, context);
  registerBackupCommands(program, context);
  registerConfigCommands(program, paths);
  registerSelfUpdateCommand(program, context);

  return program;
}
