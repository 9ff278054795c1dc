/**
 * Runtime context — everything a command handler needs, resolved once at startup.
 *
 * Handlers receive this value instead of reading the environment, the home
 * directory or the platform on their own.
 */

import { homedir } from "node:os";
import { createDefaultRegistry, type BackendRegistry } from "./backends/registry.js";
import { loadConfig } from "./config/manager.js";
import { resolvePaths, type BertPaths } from "./config/paths.js";
import { EventLogger } from "./events/logger.js";
import { NodeCommandRunner, type CommandRunner } from "./exec/runner.js";
import { detectPlatform, type PlatformInfo } from "./platform/platform.js";
import type { BertConfig } from "./schemas/config.js";
import { VERSION } from "./version.js";

export interface BertContext {
  version: string;
  config: BertConfig;
  paths: BertPaths;
  platform: PlatformInfo;
  runner: CommandRunner;
  logger: EventLogger;
  backends: BackendRegistry;
  /** Accept confirmation prompts without asking. */
  assumeYes: boolean;
}

export interface CreateContextOptions {
  homeDir?: string;
  assumeYes?: boolean;
  env?: NodeJS.ProcessEnv;
  runner?: CommandRunner;
  platform?: PlatformInfo;
}

/** `--home`, then `BERT_HOME`, then the user's home directory. */
export function resolveHomeDir(homeDir: string | undefined, env: NodeJS.ProcessEnv = process.env): string {
  return homeDir ?? env["BERT_HOME"] ?? homedir();
}

export async function createContext(opts: CreateContextOptions = {}): Promise<BertContext> {
  const env = opts.env ?? process.env;
  const platform = opts.platform ?? detectPlatform();
  const homeDir = resolveHomeDir(opts.homeDir, env);
  const assumeYes = opts.assumeYes ?? false;

  const configPath = resolvePaths(homeDir).configPath;
  const config = await loadConfig(configPath);
  const paths = resolvePaths(homeDir, config.backupDir);
  const runner = opts.runner ?? new NodeCommandRunner({ env, platform });

  return {
    version: VERSION,
    config,
    paths,
    platform,
    runner,
    logger: new EventLogger(paths.logDir),
    backends: createDefaultRegistry({
      runner,
      platform,
      nodePackageManager: config.nodePackageManager,
      assumeYes,
    }),
    assumeYes,
  };
}
