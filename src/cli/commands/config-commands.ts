/**
 * Configuration commands.
 *
 * These never load the runtime context, so they still work on a config file
 * that fails validation.
 */

import type { Command } from "commander";
import { parseNodeManagerName } from "../../backends/node-managers.js";
import { getConfigValue, setConfigValue, validateConfig } from "../../config/index.js";
import { withErrorBoundary } from "../errors.js";
import type { PathsProvider } from "../program.js";

const fmt = (v: unknown) => v === undefined ? "undefined" : typeof v === "object" ? JSON.stringify(v) : String(v);

export function registerConfigCommands(program: Command, paths: PathsProvider): void {
  program
    .command("set-manager <manager>")
    .description("Choose the Node package manager (npm, yarn, pnpm, bun)")
    .action(withErrorBoundary(async (manager: string) => {
      const name = parseNodeManagerName(manager);
      const result = await setConfigValue(paths().configPath, "nodePackageManager", name);
      if (result.issues.length > 0) {
        for (const issue of result.issues) console.log(`  ✗ ${issue.path}: ${issue.message}`);
        process.exitCode = 1;
        return;
      }
      console.log(`✅ Node package manager set to ${name}`);
    }));

  const config = program
    .command("config")
    .description("Read and change ~/.bert/config.yaml");

  config
    .command("get <key>")
    .description("Get config value (dot-notation)")
    .action(withErrorBoundary(async (key: string) => {
      const value = await getConfigValue(paths().configPath, key);
      if (value === undefined) {
        console.log(`Key '${key}' not found`);
        process.exitCode = 1;
      } else {
        console.log(typeof value === "object" ? JSON.stringify(value, null, 2) : String(value));
      }
    }));

  config
    .command("set <key> <value>")
    .description("Set config value (validates + atomic write)")
    .option("--dry-run", "Preview change without applying", false)
    .action(withErrorBoundary(async (key: string, value: string, opts: { dryRun: boolean }) => {
      const result = await setConfigValue(paths().configPath, key, value, opts.dryRun);

      if (opts.dryRun) {
        console.log(`[DRY RUN] Would update ${key}:`);
      } else if (result.issues.length > 0) {
        console.log("❌ Config change rejected:");
      } else {
        console.log(`✅ Config updated: ${key}`);
      }
      console.log(`  ${key}: ${fmt(result.change.oldValue)} → ${fmt(result.change.newValue)}`);

      if (result.issues.length > 0) {
        console.log("\nIssues:");
        for (const issue of result.issues) {
          console.log(`  ✗ ${issue.path}: ${issue.message}`);
        }
        process.exitCode = 1;
      }
    }));

  config
    .command("validate")
    .description("Validate the config file")
    .action(withErrorBoundary(async () => {
      const result = await validateConfig(paths().configPath);
      if (result.valid) {
        console.log("✅ Config valid");
        return;
      }
      console.log("❌ Schema validation failed:");
      for (const issue of result.issues) {
        console.log(`  ✗ ${issue.path}: ${issue.message}`);
      }
      process.exitCode = 1;
    }));
}
