/**
 * Backup and restore commands.
 */

import type { Command } from "commander";
import { createBackup, restoreBackup } from "../../backup/backup-manager.js";
import { BertError } from "../../errors.js";
import { withErrorBoundary } from "../errors.js";
import type { ContextProvider } from "../program.js";

export function registerBackupCommands(program: Command, context: ContextProvider): void {
  program
    .command("backup")
    .description("Save the list of installed packages to a JSON file")
    .option("-o, --output <file>", "Write the backup to <file> instead of the backup directory")
    .action(withErrorBoundary(async (opts: { output?: string }) => {
      const ctx = await context();
      console.log("Creating backup of installed packages... 🐕");

      const result = await createBackup({
        backends: ctx.backends.all(),
        platform: ctx.platform,
        backupDir: ctx.paths.backupDir,
        output: opts.output,
        logger: ctx.logger,
      });

      for (const warning of result.warnings) {
        console.log(`⚠️  ${warning}`);
      }
      const { taps, formulae, casks, language } = result.summary;
      console.log(`✅ Backup saved to ${result.path}`);
      console.log(`   ${taps} taps, ${formulae} formulae, ${casks} casks, ${language} Node packages`);
    }));

  program
    .command("restore [file]")
    .description("Reinstall packages from a backup (newest backup by default)")
    .option("-i, --input <file>", "Backup file to restore")
    .option("--pin", "Install the versions recorded in the backup", false)
    .action(withErrorBoundary(async (file: string | undefined, opts: { input?: string; pin: boolean }) => {
      const ctx = await context();
      const result = await restoreBackup({
        backends: ctx.backends,
        backupDir: ctx.paths.backupDir,
        input: opts.input ?? file,
        pin: opts.pin,
        logger: ctx.logger,
      });

      const total = result.outcomes.length;
      if (result.failed > 0) {
        const names = result.outcomes.filter(o => o.status !== "ok").map(o => o.name);
        throw new BertError(
          "PARTIAL_RESTORE",
          `Restore finished with ${result.failed} of ${total} items not installed: ${names.join(", ")}`,
          { failed: names },
        );
      }
      console.log(`\n✅ Restore complete: ${total} items installed`);
    }));
}
