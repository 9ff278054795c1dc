import type { Command } from "commander";
import { selfUpdate } from "../../packaging/updater.js";
import { withErrorBoundary } from "../errors.js";
import type { ContextProvider } from "../program.js";

export function registerSelfUpdateCommand(program: Command, context: ContextProvider): void {
  program
    .command("self-update")
    .description("Replace this bert binary with the latest release")
    .action(withErrorBoundary(async () => {
      const ctx = await context();
      console.log("Checking for updates... 🐕");

      const result = await selfUpdate({
        currentVersion: ctx.version,
        releaseRepo: ctx.config.releaseRepo,
        platform: ctx.platform,
        executablePath: process.execPath,
      });

      if (!result.updated) {
        console.log(`✅ bert is already up to date (v${result.currentVersion})`);
        return;
      }

      await ctx.logger.log("self_update.completed", {
        from: result.currentVersion,
        to: result.latestVersion,
      });
      console.log(`✅ Updated bert from v${result.currentVersion} to v${result.latestVersion}`);
      if (result.releaseNotes) {
        console.log(`\nRelease notes:\n${result.releaseNotes}`);
      }
      console.log(`\n${result.releaseUrl}`);
    }));
}
