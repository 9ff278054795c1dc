/**
 * Package commands: install, uninstall, update, search, list, info.
 *
 * `--node` picks the language backend, otherwise Homebrew handles the request.
 */

import type { Command } from "commander";
import { backendKindFor } from "../../backends/registry.js";
import { BertError, errorMessage } from "../../errors.js";
import type { InstalledPackage, PackageInfo, SearchResult } from "../../schemas/package.js";
import { toPackageSpec } from "../../schemas/package.js";
import { withErrorBoundary } from "../errors.js";
import type { ContextProvider } from "../program.js";

interface BackendOptions {
  node: boolean;
  cask: boolean;
}

export function registerPackageCommands(program: Command, context: ContextProvider): void {
  program
    .command("install <package>")
    .description("Install a package (name or name@version)")
    .option("--node", "Install a global Node package", false)
    .option("--cask", "Install a Homebrew cask", false)
    .action(withErrorBoundary(async (token: string, opts: BackendOptions) => {
      const ctx = await context();
      const spec = toPackageSpec(token, backendKindFor(opts), opts.cask);
      const backend = ctx.backends.get(spec.backend);

      console.log(spec.version
        ? `Installing package: ${spec.name} (version ${spec.version}) 🐕`
        : `Installing package: ${spec.name} 🐕`);

      try {
        await backend.install(spec);
      } catch (error) {
        await ctx.logger.logInstallFailure(spec.name, spec.backend, errorMessage(error));
        throw error;
      }
      await ctx.logger.logInstall(spec.name, spec.backend, { version: spec.version ?? null, isCask: spec.isCask });
      console.log(`✅ Successfully installed ${spec.name}`);
    }));

  program
    .command("uninstall <package>")
    .description("Uninstall a package")
    .option("--node", "Uninstall a global Node package", false)
    .option("--cask", "Uninstall a Homebrew cask", false)
    .action(withErrorBoundary(async (token: string, opts: BackendOptions) => {
      const ctx = await context();
      const spec = toPackageSpec(token, backendKindFor(opts), opts.cask);
      const backend = ctx.backends.get(spec.backend);

      console.log(`Uninstalling package: ${spec.name} 🐕`);
      await backend.ensureAvailable();
      await backend.uninstall(spec);
      await ctx.logger.log("package.uninstalled", { name: spec.name, backend: spec.backend, isCask: spec.isCask });
    }));

  program
    .command("update [packages...]")
    .description("Update the named packages, or everything")
    .option("--node", "Update global Node packages", false)
    .action(withErrorBoundary(async (packages: string[], opts: { node: boolean }) => {
      const ctx = await context();
      const backend = ctx.backends.get(backendKindFor(opts));

      console.log(packages.length > 0
        ? `Updating ${packages.join(", ")} 🐕`
        : `Updating all ${backend.displayName} packages 🐕`);

      await backend.ensureAvailable();
      await backend.update(packages);
      console.log("✅ Update complete");
    }));

  program
    .command("search <query>")
    .description("Search for packages")
    .option("--node", "Search the npm registry", false)
    .option("--cask", "Only show Homebrew casks", false)
    .action(withErrorBoundary(async (query: string, opts: BackendOptions) => {
      const ctx = await context();
      const backend = ctx.backends.get(backendKindFor(opts));
      if (backend.kind === "system") await backend.ensureAvailable();

      const results = await backend.search(query, { cask: opts.cask });
      printSearchResults(query, results);
    }));

  program
    .command("list")
    .description("List installed packages")
    .option("--node", "List global Node packages", false)
    .action(withErrorBoundary(async (opts: { node: boolean }) => {
      const ctx = await context();
      const backend = ctx.backends.get(backendKindFor(opts));
      if (!(await backend.isAvailable())) {
        throw new BertError("BACKEND_UNAVAILABLE", `${backend.displayName} is not installed`);
      }

      printInstalled(backend.displayName, await backend.listInstalled());
    }));

  program
    .command("info <package>")
    .description("Show package details")
    .option("--node", "Look up a Node package", false)
    .option("--cask", "Look up a Homebrew cask", false)
    .action(withErrorBoundary(async (token: string, opts: BackendOptions) => {
      const ctx = await context();
      const spec = toPackageSpec(token, backendKindFor(opts), opts.cask);
      const info = await ctx.backends.get(spec.backend).info(spec.name, spec.isCask);
      if (!info) {
        throw new BertError("PACKAGE_NOT_FOUND", `Package ${spec.name} not found`, { name: spec.name });
      }
      printInfo(info);
    }));
}

export function printSearchResults(query: string, results: readonly SearchResult[]): void {
  if (results.length === 0) {
    console.log(`No packages found for '${query}'`);
    return;
  }

  const width = Math.min(40, Math.max(...results.map(r => r.name.length)));
  for (const result of results) {
    const name = result.isCask ? `${result.name} (cask)` : result.name;
    const version = result.version ? ` ${result.version}` : "";
    const description = result.description ? `  ${result.description}` : "";
    console.log(`  ${name.padEnd(width)}${version}${description}`);
  }
  console.log(`\n${results.length} result(s)`);
}

export function printInstalled(displayName: string, packages: readonly InstalledPackage[]): void {
  if (packages.length === 0) {
    console.log(`No ${displayName} packages installed`);
    return;
  }

  const formulae = packages.filter(p => !p.isCask);
  const casks = packages.filter(p => p.isCask);
  const section = (title: string, items: readonly InstalledPackage[]) => {
    if (items.length === 0) return;
    console.log(`${title}:`);
    for (const p of items) {
      console.log(`  ${p.name} ${p.version}`.trimEnd());
    }
  };

  if (casks.length === 0) {
    section(`Installed ${displayName} packages`, formulae);
  } else {
    section("Formulae", formulae);
    section("Casks", casks);
  }
}

export function printInfo(info: PackageInfo): void {
  const lines: Array<[string, string | undefined]> = [
    ["Name", info.fullName],
    ["Version", info.latestVersion],
    ["Description", info.description],
    ["Homepage", info.homepage],
    ["License", info.license],
    ["Tap", info.tap],
    ["Author", info.author],
    ["Other versions", info.otherVersions.join(", ") || undefined],
    ["Aliases", info.aliases.join(", ") || undefined],
    ["Keywords", info.keywords.join(", ") || undefined],
  ];

  console.log(`📦 ${info.name}${info.isCask ? " (cask)" : ""}`);
  for (const [label, value] of lines) {
    if (value) console.log(`  ${`${label}:`.padEnd(16)}${value}`);
  }
}
