/**
 * Homebrew backend — system packages (formulae and casks).
 *
 * Every operation shells out to `brew`; formula metadata comes from the
 * formulae.brew.sh API so lookups work without a local tap checkout.
 */

import { confirm } from "@inquirer/prompts";
import { BertError, errorMessage } from "../errors.js";
import type { CommandRunner } from "../exec/runner.js";
import { executableName, homebrewPrefixes, type PlatformInfo } from "../platform/platform.js";
import type { InstalledPackage, PackageInfo, PackageSpec, SearchResult } from "../schemas/package.js";
import { captureChecked, nonEmptyLines, runChecked } from "./exec-helpers.js";
import { lookupFormula, resolveInstallName } from "./homebrew-api.js";
import type { PackageBackend, TapSource } from "./types.js";

export const HOMEBREW_INSTALL_SCRIPT_URL = "https://raw.githubusercontent.com/Homebrew/install/HEAD/install.sh";
export const HOMEBREW_INSTALL_PS_URL = "https://raw.githubusercontent.com/Homebrew/install/HEAD/install.ps1";

export interface HomebrewBackendOptions {
  runner: CommandRunner;
  platform: PlatformInfo;
  /** Skip the confirmation prompt before installing Homebrew itself. */
  assumeYes?: boolean;
}

export class HomebrewBackend implements PackageBackend, TapSource {
  readonly kind = "system" as const;
  readonly displayName = "Homebrew";

  private readonly runner: CommandRunner;
  private readonly platform: PlatformInfo;
  private readonly assumeYes: boolean;
  private brewPath: string | null = null;

  constructor(opts: HomebrewBackendOptions) {
    this.runner = opts.runner;
    this.platform = opts.platform;
    this.assumeYes = opts.assumeYes ?? false;
  }

  async isAvailable(): Promise<boolean> {
    return (await this.locateBrew()) !== null;
  }

  async ensureAvailable(): Promise<void> {
    if (await this.isAvailable()) return;

    console.log("⚠️  Homebrew is required but not installed.");
    const approved = this.assumeYes || (await confirm({ message: "Would you like to install Homebrew?", default: true }));
    if (!approved) {
      throw new BertError("BACKEND_UNAVAILABLE", "Homebrew is required to continue.");
    }

    console.log("Installing Homebrew 🐕");
    await this.installHomebrew();

    if (!(await this.isAvailable())) {
      throw new BertError(
        "BACKEND_UNAVAILABLE",
        "Homebrew was installed but `brew` is not on PATH yet. Restart your terminal and try again.",
      );
    }
    console.log("✅ Homebrew installed successfully!");
  }

  async install(spec: PackageSpec): Promise<void> {
    await this.ensureAvailable();
    const brew = await this.brew();

    // user/tap/formula: brew taps and installs in one step
    if (spec.name.split("/").length === 3) {
      console.log(`📦 Installing ${spec.name} via Homebrew 🐕`);
      await runChecked(this.runner, brew, ["install", spec.name], `Failed to install ${spec.name}`);
      return;
    }

    const formula = await lookupFormula(spec.name, spec.isCask);
    if (!formula) {
      // The API only covers the official taps and needs the network; brew knows third-party taps.
      if (!(await this.knownToBrew(brew, spec.name, spec.isCask))) {
        throw new BertError("PACKAGE_NOT_FOUND", `Package ${spec.name} not found`, { name: spec.name, isCask: spec.isCask });
      }
      if (spec.version) {
        console.log(`⚠️  No version information for ${spec.name}. Installing the version its tap provides.`);
      }
      console.log(`📦 Installing ${spec.name} via Homebrew${spec.isCask ? " (cask)" : ""} 🐕`);
      const args = spec.isCask ? ["install", "--cask", spec.name] : ["install", spec.name];
      await runChecked(this.runner, brew, args, `Failed to install ${spec.name}`);
      return;
    }

    const { installName, warning } = spec.isCask
      ? { installName: formula.name, warning: undefined }
      : resolveInstallName(formula, spec.version);
    if (warning) console.log(`⚠️  ${warning}`);

    console.log(`📦 Installing ${installName} via Homebrew${spec.isCask ? " (cask)" : ""} 🐕`);
    const args = spec.isCask ? ["install", "--cask", installName] : ["install", installName];
    await runChecked(this.runner, brew, args, `Failed to install ${installName}`);
  }

  async uninstall(spec: PackageSpec): Promise<void> {
    const brew = await this.brew();

    const listArgs = ["list", "--versions", ...(spec.isCask ? ["--cask"] : []), spec.name];
    const installed = await this.runner.capture(brew, listArgs);
    if (installed.exitCode !== 0 || installed.stdout.trim() === "") {
      console.log(`${spec.name} is not installed`);
      return;
    }

    console.log(`Found installed package: ${installed.stdout.trim()}`);
    const args = spec.isCask ? ["uninstall", "--cask", spec.name] : ["uninstall", spec.name];
    await runChecked(this.runner, brew, args, `Failed to uninstall ${spec.name}`);
    await runChecked(this.runner, brew, ["cleanup", spec.name], `Failed to clean up ${spec.name}`);
  }

  async update(names: readonly string[]): Promise<void> {
    const brew = await this.brew();
    if (names.length === 0) {
      await runChecked(this.runner, brew, ["update"], "Failed to update Homebrew");
      await runChecked(this.runner, brew, ["upgrade"], "Failed to upgrade packages");
      return;
    }
    await runChecked(this.runner, brew, ["upgrade", ...names], `Failed to upgrade ${names.join(", ")}`);
  }

  async search(query: string, opts: { cask?: boolean } = {}): Promise<SearchResult[]> {
    const brew = await this.brew();
    const args = opts.cask ? ["search", "--cask", query] : ["search", query];
    const { stdout } = await captureChecked(this.runner, brew, args, `Search for '${query}' failed`);
    return parseSearchOutput(stdout, opts.cask ?? false);
  }

  async listInstalled(): Promise<InstalledPackage[]> {
    const brew = await this.brew();
    const formulae = await captureChecked(this.runner, brew, ["list", "--formula", "--versions"], "Failed to list formulae");
    const casks = await captureChecked(this.runner, brew, ["list", "--cask", "--versions"], "Failed to list casks");
    return [...parseVersionsListing(formulae.stdout, false), ...parseVersionsListing(casks.stdout, true)];
  }

  async isInstalled(name: string, isCask = false): Promise<boolean> {
    const brew = await this.locateBrew();
    if (!brew) return false;
    const result = await this.runner.capture(brew, ["list", "--versions", ...(isCask ? ["--cask"] : []), name]);
    return result.exitCode === 0 && result.stdout.trim() !== "";
  }

  async info(name: string, isCask = false): Promise<PackageInfo | null> {
    const formula = await lookupFormula(name, isCask);
    if (!formula) return null;

    const info: PackageInfo = {
      name: formula.name,
      fullName: formula.fullName,
      backend: "system",
      isCask: formula.isCask,
      otherVersions: formula.versionedFormulae,
      aliases: formula.aliases,
      keywords: [],
    };
    if (formula.description) info.description = formula.description;
    if (formula.homepage) info.homepage = formula.homepage;
    if (formula.license) info.license = formula.license;
    if (formula.tap) info.tap = formula.tap;
    if (formula.stableVersion) info.latestVersion = formula.stableVersion;
    return info;
  }

  async findProvider(command: string): Promise<PackageSpec | null> {
    const formula = await lookupFormula(command, false);
    if (!formula) return null;
    return { name: formula.name, backend: "system", isCask: false };
  }

  async listTaps(): Promise<string[]> {
    const brew = await this.brew();
    const { stdout } = await captureChecked(this.runner, brew, ["tap"], "Failed to list taps");
    return nonEmptyLines(stdout);
  }

  async addTap(tap: string): Promise<void> {
    const brew = await this.brew();
    await runChecked(this.runner, brew, ["tap", tap], `Failed to add tap ${tap}`);
  }

  // --- Helpers ---

  private async locateBrew(): Promise<string | null> {
    if (this.brewPath) return this.brewPath;

    const onPath = await this.runner.which(executableName("brew", this.platform));
    if (onPath) {
      this.brewPath = onPath;
      return onPath;
    }

    for (const candidate of homebrewPrefixes(this.platform)) {
      const found = await this.runner.which(candidate);
      if (found) {
        this.brewPath = found;
        return found;
      }
    }
    return null;
  }

  /** `brew info` succeeds for anything in a tapped repository. */
  private async knownToBrew(brew: string, name: string, isCask: boolean): Promise<boolean> {
    const result = await this.runner.capture(brew, ["info", ...(isCask ? ["--cask"] : []), name]);
    return result.exitCode === 0;
  }

  private async brew(): Promise<string> {
    const brew = await this.locateBrew();
    if (!brew) throw new BertError("BACKEND_UNAVAILABLE", "Homebrew is not installed");
    return brew;
  }

  private async installHomebrew(): Promise<void> {
    const windows = this.platform.os === "win32";
    const url = windows ? HOMEBREW_INSTALL_PS_URL : HOMEBREW_INSTALL_SCRIPT_URL;

    let script: string;
    try {
      const response = await fetch(url);
      if (!response.ok) throw new Error(`HTTP ${response.status}`);
      script = await response.text();
    } catch (error) {
      throw new BertError("BACKEND_UNAVAILABLE", `Failed to download the Homebrew installer: ${errorMessage(error)}`, undefined, { cause: error });
    }

    const exitCode = windows
      ? await this.runner.run("powershell", ["-Command", script])
      : await this.runner.run("bash", ["-c", script]);
    if (exitCode !== 0) {
      throw new BertError("BACKEND_UNAVAILABLE", `Failed to install Homebrew (installer exited with code ${exitCode})`);
    }
  }
}

/**
 * Parse `brew list --versions` output: `name version [older versions...]`.
 * The first listed version is the linked one.
 */
export function parseVersionsListing(stdout: string, isCask: boolean): InstalledPackage[] {
  const packages: InstalledPackage[] = [];
  for (const line of nonEmptyLines(stdout)) {
    const [name, version = ""] = line.split(/\s+/);
    if (!name) continue;
    packages.push({ name, version, backend: "system", isCask });
  }
  return packages;
}

/**
 * Parse `brew search` output. Without `--cask`, brew prints formulae and casks
 * under `==> Formulae` / `==> Casks` headers.
 */
export function parseSearchOutput(stdout: string, caskOnly: boolean): SearchResult[] {
  const results: SearchResult[] = [];
  let inCasks = caskOnly;

  for (const line of nonEmptyLines(stdout)) {
    if (line.startsWith("==>")) {
      inCasks = caskOnly || /cask/i.test(line);
      continue;
    }
    if (line.startsWith("If you meant") || line.startsWith("To install")) continue;
    // Installed entries carry a trailing ✔
    for (const name of line.split(/\s+/)) {
      if (name === "✔") continue;
      results.push({ name, backend: "system", isCask: inCasks });
    }
  }
  return results;
}
