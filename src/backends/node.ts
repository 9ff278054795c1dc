/**
 * Node backend — globally installed language packages.
 *
 * Mutations go through the configured package manager (npm, yarn, pnpm or
 * bun); search and metadata come from the npm registry, so `--node` queries
 * never reach Homebrew.
 */

import { z } from "zod";
import { BackendCommandError, BertError } from "../errors.js";
import type { CommandRunner } from "../exec/runner.js";
import { executableName, type PlatformInfo } from "../platform/platform.js";
import type { NodePackageManagerName } from "../schemas/config.js";
import type { InstalledPackage, PackageInfo, PackageSpec, SearchResult } from "../schemas/package.js";
import { captureChecked, nonEmptyLines, runChecked } from "./exec-helpers.js";
import { nodeManager, type NodeManagerCommands } from "./node-managers.js";
import { fetchPackageDocument, formatPerson, latestBinaries, searchRegistry } from "./npm-registry.js";
import type { PackageBackend } from "./types.js";

export interface NodeBackendOptions {
  runner: CommandRunner;
  platform: PlatformInfo;
  manager: NodePackageManagerName;
  /** Used to install Node.js itself when it is missing. */
  system: PackageBackend;
}

const DependencyMap = z.record(z.string(), z.object({ version: z.string().optional() }).passthrough());
const JsonListing = z.union([
  z.object({ dependencies: DependencyMap.optional() }).passthrough(),
  z.array(z.object({ dependencies: DependencyMap.optional() }).passthrough()),
]);

export class NodeBackend implements PackageBackend {
  readonly kind = "language" as const;
  readonly displayName: string;

  private readonly runner: CommandRunner;
  private readonly platform: PlatformInfo;
  private readonly manager: NodeManagerCommands;
  private readonly system: PackageBackend;

  constructor(opts: NodeBackendOptions) {
    this.runner = opts.runner;
    this.platform = opts.platform;
    this.manager = nodeManager(opts.manager);
    this.system = opts.system;
    this.displayName = this.manager.name;
  }

  async isAvailable(): Promise<boolean> {
    const node = await this.runner.which(executableName("node", this.platform));
    if (!node) return false;
    return (await this.managerPath()) !== null;
  }

  async ensureAvailable(): Promise<void> {
    const node = await this.runner.which(executableName("node", this.platform));
    if (!node) {
      console.log("Node.js is required. Installing Node.js first...");
      await this.system.install({ name: "node", backend: "system", isCask: false });
    }

    if (!(await this.managerPath())) {
      throw new BertError(
        "BACKEND_UNAVAILABLE",
        `${this.manager.name} is not installed. Install it, or pick another manager with \`bert set-manager\`.`,
      );
    }
  }

  async install(spec: PackageSpec): Promise<void> {
    await this.ensureAvailable();
    const target = spec.version ? `${spec.name}@${spec.version}` : spec.name;
    console.log(`📦 Installing ${target} via ${this.manager.name}...`);
    await runChecked(this.runner, await this.command(), [...this.manager.install, target], `Failed to install ${spec.name}`);
  }

  async uninstall(spec: PackageSpec): Promise<void> {
    console.log(`Uninstalling ${spec.name} via ${this.manager.name}...`);
    await runChecked(this.runner, await this.command(), [...this.manager.uninstall, spec.name], `Failed to uninstall ${spec.name}`);
  }

  async update(names: readonly string[]): Promise<void> {
    console.log(`Updating packages via ${this.manager.name}...`);
    await runChecked(this.runner, await this.command(), [...this.manager.update, ...names], "Failed to update packages");
  }

  async search(query: string): Promise<SearchResult[]> {
    const hits = await searchRegistry(query);
    return hits.map((hit): SearchResult => ({ ...hit, backend: "language", isCask: false }));
  }

  async listInstalled(): Promise<InstalledPackage[]> {
    const command = await this.command();
    const summary = `Failed to list ${this.manager.name} global packages`;
    if (!this.manager.listIsJson) {
      const { stdout } = await captureChecked(this.runner, command, this.manager.list, summary);
      return parseTextListing(stdout);
    }

    // npm exits 1 on ELSPROBLEMS (extraneous or invalid globals) but still prints the full tree
    const result = await this.runner.capture(command, this.manager.list);
    if (result.exitCode !== 0 && !looksLikeJson(result.stdout)) {
      throw new BackendCommandError([command, ...this.manager.list].join(" "), result.exitCode, result.stderr, summary);
    }
    return parseJsonListing(result.stdout);
  }

  async isInstalled(name: string): Promise<boolean> {
    if (!(await this.isAvailable())) return false;
    const installed = await this.listInstalled();
    return installed.some(p => p.name === name);
  }

  async info(name: string): Promise<PackageInfo | null> {
    const doc = await fetchPackageDocument(name);
    if (!doc) return null;

    const distTags = doc["dist-tags"];
    const info: PackageInfo = {
      name: doc.name,
      fullName: doc.name,
      backend: "language",
      isCask: false,
      otherVersions: Object.entries(distTags)
        .filter(([tag]) => tag !== "latest")
        .map(([tag, version]) => `${tag}: ${version}`),
      aliases: [],
      keywords: doc.keywords ?? [],
    };
    if (doc.description) info.description = doc.description;
    if (doc.homepage) info.homepage = doc.homepage;
    if (doc.license) info.license = typeof doc.license === "string" ? doc.license : doc.license.type;
    const latest = distTags["latest"];
    if (latest) info.latestVersion = latest;
    const author = formatPerson(doc.author);
    if (author) info.author = author;
    return info;
  }

  async findProvider(command: string): Promise<PackageSpec | null> {
    const doc = await fetchPackageDocument(command);
    if (!doc || !latestBinaries(doc).includes(command)) return null;
    return { name: doc.name, backend: "language", isCask: false };
  }

  // --- Helpers ---

  private managerPath(): Promise<string | null> {
    return this.runner.which(executableName(this.manager.command, this.platform));
  }

  private async command(): Promise<string> {
    const path = await this.managerPath();
    if (!path) throw new BertError("BACKEND_UNAVAILABLE", `${this.manager.name} is not installed`);
    return path;
  }
}

/** npm / pnpm `--json` output: an object (npm) or array of objects (pnpm) with a `dependencies` map. */
export function parseJsonListing(stdout: string): InstalledPackage[] {
  let raw: unknown;
  try {
    raw = JSON.parse(stdout || "{}");
  } catch {
    throw new BertError("BACKEND_COMMAND_FAILED", "Package manager returned malformed JSON listing");
  }

  const parsed = JsonListing.safeParse(raw);
  if (!parsed.success) {
    throw new BertError("BACKEND_COMMAND_FAILED", "Package manager returned an unexpected listing");
  }

  const roots = Array.isArray(parsed.data) ? parsed.data : [parsed.data];
  const packages: InstalledPackage[] = [];
  for (const root of roots) {
    for (const [name, dep] of Object.entries(root.dependencies ?? {})) {
      packages.push({ name, version: dep.version ?? "", backend: "language", isCask: false });
    }
  }
  return packages;
}

function looksLikeJson(stdout: string): boolean {
  const trimmed = stdout.trim();
  return trimmed.startsWith("{") || trimmed.startsWith("[");
}

const TEXT_ENTRY = /^(?:info\s+"|[├└│─\s]+)?((?:@[^@\s"/]+\/)?[^@\s"/]+)@([^\s",]+)/;

/**
 * yarn (`info "name@1.0.0" has binaries:`) and bun (`├── name@1.0.0`) listings.
 */
export function parseTextListing(stdout: string): InstalledPackage[] {
  const packages: InstalledPackage[] = [];
  const seen = new Set<string>();
  for (const line of nonEmptyLines(stdout)) {
    const match = TEXT_ENTRY.exec(line);
    if (!match) continue;
    const [, name, version] = match;
    if (!name || !version || seen.has(name)) continue;
    seen.add(name);
    packages.push({ name, version, backend: "language", isCask: false });
  }
  return packages;
}
