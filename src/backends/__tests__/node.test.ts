import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { isBertError } from "../../errors.js";
import { FakeBackend } from "../../testing/fake-backend.js";
import { FakeRunner } from "../../testing/fake-runner.js";
import { fetchedUrls, jsonResponse, stubFetch } from "../../testing/fetch-stub.js";
import { NodeBackend, parseJsonListing, parseTextListing } from "../node.js";
import { nodeManager, parseNodeManagerName } from "../node-managers.js";
import { latestBinaries, NPM_REGISTRY, PackageDocument } from "../npm-registry.js";
import type { NodePackageManagerName } from "../../schemas/config.js";

const linux = { os: "linux", arch: "x64" } as const;

const typescriptDoc = {
  name: "typescript",
  description: "TypeScript is a language for application scale JavaScript development",
  homepage: "https://www.typescriptlang.org/",
  license: "Apache-2.0",
  author: { name: "Example Author", email: "author@example.com" },
  keywords: ["typescript", "compiler"],
  "dist-tags": { latest: "5.4.5", next: "5.5.0-dev", beta: "5.5.0-beta" },
  versions: {
    "5.4.5": { bin: { tsc: "./bin/tsc", tsserver: "./bin/tsserver" } },
  },
};

describe("parseNodeManagerName", () => {
  it("accepts the four managers case-insensitively", () => {
    expect(parseNodeManagerName("pnpm")).toBe("pnpm");
    expect(parseNodeManagerName(" Yarn ")).toBe("yarn");
  });

  it("rejects anything else", () => {
    expect(() => parseNodeManagerName("pip")).toThrow(
      "Invalid package manager: pip. Valid options are: npm, yarn, pnpm, bun",
    );
  });
});

describe("parseJsonListing", () => {
  it("reads npm's dependency object", () => {
    const stdout = JSON.stringify({
      name: "lib",
      dependencies: { typescript: { version: "5.4.5" }, "@angular/cli": { version: "17.3.0" } },
    });
    expect(parseJsonListing(stdout)).toEqual([
      { name: "typescript", version: "5.4.5", backend: "language", isCask: false },
      { name: "@angular/cli", version: "17.3.0", backend: "language", isCask: false },
    ]);
  });

  it("reads pnpm's array form", () => {
    const stdout = JSON.stringify([{ path: "/pnpm/global/5", dependencies: { prettier: { version: "3.2.5" } } }]);
    expect(parseJsonListing(stdout)).toEqual([
      { name: "prettier", version: "3.2.5", backend: "language", isCask: false },
    ]);
  });

  it("treats empty output as no packages", () => {
    expect(parseJsonListing("")).toEqual([]);
    expect(parseJsonListing("{}")).toEqual([]);
  });

  it("fails on malformed output", () => {
    expect(() => parseJsonListing("{not json")).toThrow("Package manager returned malformed JSON listing");
  });
});

describe("parseTextListing", () => {
  it("reads yarn global list output", () => {
    const stdout = [
      "yarn global v1.22.19",
      'info "typescript@5.4.5" has binaries:',
      "   - tsc",
      "   - tsserver",
      'info "@vue/cli@5.0.8" has binaries:',
      "   - vue",
      "Done in 0.12s.",
    ].join("\n");
    expect(parseTextListing(stdout)).toEqual([
      { name: "typescript", version: "5.4.5", backend: "language", isCask: false },
      { name: "@vue/cli", version: "5.0.8", backend: "language", isCask: false },
    ]);
  });

  it("reads bun pm ls tree output", () => {
    const stdout = [
      "/home/u/.bun/install/global node_modules (3)",
      "├── prettier@3.2.5",
      "└── @biomejs/biome@1.6.4",
    ].join("\n");
    expect(parseTextListing(stdout)).toEqual([
      { name: "prettier", version: "3.2.5", backend: "language", isCask: false },
      { name: "@biomejs/biome", version: "1.6.4", backend: "language", isCask: false },
    ]);
  });
});

describe("latestBinaries", () => {
  it("uses the keys of an object bin", () => {
    expect(latestBinaries(PackageDocument.parse(typescriptDoc))).toEqual(["tsc", "tsserver"]);
  });

  it("names a string bin after the unscoped package", () => {
    const doc = PackageDocument.parse({
      name: "@scope/widget",
      "dist-tags": { latest: "1.0.0" },
      versions: { "1.0.0": { bin: "./cli.js" } },
    });
    expect(latestBinaries(doc)).toEqual(["widget"]);
  });

  it("returns nothing without a latest manifest", () => {
    expect(latestBinaries(PackageDocument.parse({ name: "lib" }))).toEqual([]);
  });
});

describe("NodeBackend", () => {
  let runner: FakeRunner;
  let system: FakeBackend;

  const backendFor = (manager: NodePackageManagerName) => new NodeBackend({ runner, platform: linux, manager, system });

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    runner = new FakeRunner().addBinary("node").addBinary("npm").addBinary("yarn").addBinary("pnpm").addBinary("bun");
    system = new FakeBackend({ kind: "system" });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it.each([
    ["npm", "npm install -g typescript@5.4.5"],
    ["yarn", "yarn global add typescript@5.4.5"],
    ["pnpm", "pnpm add -g typescript@5.4.5"],
    ["bun", "bun install -g typescript@5.4.5"],
  ] as const)("installs through %s", async (manager, expected) => {
    await backendFor(manager).install({ name: "typescript", version: "5.4.5", backend: "language", isCask: false });
    expect(runner.commandLines()).toEqual([expected]);
  });

  it("uninstalls and updates with the manager's verbs", async () => {
    const backend = backendFor("yarn");
    await backend.uninstall({ name: "typescript", backend: "language", isCask: false });
    await backend.update([]);
    await backend.update(["typescript"]);
    expect(runner.commandLines()).toEqual([
      "yarn global remove typescript",
      "yarn global upgrade",
      "yarn global upgrade typescript",
    ]);
  });

  it("installs Node.js through the system backend when it is missing", async () => {
    runner.removeBinary("node");
    system.onInstall = () => runner.addBinary("node");

    await backendFor("npm").install({ name: "typescript", backend: "language", isCask: false });

    expect(system.installs).toEqual([{ name: "node", backend: "system", isCask: false }]);
    expect(runner.commandLines()).toEqual(["npm install -g typescript"]);
  });

  it("reports a missing package manager", async () => {
    runner.removeBinary("pnpm");
    const err = await backendFor("pnpm").install({ name: "typescript", backend: "language", isCask: false }).catch(e => e);
    expect(isBertError(err, "BACKEND_UNAVAILABLE")).toBe(true);
    expect(runner.calls).toEqual([]);
  });

  it("lists global packages from npm JSON", async () => {
    runner.on("npm", ["list", "-g", "--depth=0", "--json"], {
      stdout: JSON.stringify({ dependencies: { typescript: { version: "5.4.5" } } }),
    });
    const backend = backendFor("npm");

    expect(await backend.listInstalled()).toEqual([
      { name: "typescript", version: "5.4.5", backend: "language", isCask: false },
    ]);
    expect(await backend.isInstalled("typescript")).toBe(true);
    expect(await backend.isInstalled("prettier")).toBe(false);
  });

  it("reads the JSON tree npm prints alongside ELSPROBLEMS", async () => {
    runner.on("npm", ["list", "-g", "--depth=0", "--json"], {
      exitCode: 1,
      stdout: JSON.stringify({ dependencies: { typescript: { version: "5.4.5" } }, problems: ["extraneous: left-pad"] }),
      stderr: "npm error code ELSPROBLEMS",
    });

    expect(await backendFor("npm").isInstalled("typescript")).toBe(true);
  });

  it("fails the listing when npm exits non-zero without a tree", async () => {
    runner.on("npm", ["list", "-g", "--depth=0", "--json"], { exitCode: 1, stderr: "npm error code EACCES" });
    const err = await backendFor("npm").listInstalled().catch(e => e);
    expect(isBertError(err, "BACKEND_COMMAND_FAILED")).toBe(true);
    expect(err.message).toBe("Failed to list npm global packages: npm error code EACCES");
  });

  it("searches the npm registry and never runs a command", async () => {
    const url = `${NPM_REGISTRY}/-/v1/search?text=json%20cli&size=20`;
    const fetchMock = stubFetch({
      [url]: jsonResponse({
        objects: [
          { package: { name: "json-cli", version: "1.0.0", description: "JSON tools" } },
          { package: { name: "jsonc", version: "2.0.0", description: null } },
        ],
      }),
    });

    const results = await backendFor("npm").search("json cli");

    expect(fetchedUrls(fetchMock)).toEqual([url]);
    expect(runner.calls).toEqual([]);
    expect(results).toEqual([
      { name: "json-cli", version: "1.0.0", description: "JSON tools", backend: "language", isCask: false },
      { name: "jsonc", version: "2.0.0", backend: "language", isCask: false },
    ]);
  });

  it("fails the search when the registry is unreachable", async () => {
    stubFetch({});
    const err = await backendFor("npm").search("json").catch(e => e);
    expect(isBertError(err, "BACKEND_COMMAND_FAILED")).toBe(true);
    expect(err.message).toBe("npm registry search failed: HTTP 404");
  });

  it("builds package info from the registry document", async () => {
    stubFetch({ [`${NPM_REGISTRY}/typescript`]: jsonResponse(typescriptDoc) });

    expect(await backendFor("npm").info("typescript")).toEqual({
      name: "typescript",
      fullName: "typescript",
      backend: "language",
      isCask: false,
      description: "TypeScript is a language for application scale JavaScript development",
      homepage: "https://www.typescriptlang.org/",
      license: "Apache-2.0",
      latestVersion: "5.4.5",
      author: "Example Author <author@example.com>",
      otherVersions: ["next: 5.5.0-dev", "beta: 5.5.0-beta"],
      aliases: [],
      keywords: ["typescript", "compiler"],
    });
  });

  it("escapes the slash of scoped names", async () => {
    const fetchMock = stubFetch({});
    expect(await backendFor("npm").info("@scope/widget")).toBeNull();
    expect(fetchedUrls(fetchMock)).toEqual([`${NPM_REGISTRY}/@scope%2Fwidget`]);
  });

  it("only offers a provider whose latest version ships the command", async () => {
    stubFetch({ [`${NPM_REGISTRY}/tsc`]: jsonResponse({ ...typescriptDoc, name: "tsc", versions: { "5.4.5": {} } }) });
    const backend = backendFor("npm");
    expect(await backend.findProvider("tsc")).toBeNull();
  });

  it("offers a package that ships a binary of the same name", async () => {
    stubFetch({
      [`${NPM_REGISTRY}/prettier`]: jsonResponse({
        name: "prettier",
        "dist-tags": { latest: "3.2.5" },
        versions: { "3.2.5": { bin: { prettier: "./bin/prettier.cjs" } } },
      }),
    });
    expect(await backendFor("npm").findProvider("prettier")).toEqual({
      name: "prettier",
      backend: "language",
      isCask: false,
    });
  });

  it("exposes the manager table", () => {
    expect(nodeManager("bun").list).toEqual(["pm", "ls", "-g"]);
  });
});
