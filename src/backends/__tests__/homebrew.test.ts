import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { confirm } from "@inquirer/prompts";
import { isBertError } from "../../errors.js";
import { FakeRunner } from "../../testing/fake-runner.js";
import { fetchedUrls, jsonResponse, stubFetch } from "../../testing/fetch-stub.js";
import { FORMULAE_API, isFormulaToken, resolveInstallName, type Formula } from "../homebrew-api.js";
import {
  HOMEBREW_INSTALL_SCRIPT_URL,
  HomebrewBackend,
  parseSearchOutput,
  parseVersionsListing,
} from "../homebrew.js";

vi.mock("@inquirer/prompts", () => ({ confirm: vi.fn() }));

const macos = { os: "darwin", arch: "arm64" } as const;

const pythonFormula = {
  name: "python",
  full_name: "python@3.13",
  desc: "Interpreted, interactive, object-oriented programming language",
  homepage: "https://www.python.org/",
  license: "Python-2.0",
  tap: "homebrew/core",
  versions: { stable: "3.13.0" },
  versioned_formulae: ["python@3.12", "python@3.11"],
  aliases: ["python3"],
};

const jqFormula = {
  name: "jq",
  full_name: "jq",
  desc: "Lightweight and flexible command-line JSON processor",
  versions: { stable: "1.7.1" },
  versioned_formulae: [],
  aliases: [],
};

describe("parseVersionsListing", () => {
  it("takes the first listed version", () => {
    expect(parseVersionsListing("jq 1.7.1\nwget 1.24.5 1.21.4\n", false)).toEqual([
      { name: "jq", version: "1.7.1", backend: "system", isCask: false },
      { name: "wget", version: "1.24.5", backend: "system", isCask: false },
    ]);
  });

  it("marks casks and tolerates blank lines", () => {
    expect(parseVersionsListing("\nfirefox 125.0\n\n", true)).toEqual([
      { name: "firefox", version: "125.0", backend: "system", isCask: true },
    ]);
  });
});

describe("parseSearchOutput", () => {
  it("splits formulae and casks by section header", () => {
    const stdout = [
      "==> Formulae",
      "jq ✔",
      "jql",
      "",
      "==> Casks",
      "jqbx",
    ].join("\n");

    expect(parseSearchOutput(stdout, false)).toEqual([
      { name: "jq", backend: "system", isCask: false },
      { name: "jql", backend: "system", isCask: false },
      { name: "jqbx", backend: "system", isCask: true },
    ]);
  });

  it("treats headerless --cask output as casks and skips hints", () => {
    const stdout = "firefox\nfirefox@beta\nIf you meant \"firefox\" specifically:\n";
    expect(parseSearchOutput(stdout, true)).toEqual([
      { name: "firefox", backend: "system", isCask: true },
      { name: "firefox@beta", backend: "system", isCask: true },
    ]);
  });
});

describe("homebrew formula API", () => {
  const base: Formula = {
    name: "python",
    fullName: "python@3.13",
    isCask: false,
    stableVersion: "3.13.0",
    versionedFormulae: ["python@3.12", "python@3.11"],
    aliases: [],
  };

  it("accepts formula tokens and rejects paths", () => {
    expect(isFormulaToken("python@3.12")).toBe(true);
    expect(isFormulaToken("c++filt")).toBe(true);
    expect(isFormulaToken("../etc")).toBe(false);
    expect(isFormulaToken("a b")).toBe(false);
  });

  it("uses a versioned formula when one exists", () => {
    expect(resolveInstallName(base, "3.12")).toEqual({ installName: "python@3.12" });
    expect(resolveInstallName(base, undefined)).toEqual({ installName: "python" });
  });

  it("falls back to latest with a warning", () => {
    expect(resolveInstallName(base, "2.7")).toEqual({
      installName: "python",
      warning: "Version 2.7 of python not found (latest: 3.13.0; other versions: 3.12, 3.11). Installing latest instead.",
    });
    expect(resolveInstallName({ ...base, versionedFormulae: [] }, "3.9").warning).toBe(
      "Version 3.9 of python not found (only the latest version (3.13.0) is available). Installing latest instead.",
    );
  });
});

describe("HomebrewBackend", () => {
  let runner: FakeRunner;
  let backend: HomebrewBackend;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    runner = new FakeRunner().addBinary("brew", "/opt/homebrew/bin/brew");
    backend = new HomebrewBackend({ runner, platform: macos });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe("install", () => {
    it("installs the requested versioned formula", async () => {
      const fetchMock = stubFetch({ [`${FORMULAE_API}/formula/python.json`]: jsonResponse(pythonFormula) });

      await backend.install({ name: "python", version: "3.12", backend: "system", isCask: false });

      expect(fetchedUrls(fetchMock)).toEqual([`${FORMULAE_API}/formula/python.json`]);
      expect(runner.commandLines()).toEqual(["brew install python@3.12"]);
    });

    it("installs casks with --cask", async () => {
      stubFetch({ [`${FORMULAE_API}/cask/firefox.json`]: jsonResponse({ token: "firefox", version: "125.0" }) });

      await backend.install({ name: "firefox", backend: "system", isCask: true });

      expect(runner.commandLines()).toEqual(["brew install --cask firefox"]);
    });

    it("installs tap-qualified names without a lookup", async () => {
      const fetchMock = stubFetch({});

      await backend.install({ name: "user/tools/widget", backend: "system", isCask: false });

      expect(fetchMock).not.toHaveBeenCalled();
      expect(runner.commandLines()).toEqual(["brew install user/tools/widget"]);
    });

    it("fails with PACKAGE_NOT_FOUND when neither the API nor brew knows the name", async () => {
      stubFetch({});
      runner.on("brew", ["info", "nosuchtool"], { exitCode: 1, stderr: "Error: No available formula" });

      const err = await backend.install({ name: "nosuchtool", backend: "system", isCask: false }).catch(e => e);

      expect(isBertError(err, "PACKAGE_NOT_FOUND")).toBe(true);
      expect(err.message).toBe("Package nosuchtool not found");
      expect(runner.commandLines()).toEqual(["brew info nosuchtool"]);
    });

    it("installs a formula from a third-party tap that the API does not list", async () => {
      stubFetch({});
      runner.on("brew", ["info", "mongodb-community"], { stdout: "==> mongodb/brew/mongodb-community: stable 7.0.12\n" });

      await backend.install({ name: "mongodb-community", version: "7.0.12", backend: "system", isCask: false });

      expect(runner.commandLines()).toEqual(["brew info mongodb-community", "brew install mongodb-community"]);
    });

    it("installs through brew when the API is unreachable", async () => {
      vi.stubGlobal("fetch", vi.fn().mockRejectedValue(new TypeError("fetch failed")));

      await backend.install({ name: "firefox", backend: "system", isCask: true });

      expect(runner.commandLines()).toEqual(["brew info --cask firefox", "brew install --cask firefox"]);
    });

    it("surfaces a failing brew install", async () => {
      stubFetch({ [`${FORMULAE_API}/formula/jq.json`]: jsonResponse(jqFormula) });
      runner.on("brew", ["install", "jq"], { exitCode: 1 });

      const err = await backend.install({ name: "jq", backend: "system", isCask: false }).catch(e => e);

      expect(isBertError(err, "BACKEND_COMMAND_FAILED")).toBe(true);
      expect(err.message).toBe("Failed to install jq");
    });
  });

  describe("uninstall", () => {
    it("uninstalls and cleans up an installed formula", async () => {
      runner.on("brew", ["list", "--versions", "jq"], { stdout: "jq 1.7.1\n" });

      await backend.uninstall({ name: "jq", backend: "system", isCask: false });

      expect(runner.commandLines()).toEqual([
        "brew list --versions jq",
        "brew uninstall jq",
        "brew cleanup jq",
      ]);
    });

    it("does nothing when the package is not installed", async () => {
      runner.on("brew", ["list", "--versions", "--cask", "firefox"], { exitCode: 1 });

      await backend.uninstall({ name: "firefox", backend: "system", isCask: true });

      expect(runner.commandLines()).toEqual(["brew list --versions --cask firefox"]);
    });
  });

  describe("update", () => {
    it("updates Homebrew and upgrades everything with no names", async () => {
      await backend.update([]);
      expect(runner.commandLines()).toEqual(["brew update", "brew upgrade"]);
    });

    it("upgrades only the named packages", async () => {
      await backend.update(["jq", "wget"]);
      expect(runner.commandLines()).toEqual(["brew upgrade jq wget"]);
    });
  });

  it("lists formulae then casks", async () => {
    runner
      .on("brew", ["list", "--formula", "--versions"], { stdout: "jq 1.7.1\n" })
      .on("brew", ["list", "--cask", "--versions"], { stdout: "firefox 125.0\n" });

    expect(await backend.listInstalled()).toEqual([
      { name: "jq", version: "1.7.1", backend: "system", isCask: false },
      { name: "firefox", version: "125.0", backend: "system", isCask: true },
    ]);
  });

  it("checks installation with brew list --versions", async () => {
    runner.on("brew", ["list", "--versions", "jq"], { stdout: "jq 1.7.1\n" });
    expect(await backend.isInstalled("jq")).toBe(true);
    expect(await backend.isInstalled("wget")).toBe(false);
  });

  it("reads and adds taps", async () => {
    runner.on("brew", ["tap"], { stdout: "homebrew/core\nuser/tools\n" });
    expect(await backend.listTaps()).toEqual(["homebrew/core", "user/tools"]);

    await backend.addTap("user/extra");
    expect(runner.commandLines()).toContain("brew tap user/extra");
  });

  it("builds package info from the formula API", async () => {
    stubFetch({ [`${FORMULAE_API}/formula/python.json`]: jsonResponse(pythonFormula) });

    expect(await backend.info("python")).toEqual({
      name: "python",
      fullName: "python@3.13",
      backend: "system",
      isCask: false,
      description: "Interpreted, interactive, object-oriented programming language",
      homepage: "https://www.python.org/",
      license: "Python-2.0",
      tap: "homebrew/core",
      latestVersion: "3.13.0",
      otherVersions: ["python@3.12", "python@3.11"],
      aliases: ["python3"],
      keywords: [],
    });
  });

  it("finds the formula that provides a command", async () => {
    stubFetch({ [`${FORMULAE_API}/formula/jq.json`]: jsonResponse(jqFormula) });
    expect(await backend.findProvider("jq")).toEqual({ name: "jq", backend: "system", isCask: false });
    expect(await backend.findProvider("nosuchtool")).toBeNull();
  });

  describe("availability", () => {
    it("finds brew at a known prefix when it is not on PATH", async () => {
      runner = new FakeRunner().addBinary("/usr/local/bin/brew", "/usr/local/bin/brew");
      backend = new HomebrewBackend({ runner, platform: macos });
      expect(await backend.isAvailable()).toBe(true);
    });

    it("refuses to continue when the user declines installing Homebrew", async () => {
      vi.mocked(confirm).mockResolvedValue(false);
      runner = new FakeRunner();
      backend = new HomebrewBackend({ runner, platform: macos });

      const err = await backend.ensureAvailable().catch(e => e);

      expect(isBertError(err, "BACKEND_UNAVAILABLE")).toBe(true);
      expect(runner.calls).toEqual([]);
    });

    it("installs Homebrew without prompting when assumeYes is set", async () => {
      stubFetch({ [HOMEBREW_INSTALL_SCRIPT_URL]: new Response("echo installing") });
      runner = new FakeRunner();
      runner.on("bash", ["-c", "echo installing"], { effect: () => runner.addBinary("brew") });
      backend = new HomebrewBackend({ runner, platform: macos, assumeYes: true });

      await backend.ensureAvailable();

      expect(confirm).not.toHaveBeenCalled();
      expect(runner.commandLines()).toEqual(["bash -c echo installing"]);
      expect(await backend.isAvailable()).toBe(true);
    });
  });
});
