/**
 * Host platform detection.
 *
 * Detected once at startup and carried on the runtime context; nothing else
 * reads `process.platform` directly.
 */

export type OsKind = "darwin" | "linux" | "win32";

export interface PlatformInfo {
  os: OsKind;
  arch: string;
}

export function detectPlatform(
  platform: NodeJS.Platform = process.platform,
  arch: string = process.arch,
): PlatformInfo {
  switch (platform) {
    case "darwin":
    case "win32":
      return { os: platform, arch };
    default:
      // Everything else Homebrew runs on behaves like Linux
      return { os: "linux", arch };
  }
}

/** Name of the release asset for this platform's prebuilt binary. */
export function releaseAssetName(platform: PlatformInfo): string {
  switch (platform.os) {
    case "darwin":
      return platform.arch === "arm64" ? "bert-darwin-arm64" : "bert-darwin-amd64";
    case "win32":
      return "bert-windows-amd64.exe";
    case "linux":
      return "bert-linux-amd64";
  }
}

/** Append `.exe` on Windows when the name has no extension yet. */
export function executableName(command: string, platform: PlatformInfo): string {
  if (platform.os === "win32" && !command.toLowerCase().endsWith(".exe")) {
    return `${command}.exe`;
  }
  return command;
}

/** Known Homebrew install locations, checked when `brew` is not on PATH. */
export function homebrewPrefixes(platform: PlatformInfo): string[] {
  switch (platform.os) {
    case "darwin":
      return ["/opt/homebrew/bin/brew", "/usr/local/bin/brew"];
    case "linux":
      return ["/home/linuxbrew/.linuxbrew/bin/brew"];
    case "win32":
      return [];
  }
}
