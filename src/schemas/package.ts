import { z } from "zod";
import { BertError } from "../errors.js";

/** Which external manager owns a package. */
export const BackendKind = z.enum(["system", "language"]);
export type BackendKind = z.infer<typeof BackendKind>;

/** A unit the user wants to act on. */
export const PackageSpec = z.object({
  name: z.string().min(1),
  backend: BackendKind,
  /** Homebrew cask (GUI application). Always false for the language backend. */
  isCask: z.boolean().default(false),
  /** Requested version; absent means latest. */
  version: z.string().min(1).optional(),
});
export type PackageSpec = z.infer<typeof PackageSpec>;

/** One installed package as reported by its backend. */
export const InstalledPackage = z.object({
  name: z.string().min(1),
  version: z.string(),
  backend: BackendKind,
  isCask: z.boolean().default(false),
});
export type InstalledPackage = z.infer<typeof InstalledPackage>;

export interface SearchResult {
  name: string;
  backend: BackendKind;
  isCask: boolean;
  version?: string;
  description?: string;
}

/** Metadata shown by `bert info`, normalized across backends. */
export interface PackageInfo {
  name: string;
  fullName: string;
  backend: BackendKind;
  isCask: boolean;
  description?: string;
  homepage?: string;
  license?: string;
  tap?: string;
  latestVersion?: string;
  /** Installable alternatives (versioned formulae, dist-tags). */
  otherVersions: string[];
  aliases: string[];
  keywords: string[];
  author?: string;
}

/**
 * Split a CLI token into name and version.
 *
 * `jq` → jq, `python@3.12` → python / 3.12, `@scope/pkg@1.0.0` keeps the scope.
 */
export function parsePackageToken(token: string): { name: string; version?: string } {
  const trimmed = token.trim();
  const at = trimmed.lastIndexOf("@");

  if (at <= 0) {
    if (trimmed.length === 0 || trimmed === "@") {
      throw new BertError("INVALID_ARGUMENT", `Invalid package name: '${token}'`);
    }
    return { name: trimmed };
  }

  const name = trimmed.slice(0, at);
  const version = trimmed.slice(at + 1);
  if (name.length === 0 || name.endsWith("/")) {
    throw new BertError("INVALID_ARGUMENT", `Invalid package name: '${token}'`);
  }
  return version.length > 0 ? { name, version } : { name };
}

export function toPackageSpec(token: string, backend: BackendKind, isCask = false): PackageSpec {
  const { name, version } = parsePackageToken(token);
  return {
    name,
    backend,
    isCask: backend === "system" ? isCask : false,
    ...(version !== undefined ? { version } : {}),
  };
}
