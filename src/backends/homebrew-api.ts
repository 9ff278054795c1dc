/**
 * Client for the public Homebrew formula/cask JSON API (formulae.brew.sh).
 *
 * Lookups resolve to null for unknown names, network failures and payloads
 * that do not match the expected shape; callers treat all three as "no match".
 */

import { z } from "zod";

export const FORMULAE_API = "https://formulae.brew.sh/api";

/** Valid formula/cask token: no slashes, spaces or URL syntax. */
const TOKEN_PATTERN = /^[A-Za-z0-9][A-Za-z0-9@._+-]*$/;

const FormulaPayload = z.object({
  name: z.string(),
  full_name: z.string(),
  desc: z.string().nullish(),
  homepage: z.string().nullish(),
  license: z.string().nullish(),
  tap: z.string().nullish(),
  versions: z.object({ stable: z.string().nullish() }).default({}),
  versioned_formulae: z.array(z.string()).default([]),
  aliases: z.array(z.string()).default([]),
});

const CaskPayload = z.object({
  token: z.string(),
  desc: z.string().nullish(),
  homepage: z.string().nullish(),
  version: z.string().nullish(),
  tap: z.string().nullish(),
});

/** Formula or cask, normalized to one shape. */
export interface Formula {
  name: string;
  fullName: string;
  isCask: boolean;
  description?: string;
  homepage?: string;
  license?: string;
  tap?: string;
  stableVersion: string;
  versionedFormulae: string[];
  aliases: string[];
}

export function isFormulaToken(name: string): boolean {
  return TOKEN_PATTERN.test(name);
}

export async function lookupFormula(name: string, isCask = false): Promise<Formula | null> {
  if (!isFormulaToken(name)) return null;

  const url = `${FORMULAE_API}/${isCask ? "cask" : "formula"}/${encodeURIComponent(name)}.json`;
  let body: unknown;
  try {
    const response = await fetch(url, { headers: { Accept: "application/json" } });
    if (!response.ok) return null;
    body = await response.json();
  } catch {
    return null;
  }

  if (isCask) {
    const parsed = CaskPayload.safeParse(body);
    if (!parsed.success) return null;
    const cask = parsed.data;
    return withDetails(
      {
        name: cask.token,
        fullName: cask.token,
        isCask: true,
        stableVersion: cask.version ?? "",
        versionedFormulae: [],
        aliases: [],
      },
      { description: cask.desc, homepage: cask.homepage, tap: cask.tap },
    );
  }

  const parsed = FormulaPayload.safeParse(body);
  if (!parsed.success) return null;
  const formula = parsed.data;
  return withDetails(
    {
      name: formula.name,
      fullName: formula.full_name,
      isCask: false,
      stableVersion: formula.versions.stable ?? "",
      versionedFormulae: formula.versioned_formulae,
      aliases: formula.aliases,
    },
    { description: formula.desc, homepage: formula.homepage, license: formula.license, tap: formula.tap },
  );
}

/**
 * Pick the name to hand to `brew install` for a requested version.
 *
 * Uses the versioned formula `<name>@<version>` when Homebrew has one;
 * otherwise falls back to the unversioned formula and reports why.
 */
export function resolveInstallName(
  formula: Formula,
  version: string | undefined,
): { installName: string; warning?: string } {
  if (!version) return { installName: formula.name };

  const versioned = `${formula.name}@${version}`;
  if (formula.versionedFormulae.includes(versioned)) {
    return { installName: versioned };
  }

  let available: string;
  if (formula.versionedFormulae.length > 0) {
    const others = formula.versionedFormulae.map(v => v.split("@")[1] ?? "").join(", ");
    available = `latest: ${formula.stableVersion}; other versions: ${others}`;
  } else if (formula.stableVersion) {
    available = `only the latest version (${formula.stableVersion}) is available`;
  } else {
    available = "no version information available";
  }

  return {
    installName: formula.name,
    warning: `Version ${version} of ${formula.name} not found (${available}). Installing latest instead.`,
  };
}

interface FormulaDetails {
  description?: string | null;
  homepage?: string | null;
  license?: string | null;
  tap?: string | null;
}

function withDetails(base: Formula, details: FormulaDetails): Formula {
  const out: Formula = { ...base };
  if (details.description) out.description = details.description;
  if (details.homepage) out.homepage = details.homepage;
  if (details.license) out.license = details.license;
  if (details.tap) out.tap = details.tap;
  return out;
}
