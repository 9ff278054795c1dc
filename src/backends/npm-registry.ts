/**
 * npm registry client: search and package documents.
 */

import { z } from "zod";
import { BertError, errorMessage } from "../errors.js";

export const NPM_REGISTRY = "https://registry.npmjs.org";

const SearchResponse = z.object({
  objects: z.array(
    z.object({
      package: z.object({
        name: z.string(),
        version: z.string().optional(),
        description: z.string().nullish(),
      }),
    }),
  ),
});

export const NpmPerson = z.union([
  z.string(),
  z.object({ name: z.string().optional(), email: z.string().optional() }),
]);

const BinField = z.union([z.string(), z.record(z.string(), z.string())]);

export const PackageDocument = z.object({
  name: z.string(),
  description: z.string().nullish(),
  homepage: z.string().nullish(),
  license: z.union([z.string(), z.object({ type: z.string() })]).nullish(),
  author: NpmPerson.nullish(),
  keywords: z.array(z.string()).nullish(),
  "dist-tags": z.record(z.string(), z.string()).default({}),
  versions: z.record(z.string(), z.object({ bin: BinField.optional() }).passthrough()).default({}),
});
export type PackageDocument = z.infer<typeof PackageDocument>;

export interface RegistrySearchHit {
  name: string;
  version?: string;
  description?: string;
}

export async function searchRegistry(query: string, size = 20): Promise<RegistrySearchHit[]> {
  const url = `${NPM_REGISTRY}/-/v1/search?text=${encodeURIComponent(query)}&size=${size}`;
  let body: unknown;
  try {
    const response = await fetch(url, { headers: { Accept: "application/json" } });
    if (!response.ok) {
      throw new Error(`HTTP ${response.status}`);
    }
    body = await response.json();
  } catch (error) {
    throw new BertError("BACKEND_COMMAND_FAILED", `npm registry search failed: ${errorMessage(error)}`, { query }, { cause: error });
  }

  const parsed = SearchResponse.safeParse(body);
  if (!parsed.success) {
    throw new BertError("BACKEND_COMMAND_FAILED", "npm registry returned an unexpected search response", { query });
  }

  return parsed.data.objects.map(({ package: pkg }) => {
    const hit: RegistrySearchHit = { name: pkg.name };
    if (pkg.version) hit.version = pkg.version;
    if (pkg.description) hit.description = pkg.description;
    return hit;
  });
}

/** Full package document, or null when the registry does not know the name. */
export async function fetchPackageDocument(name: string): Promise<PackageDocument | null> {
  // Scoped names keep the @ but escape the slash
  const url = `${NPM_REGISTRY}/${name.replace("/", "%2F")}`;
  let body: unknown;
  try {
    const response = await fetch(url, { headers: { Accept: "application/json" } });
    if (!response.ok) return null;
    body = await response.json();
  } catch {
    return null;
  }

  const parsed = PackageDocument.safeParse(body);
  return parsed.success ? parsed.data : null;
}

/** Binary names exposed by the latest published version. */
export function latestBinaries(doc: PackageDocument): string[] {
  const latest = doc["dist-tags"]["latest"];
  const manifest = latest ? doc.versions[latest] : undefined;
  const bin = manifest?.bin;
  if (bin === undefined) return [];
  if (typeof bin === "string") {
    // A string bin is named after the package (scope stripped)
    return [doc.name.split("/").pop() ?? doc.name];
  }
  return Object.keys(bin);
}

export function formatPerson(person: z.infer<typeof NpmPerson> | null | undefined): string | undefined {
  if (!person) return undefined;
  if (typeof person === "string") return person;
  if (!person.name) return undefined;
  return person.email ? `${person.name} <${person.email}>` : person.name;
}
