/**
 * Self-update engine.
 *
 * Checks the latest GitHub release, downloads the binary built for this
 * platform next to the running executable and swaps it in. The previous
 * binary is kept as `<exe>.old` until the swap succeeds, and moved back if
 * it does not.
 */

import { chmod, rename, rm, writeFile } from "node:fs/promises";
import { basename } from "node:path";
import { z } from "zod";
import { BertError, errorMessage } from "../errors.js";
import { releaseAssetName, type PlatformInfo } from "../platform/platform.js";

const USER_AGENT = "bert-updater";
const DEFAULT_TIMEOUT_MS = 60_000;

const GithubRelease = z.object({
  tag_name: z.string(),
  body: z.string().nullish(),
  html_url: z.string(),
  assets: z.array(
    z.object({
      name: z.string(),
      browser_download_url: z.string(),
    }),
  ).default([]),
});
export type GithubRelease = z.infer<typeof GithubRelease>;

export interface UpdateOptions {
  currentVersion: string;
  /** `owner/name` of the repository publishing releases. */
  releaseRepo: string;
  platform: PlatformInfo;
  /** Binary to replace. */
  executablePath: string;
  timeoutMs?: number;
}

export interface UpdateResult {
  updated: boolean;
  currentVersion: string;
  latestVersion: string;
  releaseUrl: string;
  releaseNotes?: string;
}

export async function fetchLatestRelease(releaseRepo: string, timeoutMs = DEFAULT_TIMEOUT_MS): Promise<GithubRelease> {
  const url = `https://api.github.com/repos/${releaseRepo}/releases/latest`;
  const response = await fetchWithTimeout(url, timeoutMs, { "User-Agent": USER_AGENT, Accept: "application/vnd.github+json" });
  if (!response.ok) {
    throw new BertError("UPDATE_FAILED", `Failed to fetch latest release information (HTTP ${response.status})`);
  }

  const parsed = GithubRelease.safeParse(await response.json());
  if (!parsed.success) {
    throw new BertError("UPDATE_FAILED", "Release information has an unexpected shape");
  }
  return parsed.data;
}

export async function selfUpdate(opts: UpdateOptions): Promise<UpdateResult> {
  const timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  assertReplaceableExecutable(opts.executablePath);

  const release = await fetchLatestRelease(opts.releaseRepo, timeoutMs);
  const latestVersion = release.tag_name.replace(/^v/, "");
  const result: UpdateResult = {
    updated: false,
    currentVersion: opts.currentVersion,
    latestVersion,
    releaseUrl: release.html_url,
  };
  if (release.body) result.releaseNotes = release.body;

  if (latestVersion === opts.currentVersion) {
    return result;
  }

  const assetName = releaseAssetName(opts.platform);
  const asset = release.assets.find(a => a.name === assetName);
  if (!asset) {
    throw new BertError("UPDATE_FAILED", "No compatible binary found for your platform", { assetName });
  }

  const response = await fetchWithTimeout(asset.browser_download_url, timeoutMs, { "User-Agent": USER_AGENT });
  if (!response.ok) {
    throw new BertError("UPDATE_FAILED", `Download failed (HTTP ${response.status})`);
  }
  const bytes = Buffer.from(await response.arrayBuffer());

  const exe = opts.executablePath;
  const staged = `${exe}.new`;
  const previous = `${exe}.old`;

  try {
    await writeFile(staged, bytes);
    if (opts.platform.os !== "win32") await chmod(staged, 0o755);
  } catch (error) {
    await rm(staged, { force: true });
    throw new BertError("UPDATE_FAILED", `Failed to stage update: ${errorMessage(error)}`, undefined, { cause: error });
  }

  await rm(previous, { force: true });
  await rename(exe, previous);
  try {
    await rename(staged, exe);
  } catch (error) {
    await rename(previous, exe);
    await rm(staged, { force: true });
    throw new BertError("UPDATE_FAILED", `Failed to install update: ${errorMessage(error)}`, undefined, { cause: error });
  }

  // Windows keeps the running image locked; the .old file is removed next time
  if (opts.platform.os !== "win32") {
    await rm(previous, { force: true });
  }

  return { ...result, updated: true };
}

/**
 * Refuse to overwrite a Node.js runtime: under `node dist/...` the running
 * executable is node itself, and npm owns the install.
 */
function assertReplaceableExecutable(executablePath: string): void {
  const name = basename(executablePath).toLowerCase();
  if (name === "node" || name === "node.exe" || name.startsWith("node-")) {
    throw new BertError(
      "UPDATE_FAILED",
      "bert is running on Node.js; update it with `npm install -g bert-cli@latest` instead",
    );
  }
}

async function fetchWithTimeout(url: string, timeoutMs: number, headers: Record<string, string>): Promise<Response> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  try {
    return await fetch(url, { headers, signal: controller.signal });
  } catch (error) {
    if (error instanceof Error && error.name === "AbortError") {
      throw new BertError("UPDATE_FAILED", `Request to ${url} timed out after ${timeoutMs}ms`);
    }
    throw new BertError("UPDATE_FAILED", `Request to ${url} failed: ${errorMessage(error)}`, undefined, { cause: error });
  } finally {
    clearTimeout(timer);
  }
}
