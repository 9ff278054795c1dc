/**
 * Config manager — CLI-gated configuration management.
 *
 * All config changes go through this module, never raw YAML edits.
 * Provides: load, get, set (with dry-run), validate.
 * Writes are atomic (write-file-atomic: temp file, then rename).
 */

import { readFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import writeFileAtomic from "write-file-atomic";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import { BertError, errorMessage } from "../errors.js";
import { BertConfig } from "../schemas/config.js";

export interface ConfigChange {
  key: string;
  oldValue: unknown;
  newValue: unknown;
}

export interface ConfigIssue {
  path: string;
  message: string;
}

/**
 * Load and validate the config. A missing file yields the defaults;
 * nothing is written until a value is set.
 */
export async function loadConfig(configPath: string): Promise<BertConfig> {
  const raw = await readRawConfig(configPath);
  const result = BertConfig.safeParse(raw);
  if (!result.success) {
    const detail = result.error.issues.map(i => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new BertError("INVALID_ARGUMENT", `Invalid config at ${configPath}: ${detail}`);
  }
  return result.data;
}

export async function saveConfig(configPath: string, config: BertConfig): Promise<void> {
  await mkdir(dirname(configPath), { recursive: true });
  await writeFileAtomic(configPath, stringifyYaml(config, { lineWidth: 120 }), "utf-8");
}

/**
 * Get a value from the config using a dot-notation path.
 */
export async function getConfigValue(configPath: string, key: string): Promise<unknown> {
  const config = await loadConfig(configPath);
  return resolveKeyPath(config, key);
}

/**
 * Set a value using a dot-notation path.
 * Validates the entire config after modification and only writes when valid.
 */
export async function setConfigValue(
  configPath: string,
  key: string,
  value: string,
  dryRun: boolean = false,
): Promise<{ change: ConfigChange; issues: ConfigIssue[]; config?: BertConfig }> {
  // The file as written, over the defaults; unknown keys stay and fail validation
  const onDisk = await readRawConfig(configPath);
  const raw: Record<string, unknown> = { ...BertConfig.parse({}), ...(isRecord(onDisk) ? onDisk : {}) };
  const oldValue = resolveKeyPath(raw, key);
  const parsedValue = parseValue(value);

  setKeyPath(raw, key, parsedValue);

  const change: ConfigChange = { key, oldValue, newValue: parsedValue };
  const parseResult = BertConfig.strict().safeParse(raw);
  if (!parseResult.success) {
    return {
      change,
      issues: parseResult.error.issues.map(i => ({
        path: i.path.join(".") || key,
        message: i.message,
      })),
    };
  }

  if (!dryRun) {
    await saveConfig(configPath, parseResult.data);
  }

  return { change, issues: [], config: parseResult.data };
}

/**
 * Validate the config file on disk.
 */
export async function validateConfig(configPath: string): Promise<{ valid: boolean; issues: ConfigIssue[] }> {
  const raw = await readRawConfig(configPath);
  const result = BertConfig.strict().safeParse(raw);
  if (result.success) return { valid: true, issues: [] };
  return {
    valid: false,
    issues: result.error.issues.map(i => ({ path: i.path.join("."), message: i.message })),
  };
}

// --- Helpers ---

async function readRawConfig(configPath: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(configPath, "utf-8");
  } catch (error) {
    if (isNotFound(error)) return {};
    throw new BertError("INVALID_ARGUMENT", `Cannot read config at ${configPath}: ${errorMessage(error)}`);
  }

  try {
    return parseYaml(content) ?? {};
  } catch (error) {
    throw new BertError("INVALID_ARGUMENT", `Config at ${configPath} is not valid YAML: ${errorMessage(error)}`);
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function resolveKeyPath(obj: Record<string, unknown>, path: string): unknown {
  let current: unknown = obj;
  for (const part of path.split(".")) {
    if (!isRecord(current)) return undefined;
    current = current[part];
  }
  return current;
}

function setKeyPath(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split(".");
  const lastKey = parts.pop();
  if (!lastKey) return;

  let current = obj;
  for (const part of parts) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  current[lastKey] = value;
}

/** Parse a string value into the appropriate type. */
function parseValue(value: string): unknown {
  if (value === "true") return true;
  if (value === "false") return false;
  if (value === "null") return null;
  if (/^\d+$/.test(value)) return parseInt(value, 10);
  if (/^\d+\.\d+$/.test(value)) return parseFloat(value);
  // Remove surrounding quotes
  if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
    return value.slice(1, -1);
  }
  return value;
}
