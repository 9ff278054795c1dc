/**
 * Process execution seam.
 *
 * All backends go through a CommandRunner so that handlers can be driven by an
 * in-process fake in tests. The Node implementation wraps child_process.
 */

import { spawn } from "node:child_process";
import { access, constants as fsConstants } from "node:fs/promises";
import { constants as osConstants } from "node:os";
import { delimiter, isAbsolute, join } from "node:path";
import type { PlatformInfo } from "../platform/platform.js";

export interface CapturedResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface CommandRunner {
  /** Run with inherited stdio. Resolves to the child's exit code. */
  run(command: string, args: readonly string[]): Promise<number>;
  /** Run with piped stdio and collect the output. */
  capture(command: string, args: readonly string[]): Promise<CapturedResult>;
  /** Resolve a command name against PATH. Returns the absolute path or null. */
  which(command: string): Promise<string | null>;
}

const FORWARDED_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

/** Map a child's close status to a shell-style exit code. */
export function toExitCode(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) return code;
  if (signal) return 128 + (osConstants.signals[signal] ?? 0);
  return 1;
}

export class NodeCommandRunner implements CommandRunner {
  private readonly env: NodeJS.ProcessEnv;
  private readonly platform: PlatformInfo;

  constructor(opts: { env?: NodeJS.ProcessEnv; platform: PlatformInfo }) {
    this.env = opts.env ?? process.env;
    this.platform = opts.platform;
  }

  run(command: string, args: readonly string[]): Promise<number> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, args, { stdio: "inherit", env: this.env });

      // While the child runs, interrupts belong to it; we exit with its status.
      const forward = (signal: NodeJS.Signals) => {
        child.kill(signal);
      };
      for (const signal of FORWARDED_SIGNALS) process.on(signal, forward);
      const detach = () => {
        for (const signal of FORWARDED_SIGNALS) process.off(signal, forward);
      };

      child.once("error", (error) => {
        detach();
        reject(error);
      });
      child.once("close", (code, signal) => {
        detach();
        resolve(toExitCode(code, signal));
      });
    });
  }

  capture(command: string, args: readonly string[]): Promise<CapturedResult> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"], env: this.env });
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];

      child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));
      child.once("error", reject);
      child.once("close", (code, signal) => {
        resolve({
          exitCode: toExitCode(code, signal),
          stdout: Buffer.concat(stdout).toString("utf-8"),
          stderr: Buffer.concat(stderr).toString("utf-8"),
        });
      });
    });
  }

  async which(command: string): Promise<string | null> {
    const candidates = this.platform.os === "win32" ? windowsCandidates(command, this.env) : [command];

    if (isAbsolute(command) || command.includes("/")) {
      for (const candidate of candidates) {
        if (await isExecutable(candidate)) return candidate;
      }
      return null;
    }

    const dirs = (this.env["PATH"] ?? this.env["Path"] ?? "").split(delimiter).filter(Boolean);
    for (const dir of dirs) {
      for (const candidate of candidates) {
        const full = join(dir, candidate);
        if (await isExecutable(full)) return full;
      }
    }
    return null;
  }
}

function windowsCandidates(command: string, env: NodeJS.ProcessEnv): string[] {
  if (/\.[a-z0-9]+$/i.test(command)) return [command];
  const exts = (env["PATHEXT"] ?? ".EXE;.CMD;.BAT").split(";").filter(Boolean);
  return [command, ...exts.map(ext => `${command}${ext.toLowerCase()}`)];
}

async function isExecutable(path: string): Promise<boolean> {
  try {
    await access(path, fsConstants.X_OK);
    return true;
  } catch {
    return false;
  }
}
