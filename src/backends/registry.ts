/**
 * Backend registry — the single place a BackendKind is turned into a backend.
 *
 * A third backend is one more `register()` call; handlers stay unchanged.
 */

import { BertError } from "../errors.js";
import type { CommandRunner } from "../exec/runner.js";
import type { PlatformInfo } from "../platform/platform.js";
import type { NodePackageManagerName } from "../schemas/config.js";
import type { BackendKind } from "../schemas/package.js";
import { HomebrewBackend } from "./homebrew.js";
import { NodeBackend } from "./node.js";
import type { PackageBackend } from "./types.js";

export class BackendRegistry {
  private readonly backends = new Map<BackendKind, PackageBackend>();

  register(backend: PackageBackend): this {
    this.backends.set(backend.kind, backend);
    return this;
  }

  get(kind: BackendKind): PackageBackend {
    const backend = this.backends.get(kind);
    if (!backend) {
      throw new BertError("BACKEND_UNAVAILABLE", `No backend registered for '${kind}' packages`);
    }
    return backend;
  }

  has(kind: BackendKind): boolean {
    return this.backends.has(kind);
  }

  /** Registered backends in registration order. */
  all(): PackageBackend[] {
    return [...this.backends.values()];
  }
}

/** Map the CLI's `--node` switch to a backend kind. */
export function backendKindFor(opts: { node?: boolean }): BackendKind {
  return opts.node ? "language" : "system";
}

export interface DefaultBackendOptions {
  runner: CommandRunner;
  platform: PlatformInfo;
  nodePackageManager: NodePackageManagerName;
  assumeYes?: boolean;
}

export function createDefaultRegistry(opts: DefaultBackendOptions): BackendRegistry {
  const system = new HomebrewBackend({
    runner: opts.runner,
    platform: opts.platform,
    assumeYes: opts.assumeYes ?? false,
  });
  const language = new NodeBackend({
    runner: opts.runner,
    platform: opts.platform,
    manager: opts.nodePackageManager,
    system,
  });
  return new BackendRegistry().register(system).register(language);
}
