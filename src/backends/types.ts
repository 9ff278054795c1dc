import type {
  BackendKind,
  InstalledPackage,
  PackageInfo,
  PackageSpec,
  SearchResult,
} from "../schemas/package.js";

/**
 * One external package manager.
 *
 * Command handlers only ever talk to this interface; which implementation they
 * get is decided by the BackendRegistry, never by flags inside a handler.
 */
export interface PackageBackend {
  readonly kind: BackendKind;
  readonly displayName: string;

  /** The manager's binary can be found. */
  isAvailable(): Promise<boolean>;
  /** Install the manager itself when missing (may prompt). Throws BACKEND_UNAVAILABLE otherwise. */
  ensureAvailable(): Promise<void>;

  install(spec: PackageSpec): Promise<void>;
  uninstall(spec: PackageSpec): Promise<void>;
  /** Upgrade the named packages, or everything when the list is empty. */
  update(names: readonly string[]): Promise<void>;

  search(query: string, opts?: { cask?: boolean }): Promise<SearchResult[]>;
  listInstalled(): Promise<InstalledPackage[]>;
  isInstalled(name: string, isCask?: boolean): Promise<boolean>;
  info(name: string, isCask?: boolean): Promise<PackageInfo | null>;

  /** Package that ships a binary called `command`, or null. */
  findProvider(command: string): Promise<PackageSpec | null>;
}

/** Backends that carry extra repository sources (Homebrew taps). */
export interface TapSource {
  listTaps(): Promise<string[]>;
  addTap(tap: string): Promise<void>;
}

export function hasTaps(backend: PackageBackend): backend is PackageBackend & TapSource {
  return "listTaps" in backend && "addTap" in backend;
}
