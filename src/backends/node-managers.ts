import { BertError } from "../errors.js";
import { NodePackageManagerName } from "../schemas/config.js";

/** Global-install argument vectors for one Node package manager. */
export interface NodeManagerCommands {
  name: NodePackageManagerName;
  command: string;
  install: readonly string[];
  uninstall: readonly string[];
  update: readonly string[];
  list: readonly string[];
  /** Whether `list` prints JSON (`dependencies` map) rather than text lines. */
  listIsJson: boolean;
}

const MANAGERS: Record<NodePackageManagerName, NodeManagerCommands> = {
  npm: {
    name: "npm",
    command: "npm",
    install: ["install", "-g"],
    uninstall: ["uninstall", "-g"],
    update: ["update", "-g"],
    list: ["list", "-g", "--depth=0", "--json"],
    listIsJson: true,
  },
  yarn: {
    name: "yarn",
    command: "yarn",
    install: ["global", "add"],
    uninstall: ["global", "remove"],
    update: ["global", "upgrade"],
    list: ["global", "list"],
    listIsJson: false,
  },
  pnpm: {
    name: "pnpm",
    command: "pnpm",
    install: ["add", "-g"],
    uninstall: ["remove", "-g"],
    update: ["update", "-g"],
    list: ["list", "-g", "--json"],
    listIsJson: true,
  },
  bun: {
    name: "bun",
    command: "bun",
    install: ["install", "-g"],
    uninstall: ["remove", "-g"],
    update: ["update", "-g"],
    list: ["pm", "ls", "-g"],
    listIsJson: false,
  },
};

export function nodeManager(name: NodePackageManagerName): NodeManagerCommands {
  return MANAGERS[name];
}

export function parseNodeManagerName(value: string): NodePackageManagerName {
  const parsed = NodePackageManagerName.safeParse(value.trim().toLowerCase());
  if (!parsed.success) {
    throw new BertError(
      "INVALID_ARGUMENT",
      `Invalid package manager: ${value}. Valid options are: ${NodePackageManagerName.options.join(", ")}`,
    );
  }
  return parsed.data;
}
