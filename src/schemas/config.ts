/**
 * bert configuration schema.
 *
 * Stored as YAML at ~/.bert/config.yaml. Changes go through `bert config set`
 * or `bert set-manager`, which validate before writing.
 */

import { z } from "zod";

export const NodePackageManagerName = z.enum(["npm", "yarn", "pnpm", "bun"]);
export type NodePackageManagerName = z.infer<typeof NodePackageManagerName>;

export const BertConfig = z.object({
  schemaVersion: z.literal(1).default(1),
  /** Package manager used for `--node` operations. */
  nodePackageManager: NodePackageManagerName.default("npm"),
  /** Where backups are written and looked up. `~` expands to the home directory. */
  backupDir: z.string().min(1).optional(),
  /** GitHub repository (`owner/name`) that publishes release binaries. */
  releaseRepo: z.string().regex(/^[\w.-]+\/[\w.-]+$/).default("michaelessiet/bert-cli"),
});
export type BertConfig = z.infer<typeof BertConfig>;
