import { z } from "zod";

export const EventType = z.enum([
  "package.installed",
  "package.install_failed",
  "package.uninstalled",
  "command.auto_installed",
  "backup.created",
  "restore.completed",
  "self_update.completed",
]);
export type EventType = z.infer<typeof EventType>;

/** One line of the JSONL event log. */
export const BaseEvent = z.object({
  eventId: z.number().int().nonnegative(),
  type: EventType,
  timestamp: z.string().datetime(),
  actor: z.string(),
  payload: z.record(z.string(), z.unknown()).default({}),
});
export type BaseEvent = z.infer<typeof BaseEvent>;
