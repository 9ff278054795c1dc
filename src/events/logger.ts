/**
 * Event logger — append-only JSONL record of what bert did to the machine.
 *
 * One file per day: <eventsDir>/<YYYY-MM-DD>.jsonl
 * Logging never fails a command; the first write error is reported on stderr.
 */

import { appendFile, mkdir } from "node:fs/promises";
import { join } from "node:path";
import { errorMessage } from "../errors.js";
import type { BaseEvent, EventType } from "../schemas/event.js";

export class EventLogger {
  private readonly eventsDir: string;
  private readonly actor: string;
  private eventCounter = 0;
  private warned = false;
  lastEventAt = 0;

  constructor(eventsDir: string, actor = "bert") {
    this.eventsDir = eventsDir;
    this.actor = actor;
  }

  async log(type: EventType, payload: Record<string, unknown> = {}): Promise<BaseEvent> {
    const now = new Date();
    const event: BaseEvent = {
      eventId: this.eventCounter++,
      type,
      timestamp: now.toISOString(),
      actor: this.actor,
      payload,
    };

    const filePath = join(this.eventsDir, `${event.timestamp.slice(0, 10)}.jsonl`);
    try {
      await mkdir(this.eventsDir, { recursive: true });
      await appendFile(filePath, JSON.stringify(event) + "\n", "utf-8");
      this.lastEventAt = now.getTime();
    } catch (error) {
      if (!this.warned) {
        this.warned = true;
        console.error(`⚠️  Could not write event log (${filePath}): ${errorMessage(error)}`);
      }
    }

    return event;
  }

  async logInstall(name: string, backend: string, extra: Record<string, unknown> = {}): Promise<void> {
    await this.log("package.installed", { name, backend, ...extra });
  }

  async logInstallFailure(name: string, backend: string, reason: string): Promise<void> {
    await this.log("package.install_failed", { name, backend, reason });
  }
}
