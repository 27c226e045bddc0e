/**
 * Event logger: append-only JSONL event log.
 *
 * One file per UTC day: <eventsDir>/<YYYY-MM-DD>.jsonl, one event per line.
 * Writes from one logger are serialized so lines keep their eventId order.
 */

import { appendFile, mkdir } from "node:fs/promises";
import { join } from "node:path";

export type ContextEventType =
  | "context.encoded"
  | "context.blob.written"
  | "context.share.registered"
  | "context.share.reused"
  | "context.share.cleared"
  | "context.decoded"
  | "context.load.failed"
  | "context.main.multiple";

export interface ContextEvent {
  eventId: number;
  type: ContextEventType;
  timestamp: string;
  actor: string;
  payload: Record<string, unknown>;
}

export type EventCallback = (event: ContextEvent) => void;

export interface EventLoggerOptions {
  /** Invoked after each event is written. */
  onEvent?: EventCallback;
  /** Clock override for tests. */
  now?: () => Date;
}

export class EventLogger {
  private readonly eventsDir: string;
  private readonly onEvent?: EventCallback;
  private readonly now: () => Date;
  private nextEventId = 1;
  private pending: Promise<void> = Promise.resolve();
  private ensuredDir = false;

  /** Epoch ms of the most recent event, 0 before the first. */
  lastEventAt = 0;

  constructor(eventsDir: string, options: EventLoggerOptions = {}) {
    this.eventsDir = eventsDir;
    this.onEvent = options.onEvent;
    this.now = options.now ?? (() => new Date());
  }

  async log(
    type: ContextEventType,
    actor: string,
    payload: Record<string, unknown> = {},
  ): Promise<ContextEvent> {
    const at = this.now();
    const event: ContextEvent = {
      eventId: this.nextEventId++,
      type,
      timestamp: at.toISOString(),
      actor,
      payload,
    };

    const write = this.pending.then(() => this.append(event));
    // Keep the chain alive after a failed write; the failure still reaches this caller.
    this.pending = write.catch(() => undefined);
    await write;

    this.lastEventAt = at.getTime();
    this.onEvent?.(event);
    return event;
  }

  /** Path of the file receiving events for the given day. */
  filePathFor(date: Date): string {
    return join(this.eventsDir, `${date.toISOString().slice(0, 10)}.jsonl`);
  }

  private async append(event: ContextEvent): Promise<void> {
    if (!this.ensuredDir) {
      await mkdir(this.eventsDir, { recursive: true });
      this.ensuredDir = true;
    }
    await appendFile(this.filePathFor(new Date(event.timestamp)), JSON.stringify(event) + "\n", "utf-8");
  }
}
