/**
 * Event logger — append-only JSONL audit trail.
 *
 * Events are written to date-rotated files (YYYY-MM-DD.jsonl) inside the
 * events directory, one JSON object per line.
 */

import { appendFile, mkdir } from "node:fs/promises";
import { join } from "node:path";
import type { CabinetEvent, EventType } from "../schemas/event.js";

export type EventCallback = (event: CabinetEvent) => void | Promise<void>;

export interface EventLoggerOptions {
  /** Called after every event is persisted. */
  onEvent?: EventCallback;
}

export class EventLogger {
  private eventCounter = 0;
  private readonly writeFailures: string[] = [];

  constructor(
    private readonly eventsDir: string,
    private readonly options: EventLoggerOptions = {},
  ) {}

  /** Directory the log files are written to. */
  get directory(): string {
    return this.eventsDir;
  }

  async log(
    type: EventType,
    actor: string,
    opts: { payload?: Record<string, unknown> } = {},
  ): Promise<CabinetEvent> {
    const event: CabinetEvent = {
      eventId: this.eventCounter++,
      type,
      timestamp: new Date().toISOString(),
      actor,
      payload: opts.payload ?? {},
    };

    await mkdir(this.eventsDir, { recursive: true });
    const file = join(this.eventsDir, `${event.timestamp.slice(0, 10)}.jsonl`);
    await appendFile(file, JSON.stringify(event) + "\n", "utf-8");

    if (this.options.onEvent) {
      await this.options.onEvent(event);
    }

    return event;
  }

  /**
   * Like log(), but a failed write is recorded in `failures` instead of
   * thrown. Used by operations whose result must not depend on the audit trail.
   */
  async tryLog(
    type: EventType,
    actor: string,
    opts: { payload?: Record<string, unknown> } = {},
  ): Promise<CabinetEvent | undefined> {
    try {
      return await this.log(type, actor, opts);
    } catch (error) {
      this.writeFailures.push(`${type}: ${(error as Error).message}`);
      return undefined;
    }
  }

  /** Events that could not be written, as `<type>: <error message>`. */
  get failures(): readonly string[] {
    return this.writeFailures;
  }
}
