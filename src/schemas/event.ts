import { z } from "zod";

/** Every event type the toolkit writes to its audit log. */
export const EventType = z.enum([
  "scaffold.started",
  "scaffold.conflict",
  "scaffold.completed",
  "sanitize.completed",
  "launchers.written",
  "launchers.relocated",
  "profiles.relocated",
  "profiles.launchers.written",
  "placeholders.written",
  "listing.written",
  "descriptions.written",
  "transcode.started",
  "transcode.completed",
  "transcode.failed",
  "transcode.batch.completed",
]);
export type EventType = z.infer<typeof EventType>;

/**
 * Audit event — one JSON line in events/YYYY-MM-DD.jsonl.
 */
export const CabinetEvent = z.object({
  /** Monotonic per logger instance. */
  eventId: z.number().int().nonnegative(),
  type: EventType,
  /** ISO-8601 timestamp. */
  timestamp: z.string().datetime(),
  /** Which command or component emitted the event. */
  actor: z.string(),
  payload: z.record(z.string(), z.unknown()).default({}),
});
export type CabinetEvent = z.infer<typeof CabinetEvent>;
