// lib/activity.ts
// Bounded in-memory feed of what the scheduler did, pushed to the listing page over socket.io.

import { randomUUID } from 'node:crypto';

export type ActivityName =
  | 'calendar.checked'
  | 'calendar.failed'
  | 'call.scheduled'
  | 'call.skipped'
  | 'call.placed'
  | 'call.failed'
  | 'webhook.answered'
  | 'webhook.rejected';

export type ActivitySource = 'poll' | 'manual' | 'job' | 'webhook';

export type Activity = {
  id: string;
  name: ActivityName;
  ts: string;              // ISO timestamp
  source: ActivitySource;
  eventId?: string;
  message: string;
  meta?: Record<string, string | number | boolean | null>;
};

type Emitter = { emit: (ch: string, payload: Activity) => void };

export class ActivityLog {
  private readonly items: Activity[] = [];
  private emitter: Emitter | null = null;

  constructor(private readonly max = 500) {}

  /** Attach socket.io (or anything with `emit`) once the server exists. */
  attach(emitter: Emitter) {
    this.emitter = emitter;
  }

  record(
    name: ActivityName,
    source: ActivitySource,
    message: string,
    extra: { eventId?: string; meta?: Activity['meta'] } = {}
  ): Activity {
    const row: Activity = {
      id: randomUUID(),
      name,
      ts: new Date().toISOString(),
      source,
      message,
      ...extra,
    };
    this.items.push(row);
    if (this.items.length > this.max) {
      this.items.splice(0, this.items.length - this.max);
    }
    try {
      this.emitter?.emit('activity', row);
    } catch (e) {
      console.warn('[activity] broadcast failed:', e);
    }
    return row;
  }

  /** Newest first. */
  list(filters: { name?: ActivityName; eventId?: string; limit?: number } = {}): Activity[] {
    const { name, eventId, limit = 50 } = filters;
    let out = this.items;
    if (name) out = out.filter((a) => a.name === name);
    if (eventId) out = out.filter((a) => a.eventId === eventId);
    return out.slice(-limit).reverse();
  }
}
