// lib/repos/scheduled.ts
// In-memory record of which calendar events already have a call job.
// Lives for the process lifetime; nothing is persisted across restarts.

import { createHash } from 'node:crypto';
import type { DedupPolicy } from '../config';

export type ScheduledEntry = {
  eventId: string;
  fingerprint: string;
  jobId: string | null;
  runAt: string;          // ISO
  meetingPhone: string;
  eventName: string;
  scheduledAt: string;    // ISO
};

/** Stable hash of the event fields that decide when and where we call. */
export function eventFingerprint(ev: { description?: string | null; start?: Date | null }) {
  const start = ev.start ? ev.start.toISOString() : '';
  return createHash('sha256')
    .update(`${start}\n${ev.description ?? ''}`)
    .digest('hex')
    .slice(0, 16);
}

export class EventRegistry {
  private readonly entries = new Map<string, ScheduledEntry>(); // eventId -> entry

  constructor(readonly policy: DedupPolicy = 'id') {}

  /**
   * Under the `id` policy any marked id counts as scheduled. Under `content`
   * the stored fingerprint must also match, so an edited event is picked up again.
   */
  isScheduled(eventId: string, fingerprint?: string): boolean {
    const row = this.entries.get(eventId);
    if (!row) return false;
    if (this.policy === 'id' || fingerprint == null) return true;
    return row.fingerprint === fingerprint;
  }

  /**
   * Idempotent. Re-marking an id keeps the first entry, except under the
   * `content` policy where a different fingerprint replaces it.
   * Returns the entry that was replaced, if any.
   */
  markScheduled(eventId: string, entry?: Omit<ScheduledEntry, 'eventId' | 'scheduledAt'>) {
    const prev = this.entries.get(eventId) ?? null;
    if (prev && (this.policy === 'id' || !entry || prev.fingerprint === entry.fingerprint)) {
      return null;
    }
    const row: ScheduledEntry = {
      fingerprint: '',
      jobId: null,
      runAt: '',
      meetingPhone: '',
      eventName: '',
      ...entry,
      eventId,
      scheduledAt: new Date().toISOString(),
    };
    this.entries.set(eventId, row);
    return prev;
  }

  get(eventId: string) {
    return this.entries.get(eventId) ?? null;
  }

  /** Soonest call first. */
  list() {
    return Array.from(this.entries.values()).sort((a, b) => a.runAt.localeCompare(b.runAt));
  }

  get size() {
    return this.entries.size;
  }
}
