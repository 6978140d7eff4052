// lib/pipeline.ts
// Per-event scheduling decision, and the calendar check that feeds it.

import type { ActivityLog, ActivitySource } from './activity';
import type { CalendarEvent, CalendarSource } from './calendar';
import type { CallDispatcher } from './dispatcher';
import { getErrorMessage } from './errors';
import { extractPhoneNumber } from './phone';
import { EventRegistry, eventFingerprint } from './repos/scheduled';
import type { JobSubmitter } from './scheduler';
import { DEFAULT_EVENT_NAME } from './twiml';

/** Leg 1 rings this long before the meeting starts. */
export const CALL_LEAD_MS = 60_000;

export type ScheduledCallJob = {
  eventId: string;
  runAt: Date;
  meetingPhone: string;
  eventName: string;
};

export type SkipReason = 'already_scheduled' | 'no_phone' | 'all_day' | 'past';

export type ScheduleDecision =
  | { status: 'scheduled'; eventId: string; job: ScheduledCallJob; jobId: string; replacedJobId: string | null }
  | { status: 'skipped'; eventId: string; reason: SkipReason; cancelledJobId?: string | null }
  | { status: 'failed'; eventId: string; error: string };

export type CheckResult = {
  source: ActivitySource;
  fetched: number;
  scheduled: number;
  skipped: number;
  failed: number;
  decisions: ScheduleDecision[];
};

export type PipelineDeps = {
  calendar: CalendarSource;
  registry: EventRegistry;
  scheduler: JobSubmitter;
  dispatcher: Pick<CallDispatcher, 'placeCall'>;
  lookaheadMs: number;
  activity?: ActivityLog;
  now?: () => Date;
};

export function computeCallTime(start: Date) {
  return new Date(start.getTime() - CALL_LEAD_MS);
}

export class SchedulingPipeline {
  private readonly now: () => Date;

  constructor(private readonly deps: PipelineDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * dedup → phone → start time → call time → past guard → submit → mark.
   * Synchronous: there is no await between the registry check and the mark.
   */
  process(event: CalendarEvent, source: ActivitySource = 'poll'): ScheduleDecision {
    const { registry, scheduler, dispatcher, activity } = this.deps;
    const fingerprint = eventFingerprint(event);
    if (registry.isScheduled(event.id, fingerprint)) {
      console.log(`[pipeline] skip ${event.id} "${event.summary ?? ''}" (already_scheduled)`);
      return { status: 'skipped', eventId: event.id, reason: 'already_scheduled' };
    }

    // content policy only: an entry with a stale fingerprint
    const stale = registry.get(event.id);
    const meetingPhone = extractPhoneNumber(event.description);

    const skip = (reason: SkipReason): ScheduleDecision => {
      console.log(`[pipeline] skip ${event.id} "${event.summary ?? ''}" (${reason})`);
      if (!stale) return { status: 'skipped', eventId: event.id, reason };
      const cancelledJobId = this.retire(event, fingerprint, stale.jobId, meetingPhone, source);
      return { status: 'skipped', eventId: event.id, reason, cancelledJobId };
    };

    if (!meetingPhone) return skip('no_phone');

    if (!event.start) return skip('all_day');

    const runAt = computeCallTime(event.start);
    if (runAt.getTime() <= this.now().getTime()) {
      activity?.record('call.skipped', source, `Too late to call for "${event.summary || DEFAULT_EVENT_NAME}"`, {
        eventId: event.id,
        meta: { runAt: runAt.toISOString(), meetingPhone },
      });
      return skip('past');
    }

    const job: ScheduledCallJob = {
      eventId: event.id,
      runAt,
      meetingPhone,
      eventName: event.summary || DEFAULT_EVENT_NAME,
    };

    let jobId: string;
    try {
      jobId = scheduler.submit(
        runAt,
        (j: ScheduledCallJob) => dispatcher.placeCall(j.meetingPhone, j.eventName, j.eventId),
        job,
        job.eventName
      );
    } catch (e) {
      const error = getErrorMessage(e);
      console.error(`[pipeline] could not schedule ${event.id}:`, error);
      return { status: 'failed', eventId: event.id, error };
    }

    const replaced = registry.markScheduled(event.id, {
      fingerprint,
      jobId,
      runAt: runAt.toISOString(),
      meetingPhone,
      eventName: job.eventName,
    });
    // content policy: the edited event supersedes its old call
    const replacedJobId = replaced?.jobId ?? null;
    if (replacedJobId) scheduler.cancel(replacedJobId);

    console.log(
      `[pipeline] scheduled call for "${job.eventName}" at ${runAt.toISOString()} (meeting phone ${meetingPhone})`
    );
    activity?.record('call.scheduled', source, `Call for "${job.eventName}" at ${runAt.toISOString()}`, {
      eventId: event.id,
      meta: { runAt: runAt.toISOString(), meetingPhone, jobId, replacedJobId },
    });

    return { status: 'scheduled', eventId: event.id, job, jobId, replacedJobId };
  }

  /**
   * The event was edited into something that cannot be called. Its old job
   * is cancelled and the entry takes the new fingerprint with no job, so the
   * same content is not reconsidered on the next poll.
   */
  private retire(
    event: CalendarEvent,
    fingerprint: string,
    jobId: string | null,
    meetingPhone: string | null,
    source: ActivitySource
  ): string | null {
    const { registry, scheduler, activity } = this.deps;
    const eventName = event.summary || DEFAULT_EVENT_NAME;
    if (jobId) scheduler.cancel(jobId);
    registry.markScheduled(event.id, {
      fingerprint,
      jobId: null,
      runAt: '',
      meetingPhone: meetingPhone ?? '',
      eventName,
    });
    if (jobId) {
      console.log(`[pipeline] cancelled ${jobId} for edited event ${event.id}`);
      activity?.record('call.skipped', source, `Cancelled call for "${eventName}" after an edit`, {
        eventId: event.id,
        meta: { cancelledJobId: jobId },
      });
    }
    return jobId;
  }

  /**
   * One poll cycle. Fetch failures are recorded and rethrown for the caller
   * (poll loop or force-check route) to report.
   */
  async checkCalendar(source: ActivitySource = 'poll'): Promise<CheckResult> {
    const { calendar, lookaheadMs, activity } = this.deps;
    console.log(`[${this.now().toISOString()}] Checking calendar for upcoming events... (${source})`);

    let events: CalendarEvent[];
    try {
      events = await calendar.fetchUpcoming(lookaheadMs);
    } catch (e) {
      activity?.record('calendar.failed', source, `Calendar check failed: ${getErrorMessage(e)}`);
      throw e;
    }

    const decisions = events.map((ev) => this.process(ev, source));
    const count = (s: ScheduleDecision['status']) => decisions.filter((d) => d.status === s).length;
    const result: CheckResult = {
      source,
      fetched: events.length,
      scheduled: count('scheduled'),
      skipped: count('skipped'),
      failed: count('failed'),
      decisions,
    };

    console.log(
      `[pipeline] check done: ${result.fetched} events, ${result.scheduled} scheduled, ${result.skipped} skipped, ${result.failed} failed`
    );
    activity?.record(
      'calendar.checked',
      source,
      `Checked ${result.fetched} events, scheduled ${result.scheduled}`,
      { meta: { fetched: result.fetched, scheduled: result.scheduled, failed: result.failed } }
    );
    return result;
  }
}
