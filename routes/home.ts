// routes/home.ts
// Listing page, manual calendar check, and a couple of JSON status endpoints.
import express from 'express';
import type { ActivityLog } from '../lib/activity';
import type { CalendarEvent, CalendarSource } from '../lib/calendar';
import { getErrorMessage } from '../lib/errors';
import type { SchedulingPipeline } from '../lib/pipeline';
import type { EventRegistry } from '../lib/repos/scheduled';
import type { CallJobScheduler } from '../lib/scheduler';
import { renderIndex, type Flash } from '../lib/views';

export type HomeDeps = {
  calendar: CalendarSource;
  pipeline: Pick<SchedulingPipeline, 'checkCalendar'>;
  registry: EventRegistry;
  scheduler: Pick<CallJobScheduler, 'pending' | 'size'>;
  activity: ActivityLog;
  lookaheadMs: number;
};

// flash messages ride on the redirect's query string; there is no session
function readFlash(req: express.Request): Flash | null {
  const text = typeof req.query.flash === 'string' ? req.query.flash.trim() : '';
  if (!text) return null;
  return { level: req.query.level === 'error' ? 'error' : 'ok', text };
}

function flashUrl(flash: Flash) {
  const qs = new URLSearchParams({ flash: flash.text, level: flash.level });
  return `/?${qs.toString()}`;
}

export function makeHomeRouter(deps: HomeDeps) {
  const router = express.Router();

  router.get('/', async (req, res) => {
    let events: CalendarEvent[] = [];
    let calendarError: string | null = null;
    try {
      events = await deps.calendar.fetchUpcoming(deps.lookaheadMs);
    } catch (e) {
      calendarError = getErrorMessage(e);
      console.warn('[home] calendar unavailable:', calendarError);
    }

    res.type('html').send(
      renderIndex({
        events,
        calendarError,
        flash: readFlash(req),
        scheduled: deps.registry.list(),
        pending: deps.scheduler.pending(),
        activity: deps.activity.list({ limit: 20 }),
        lookaheadMinutes: Math.round(deps.lookaheadMs / 60_000),
      })
    );
  });

  router.get('/force-check', async (_req, res) => {
    try {
      const r = await deps.pipeline.checkCalendar('manual');
      const text =
        r.scheduled > 0
          ? `Calendar checked successfully! Scheduled ${r.scheduled} new call${r.scheduled === 1 ? '' : 's'}.`
          : 'Calendar checked successfully!';
      res.redirect(flashUrl({ level: 'ok', text }));
    } catch (e) {
      console.error('[home] force check failed:', getErrorMessage(e));
      res.redirect(flashUrl({ level: 'error', text: `Error checking calendar: ${getErrorMessage(e)}` }));
    }
  });

  router.get('/health', (_req, res) => {
    res.json({ ok: true, scheduled: deps.registry.size, pending: deps.scheduler.size });
  });

  router.get('/api/scheduled', (_req, res) => {
    res.json({ ok: true, items: deps.registry.list(), pending: deps.scheduler.pending() });
  });

  router.get('/api/activity', (req, res) => {
    const limit = Math.max(1, Math.min(Math.trunc(Number(req.query.limit)) || 50, 500));
    res.json({ ok: true, items: deps.activity.list({ limit }) });
  });

  return router;
}
export default makeHomeRouter;
