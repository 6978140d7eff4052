// lib/views.ts
// Server-rendered listing page.

import type { Activity } from './activity';
import type { CalendarEvent } from './calendar';
import { extractPhoneNumber } from './phone';
import type { ScheduledEntry } from './repos/scheduled';
import type { PendingJob } from './scheduler';

export type Flash = { level: 'ok' | 'error'; text: string };

export type IndexView = {
  events: CalendarEvent[];
  calendarError: string | null;
  flash: Flash | null;
  scheduled: ScheduledEntry[];
  pending: PendingJob[];
  activity: Activity[];
  lookaheadMinutes: number;
};

export function escapeHtml(s: string) {
  return s
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

const fmt = (iso: string | Date) => new Date(iso).toISOString().replace('T', ' ').slice(0, 16) + ' UTC';

function eventRow(ev: CalendarEvent, scheduled: Map<string, ScheduledEntry>) {
  const phone = extractPhoneNumber(ev.description);
  const entry = scheduled.get(ev.id);
  const title = escapeHtml(ev.summary || 'No Title');
  const status = entry?.jobId
    ? `call at ${fmt(entry.runAt)}`
    : !phone
      ? 'no dial-in number'
      : !ev.start
        ? 'all-day, not called'
        : 'not scheduled';
  return `<tr>
      <td>${ev.start ? fmt(ev.start) : 'all day'}</td>
      <td>${ev.htmlLink ? `<a href="${escapeHtml(ev.htmlLink)}">${title}</a>` : title}</td>
      <td>${phone ? escapeHtml(phone) : ''}</td>
      <td>${status}</td>
    </tr>`;
}

export function renderIndex(v: IndexView) {
  const byId = new Map(v.scheduled.map((s) => [s.eventId, s]));

  const banner = v.flash
    ? `<p class="flash ${v.flash.level}">${escapeHtml(v.flash.text)}</p>`
    : '';
  const calErr = v.calendarError
    ? `<p class="flash error">${escapeHtml(v.calendarError)}</p>`
    : '';

  const events = v.events.length
    ? `<table>
    <tr><th>Start</th><th>Event</th><th>Dial-in</th><th>Status</th></tr>
    ${v.events.map((ev) => eventRow(ev, byId)).join('\n')}
  </table>`
    : '<p>No upcoming events.</p>';

  const pending = v.pending.length
    ? `<ul>${v.pending.map((p) => `<li>${fmt(p.runAt)} ${escapeHtml(p.label)}</li>`).join('')}</ul>`
    : '<p>No calls waiting.</p>';

  const activity = v.activity.length
    ? `<ul>${v.activity.map((a) => `<li>${fmt(a.ts)} ${escapeHtml(a.message)}</li>`).join('')}</ul>`
    : '<p>Nothing yet.</p>';

  return `<!doctype html>
<html>
<head>
  <meta charset="utf-8">
  <title>Dial-in caller</title>
  <style>
    body { font-family: system-ui, sans-serif; margin: 2rem; }
    table { border-collapse: collapse; }
    td, th { padding: .3rem .8rem; border-bottom: 1px solid #ddd; text-align: left; }
    .flash { padding: .5rem 1rem; }
    .flash.ok { background: #e6f7e6; }
    .flash.error { background: #fde8e8; }
  </style>
</head>
<body>
  <h1>Upcoming events (next ${v.lookaheadMinutes} min)</h1>
  ${banner}
  ${calErr}
  <p><a href="/force-check">Check calendar now</a></p>
  ${events}
  <h2>Scheduled calls</h2>
  ${pending}
  <h2>Recent activity</h2>
  ${activity}
  <script src="/socket.io/socket.io.js"></script>
  <script>io().on('activity', function () { location.replace('/'); });</script>
</body>
</html>`;
}
