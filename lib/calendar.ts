// lib/calendar.ts
// Read-only Google Calendar access: the upcoming window of events.

import { readFile } from 'node:fs/promises';
import { OAuth2Client } from 'google-auth-library';
import { google, type calendar_v3 } from 'googleapis';
import { z } from 'zod';
import { CredentialError, TransportError, getErrorMessage } from './errors';

export type CalendarEvent = {
  id: string;
  summary?: string | null;
  description?: string | null;
  /** null for all-day events (date only, no dateTime) */
  start: Date | null;
  htmlLink?: string | null;
};

export interface CalendarSource {
  /** Events starting in [now, now + windowMs), soonest first. */
  fetchUpcoming(windowMs: number): Promise<CalendarEvent[]>;
}

// Accepts both token.json shapes: { token, expiry, ... } and
// { type: 'authorized_user', ... }.
const authorizedUser = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  refresh_token: z.string().min(1),
  token: z.string().nullish(),
  access_token: z.string().nullish(),
  expiry: z.string().nullish(),
  expiry_date: z.number().nullish(),
});

export async function loadAuthorizedUser(tokenFile: string): Promise<OAuth2Client> {
  let raw: string;
  try {
    raw = await readFile(tokenFile, 'utf8');
  } catch (e) {
    throw new CredentialError(
      `Google Calendar credentials not found at ${tokenFile}. Complete the OAuth flow to generate it.`,
      { cause: e }
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    throw new CredentialError(`${tokenFile} is not valid JSON`, { cause: e });
  }

  const parsed = authorizedUser.safeParse(json);
  if (!parsed.success) {
    const missing = parsed.error.issues.map((i) => i.path.join('.')).join(', ');
    throw new CredentialError(`${tokenFile} is missing ${missing}`);
  }
  const t = parsed.data;

  const expiryMs = t.expiry_date ?? (t.expiry ? Date.parse(t.expiry) : NaN);
  const client = new OAuth2Client(t.client_id, t.client_secret);
  client.setCredentials({
    refresh_token: t.refresh_token,
    access_token: t.access_token ?? t.token ?? undefined,
    expiry_date: Number.isFinite(expiryMs) ? expiryMs : undefined,
  });
  return client;
}

function httpStatusOf(e: unknown): number | null {
  if (!e || typeof e !== 'object') return null;
  if ('response' in e && e.response && typeof e.response === 'object' && 'status' in e.response) {
    const s = e.response.status;
    if (typeof s === 'number') return s;
  }
  if ('code' in e) {
    if (typeof e.code === 'number') return e.code;
    if (typeof e.code === 'string' && /^\d{3}$/.test(e.code)) return Number(e.code);
  }
  return null;
}

/** Google client failures → CredentialError (401/403/invalid_grant) or TransportError. */
export function classifyGoogleError(e: unknown): CredentialError | TransportError {
  if (e instanceof CredentialError || e instanceof TransportError) return e;
  const msg = getErrorMessage(e);
  const status = httpStatusOf(e);
  if (status === 401 || status === 403 || /invalid_grant|invalid_client|unauthorized_client/i.test(msg)) {
    return new CredentialError(`Google Calendar rejected the credentials: ${msg}`, { cause: e });
  }
  return new TransportError(`Google Calendar request failed: ${msg}`, { cause: e });
}

export function toCalendarEvent(item: calendar_v3.Schema$Event): CalendarEvent | null {
  if (!item.id) return null;
  const dt = item.start?.dateTime;
  const parsed = dt ? new Date(dt) : null;
  return {
    id: item.id,
    summary: item.summary ?? null,
    description: item.description ?? null,
    start: parsed && !Number.isNaN(parsed.getTime()) ? parsed : null,
    htmlLink: item.htmlLink ?? null,
  };
}

export type GoogleCalendarOptions = {
  tokenFile: string;
  calendarId?: string;
  now?: () => Date;
};

export class GoogleCalendarSource implements CalendarSource {
  constructor(private readonly opts: GoogleCalendarOptions) {}

  async fetchUpcoming(windowMs: number): Promise<CalendarEvent[]> {
    // token file is re-read on every fetch
    const auth = await loadAuthorizedUser(this.opts.tokenFile);
    const calendar = google.calendar({ version: 'v3', auth });

    const now = this.opts.now?.() ?? new Date();
    const timeMin = now.toISOString();
    const timeMax = new Date(now.getTime() + windowMs).toISOString();

    const out: CalendarEvent[] = [];
    let pageToken: string | undefined;
    try {
      do {
        const res = await calendar.events.list({
          calendarId: this.opts.calendarId ?? 'primary',
          timeMin,
          timeMax,
          singleEvents: true,
          orderBy: 'startTime',
          maxResults: 250,
          pageToken,
        });
        for (const item of res.data.items ?? []) {
          const ev = toCalendarEvent(item);
          if (ev) out.push(ev);
        }
        pageToken = res.data.nextPageToken ?? undefined;
      } while (pageToken);
    } catch (e) {
      throw classifyGoogleError(e);
    }
    return out;
  }
}
