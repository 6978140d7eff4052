// lib/twiml.ts
// Callback URL contract between the dispatcher and /twilio-webhook,
// plus the TwiML documents the webhook answers with.

import { createHmac, timingSafeEqual } from 'node:crypto';

export const DEFAULT_EVENT_NAME = 'Upcoming Event';
export const DIAL_TIMEOUT_SEC = 20;
export const CONNECT_PAUSE_SEC = 3;

export type CallWebhookContext = {
  meetingPhone: string;
  eventName: string;
};

export function escapeXml(s: string) {
  return s
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

// ---------- signing ----------
export function signCallback(ctx: CallWebhookContext, secret: string) {
  return createHmac('sha256', secret)
    .update(`${ctx.meetingPhone}\n${ctx.eventName}`)
    .digest('hex');
}

export function verifyCallback(ctx: CallWebhookContext, sig: string, secret: string) {
  const expected = signCallback(ctx, secret);
  if (!/^[0-9a-f]{64}$/i.test(sig)) return false;
  return timingSafeEqual(Buffer.from(expected, 'hex'), Buffer.from(sig, 'hex'));
}

/**
 * `${appUrl}/twilio-webhook?meeting_phone=…&event_name=…[&sig=…]`
 * The query string is the only state the webhook sees.
 */
export function buildCallbackUrl(appUrl: string, ctx: CallWebhookContext, secret?: string | null) {
  const qs = new URLSearchParams();
  qs.set('meeting_phone', ctx.meetingPhone);
  qs.set('event_name', ctx.eventName);
  if (secret) qs.set('sig', signCallback(ctx, secret));
  return `${appUrl.replace(/\/+$/, '')}/twilio-webhook?${qs.toString()}`;
}

// ---------- TwiML ----------
export function renderBridgeTwiml(opts: {
  meetingPhone?: string | null;
  eventName?: string | null;
  callerId: string;
}) {
  const name = escapeXml(opts.eventName || DEFAULT_EVENT_NAME);
  const target = escapeXml(opts.meetingPhone ?? '');
  const callerId = escapeXml(opts.callerId);
  return `<?xml version="1.0" encoding="UTF-8"?>
<Response>
    <Say voice="alice">Hello, you have an upcoming event: ${name}. Please wait while we connect you.</Say>
    <Pause length="${CONNECT_PAUSE_SEC}"/>
    <Dial callerId="${callerId}" timeout="${DIAL_TIMEOUT_SEC}">${target}</Dial>
</Response>`;
}

export function renderHangupTwiml() {
  return `<?xml version="1.0" encoding="UTF-8"?>
<Response>
    <Hangup/>
</Response>`;
}
