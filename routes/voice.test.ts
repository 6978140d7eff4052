import axios from 'axios';
import express from 'express';
import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';
import { listen } from '../lib/__mocks__/services';
import { ActivityLog } from '../lib/activity';
import { buildCallbackUrl } from '../lib/twiml';
import { makeVoiceRouter } from './voice';

const activity = new ActivityLog();

function appWith(signingSecret: string | null) {
  const app = express();
  app.use(makeVoiceRouter({ ownerNumber: '+15551111111', signingSecret, activity }));
  return app;
}

const http = axios.create({ validateStatus: () => true, responseType: 'text' });

let open: Awaited<ReturnType<typeof listen>>;
let signed: Awaited<ReturnType<typeof listen>>;

beforeAll(async () => {
  open = await listen(appWith(null));
  signed = await listen(appWith('test-secret'));
});

afterAll(async () => {
  await open.close();
  await signed.close();
});

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
});

describe('GET|POST /twilio-webhook', () => {
  it('answers with bridge TwiML for the query parameters', async () => {
    const res = await http.get(`${open.base}/twilio-webhook?meeting_phone=555-123-4567&event_name=Standup`);
    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toMatch(/^text\/xml/);
    expect(res.data).toContain('you have an upcoming event: Standup.');
    expect(res.data).toContain('<Dial callerId="+15551111111" timeout="20">555-123-4567</Dial>');
  });

  it('accepts POST from Twilio with the parameters on the query string', async () => {
    const res = await http.post(
      `${open.base}/twilio-webhook?meeting_phone=555-123-4567&event_name=Standup`,
      'CallSid=CA0001&CallStatus=in-progress',
      { headers: { 'Content-Type': 'application/x-www-form-urlencoded' } }
    );
    expect(res.status).toBe(200);
    expect(res.data).toContain('>555-123-4567</Dial>');
  });

  it('falls back to a form body', async () => {
    const res = await http.post(`${open.base}/twilio-webhook`, 'meeting_phone=212-555-0100&event_name=Retro', {
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
    });
    expect(res.data).toContain('upcoming event: Retro.');
    expect(res.data).toContain('>212-555-0100</Dial>');
  });

  it('uses the placeholder when event_name is missing', async () => {
    const res = await http.get(`${open.base}/twilio-webhook?meeting_phone=555-123-4567`);
    expect(res.status).toBe(200);
    expect(res.data).toContain('you have an upcoming event: Upcoming Event.');
  });

  it('still returns a valid document when meeting_phone is missing', async () => {
    const res = await http.get(`${open.base}/twilio-webhook`);
    expect(res.status).toBe(200);
    expect(res.data).toContain('<Dial callerId="+15551111111" timeout="20"></Dial>');
    expect(res.data.trim().endsWith('</Response>')).toBe(true);
  });

  it('records the answered bridge', async () => {
    await http.get(`${open.base}/twilio-webhook?meeting_phone=555-123-4567&event_name=Standup`);
    expect(activity.list({ name: 'webhook.answered' })[0].meta).toEqual({
      meetingPhone: '555-123-4567',
      eventName: 'Standup',
    });
  });
});

describe('signed callbacks', () => {
  it('accepts a URL built by the dispatcher with the same secret', async () => {
    const url = buildCallbackUrl(signed.base, { meetingPhone: '555-123-4567', eventName: 'Standup' }, 'test-secret');
    const res = await http.get(url);
    expect(res.status).toBe(200);
    expect(res.data).toContain('>555-123-4567</Dial>');
  });

  it('hangs up on a tampered or unsigned request', async () => {
    const url = new URL(
      buildCallbackUrl(signed.base, { meetingPhone: '555-123-4567', eventName: 'Standup' }, 'test-secret')
    );
    url.searchParams.set('meeting_phone', '900-555-0199');

    const tampered = await http.get(url.toString());
    expect(tampered.status).toBe(403);
    expect(tampered.data).toContain('<Hangup/>');

    const unsigned = await http.get(`${signed.base}/twilio-webhook?meeting_phone=555-123-4567`);
    expect(unsigned.status).toBe(403);
    expect(activity.list({ name: 'webhook.rejected' }).length).toBeGreaterThanOrEqual(2);
  });
});
