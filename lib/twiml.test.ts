import { describe, expect, it } from 'vitest';
import { buildCallbackUrl, escapeXml, renderBridgeTwiml, signCallback, verifyCallback } from './twiml';

describe('renderBridgeTwiml', () => {
  it('announces the event then dials the meeting number', () => {
    expect(renderBridgeTwiml({ meetingPhone: '555-123-4567', eventName: 'Standup', callerId: '+15551111111' }))
      .toBe(`<?xml version="1.0" encoding="UTF-8"?>
<Response>
    <Say voice="alice">Hello, you have an upcoming event: Standup. Please wait while we connect you.</Say>
    <Pause length="3"/>
    <Dial callerId="+15551111111" timeout="20">555-123-4567</Dial>
</Response>`);
  });

  it('falls back to the placeholder name and an empty dial target', () => {
    const xml = renderBridgeTwiml({ meetingPhone: null, eventName: null, callerId: '+15551111111' });
    expect(xml).toContain('you have an upcoming event: Upcoming Event.');
    expect(xml).toContain('<Dial callerId="+15551111111" timeout="20"></Dial>');
  });

  it('escapes markup in the event name', () => {
    const xml = renderBridgeTwiml({ meetingPhone: '555-123-4567', eventName: 'R&D <sync>', callerId: '' });
    expect(xml).toContain('upcoming event: R&amp;D &lt;sync&gt;.');
  });
});

describe('escapeXml', () => {
  it('escapes all five predefined entities', () => {
    expect(escapeXml(`<a href="x">'&'</a>`)).toBe('&lt;a href=&quot;x&quot;&gt;&apos;&amp;&apos;&lt;/a&gt;');
  });
});

describe('buildCallbackUrl', () => {
  it('puts the phone and url-escaped name on the webhook path', () => {
    expect(buildCallbackUrl('https://calls.example.test/', { meetingPhone: '555-123-4567', eventName: 'Team Sync & Plan' }))
      .toBe('https://calls.example.test/twilio-webhook?meeting_phone=555-123-4567&event_name=Team+Sync+%26+Plan');
  });

  it('round-trips through URLSearchParams', () => {
    const url = new URL(buildCallbackUrl('http://localhost:5000', { meetingPhone: '+1 (415) 555-0132', eventName: 'Q3 review' }));
    expect(url.searchParams.get('meeting_phone')).toBe('+1 (415) 555-0132');
    expect(url.searchParams.get('event_name')).toBe('Q3 review');
    expect(url.searchParams.has('sig')).toBe(false);
  });

  it('adds a verifiable signature when a secret is given', () => {
    const ctx = { meetingPhone: '555-123-4567', eventName: 'Standup' };
    const url = new URL(buildCallbackUrl('http://localhost:5000', ctx, 'test-secret'));
    const sig = url.searchParams.get('sig') ?? '';
    expect(sig).toBe(signCallback(ctx, 'test-secret'));
    expect(verifyCallback(ctx, sig, 'test-secret')).toBe(true);
    expect(verifyCallback({ ...ctx, meetingPhone: '555-000-0000' }, sig, 'test-secret')).toBe(false);
    expect(verifyCallback(ctx, sig, 'other-secret')).toBe(false);
    expect(verifyCallback(ctx, 'not-hex', 'test-secret')).toBe(false);
  });
});
