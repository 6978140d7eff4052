import express from 'express';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { listen } from './__mocks__/services';
import { CredentialError, DispatchFailure, TransportError } from './errors';
import { TwilioClient } from './twilio';

// stand-in for api.twilio.com: behaviour picked by the `To` number
type Seen = { path: string; auth: string | undefined; body: Record<string, string> };
const seen: Seen[] = [];

const fakeTwilio = express();
fakeTwilio.post('/2010-04-01/Accounts/:sid/Calls.json', express.urlencoded({ extended: false }), (req, res) => {
  const body: Record<string, string> = {};
  for (const [k, v] of Object.entries(req.body ?? {})) body[k] = String(v);
  seen.push({ path: req.path, auth: req.header('authorization'), body });

  switch (body.To) {
    case 'bad-number':
      return res.status(400).json({ code: 21211, message: "The 'To' number bad-number is not a valid phone number." });
    case 'rate-limited':
      return res.status(429).json({ code: 20429, message: 'Too Many Requests' });
    case 'server-error':
      return res.status(503).send('unavailable');
    case 'no-sid':
      return res.status(201).json({ status: 'queued' });
    default:
      if (req.params.sid !== 'ACtest') return res.status(401).json({ code: 20003, message: 'Authenticate' });
      return res.status(201).json({ sid: 'CA0001', status: 'queued' });
  }
});

let srv: Awaited<ReturnType<typeof listen>>;

beforeAll(async () => {
  srv = await listen(fakeTwilio);
});

afterAll(async () => {
  await srv.close();
});

const client = (accountSid = 'ACtest', authToken = 'test-token') =>
  new TwilioClient({ accountSid, authToken, apiBase: srv.base });

const call = { from: '+15550000000', url: 'https://calls.example.test/twilio-webhook?meeting_phone=555-123-4567' };

describe('TwilioClient.createCall', () => {
  it('posts a form-encoded call request with basic auth', async () => {
    const created = await client().createCall({ to: '+15551111111', ...call });

    expect(created).toEqual({ sid: 'CA0001', status: 'queued' });
    const last = seen[seen.length - 1];
    expect(last.path).toBe('/2010-04-01/Accounts/ACtest/Calls.json');
    expect(last.auth).toBe('Basic ' + Buffer.from('ACtest:test-token').toString('base64'));
    expect(last.body).toEqual({ To: '+15551111111', From: '+15550000000', Url: call.url });
  });

  it('fails with CredentialError before calling out when creds are missing', async () => {
    const before = seen.length;
    await expect(client('', '').createCall({ to: '+15551111111', ...call })).rejects.toBeInstanceOf(CredentialError);
    expect(seen.length).toBe(before);
  });

  it('maps a 401 to CredentialError', async () => {
    await expect(client('ACwrong').createCall({ to: '+15551111111', ...call })).rejects.toThrow(
      new CredentialError('Twilio call failed: 401 (20003 Authenticate)')
    );
  });

  it('maps rejected numbers and rate limits to DispatchFailure', async () => {
    const bad = await client().createCall({ to: 'bad-number', ...call }).catch((e: unknown) => e);
    expect(bad).toBeInstanceOf(DispatchFailure);
    expect(bad instanceof DispatchFailure && bad.status).toBe(400);

    await expect(client().createCall({ to: 'rate-limited', ...call })).rejects.toThrow(
      'Twilio call failed: 429 (20429 Too Many Requests)'
    );
  });

  it('maps 5xx and malformed success bodies to TransportError', async () => {
    await expect(client().createCall({ to: 'server-error', ...call })).rejects.toBeInstanceOf(TransportError);
    await expect(client().createCall({ to: 'no-sid', ...call })).rejects.toThrow('Twilio returned 201 without a call sid');
  });

  it('maps connection failures to TransportError', async () => {
    const offline = new TwilioClient({ accountSid: 'ACtest', authToken: 'test-token', apiBase: 'http://127.0.0.1:9' });
    await expect(offline.createCall({ to: '+15551111111', ...call })).rejects.toBeInstanceOf(TransportError);
  });
});
