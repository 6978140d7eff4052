// lib/twilio.ts
// Outbound call creation against the Twilio REST API.
import axios from 'axios';
import { z } from 'zod';
import { CredentialError, DispatchFailure, TransportError, getErrorMessage } from './errors';

export type CreateCallArgs = {
  to: string;
  from: string;
  /** Where Twilio fetches TwiML once the callee answers. */
  url: string;
};

export type CreatedCall = { sid: string; status: string | null };

/** Anything that can place a call; the dispatcher only depends on this. */
export interface VoiceClient {
  createCall(args: CreateCallArgs): Promise<CreatedCall>;
}

export type TwilioOptions = {
  accountSid: string;
  authToken: string;
  apiBase?: string;
  timeoutMs?: number;
};

const callResource = z.object({
  sid: z.string().min(1),
  status: z.string().nullish(),
});

const twilioError = z.object({
  code: z.number().nullish(),
  message: z.string().nullish(),
});

export class TwilioClient implements VoiceClient {
  private readonly base: string;

  constructor(private readonly opts: TwilioOptions) {
    this.base = (opts.apiBase ?? 'https://api.twilio.com').replace(/\/+$/, '');
  }

  async createCall({ to, from, url }: CreateCallArgs): Promise<CreatedCall> {
    const sid = this.opts.accountSid.trim();
    const token = this.opts.authToken.trim();
    if (!sid || !token) {
      throw new CredentialError('Twilio creds missing (TWILIO_ACCOUNT_SID / TWILIO_AUTH_TOKEN)');
    }

    const endpoint = `${this.base}/2010-04-01/Accounts/${encodeURIComponent(sid)}/Calls.json`;

    const body = new URLSearchParams();
    body.set('To', to);
    body.set('From', from);
    body.set('Url', url);

    const authHeader = 'Basic ' + Buffer.from(`${sid}:${token}`).toString('base64');

    const resp = await axios
      .post<unknown>(endpoint, body.toString(), {
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          Authorization: authHeader,
        },
        timeout: this.opts.timeoutMs ?? 15000,
        validateStatus: () => true,
      })
      .catch((e: unknown) => {
        throw new TransportError(`Twilio request failed: ${getErrorMessage(e)}`, { cause: e });
      });

    if (resp.status >= 200 && resp.status < 300) {
      const call = callResource.safeParse(resp.data);
      if (!call.success) throw new TransportError(`Twilio returned ${resp.status} without a call sid`);
      return { sid: call.data.sid, status: call.data.status ?? null };
    }

    const parsed = twilioError.safeParse(resp.data);
    const detail = parsed.success
      ? [parsed.data.code, parsed.data.message].filter((x) => x != null).join(' ')
      : '';
    const msg = `Twilio call failed: ${resp.status}${detail ? ` (${detail})` : ''}`;

    if (resp.status === 401 || resp.status === 403) throw new CredentialError(msg);
    if (resp.status >= 500) throw new TransportError(msg);
    throw new DispatchFailure(msg, resp.status);
  }
}
