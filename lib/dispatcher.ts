// lib/dispatcher.ts
// Leg 1: ring the owner and point Twilio at the bridge webhook.

import type { ActivityLog } from './activity';
import { AppError, getErrorMessage } from './errors';
import { buildCallbackUrl } from './twiml';
import type { VoiceClient } from './twilio';

export type CallOutcome =
  | { ok: true; sid: string; callbackUrl: string }
  | { ok: false; error: string; kind: string };

export type DispatcherOptions = {
  voice: VoiceClient;
  ownerNumber: string;
  fromNumber: string;
  appUrl: string;
  signingSecret?: string | null;
  activity?: ActivityLog;
};

export class CallDispatcher {
  constructor(private readonly opts: DispatcherOptions) {}

  /**
   * Never throws: a failed call is logged and recorded, and the job is done.
   * There is no retry.
   */
  async placeCall(meetingPhone: string, eventName: string, eventId?: string): Promise<CallOutcome> {
    const { voice, ownerNumber, fromNumber, appUrl, signingSecret, activity } = this.opts;
    const callbackUrl = buildCallbackUrl(appUrl, { meetingPhone, eventName }, signingSecret);

    try {
      const call = await voice.createCall({ to: ownerNumber, from: fromNumber, url: callbackUrl });
      console.log(`[dispatch] call ${call.sid} placed for "${eventName}" (meeting phone ${meetingPhone})`);
      activity?.record('call.placed', 'job', `Calling you for "${eventName}"`, {
        eventId,
        meta: { sid: call.sid, meetingPhone },
      });
      return { ok: true, sid: call.sid, callbackUrl };
    } catch (e) {
      const kind = e instanceof AppError ? e.kind : 'unknown';
      const error = getErrorMessage(e);
      console.error(`[dispatch] call for "${eventName}" failed (${kind}):`, error);
      activity?.record('call.failed', 'job', `Call for "${eventName}" failed: ${error}`, {
        eventId,
        meta: { kind, meetingPhone },
      });
      return { ok: false, error, kind };
    }
  }
}
