// routes/voice.ts
// Bridge webhook: Twilio requests this once the owner picks up leg 1.
// Point nothing at it by hand; the dispatcher puts the full URL on each call.
import express from 'express';
import type { ActivityLog } from '../lib/activity';
import { renderBridgeTwiml, renderHangupTwiml, verifyCallback } from '../lib/twiml';

// query string first (that's where the dispatcher puts them), then a form-encoded body
function param(req: express.Request, key: string): string | null {
  const q = req.query[key];
  if (typeof q === 'string') return q;
  const body: unknown = req.body;
  if (body && typeof body === 'object') {
    const v: unknown = Reflect.get(body, key);
    if (typeof v === 'string') return v;
  }
  return null;
}

export function makeVoiceRouter(opts: {
  ownerNumber: string;
  signingSecret?: string | null;
  activity?: ActivityLog;
}) {
  const router = express.Router();

  const bridge: express.RequestHandler = (req, res) => {
    const meetingPhone = param(req, 'meeting_phone');
    const eventName = param(req, 'event_name');

    if (opts.signingSecret) {
      const sig = param(req, 'sig') || '';
      const ok = verifyCallback(
        { meetingPhone: meetingPhone ?? '', eventName: eventName ?? '' },
        sig,
        opts.signingSecret
      );
      if (!ok) {
        console.warn('[voice] rejected webhook with bad signature', { meetingPhone, eventName });
        opts.activity?.record('webhook.rejected', 'webhook', 'Rejected a bridge request with a bad signature');
        // still valid TwiML so Twilio just hangs up
        return res.status(403).type('text/xml').send(renderHangupTwiml());
      }
    }

    if (!meetingPhone) console.warn('[voice] webhook without meeting_phone; dialing nothing');
    console.log(`[voice] bridging to ${meetingPhone ?? '(none)'} for "${eventName ?? ''}"`);
    opts.activity?.record('webhook.answered', 'webhook', `You picked up; dialing ${meetingPhone ?? 'nothing'}`, {
      meta: { meetingPhone, eventName },
    });

    return res
      .type('text/xml')
      .send(renderBridgeTwiml({ meetingPhone, eventName, callerId: opts.ownerNumber }));
  };

  router.get('/twilio-webhook', bridge);
  router.post('/twilio-webhook', express.urlencoded({ extended: false }), bridge);

  return router;
}
export default makeVoiceRouter;
