// lib/config.ts
// Environment-driven settings. `.env` is loaded by server.ts via dotenv;
// everything here reads from the env object it is given so tests can pass their own.

import { z } from 'zod';

const trimmed = (fallback = '') => z.string().trim().default(fallback);

const minutes = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  TWILIO_ACCOUNT_SID: trimmed(),
  TWILIO_AUTH_TOKEN: trimmed(),
  TWILIO_PHONE_NUMBER: trimmed(),
  MY_PHONE_NUMBER: trimmed(),
  TWILIO_API_BASE: trimmed('https://api.twilio.com'),
  APP_URL: trimmed('http://localhost:5000'),
  GOOGLE_TOKEN_FILE: trimmed('token.json'),
  GOOGLE_CALENDAR_ID: trimmed('primary'),
  POLL_INTERVAL_MINUTES: minutes(5),
  LOOKAHEAD_MINUTES: minutes(60),
  DEDUP_POLICY: z.enum(['id', 'content']).default('id'),
  CALLBACK_SIGNING_SECRET: trimmed(),
  PORT: z.coerce.number().int().min(0).max(65535).default(5000),
  ACTIVITY_MAX: z.coerce.number().int().positive().default(500),
});

export type DedupPolicy = z.infer<typeof envSchema>['DEDUP_POLICY'];

export type AppConfig = {
  twilio: {
    accountSid: string;
    authToken: string;
    fromNumber: string;
    apiBase: string;
  };
  ownerNumber: string;
  appUrl: string;
  google: {
    tokenFile: string;
    calendarId: string;
  };
  pollIntervalMs: number;
  lookaheadMs: number;
  dedupPolicy: DedupPolicy;
  signingSecret: string | null;
  port: number;
  activityMax: number;
};

// empty strings count as "not set" so defaults apply to `FOO=` lines in .env
function dropBlank(env: NodeJS.ProcessEnv) {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(env)) {
    if (v != null && v.trim() !== '') out[k] = v;
  }
  return out;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(dropBlank(env));
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }
  const e = parsed.data;

  if (e.POLL_INTERVAL_MINUTES >= e.LOOKAHEAD_MINUTES) {
    console.warn(
      `[config] LOOKAHEAD_MINUTES (${e.LOOKAHEAD_MINUTES}) should exceed POLL_INTERVAL_MINUTES (${e.POLL_INTERVAL_MINUTES}); events may be seen only once before their call time`
    );
  }

  return {
    twilio: {
      accountSid: e.TWILIO_ACCOUNT_SID,
      authToken: e.TWILIO_AUTH_TOKEN,
      fromNumber: e.TWILIO_PHONE_NUMBER,
      apiBase: e.TWILIO_API_BASE.replace(/\/+$/, ''),
    },
    ownerNumber: e.MY_PHONE_NUMBER,
    appUrl: e.APP_URL.replace(/\/+$/, ''),
    google: {
      tokenFile: e.GOOGLE_TOKEN_FILE,
      calendarId: e.GOOGLE_CALENDAR_ID,
    },
    pollIntervalMs: e.POLL_INTERVAL_MINUTES * 60_000,
    lookaheadMs: e.LOOKAHEAD_MINUTES * 60_000,
    dedupPolicy: e.DEDUP_POLICY,
    signingSecret: e.CALLBACK_SIGNING_SECRET || null,
    port: e.PORT,
    activityMax: e.ACTIVITY_MAX,
  };
}
