// lib/app.ts
// Builds the owned services once and wires them into express + socket.io.
import http from 'node:http';
import express from 'express';
import { Server as SocketIOServer } from 'socket.io';
import { ActivityLog } from './activity';
import { GoogleCalendarSource, type CalendarSource } from './calendar';
import type { AppConfig } from './config';
import { CallDispatcher } from './dispatcher';
import { SchedulingPipeline } from './pipeline';
import { EventRegistry } from './repos/scheduled';
import { CallJobScheduler } from './scheduler';
import { TwilioClient, type VoiceClient } from './twilio';
import { makeHomeRouter } from '../routes/home';
import { makeVoiceRouter } from '../routes/voice';

export type Services = {
  config: AppConfig;
  calendar: CalendarSource;
  voice: VoiceClient;
  registry: EventRegistry;
  scheduler: CallJobScheduler;
  activity: ActivityLog;
  dispatcher: CallDispatcher;
  pipeline: SchedulingPipeline;
};

/** `overrides` lets tests swap the Google and Twilio edges for in-process fakes. */
export function createServices(
  config: AppConfig,
  overrides: { calendar?: CalendarSource; voice?: VoiceClient } = {}
): Services {
  const calendar =
    overrides.calendar ??
    new GoogleCalendarSource({ tokenFile: config.google.tokenFile, calendarId: config.google.calendarId });
  const voice =
    overrides.voice ??
    new TwilioClient({
      accountSid: config.twilio.accountSid,
      authToken: config.twilio.authToken,
      apiBase: config.twilio.apiBase,
    });

  const registry = new EventRegistry(config.dedupPolicy);
  const scheduler = new CallJobScheduler();
  const activity = new ActivityLog(config.activityMax);
  const dispatcher = new CallDispatcher({
    voice,
    ownerNumber: config.ownerNumber,
    fromNumber: config.twilio.fromNumber,
    appUrl: config.appUrl,
    signingSecret: config.signingSecret,
    activity,
  });
  const pipeline = new SchedulingPipeline({
    calendar,
    registry,
    scheduler,
    dispatcher,
    lookaheadMs: config.lookaheadMs,
    activity,
  });

  return { config, calendar, voice, registry, scheduler, activity, dispatcher, pipeline };
}

export function createApp(services: Services) {
  const { config, calendar, pipeline, registry, scheduler, activity } = services;

  const app = express();
  app.disable('x-powered-by');

  app.use(
    makeHomeRouter({ calendar, pipeline, registry, scheduler, activity, lookaheadMs: config.lookaheadMs })
  );
  app.use(
    makeVoiceRouter({ ownerNumber: config.ownerNumber, signingSecret: config.signingSecret, activity })
  );

  const server = http.createServer(app);
  const io = new SocketIOServer(server);
  activity.attach(io);

  io.on('connection', (socket) => {
    socket.emit('hello', { ok: true, scheduled: registry.size, pending: scheduler.size });
  });

  return { app, server, io };
}
