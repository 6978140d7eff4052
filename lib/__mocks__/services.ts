// In-process stand-ins for the Google, Twilio and scheduler edges.
import http from 'node:http';
import type { Express } from 'express';
import type { CalendarEvent, CalendarSource } from '../calendar';
import type { JobHandler, JobSubmitter } from '../scheduler';
import type { CreateCallArgs, CreatedCall, VoiceClient } from '../twilio';

export class FakeCalendar implements CalendarSource {
  calls = 0;
  error: Error | null = null;

  constructor(public events: CalendarEvent[] = []) {}

  async fetchUpcoming(_windowMs: number): Promise<CalendarEvent[]> {
    this.calls++;
    if (this.error) throw this.error;
    return this.events;
  }
}

export class FakeVoice implements VoiceClient {
  calls: CreateCallArgs[] = [];
  error: Error | null = null;

  async createCall(args: CreateCallArgs): Promise<CreatedCall> {
    this.calls.push(args);
    if (this.error) throw this.error;
    return { sid: `CA${String(this.calls.length).padStart(4, '0')}`, status: 'queued' };
  }
}

type Captured = { id: string; runAt: Date; label: string; fire: () => unknown };

/** Records submissions instead of waiting on the clock; `fire` runs a job by hand. */
export class CapturingScheduler implements JobSubmitter {
  jobs: Captured[] = [];
  cancelled: string[] = [];
  failWith: Error | null = null;

  submit<P>(runAt: Date, handler: JobHandler<P>, payload: P, label = ''): string {
    if (this.failWith) throw this.failWith;
    const id = `job_${this.jobs.length + 1}`;
    this.jobs.push({ id, runAt, label, fire: () => handler(payload) });
    return id;
  }

  cancel(jobId: string): boolean {
    this.cancelled.push(jobId);
    return true;
  }
}

export function event(partial: Partial<CalendarEvent> & { id: string }): CalendarEvent {
  return { summary: null, description: null, start: null, htmlLink: null, ...partial };
}

export async function listen(app: Express | http.RequestListener) {
  const server = http.createServer(app);
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const addr = server.address();
  if (!addr || typeof addr === 'string') throw new Error('server has no port');
  return {
    base: `http://127.0.0.1:${addr.port}`,
    close: () => new Promise<void>((resolve) => server.close(() => resolve())),
  };
}
