// lib/scheduler.ts
// One-shot, time-addressed jobs on top of node-schedule.
// Jobs fire independently of the calendar poll that created them.

import { randomUUID } from 'node:crypto';
import { scheduleJob, type Job } from 'node-schedule';
import { getErrorMessage } from './errors';

export type JobHandler<P> = (payload: P) => unknown;

export type PendingJob = {
  id: string;
  runAt: string;   // ISO
  label: string;
};

/** What the pipeline needs from a scheduler; tests substitute their own. */
export interface JobSubmitter {
  submit<P>(runAt: Date, handler: JobHandler<P>, payload: P, label?: string): string;
  cancel(jobId: string): boolean;
}

export class CallJobScheduler implements JobSubmitter {
  private readonly jobs = new Map<string, { job: Job; runAt: Date; label: string }>();

  /**
   * Registers `handler(payload)` to run once at or after `runAt`.
   * Throws when `runAt` is invalid or not in the future; nothing is registered then.
   */
  submit<P>(runAt: Date, handler: JobHandler<P>, payload: P, label = ''): string {
    const at = runAt.getTime();
    if (Number.isNaN(at)) throw new Error('invalid run time');
    if (at <= Date.now()) throw new Error(`run time ${runAt.toISOString()} is not in the future`);

    const id = `call_${randomUUID()}`;
    const job = scheduleJob(id, runAt, () => this.fire(id, handler, payload));
    if (!job) throw new Error(`node-schedule refused job for ${runAt.toISOString()}`);

    this.jobs.set(id, { job, runAt, label });
    console.log(`[scheduler] job ${id} set for ${runAt.toISOString()}${label ? ` (${label})` : ''}`);
    return id;
  }

  cancel(jobId: string): boolean {
    const row = this.jobs.get(jobId);
    if (!row) return false;
    row.job.cancel();
    this.jobs.delete(jobId);
    console.log(`[scheduler] job ${jobId} cancelled`);
    return true;
  }

  pending(): PendingJob[] {
    return Array.from(this.jobs.entries())
      .map(([id, r]) => ({ id, runAt: r.runAt.toISOString(), label: r.label }))
      .sort((a, b) => a.runAt.localeCompare(b.runAt));
  }

  get size() {
    return this.jobs.size;
  }

  shutdown() {
    for (const id of Array.from(this.jobs.keys())) this.cancel(id);
  }

  // a failing handler is logged and never reaches node-schedule or other jobs
  private async fire<P>(id: string, handler: JobHandler<P>, payload: P): Promise<void> {
    this.jobs.delete(id);
    try {
      await handler(payload);
    } catch (e) {
      console.error(`[scheduler] job ${id} failed:`, getErrorMessage(e));
    }
  }
}
