// lib/poller.ts
// The periodic calendar check. A failed cycle is logged; the timer keeps going.

import { getErrorMessage } from './errors';
import type { SchedulingPipeline } from './pipeline';

export type Poller = {
  /** Run one cycle now (no-op while a previous cycle is still in flight). */
  tick: () => Promise<void>;
  stop: () => void;
};

export function startPolling(
  pipeline: Pick<SchedulingPipeline, 'checkCalendar'>,
  intervalMs: number,
  opts: { runImmediately?: boolean } = {}
): Poller {
  let running = false;

  const tick = async () => {
    if (running) {
      console.log('[poller] previous check still running, skipping this tick');
      return;
    }
    running = true;
    try {
      await pipeline.checkCalendar('poll');
    } catch (e) {
      console.error('[poller] Error checking calendar events:', getErrorMessage(e));
    } finally {
      running = false;
    }
  };

  const timer = setInterval(() => {
    void tick();
  }, intervalMs);

  if (opts.runImmediately) void tick();
  console.log(`[poller] checking calendar every ${Math.round(intervalMs / 60_000)} min`);

  return {
    tick,
    stop: () => clearInterval(timer),
  };
}
