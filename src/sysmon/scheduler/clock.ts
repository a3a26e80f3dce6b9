/**
 * Scheduler clock. Injected so tests can run warm-up and dwell waits in
 * virtual time.
 */

import { setTimeout as delay } from 'node:timers/promises';

/** Longest single timer Node accepts; larger delays fire after 1 ms */
export const MAX_SLEEP_MS = 2_147_483_647;

export interface SchedulerClock {
  /** Milliseconds since an arbitrary epoch */
  now(): number;
  /** Waits `ms`; resolves early, without error, when `signal` aborts */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: SchedulerClock = {
  now: () => Date.now(),
  async sleep(ms, signal) {
    if (signal?.aborted) {
      return;
    }
    try {
      await delay(ms, undefined, { signal });
    } catch (error) {
      if (signal?.aborted) {
        return;
      }
      throw error;
    }
  },
};
