/**
 * Scheduler Module - Pure Transformations
 */
import type { RunPlan } from "./schema.js";

/**
 * Plan the wait after a tick that finished at `now`.
 *
 * On time: sleep until `nextRun` and move the slot one interval on, so
 * tick starts stay at `start + k * interval` whatever the action took.
 * Late: start the next tick immediately and re-anchor the grid at `now`.
 *
 * @example
 * planNextRun(2000, 100, 2000)  // { sleepMs: 1900, nextRun: 4000, overrunMs: 0 }
 * planNextRun(2000, 3000, 2000) // { sleepMs: 0, nextRun: 5000, overrunMs: 1000 }
 */
export function planNextRun(
  nextRun: number,
  now: number,
  intervalMs: number,
): RunPlan {
  const sleepFor = nextRun - now;

  if (sleepFor >= 0) {
    return { sleepMs: sleepFor, nextRun: nextRun + intervalMs, overrunMs: 0 };
  }

  return { sleepMs: 0, nextRun: now + intervalMs, overrunMs: -sleepFor };
}
