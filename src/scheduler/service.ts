/**
 * Scheduler Module - Service Layer
 *
 * Runs an async action on a fixed interval. Ticks never overlap: the next
 * one is planned only after the current one settles.
 */
import { setTimeout as sleep } from "node:timers/promises";

import { createLogger, describeError } from "../logger.js";
import type { Clock, ScheduleOptions, StopReason } from "./schema.js";
import { planNextRun } from "./transform.js";

const log = createLogger("scheduler");

/**
 * Wall clock. A sleep cut short by the signal resolves instead of throwing.
 */
export const systemClock: Clock = {
  now: () => Date.now(),
  async sleep(ms, signal) {
    try {
      await sleep(ms, undefined, { signal });
    } catch (error) {
      if (!signal.aborted) throw error;
    }
  },
};

/**
 * Run `action` every `intervalMs` until `signal` aborts.
 *
 * The first tick starts immediately. A tick that runs past its slot is
 * logged as an overrun and the next tick starts right away.
 *
 * @returns "aborted" once the signal fires; rejects if the action throws
 */
export async function runPeriodically(
  action: () => Promise<void>,
  options: ScheduleOptions,
): Promise<StopReason> {
  const { intervalMs, signal } = options;
  const clock = options.clock ?? systemClock;

  if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
    throw new RangeError(`Interval must be positive, got ${intervalMs}`);
  }

  log.info({ intervalMs }, "Scheduler started");

  let nextRun = clock.now() + intervalMs;
  let ticks = 0;

  while (!signal.aborted) {
    const startedAt = clock.now();
    ticks += 1;

    try {
      await action();
    } catch (error) {
      log.error(
        { tick: ticks, error: describeError(error) },
        "Scheduled action failed",
      );
      throw error;
    }

    if (signal.aborted) break;

    const now = clock.now();
    const plan = planNextRun(nextRun, now, intervalMs);
    nextRun = plan.nextRun;

    if (plan.overrunMs > 0) {
      log.warn(
        {
          tick: ticks,
          elapsedMs: now - startedAt,
          intervalMs,
          overrunMs: plan.overrunMs,
        },
        "Tick overran its interval, starting next tick now",
      );
      continue;
    }

    if (plan.sleepMs > 0) {
      await clock.sleep(plan.sleepMs, signal);
    }
  }

  log.info({ ticks }, "Scheduler stopped");
  return "aborted";
}
