/**
 * Scheduler Module - Types
 */

/**
 * Time source of the scheduler. Tests inject a virtual clock.
 */
export type Clock = Readonly<{
  /** Milliseconds on a monotonic-enough timeline */
  now(): number;
  /** Resolve after `ms`, or early once `signal` aborts */
  sleep(ms: number, signal: AbortSignal): Promise<void>;
}>;

export type ScheduleOptions = Readonly<{
  intervalMs: number;
  signal: AbortSignal;
  clock?: Clock;
}>;

/**
 * Why a periodic run ended without an error.
 */
export type StopReason = "aborted";

/**
 * Outcome of one planning step after a tick.
 */
export type RunPlan = Readonly<{
  /** How long to wait before the next tick; 0 means start now */
  sleepMs: number;
  /** Scheduled start of the tick after the next one */
  nextRun: number;
  /** Milliseconds the tick ran past its slot; 0 when on time */
  overrunMs: number;
}>;
