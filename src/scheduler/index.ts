/**
 * Scheduler Module - Public API
 */

// Types
export type { Clock, RunPlan, ScheduleOptions, StopReason } from "./schema.js";

// Service functions (side effects)
export { runPeriodically, systemClock } from "./service.js";

// Pure transformations
export { planNextRun } from "./transform.js";
