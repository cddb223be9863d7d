export type Logger = Pick<Console, "info" | "warn" | "error">;

export type Clock = () => number;

export type SchedulerConfig = {
  tickIntervalMs: number;
  // Launching longer than this counts as a crash
  launchTimeoutMs: number;
  maxAttempts: number;
  retryBackoffMs: number;
  maxRetryBackoffMs: number;
  // Consecutive placement misses before a warning is raised
  infeasibleWarnAfterTicks: number;
  heartbeatTimeoutMs: number;
};

export const DEFAULT_SCHEDULER_CONFIG: SchedulerConfig = {
  tickIntervalMs: 5000,
  launchTimeoutMs: 120000,
  maxAttempts: 3,
  retryBackoffMs: 1000,
  maxRetryBackoffMs: 60000,
  infeasibleWarnAfterTicks: 5,
  heartbeatTimeoutMs: 30000,
};
