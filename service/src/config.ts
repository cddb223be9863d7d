import { z } from "zod";
import { SchedulerConfig } from "cluster-scheduler";

const optionalNumber = z.coerce.number().int().positive().optional();

const EnvSchema = z.object({
  PORT: z.coerce.number().int().nonnegative().default(9000),
  SCHEDULER_TICK_INTERVAL_MS: optionalNumber,
  SCHEDULER_LAUNCH_TIMEOUT_MS: optionalNumber,
  SCHEDULER_MAX_ATTEMPTS: optionalNumber,
  SCHEDULER_RETRY_BACKOFF_MS: optionalNumber,
  SCHEDULER_MAX_RETRY_BACKOFF_MS: optionalNumber,
  SCHEDULER_INFEASIBLE_WARN_AFTER_TICKS: optionalNumber,
  SCHEDULER_HEARTBEAT_TIMEOUT_MS: optionalNumber,
  AGENT_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
});

export type ServiceConfig = {
  port: number;
  agentRequestTimeoutMs: number;
  scheduler: Partial<SchedulerConfig>;
};

/**
 * Reads the service settings from the environment. Scheduler settings left
 * unset fall back to the library defaults.
 */
export const loadServiceConfig = (
  env: NodeJS.ProcessEnv = process.env
): ServiceConfig => {
  const parsed = EnvSchema.parse(env);
  const scheduler: Partial<SchedulerConfig> = {
    tickIntervalMs: parsed.SCHEDULER_TICK_INTERVAL_MS,
    launchTimeoutMs: parsed.SCHEDULER_LAUNCH_TIMEOUT_MS,
    maxAttempts: parsed.SCHEDULER_MAX_ATTEMPTS,
    retryBackoffMs: parsed.SCHEDULER_RETRY_BACKOFF_MS,
    maxRetryBackoffMs: parsed.SCHEDULER_MAX_RETRY_BACKOFF_MS,
    infeasibleWarnAfterTicks: parsed.SCHEDULER_INFEASIBLE_WARN_AFTER_TICKS,
    heartbeatTimeoutMs: parsed.SCHEDULER_HEARTBEAT_TIMEOUT_MS,
  };
  return {
    port: parsed.PORT,
    agentRequestTimeoutMs: parsed.AGENT_REQUEST_TIMEOUT_MS,
    scheduler,
  };
};
