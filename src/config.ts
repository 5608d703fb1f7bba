/**
 * Configuration
 *
 * Reads the bridge settings from environment variables. Every value has a
 * default; anything present but malformed aborts startup.
 */

import { z } from 'zod';

const intFromEnv = (fallback: number, min = 0) =>
  z.coerce.number().int().min(min).default(fallback);

const configSchema = z.object({
  HOST: z.string().min(1).default('127.0.0.1'),
  PORT: z.coerce.number().int().min(0).max(65535).default(5000),
  GDB_PATH: z.string().min(1).default('gdb'),
  GDB_ARGS: z.string().default('-q -nx'),
  COMMAND_TIMEOUT_MS: intFromEnv(5000, 1),
  STARTUP_TIMEOUT_MS: intFromEnv(10000, 1),
  QUEUE_DEPTH: intFromEnv(32, 1),
  QUEUE_MODE: z.enum(['queue', 'reject']).default('queue'),
  MAX_CONSECUTIVE_TIMEOUTS: intFromEnv(2, 1),
  ENRICH_TIMEOUT_MS: intFromEnv(5000, 1),
  ANALYSIS_TIMEOUT_MS: intFromEnv(3000, 1),
  GRACE_PERIOD_MS: intFromEnv(5000),
  KILL_TIMEOUT_MS: intFromEnv(2000, 1),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info')
});

export type QueueMode = 'queue' | 'reject';

export interface DebuggerConfig {
  /** Path to the gdb executable */
  path: string;
  /** Extra arguments passed after --interpreter=mi */
  args: string[];
  commandTimeoutMs: number;
  startupTimeoutMs: number;
  killTimeoutMs: number;
  queueDepth: number;
  queueMode: QueueMode;
}

export interface BridgeConfig {
  host: string;
  port: number;
  debugger: DebuggerConfig;
  maxConsecutiveTimeouts: number;
  enrichTimeoutMs: number;
  analysisTimeoutMs: number;
  gracePeriodMs: number;
  logLevel: string;
}

/**
 * Parse configuration from an environment map (defaults to process.env)
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): BridgeConfig {
  const result = configSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const values = result.data;
  return {
    host: values.HOST,
    port: values.PORT,
    debugger: {
      path: values.GDB_PATH,
      args: values.GDB_ARGS.split(/\s+/).filter((arg) => arg.length > 0),
      commandTimeoutMs: values.COMMAND_TIMEOUT_MS,
      startupTimeoutMs: values.STARTUP_TIMEOUT_MS,
      killTimeoutMs: values.KILL_TIMEOUT_MS,
      queueDepth: values.QUEUE_DEPTH,
      queueMode: values.QUEUE_MODE
    },
    maxConsecutiveTimeouts: values.MAX_CONSECUTIVE_TIMEOUTS,
    enrichTimeoutMs: values.ENRICH_TIMEOUT_MS,
    analysisTimeoutMs: values.ANALYSIS_TIMEOUT_MS,
    gracePeriodMs: values.GRACE_PERIOD_MS,
    logLevel: values.LOG_LEVEL
  };
}
