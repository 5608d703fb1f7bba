/**
 * Logging
 *
 * A single pino root logger writing to stderr. stdout is reserved for the
 * MCP stdio transport, so nothing in this project may log there.
 */

import pino, { type Logger } from 'pino';

export type { Logger };

export const rootLogger: Logger = pino(
  {
    name: 'gdb-live-bridge',
    level: process.env.LOG_LEVEL ?? 'info',
    serializers: {
      err: pino.stdSerializers.err
    }
  },
  pino.destination(2)
);

/**
 * Create a logger bound to a component and, optionally, a session
 */
export function createLogger(component: string, bindings: Record<string, unknown> = {}): Logger {
  return rootLogger.child({ component, ...bindings });
}

export function setLogLevel(level: string): void {
  rootLogger.level = level;
}
