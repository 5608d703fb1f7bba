#!/usr/bin/env node

/**
 * GDB Live Bridge Entry Point
 *
 * Starts the WebSocket gateway, or the MCP stdio server with `--mcp`.
 */

import { loadConfig } from './config.js';
import { rootLogger, setLogLevel } from './logger.js';
import { SessionManager } from './session/session-manager.js';
import { BacktraceAnalyzer } from './analysis/crash-analyzer.js';
import { GatewayServer } from './gateway/server.js';
import { startServer } from './server.js';

// Catch any uncaught errors before they silently kill the process
process.on('uncaughtException', (error) => {
  rootLogger.fatal({ err: error }, 'uncaught exception');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  rootLogger.fatal({ err: reason }, 'unhandled rejection');
  process.exit(1);
});

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const analyzer = new BacktraceAnalyzer();
  const manager = new SessionManager({
    debugger: config.debugger,
    maxConsecutiveTimeouts: config.maxConsecutiveTimeouts,
    enrichTimeoutMs: config.enrichTimeoutMs,
    analysisTimeoutMs: config.analysisTimeoutMs,
    analyzer
  });

  let gateway: GatewayServer | null = null;
  if (process.argv.includes('--mcp')) {
    await startServer(manager, analyzer);
    rootLogger.info('MCP server running on stdio');
  } else {
    gateway = new GatewayServer(manager, {
      host: config.host,
      port: config.port,
      gracePeriodMs: config.gracePeriodMs
    });
    await gateway.start();
  }

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    rootLogger.info({ signal }, 'shutting down');
    try {
      await gateway?.stop();
      await manager.shutdown();
      process.exit(0);
    } catch (error) {
      rootLogger.error({ err: error }, 'shutdown failed');
      process.exit(1);
    }
  };

  process.on('SIGINT', (signal) => {
    void shutdown(signal);
  });
  process.on('SIGTERM', (signal) => {
    void shutdown(signal);
  });
}

main().catch((error: unknown) => {
  rootLogger.fatal({ err: error }, 'failed to start');
  process.exit(1);
});
