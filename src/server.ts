/**
 * MCP Debug Server
 *
 * Exposes the GDB session bridge as MCP tools over stdio. Events that
 * arrive between tool calls are buffered per session and fetched with
 * `get_events`.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type Tool
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { EventSubscription, SessionManager } from './session/session-manager.js';
import type { CrashAnalyzer } from './analysis/types.js';
import { type ErrorPayload, toErrorPayload } from './errors.js';

const sessionIdProperty = {
  type: 'string',
  description: 'Session ID from create_session'
} as const;

/**
 * Tool definitions
 */
const tools: Tool[] = [
  // Session Management
  {
    name: 'create_session',
    description: 'Create a new GDB session. Returns a session ID to use with the other tools.',
    inputSchema: {
      type: 'object',
      properties: {}
    }
  },
  {
    name: 'connect_target',
    description:
      'Start GDB for a session and select a target: "host:port" for a remote stub (e.g. QEMU or gdbserver), anything else is loaded as a local executable.',
    inputSchema: {
      type: 'object',
      properties: {
        sessionId: sessionIdProperty,
        target: {
          type: 'string',
          description: 'host:port of a remote stub, or path to an executable'
        },
        autoRun: {
          type: 'boolean',
          description: 'Run the program right after loading it'
        }
      },
      required: ['sessionId', 'target']
    }
  },
  {
    name: 'disconnect_session',
    description: 'Terminate GDB for a session. The session cannot be reconnected afterwards.',
    inputSchema: {
      type: 'object',
      properties: { sessionId: sessionIdProperty },
      required: ['sessionId']
    }
  },
  {
    name: 'destroy_session',
    description: 'Disconnect a session if needed and forget it, including any events not yet read.',
    inputSchema: {
      type: 'object',
      properties: { sessionId: sessionIdProperty },
      required: ['sessionId']
    }
  },
  {
    name: 'list_sessions',
    description: 'List all debug sessions and their state',
    inputSchema: {
      type: 'object',
      properties: {}
    }
  },

  // Commands
  {
    name: 'run_command',
    description: 'Run a GDB command. Console commands (default) return their printed output.',
    inputSchema: {
      type: 'object',
      properties: {
        sessionId: sessionIdProperty,
        command: {
          type: 'string',
          description: 'Command text, e.g. "info frame" or "-data-evaluate-expression x"'
        },
        mode: {
          type: 'string',
          enum: ['cli', 'mi'],
          description: 'cli for console commands, mi for raw machine-interface commands'
        },
        timeoutMs: {
          type: 'number',
          description: 'Override the command timeout'
        }
      },
      required: ['sessionId', 'command']
    }
  },
  {
    name: 'control',
    description: 'Control execution: run, continue, step over/into/out, or interrupt',
    inputSchema: {
      type: 'object',
      properties: {
        sessionId: sessionIdProperty,
        action: {
          type: 'string',
          enum: ['run', 'continue', 'step_over', 'step_into', 'step_out', 'interrupt']
        }
      },
      required: ['sessionId', 'action']
    }
  },

  // Inspection
  {
    name: 'get_backtrace',
    description: 'Get the call stack of the stopped program',
    inputSchema: {
      type: 'object',
      properties: { sessionId: sessionIdProperty },
      required: ['sessionId']
    }
  },
  {
    name: 'get_registers',
    description: 'Get all registers of the stopped program, as hex',
    inputSchema: {
      type: 'object',
      properties: { sessionId: sessionIdProperty },
      required: ['sessionId']
    }
  },
  {
    name: 'set_breakpoint',
    description: 'Set a breakpoint at a function name, file:line, or *address',
    inputSchema: {
      type: 'object',
      properties: {
        sessionId: sessionIdProperty,
        location: {
          type: 'string',
          description: 'e.g. "panic", "kernel.c:42" or "*0x80100000"'
        }
      },
      required: ['sessionId', 'location']
    }
  },
  {
    name: 'read_memory',
    description: 'Read raw memory as hex bytes',
    inputSchema: {
      type: 'object',
      properties: {
        sessionId: sessionIdProperty,
        address: {
          type: 'string',
          description: 'Start address or expression, e.g. "0x1000" or "&buf"'
        },
        size: {
          type: 'number',
          description: 'Number of bytes (default 64)'
        }
      },
      required: ['sessionId', 'address']
    }
  },
  {
    name: 'get_events',
    description:
      'Fetch events (stops, crashes with analysis, breakpoint hits, exits, console output) received since the last call',
    inputSchema: {
      type: 'object',
      properties: { sessionId: sessionIdProperty },
      required: ['sessionId']
    }
  },

  // Analysis
  {
    name: 'analyze_text',
    description: 'Analyze a pasted GDB backtrace and/or "info registers" dump',
    inputSchema: {
      type: 'object',
      properties: {
        text: {
          type: 'string',
          description: 'GDB console output'
        }
      },
      required: ['text']
    }
  }
];

const sessionArgs = z.object({ sessionId: z.string().min(1) });

const connectArgs = sessionArgs.extend({
  target: z.string().trim().min(1),
  autoRun: z.boolean().optional()
});

const commandArgs = sessionArgs.extend({
  command: z.string().trim().min(1),
  mode: z.enum(['cli', 'mi']).default('cli'),
  timeoutMs: z.number().int().positive().optional()
});

const controlArgs = sessionArgs.extend({
  action: z.enum(['run', 'continue', 'step_over', 'step_into', 'step_out', 'interrupt'])
});

const breakpointArgs = sessionArgs.extend({ location: z.string().trim().min(1) });

const memoryArgs = sessionArgs.extend({
  address: z.string().trim().min(1),
  size: z.number().int().positive().max(65536).default(64)
});

const analyzeArgs = z.object({ text: z.string() });

function describeFailure(error: unknown): ErrorPayload {
  if (error instanceof z.ZodError) {
    return {
      code: 'INVALID_MESSAGE',
      message: error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
    };
  }
  return toErrorPayload(error);
}

/**
 * Routes tool calls to the session manager and keeps one event buffer per
 * session
 */
export class DebugToolHandler {
  private subscriptions: Map<string, EventSubscription> = new Map();

  constructor(
    private readonly manager: SessionManager,
    private readonly analyzer: CrashAnalyzer
  ) {}

  async handleToolCall(name: string, args: Record<string, unknown>): Promise<unknown> {
    switch (name) {
      // Session Management
      case 'create_session': {
        const session = this.manager.createSession();
        this.subscribe(session.id);
        return { sessionId: session.id, state: session.state };
      }

      case 'connect_target': {
        const { sessionId, target, autoRun } = connectArgs.parse(args);
        this.subscribe(sessionId);
        const session = await this.manager.connect(sessionId, target, { autoRun });
        return { sessionId, state: session.state, target: session.target };
      }

      case 'disconnect_session': {
        const { sessionId } = sessionArgs.parse(args);
        const session = await this.manager.disconnect(sessionId);
        return { sessionId, state: session.state };
      }

      case 'destroy_session': {
        const { sessionId } = sessionArgs.parse(args);
        try {
          await this.manager.destroySession(sessionId);
        } finally {
          this.subscriptions.get(sessionId)?.unsubscribe();
          this.subscriptions.delete(sessionId);
        }
        return { sessionId, destroyed: true };
      }

      case 'list_sessions': {
        return {
          sessions: this.manager.listSessions().map((session) => ({
            sessionId: session.id,
            state: session.state,
            target: session.target,
            stopReason: session.stopReason,
            error: session.error
          }))
        };
      }

      // Commands
      case 'run_command': {
        const { sessionId, command, mode, timeoutMs } = commandArgs.parse(args);
        if (mode === 'cli') {
          return { output: await this.manager.cliCommand(sessionId, command, timeoutMs) };
        }
        const response = await this.manager.dispatch(sessionId, command, timeoutMs);
        return {
          resultClass: response.resultClass,
          results: response.results,
          output: response.console.join('')
        };
      }

      case 'control': {
        const { sessionId, action } = controlArgs.parse(args);
        const response = await this.manager.control(sessionId, action);
        return { action, resultClass: response.resultClass };
      }

      // Inspection
      case 'get_backtrace': {
        const { sessionId } = sessionArgs.parse(args);
        return { frames: await this.manager.getBacktrace(sessionId) };
      }

      case 'get_registers': {
        const { sessionId } = sessionArgs.parse(args);
        return { registers: await this.manager.getRegisters(sessionId) };
      }

      case 'set_breakpoint': {
        const { sessionId, location } = breakpointArgs.parse(args);
        return { breakpoint: await this.manager.setBreakpoint(sessionId, location) };
      }

      case 'read_memory': {
        const { sessionId, address, size } = memoryArgs.parse(args);
        return { memory: await this.manager.readMemory(sessionId, address, size) };
      }

      case 'get_events': {
        const { sessionId } = sessionArgs.parse(args);
        const events = this.subscribe(sessionId).drain();
        return { state: this.manager.getSessionInfo(sessionId).state, events };
      }

      // Analysis
      case 'analyze_text': {
        const { text } = analyzeArgs.parse(args);
        return this.analyzer.analyze(text);
      }

      default:
        throw new Error(`Unknown tool: ${name}`);
    }
  }

  /**
   * Buffered subscription for a session, created on first use
   */
  private subscribe(sessionId: string): EventSubscription {
    const existing = this.subscriptions.get(sessionId);
    if (existing) {
      return existing;
    }
    const subscription = this.manager.eventsFor(sessionId);
    this.subscriptions.set(sessionId, subscription);
    return subscription;
  }
}

/**
 * Create and configure the MCP server
 */
export function createServer(manager: SessionManager, analyzer: CrashAnalyzer): Server {
  const server = new Server(
    {
      name: 'gdb-live-bridge',
      version: '0.1.0'
    },
    {
      capabilities: {
        tools: {}
      }
    }
  );
  const handler = new DebugToolHandler(manager, analyzer);

  // List tools handler
  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools
  }));

  // Call tool handler
  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    try {
      const result = await handler.handleToolCall(name, args ?? {});
      return {
        content: [
          {
            type: 'text',
            text: JSON.stringify(result, null, 2)
          }
        ]
      };
    } catch (error) {
      return {
        content: [
          {
            type: 'text',
            text: JSON.stringify({ error: describeFailure(error) }, null, 2)
          }
        ],
        isError: true
      };
    }
  });

  return server;
}

/**
 * Serve MCP over stdio until the transport closes
 */
export async function startServer(manager: SessionManager, analyzer: CrashAnalyzer): Promise<Server> {
  const server = createServer(manager, analyzer);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  return server;
}
