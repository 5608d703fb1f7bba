/**
 * Session Manager
 *
 * Central orchestrator for debug sessions. Owns every session's MI client
 * and event monitor, drives the session state machine, and routes
 * requests to the right session. Nothing is shared between sessions except
 * the (stateless) crash analyzer.
 */

import { EventEmitter } from 'events';
import { randomUUID } from 'crypto';
import {
  ACTIVE_STATES,
  type BreakpointInfo,
  type CommandResponse,
  type ConnectOptions,
  type DebugSessionInfo,
  type MemoryBlock,
  type RegisterSnapshot,
  type SessionEvent,
  SessionState,
  type StackFrame,
  TERMINAL_STATES
} from './types.js';
import { EventMonitor } from './event-monitor.js';
import { type ExitInfo, MiClient, type SpawnDebugger } from '../mi/mi-client.js';
import type { BridgeConfig } from '../config.js';
import type { CrashAnalyzer } from '../analysis/types.js';
import { BacktraceAnalyzer } from '../analysis/crash-analyzer.js';
import {
  CommandError,
  ConnectError,
  DispatchError,
  StartError,
  errorMessage
} from '../errors.js';
import { type Logger, createLogger } from '../logger.js';

export type ControlAction = 'run' | 'continue' | 'step_over' | 'step_into' | 'step_out' | 'interrupt';

export type SessionEventListener = (event: SessionEvent) => void;

/**
 * A view onto one session's events. With a listener, events are pushed as
 * they are emitted; without one they are buffered until drained.
 */
export interface EventSubscription {
  readonly sessionId: string;
  /** Take every buffered event (always empty for listener subscriptions) */
  drain(): SessionEvent[];
  unsubscribe(): void;
}

export interface SessionManagerOptions
  extends Pick<BridgeConfig, 'debugger' | 'maxConsecutiveTimeouts' | 'enrichTimeoutMs' | 'analysisTimeoutMs'> {
  /** Defaults to BacktraceAnalyzer; null publishes crashes without analysis */
  analyzer?: CrashAnalyzer | null;
  /** Replaces child_process.spawn for every session */
  spawnProcess?: SpawnDebugger;
  /** Cap on events held by a polling subscription */
  maxBufferedEvents?: number;
}

/**
 * Internal session data
 */
interface SessionData {
  info: DebugSessionInfo;
  client: MiClient | null;
  monitor: EventMonitor | null;
  subscribers: Set<SessionEventListener>;
  consecutiveTimeouts: number;
  /** Run state reported by the target while the session was still connecting */
  observedRunState: SessionState | null;
  teardown: Promise<void> | null;
  logger: Logger;
}

/**
 * Events emitted by the session manager
 */
export interface SessionManagerEvents {
  sessionCreated: (session: DebugSessionInfo) => void;
  sessionStateChanged: (sessionId: string, state: SessionState, previousState: SessionState) => void;
  sessionEvent: (sessionId: string, event: SessionEvent) => void;
  sessionTerminated: (sessionId: string) => void;
}

export class SessionManager extends EventEmitter {
  private sessions: Map<string, SessionData> = new Map();
  private readonly analyzer: CrashAnalyzer | undefined;
  private readonly logger = createLogger('session-manager');

  constructor(private readonly options: SessionManagerOptions) {
    super();
    this.analyzer = options.analyzer === null ? undefined : (options.analyzer ?? new BacktraceAnalyzer());
  }

  /**
   * Create a new session in the idle state
   */
  createSession(): DebugSessionInfo {
    const sessionId = randomUUID();
    const info: DebugSessionInfo = {
      id: sessionId,
      state: SessionState.IDLE,
      createdAt: new Date()
    };

    this.sessions.set(sessionId, {
      info,
      client: null,
      monitor: null,
      subscribers: new Set(),
      consecutiveTimeouts: 0,
      observedRunState: null,
      teardown: null,
      logger: createLogger('session', { sessionId })
    });

    this.logger.info({ sessionId }, 'session created');
    this.emit('sessionCreated', { ...info });
    return { ...info };
  }

  /**
   * Start GDB for an idle session and select the target. `target` is
   * handed to the MI client as is.
   */
  async connect(sessionId: string, target: string, options: ConnectOptions = {}): Promise<DebugSessionInfo> {
    const session = this.getSession(sessionId);
    if (session.info.state !== SessionState.IDLE) {
      throw new ConnectError(
        `Session ${sessionId} is ${session.info.state}; create a new session to connect again`
      );
    }

    session.info.target = target;
    this.updateState(session, SessionState.STARTING);

    const debuggerConfig = this.options.debugger;
    const client = new MiClient({
      command: debuggerConfig.path,
      args: debuggerConfig.args,
      timeout: debuggerConfig.commandTimeoutMs,
      startupTimeout: debuggerConfig.startupTimeoutMs,
      killTimeout: debuggerConfig.killTimeoutMs,
      queueDepth: debuggerConfig.queueDepth,
      queueMode: debuggerConfig.queueMode,
      spawnProcess: this.options.spawnProcess,
      logger: createLogger('mi-client', { sessionId })
    });
    session.client = client;
    client.on('exit', (info: ExitInfo) => {
      this.handleClientExit(session, info);
    });

    try {
      await client.start();
    } catch (error) {
      return this.failConnect(session, error);
    }
    this.assertStillConnecting(session);
    this.updateState(session, SessionState.CONNECTING);

    if (options.autoMonitor !== false) {
      const monitor = new EventMonitor(client, (event) => this.handleEvent(session, event), {
        enrichTimeoutMs: this.options.enrichTimeoutMs,
        analysisTimeoutMs: this.options.analysisTimeoutMs,
        analyzer: this.analyzer,
        logger: createLogger('event-monitor', { sessionId })
      });
      session.monitor = monitor;
      monitor.start();
    }

    try {
      await client.connectTarget(target);
    } catch (error) {
      return this.failConnect(session, error);
    }
    this.assertStillConnecting(session);

    this.updateState(session, session.observedRunState ?? SessionState.CONNECTED);
    session.logger.info({ target }, 'target connected');

    if (options.autoRun) {
      try {
        await client.run();
      } catch (error) {
        session.logger.warn({ err: error }, 'auto-run failed');
        this.deliver(session, { kind: 'error', message: `Failed to run target: ${errorMessage(error)}` });
      }
    }

    return { ...session.info };
  }

  /**
   * Forward a raw MI command to the session's GDB
   */
  dispatch(sessionId: string, command: string, timeout?: number): Promise<CommandResponse> {
    return this.withClient(sessionId, (client) => client.sendCommand(command, timeout));
  }

  /**
   * Run a console (CLI) command and return what it printed
   */
  async cliCommand(sessionId: string, text: string, timeout?: number): Promise<string> {
    const { output } = await this.withClient(sessionId, (client) => client.cliCommand(text, timeout));
    return output;
  }

  control(sessionId: string, action: ControlAction): Promise<CommandResponse> {
    return this.withClient(sessionId, (client) => {
      switch (action) {
        case 'run':
          return client.run();
        case 'continue':
          return client.continue();
        case 'step_over':
          return client.next();
        case 'step_into':
          return client.step();
        case 'step_out':
          return client.finish();
        case 'interrupt':
          return client.interrupt();
      }
    });
  }

  getBacktrace(sessionId: string): Promise<StackFrame[]> {
    return this.withClient(sessionId, (client) => client.stackListFrames());
  }

  getRegisters(sessionId: string): Promise<RegisterSnapshot> {
    return this.withClient(sessionId, (client) => client.listRegisters());
  }

  /**
   * Insert a breakpoint. The location is passed through unmodified; GDB
   * reports malformed ones.
   */
  setBreakpoint(sessionId: string, location: string): Promise<BreakpointInfo> {
    return this.withClient(sessionId, (client) => client.breakInsert(location));
  }

  readMemory(sessionId: string, address: string, size: number): Promise<MemoryBlock> {
    return this.withClient(sessionId, (client) => client.readMemory(address, size));
  }

  /**
   * Tear the session down. Idempotent, and safe while connecting, with
   * commands in flight, or mid-enrichment; resolves once GDB has exited.
   */
  async disconnect(sessionId: string): Promise<DebugSessionInfo> {
    const session = this.getSession(sessionId);
    await this.teardown(session, null);
    return { ...session.info };
  }

  /**
   * Disconnect and forget a session
   */
  async destroySession(sessionId: string): Promise<void> {
    const session = this.getSession(sessionId);
    await this.teardown(session, null);
    session.subscribers.clear();
    this.sessions.delete(sessionId);
    this.logger.info({ sessionId }, 'session destroyed');
  }

  /**
   * Subscribe to a session's events
   */
  eventsFor(sessionId: string, listener?: SessionEventListener): EventSubscription {
    const session = this.getSession(sessionId);
    const buffer: SessionEvent[] = [];
    const limit = this.options.maxBufferedEvents ?? 1000;

    const deliver: SessionEventListener =
      listener ??
      ((event) => {
        buffer.push(event);
        if (buffer.length > limit) {
          buffer.shift();
        }
      });
    session.subscribers.add(deliver);

    return {
      sessionId,
      drain: () => buffer.splice(0),
      unsubscribe: () => {
        session.subscribers.delete(deliver);
      }
    };
  }

  hasSession(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  /**
   * Get session info
   */
  getSessionInfo(sessionId: string): DebugSessionInfo {
    return { ...this.getSession(sessionId).info };
  }

  /**
   * List all sessions
   */
  listSessions(): DebugSessionInfo[] {
    return Array.from(this.sessions.values()).map((session) => ({ ...session.info }));
  }

  /**
   * Destroy every session
   */
  async shutdown(): Promise<void> {
    const sessionIds = Array.from(this.sessions.keys());
    await Promise.all(
      sessionIds.map((sessionId) =>
        this.destroySession(sessionId).catch((error: unknown) => {
          this.logger.error({ err: error, sessionId }, 'failed to destroy session during shutdown');
        })
      )
    );
  }

  // ============================================
  // Internals
  // ============================================

  /**
   * Get a session or throw if not found
   */
  private getSession(sessionId: string): SessionData {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new DispatchError('SESSION_NOT_FOUND', `Session not found: ${sessionId}`);
    }
    return session;
  }

  private async withClient<T>(sessionId: string, operation: (client: MiClient) => Promise<T>): Promise<T> {
    const session = this.getSession(sessionId);
    const client = session.client;
    if (!client || !ACTIVE_STATES.has(session.info.state)) {
      throw new DispatchError(
        'NOT_CONNECTED',
        `Session ${sessionId} is ${session.info.state}, not connected`
      );
    }

    try {
      const result = await operation(client);
      session.consecutiveTimeouts = 0;
      return result;
    } catch (error) {
      if (error instanceof CommandError) {
        if (error.isTimeout) {
          this.recordTimeout(session);
        } else if (error.code === 'COMMAND_FAILED') {
          // GDB answered, so it is alive
          session.consecutiveTimeouts = 0;
        }
      }
      throw error;
    }
  }

  /**
   * A single timeout is tolerated; repeated ones mean GDB is wedged.
   */
  private recordTimeout(session: SessionData): void {
    session.consecutiveTimeouts += 1;
    const limit = this.options.maxConsecutiveTimeouts;
    session.logger.warn({ consecutiveTimeouts: session.consecutiveTimeouts, limit }, 'command timed out');

    if (session.consecutiveTimeouts >= limit) {
      this.forceDisconnect(
        session,
        `GDB stopped responding (${session.consecutiveTimeouts} consecutive command timeouts)`
      );
    }
  }

  private handleClientExit(session: SessionData, info: ExitInfo): void {
    if (info.expected || session.teardown || !ACTIVE_STATES.has(session.info.state)) {
      return;
    }
    const cause = info.signal ? `signal ${info.signal}` : `code ${info.code}`;
    this.forceDisconnect(session, `GDB exited unexpectedly with ${cause}`);
  }

  private forceDisconnect(session: SessionData, reason: string): void {
    this.teardown(session, reason).catch((error: unknown) => {
      session.logger.error({ err: error }, 'forced disconnect failed');
    });
  }

  private handleEvent(session: SessionData, event: SessionEvent): void {
    const runState = runStateAfter(event);
    if (event.kind === 'stopped' || event.kind === 'crashed') {
      session.info.stopReason = event.kind === 'crashed' ? `signal ${event.signal}` : event.reason;
    } else if (event.kind === 'breakpoint_hit') {
      session.info.stopReason = `breakpoint ${event.number}`;
    } else if (event.kind === 'exited') {
      session.info.exitCode = event.code;
    }

    if (runState) {
      if (ACTIVE_STATES.has(session.info.state)) {
        this.updateState(session, runState);
      } else if (session.info.state === SessionState.CONNECTING) {
        session.observedRunState = runState;
      }
    }

    this.deliver(session, event);
  }

  private deliver(session: SessionData, event: SessionEvent): void {
    for (const subscriber of session.subscribers) {
      try {
        subscriber(event);
      } catch (error) {
        session.logger.error({ err: error, kind: event.kind }, 'event subscriber threw');
      }
    }
    this.emit('sessionEvent', session.info.id, event);
  }

  /**
   * Update session state
   */
  private updateState(session: SessionData, newState: SessionState): void {
    const previousState = session.info.state;
    if (previousState === newState) {
      return;
    }
    session.info.state = newState;
    session.logger.debug({ from: previousState, to: newState }, 'state changed');
    this.emit('sessionStateChanged', session.info.id, newState, previousState);
  }

  private assertStillConnecting(session: SessionData): void {
    if (session.teardown) {
      throw new ConnectError('Session was disconnected while connecting');
    }
  }

  private async failConnect(session: SessionData, error: unknown): Promise<never> {
    if (session.teardown) {
      await session.teardown;
      throw new ConnectError('Session was disconnected while connecting', { cause: error });
    }

    const failure =
      error instanceof StartError
        ? error
        : new ConnectError(
            `Failed to connect to ${session.info.target ?? 'target'}: ${errorMessage(error)}`,
            { cause: error }
          );
    session.info.error = failure.message;
    session.logger.warn({ err: failure }, 'connect failed');

    this.updateState(session, SessionState.FAILED);
    await this.teardown(session, null);
    throw failure;
  }

  private teardown(session: SessionData, reason: string | null): Promise<void> {
    if (!session.teardown) {
      session.teardown = this.release(session, reason);
    }
    return session.teardown;
  }

  private async release(session: SessionData, reason: string | null): Promise<void> {
    if (reason) {
      session.info.error = reason;
      session.logger.warn({ reason }, 'forcing disconnect');
      this.deliver(session, { kind: 'error', message: reason });
    }
    if (!TERMINAL_STATES.has(session.info.state)) {
      this.updateState(session, SessionState.DISCONNECTED);
    }

    // stop the monitor first so nothing is published past this point
    const monitorStopped = session.monitor?.stop();
    try {
      await session.client?.stop();
    } catch (error) {
      session.logger.error({ err: error }, 'failed to stop gdb');
    }
    await monitorStopped;

    session.logger.info({ state: session.info.state }, 'session released');
    this.emit('sessionTerminated', session.info.id);
  }
}

function runStateAfter(event: SessionEvent): SessionState | null {
  switch (event.kind) {
    case 'running':
      return SessionState.RUNNING;
    case 'stopped':
    case 'crashed':
    case 'breakpoint_hit':
      return SessionState.STOPPED;
    case 'exited':
      return SessionState.CONNECTED;
    default:
      return null;
  }
}
