/**
 * Gateway Connection
 *
 * Binds one push-channel client to one session: forwards the session's
 * events and state changes, and turns each inbound message into a session
 * manager call followed by exactly one result message.
 */

import {
  type InboundMessage,
  type OutboundEnvelope,
  type OutboundMessage,
  CONTROL_MESSAGES,
  eventMessageType,
  inboundMessageSchema,
  isControlMessage
} from './protocol.js';
import type { EventSubscription, SessionManager } from '../session/session-manager.js';
import { type SessionEvent, SessionState, TERMINAL_STATES } from '../session/types.js';
import { type ErrorPayload, toErrorPayload } from '../errors.js';
import { type Logger, createLogger } from '../logger.js';

/**
 * Outbound half of a client connection
 */
export interface PushChannel {
  send(message: OutboundEnvelope): void;
}

type Attempt<T> = { ok: true; value: T } | { ok: false; error: ErrorPayload };

async function attempt<T>(operation: () => Promise<T>): Promise<Attempt<T>> {
  try {
    return { ok: true, value: await operation() };
  } catch (error) {
    return { ok: false, error: toErrorPayload(error) };
  }
}

export class GatewayConnection {
  private subscription: EventSubscription | null = null;
  private currentSessionId: string;
  private detached = false;
  private logger: Logger;

  private readonly onStateChanged = (sessionId: string, state: SessionState, previousState: SessionState) => {
    if (sessionId === this.currentSessionId) {
      this.send({ type: 'session_state', session_id: sessionId, state, previous_state: previousState });
    }
  };

  /**
   * @param resumeSessionId - existing session to re-attach to; a new one is
   * created when omitted
   */
  constructor(
    private readonly manager: SessionManager,
    private readonly channel: PushChannel,
    resumeSessionId?: string
  ) {
    const resumed = resumeSessionId !== undefined;
    this.currentSessionId = resumeSessionId ?? manager.createSession().id;
    this.logger = createLogger('gateway', { sessionId: this.currentSessionId });

    manager.on('sessionStateChanged', this.onStateChanged);
    this.attach(resumed);
  }

  get sessionId(): string {
    return this.currentSessionId;
  }

  /**
   * Parse and handle one raw inbound message. Never rejects.
   */
  async receive(data: string): Promise<void> {
    let payload: unknown;
    try {
      payload = JSON.parse(data);
    } catch {
      this.send({ type: 'error', error: { code: 'INVALID_MESSAGE', message: 'Message is not valid JSON' } });
      return;
    }

    const parsed = inboundMessageSchema.safeParse(payload);
    if (!parsed.success) {
      const problems = parsed.error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
      this.send({
        type: 'error',
        request_id: requestIdOf(payload),
        error: { code: 'INVALID_MESSAGE', message: problems }
      });
      return;
    }

    try {
      await this.handle(parsed.data);
    } catch (error) {
      this.logger.error({ err: error, type: parsed.data.type }, 'message handler failed');
      this.send({ type: 'error', request_id: parsed.data.request_id, error: toErrorPayload(error) });
    }
  }

  /**
   * Stop forwarding to this client. The session itself is left alone.
   */
  detach(): void {
    if (this.detached) {
      return;
    }
    this.detached = true;
    this.subscription?.unsubscribe();
    this.subscription = null;
    this.manager.off('sessionStateChanged', this.onStateChanged);
  }

  private attach(resumed: boolean): void {
    this.subscription = this.manager.eventsFor(this.currentSessionId, (event) => this.forward(event));
    this.send({
      type: 'session_ready',
      session_id: this.currentSessionId,
      resumed,
      state: this.manager.getSessionInfo(this.currentSessionId).state
    });
  }

  private forward(event: SessionEvent): void {
    this.send({ type: eventMessageType(event), session_id: this.currentSessionId, event });
  }

  private send(message: OutboundMessage): void {
    if (this.detached) {
      return;
    }
    this.channel.send({ ...message, timestamp: new Date().toISOString() });
  }

  /**
   * Sessions are never recycled: connecting again after a failure or a
   * disconnect moves this client onto a brand new session.
   */
  private async renewSessionIfTerminal(): Promise<void> {
    const previous = this.manager.getSessionInfo(this.currentSessionId);
    if (!TERMINAL_STATES.has(previous.state)) {
      return;
    }

    this.subscription?.unsubscribe();
    this.currentSessionId = this.manager.createSession().id;
    this.logger = createLogger('gateway', { sessionId: this.currentSessionId });
    this.attach(false);

    await this.manager.destroySession(previous.id);
  }

  private async handle(message: InboundMessage): Promise<void> {
    const requestId = message.request_id;

    if (isControlMessage(message)) {
      const action = CONTROL_MESSAGES[message.type];
      const result = await attempt(() => this.manager.control(this.currentSessionId, action));
      this.send(
        result.ok
          ? { type: 'control_result', request_id: requestId, action, success: true, result_class: result.value.resultClass }
          : { type: 'control_result', request_id: requestId, action, success: false, error: result.error }
      );
      return;
    }

    switch (message.type) {
      case 'connect_target': {
        const { target, auto_monitor: autoMonitor, auto_run: autoRun } = message;
        await this.renewSessionIfTerminal();
        const sessionId = this.currentSessionId;
        const result = await attempt(() => this.manager.connect(sessionId, target, { autoMonitor, autoRun }));
        this.send({
          type: 'connect_result',
          request_id: requestId,
          session_id: sessionId,
          state: this.stateOf(sessionId),
          success: result.ok,
          error: result.ok ? undefined : result.error
        });
        return;
      }

      case 'disconnect': {
        const sessionId = this.currentSessionId;
        const result = await attempt(() => this.manager.disconnect(sessionId));
        this.send({
          type: 'disconnect_result',
          request_id: requestId,
          session_id: sessionId,
          state: this.stateOf(sessionId),
          success: result.ok,
          error: result.ok ? undefined : result.error
        });
        return;
      }

      case 'run_command': {
        const { command, mode, timeout_ms: timeout } = message;
        if (mode === 'cli') {
          const result = await attempt(() => this.manager.cliCommand(this.currentSessionId, command, timeout));
          this.send(
            result.ok
              ? { type: 'command_result', request_id: requestId, command, mode, success: true, output: result.value }
              : { type: 'command_result', request_id: requestId, command, mode, success: false, error: result.error }
          );
        } else {
          const result = await attempt(() => this.manager.dispatch(this.currentSessionId, command, timeout));
          this.send(
            result.ok
              ? {
                  type: 'command_result',
                  request_id: requestId,
                  command,
                  mode,
                  success: true,
                  output: result.value.console.join(''),
                  result_class: result.value.resultClass,
                  results: result.value.results
                }
              : { type: 'command_result', request_id: requestId, command, mode, success: false, error: result.error }
          );
        }
        return;
      }

      case 'get_backtrace': {
        const result = await attempt(() => this.manager.getBacktrace(this.currentSessionId));
        this.send(
          result.ok
            ? { type: 'backtrace_result', request_id: requestId, success: true, frames: result.value }
            : { type: 'backtrace_result', request_id: requestId, success: false, error: result.error }
        );
        return;
      }

      case 'get_registers': {
        const result = await attempt(() => this.manager.getRegisters(this.currentSessionId));
        this.send(
          result.ok
            ? { type: 'registers_result', request_id: requestId, success: true, registers: result.value }
            : { type: 'registers_result', request_id: requestId, success: false, error: result.error }
        );
        return;
      }

      case 'set_breakpoint': {
        const { location } = message;
        const result = await attempt(() => this.manager.setBreakpoint(this.currentSessionId, location));
        this.send(
          result.ok
            ? {
                type: 'breakpoint_result',
                request_id: requestId,
                location,
                success: true,
                number: result.value.number,
                breakpoint: result.value
              }
            : { type: 'breakpoint_result', request_id: requestId, location, success: false, error: result.error }
        );
        return;
      }

      case 'read_memory': {
        const { address, size } = message;
        const result = await attempt(() => this.manager.readMemory(this.currentSessionId, address, size));
        this.send(
          result.ok
            ? { type: 'memory_result', request_id: requestId, success: true, memory: result.value }
            : { type: 'memory_result', request_id: requestId, success: false, error: result.error }
        );
        return;
      }

      case 'get_status': {
        const result = await attempt(() => Promise.resolve(this.manager.getSessionInfo(this.currentSessionId)));
        this.send(
          result.ok
            ? { type: 'status_result', request_id: requestId, success: true, session: result.value }
            : { type: 'status_result', request_id: requestId, success: false, error: result.error }
        );
        return;
      }
    }
  }

  private stateOf(sessionId: string): SessionState {
    return this.manager.hasSession(sessionId)
      ? this.manager.getSessionInfo(sessionId).state
      : SessionState.DISCONNECTED;
  }
}

function requestIdOf(payload: unknown): string | number | undefined {
  if (typeof payload !== 'object' || payload === null || !('request_id' in payload)) {
    return undefined;
  }
  const value = payload.request_id;
  return typeof value === 'string' || typeof value === 'number' ? value : undefined;
}
