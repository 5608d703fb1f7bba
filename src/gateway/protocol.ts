/**
 * Push-channel message contract
 *
 * Inbound messages are validated with zod; outbound messages are plain
 * typed objects serialized as JSON.
 */

import { z } from 'zod';
import type { ErrorPayload } from '../errors.js';
import type { MiTuple, ResultClass } from '../mi/record-parser.js';
import type { ControlAction } from '../session/session-manager.js';
import type {
  BreakpointInfo,
  DebugSessionInfo,
  MemoryBlock,
  RegisterSnapshot,
  SessionEvent,
  SessionEventKind,
  SessionState,
  StackFrame
} from '../session/types.js';

const requestId = z.union([z.string(), z.number()]).optional();

const bare = <T extends string>(type: T) => z.object({ type: z.literal(type), request_id: requestId });

export const CONTROL_MESSAGES = {
  'control.continue': 'continue',
  'control.step_over': 'step_over',
  'control.step_into': 'step_into',
  'control.step_out': 'step_out',
  'control.interrupt': 'interrupt'
} as const satisfies Record<string, ControlAction>;

export const inboundMessageSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('connect_target'),
    request_id: requestId,
    target: z.string().trim().min(1),
    auto_monitor: z.boolean().optional(),
    auto_run: z.boolean().optional()
  }),
  bare('disconnect'),
  z.object({
    type: z.literal('run_command'),
    request_id: requestId,
    command: z.string().trim().min(1),
    mode: z.enum(['cli', 'mi']).default('cli'),
    timeout_ms: z.number().int().positive().optional()
  }),
  bare('control.continue'),
  bare('control.step_over'),
  bare('control.step_into'),
  bare('control.step_out'),
  bare('control.interrupt'),
  bare('get_backtrace'),
  bare('get_registers'),
  z.object({
    type: z.literal('set_breakpoint'),
    request_id: requestId,
    location: z.string().trim().min(1)
  }),
  z.object({
    type: z.literal('read_memory'),
    request_id: requestId,
    address: z.string().trim().min(1),
    size: z.number().int().positive().max(65536).default(64)
  }),
  bare('get_status')
]);

export type InboundMessage = z.infer<typeof inboundMessageSchema>;

export type ControlMessageType = keyof typeof CONTROL_MESSAGES;

export function isControlMessage(
  message: InboundMessage
): message is Extract<InboundMessage, { type: ControlMessageType }> {
  return Object.hasOwn(CONTROL_MESSAGES, message.type);
}

type RequestId = string | number | undefined;

interface Reply {
  request_id?: RequestId;
  success: boolean;
  error?: ErrorPayload;
}

export type EventMessageType =
  | 'event.started'
  | 'event.running'
  | 'event.stopped'
  | 'event.crashed'
  | 'event.breakpoint_hit'
  | 'event.exited'
  | 'event.console'
  | 'event.error';

export type OutboundMessage =
  | { type: 'session_ready'; session_id: string; resumed: boolean; state: SessionState }
  | ({ type: 'connect_result'; session_id: string; state: SessionState } & Reply)
  | ({ type: 'disconnect_result'; session_id: string; state: SessionState } & Reply)
  | ({
      type: 'command_result';
      command: string;
      mode: 'cli' | 'mi';
      output?: string;
      result_class?: ResultClass;
      results?: MiTuple;
    } & Reply)
  | ({ type: 'control_result'; action: ControlAction; result_class?: ResultClass } & Reply)
  | ({ type: 'backtrace_result'; frames?: StackFrame[] } & Reply)
  | ({ type: 'registers_result'; registers?: RegisterSnapshot } & Reply)
  | ({ type: 'breakpoint_result'; location: string; number?: number; breakpoint?: BreakpointInfo } & Reply)
  | ({ type: 'memory_result'; memory?: MemoryBlock } & Reply)
  | ({ type: 'status_result'; session?: DebugSessionInfo } & Reply)
  | { type: 'session_state'; session_id: string; state: SessionState; previous_state: SessionState }
  | { type: EventMessageType; session_id: string; event: SessionEvent }
  | { type: 'error'; request_id?: RequestId; error: ErrorPayload };

/** What actually goes on the wire: every message carries a timestamp */
export type OutboundEnvelope = OutboundMessage & { timestamp: string };

const EVENT_MESSAGE_TYPES: Record<SessionEventKind, EventMessageType> = {
  started: 'event.started',
  running: 'event.running',
  stopped: 'event.stopped',
  crashed: 'event.crashed',
  breakpoint_hit: 'event.breakpoint_hit',
  exited: 'event.exited',
  console_output: 'event.console',
  error: 'event.error'
};

export function eventMessageType(event: SessionEvent): EventMessageType {
  return EVENT_MESSAGE_TYPES[event.kind];
}
