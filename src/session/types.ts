/**
 * Session Types and Interfaces
 *
 * Core type definitions for debug sessions, stack frames, registers and the
 * events pushed to clients.
 */

import { type MiTuple, type ResultClass, miString, miTuple } from '../mi/record-parser.js';
import type { AnalysisReport } from '../analysis/types.js';

/**
 * Debug session state machine
 */
export enum SessionState {
  /** Session created, no debugger process yet */
  IDLE = 'idle',
  /** Debugger process is being spawned */
  STARTING = 'starting',
  /** Debugger is up, target is being selected */
  CONNECTING = 'connecting',
  /** Target selected, program not running */
  CONNECTED = 'connected',
  /** Program is running */
  RUNNING = 'running',
  /** Program is stopped (breakpoint, signal, step) */
  STOPPED = 'stopped',
  /** Torn down; terminal */
  DISCONNECTED = 'disconnected',
  /** Start or connect failed; terminal */
  FAILED = 'failed'
}

/** States in which commands may be dispatched */
export const ACTIVE_STATES: ReadonlySet<SessionState> = new Set([
  SessionState.CONNECTED,
  SessionState.RUNNING,
  SessionState.STOPPED
]);

export const TERMINAL_STATES: ReadonlySet<SessionState> = new Set([
  SessionState.DISCONNECTED,
  SessionState.FAILED
]);

/**
 * Information about a debug session
 */
export interface DebugSessionInfo {
  id: string;
  state: SessionState;
  target?: string;
  createdAt: Date;
  stopReason?: string;
  exitCode?: number | null;
  error?: string;
}

export interface ConnectOptions {
  /** Run the event monitor for this session (default true) */
  autoMonitor?: boolean;
  /** Issue -exec-run once the target is selected (default false) */
  autoRun?: boolean;
}

/**
 * Stack frame information
 */
export interface StackFrame {
  level: number;
  address: string;
  function: string;
  file?: string;
  fullPath?: string;
  line?: number;
}

/** Register name to value (hex string as reported by GDB) */
export type RegisterSnapshot = Readonly<Record<string, string>>;

export interface BreakpointInfo {
  number: number;
  location: string;
  address?: string;
  function?: string;
  file?: string;
  line?: number;
}

export interface MemoryBlock {
  begin: string;
  end?: string;
  contents: string;
}

/**
 * Reply to one command, correlated by token
 */
export interface CommandResponse {
  token: number;
  command: string;
  resultClass: ResultClass;
  results: MiTuple;
  /** Console stream output captured while the command was in flight */
  console: string[];
}

export type ConsoleStream = 'console' | 'target' | 'log' | 'program';

/**
 * Events pushed to session subscribers, in emission order
 */
export type SessionEvent =
  | { kind: 'started'; pid?: number }
  | { kind: 'running'; threadId?: string }
  | { kind: 'stopped'; reason: string; signal?: string; frame?: StackFrame }
  | {
      kind: 'crashed';
      signal: string;
      meaning?: string;
      frame?: StackFrame;
      backtrace: readonly StackFrame[];
      registers: RegisterSnapshot;
      /** `info frame` output captured with the backtrace */
      frameInfo?: string;
      analysis?: AnalysisReport;
      enrichmentErrors: string[];
    }
  | {
      kind: 'breakpoint_hit';
      number: number;
      frame?: StackFrame;
      backtrace: readonly StackFrame[];
      registers: RegisterSnapshot;
      enrichmentErrors: string[];
    }
  | { kind: 'exited'; code: number | null; signal?: string }
  | { kind: 'console_output'; stream: ConsoleStream; text: string }
  | { kind: 'error'; message: string };

export type SessionEventKind = SessionEvent['kind'];

/**
 * Convert an MI frame tuple into a stack frame
 */
export function convertStackFrame(frame: MiTuple): StackFrame {
  const line = miString(frame, 'line');
  const level = miString(frame, 'level');
  return Object.freeze({
    level: level !== undefined ? Number.parseInt(level, 10) : 0,
    address: miString(frame, 'addr') ?? '0x0',
    function: miString(frame, 'func') ?? '??',
    file: miString(frame, 'file'),
    fullPath: miString(frame, 'fullname'),
    line: line !== undefined ? Number.parseInt(line, 10) : undefined
  });
}

/**
 * Convert the `frame` field of a stop record, when present
 */
export function convertStopFrame(results: MiTuple): StackFrame | undefined {
  const frame = miTuple(results, 'frame');
  return frame ? convertStackFrame(frame) : undefined;
}

export function convertBreakpoint(bkpt: MiTuple, location: string): BreakpointInfo {
  const line = miString(bkpt, 'line');
  return {
    number: Number.parseInt(miString(bkpt, 'number') ?? '0', 10),
    location,
    address: miString(bkpt, 'addr'),
    function: miString(bkpt, 'func'),
    file: miString(bkpt, 'file'),
    line: line !== undefined ? Number.parseInt(line, 10) : undefined
  };
}
