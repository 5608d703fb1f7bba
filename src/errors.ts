/**
 * Error Types
 *
 * Every failure that can reach a client carries a machine-checkable code
 * alongside its human-readable message.
 */

export type ErrorCode =
  | 'START_FAILED'
  | 'CONNECT_FAILED'
  | 'COMMAND_TIMEOUT'
  | 'PROCESS_EXITED'
  | 'QUEUE_FULL'
  | 'COMMAND_REJECTED'
  | 'COMMAND_FAILED'
  | 'NOT_CONNECTED'
  | 'SESSION_NOT_FOUND'
  | 'ANALYSIS_FAILED'
  | 'INVALID_MESSAGE'
  | 'INTERNAL';

export type CommandErrorCode = Extract<
  ErrorCode,
  'COMMAND_TIMEOUT' | 'PROCESS_EXITED' | 'QUEUE_FULL' | 'COMMAND_REJECTED' | 'COMMAND_FAILED'
>;

export type DispatchErrorCode = Extract<ErrorCode, 'NOT_CONNECTED' | 'SESSION_NOT_FOUND'>;

export interface ErrorPayload {
  code: ErrorCode;
  message: string;
}

export class DebuggerError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }

  toPayload(): ErrorPayload {
    return { code: this.code, message: this.message };
  }
}

/** The debugger process could not be spawned or died before its first prompt */
export class StartError extends DebuggerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('START_FAILED', message, options);
  }
}

/** The target was unreachable or GDB rejected it */
export class ConnectError extends DebuggerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONNECT_FAILED', message, options);
  }
}

export class CommandError extends DebuggerError {
  declare readonly code: CommandErrorCode;

  constructor(code: CommandErrorCode, message: string, options?: { cause?: unknown }) {
    super(code, message, options);
  }

  get isTimeout(): boolean {
    return this.code === 'COMMAND_TIMEOUT';
  }
}

export class DispatchError extends DebuggerError {
  declare readonly code: DispatchErrorCode;

  constructor(code: DispatchErrorCode, message: string) {
    super(code, message);
  }
}

/** The analysis collaborator failed; never fatal to the caller */
export class AnalysisError extends DebuggerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ANALYSIS_FAILED', message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Map any thrown value to the wire shape sent to clients
 */
export function toErrorPayload(error: unknown): ErrorPayload {
  if (error instanceof DebuggerError) {
    return error.toPayload();
  }
  return { code: 'INTERNAL', message: errorMessage(error) };
}
