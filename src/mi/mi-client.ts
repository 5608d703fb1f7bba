/**
 * GDB/MI Client
 *
 * Owns one GDB process running the machine interface. Commands are tagged
 * with a numeric token and serialized through a queue; replies are matched
 * back to their command by token while every record, reply or not, is
 * forwarded to record subscribers in arrival order.
 */

import { EventEmitter } from 'events';
import { spawn } from 'child_process';
import type { Readable, Writable } from 'stream';
import { CommandQueue } from './command-queue.js';
import {
  MiRecordParser,
  type MiRecord,
  type MiResultRecord,
  isMiTuple,
  miList,
  miString,
  miTuple,
  quoteMiString
} from './record-parser.js';
import {
  type BreakpointInfo,
  type CommandResponse,
  type MemoryBlock,
  type RegisterSnapshot,
  type StackFrame,
  convertBreakpoint,
  convertStackFrame
} from '../session/types.js';
import { CommandError, StartError, errorMessage } from '../errors.js';
import type { QueueMode } from '../config.js';
import { type Logger, createLogger } from '../logger.js';
import { AsyncChannel } from '../util/async-channel.js';

/**
 * The subset of ChildProcess the client relies on
 */
export interface DebuggerProcess extends EventEmitter {
  readonly pid?: number;
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type SpawnDebugger = (
  command: string,
  args: string[],
  options: { env?: Record<string, string>; cwd?: string }
) => DebuggerProcess;

/**
 * Configuration for starting a GDB process
 */
export interface MiClientConfig {
  /** Path to gdb */
  command: string;
  /** Arguments appended after --interpreter=mi */
  args?: string[];
  /** Extra environment variables */
  env?: Record<string, string>;
  /** Working directory */
  cwd?: string;
  /** Default command timeout in milliseconds */
  timeout?: number;
  /** Time allowed for the first (gdb) prompt */
  startupTimeout?: number;
  /** Grace period between SIGTERM and SIGKILL */
  killTimeout?: number;
  queueDepth?: number;
  queueMode?: QueueMode;
  /** Replaces child_process.spawn */
  spawnProcess?: SpawnDebugger;
  logger?: Logger;
}

/** Final record of every record stream */
export interface EndOfStream {
  kind: 'end';
  reason: 'exited' | 'stopped';
  exitCode: number | null;
  signal: NodeJS.Signals | null;
}

export type RawRecord = MiRecord | EndOfStream;

export type CommandExecutor = (command: string, timeout?: number) => Promise<CommandResponse>;

export interface ExitInfo {
  code: number | null;
  signal: NodeJS.Signals | null;
  /** True when the exit was requested through stop() */
  expected: boolean;
}

/**
 * Events emitted by the MI client
 */
export interface MiClientEvents {
  record: (record: MiRecord) => void;
  stderr: (text: string) => void;
  exit: (info: ExitInfo) => void;
  error: (error: Error) => void;
}

interface PendingCommand {
  command: string;
  resolve: (response: CommandResponse) => void;
  reject: (error: Error) => void;
  timeout: ReturnType<typeof setTimeout>;
  console: string[];
}

interface ReadyWaiter {
  resolve: () => void;
  reject: (error: Error) => void;
}

const defaultSpawn: SpawnDebugger = (command, args, options) =>
  spawn(command, args, {
    stdio: ['pipe', 'pipe', 'pipe'],
    env: { ...process.env, ...options.env },
    cwd: options.cwd
  });

/** How long to wait for stdout to drain once the process has exited */
const DRAIN_AFTER_EXIT_MS = 200;

export class MiClient extends EventEmitter {
  private process: DebuggerProcess | null = null;
  private parser = new MiRecordParser();
  private nextToken = 1;
  private pending: Map<number, PendingCommand> = new Map();
  private queue: CommandQueue;
  private channels: Set<AsyncChannel<RawRecord>> = new Set();
  private readyWaiter: ReadyWaiter | null = null;
  private registerNames: string[] | null = null;
  private ready = false;
  private exited = false;
  private finalized = false;
  private stopRequested = false;
  private stopping: Promise<void> | null = null;
  private exitInfo: ExitInfo | null = null;
  private readonly defaultTimeout: number;
  private readonly logger: Logger;

  /** Executor that goes through the command queue */
  readonly send: CommandExecutor = (command, timeout) => this.sendCommand(command, timeout);

  constructor(private readonly config: MiClientConfig) {
    super();
    this.defaultTimeout = config.timeout ?? 5000;
    this.queue = new CommandQueue({
      maxDepth: config.queueDepth ?? 32,
      mode: config.queueMode ?? 'queue'
    });
    this.logger = config.logger ?? createLogger('mi-client');
  }

  /**
   * Spawn GDB and wait for its first prompt
   */
  async start(): Promise<void> {
    if (this.process || this.stopRequested) {
      throw new StartError('GDB client has already been started');
    }

    const args = ['--interpreter=mi', ...(this.config.args ?? [])];
    const spawnProcess = this.config.spawnProcess ?? defaultSpawn;
    this.logger.info({ command: this.config.command, args }, 'starting gdb');

    const ready = new Promise<void>((resolve, reject) => {
      this.readyWaiter = { resolve, reject };
    });

    let child: DebuggerProcess;
    try {
      child = spawnProcess(this.config.command, args, {
        env: this.config.env,
        cwd: this.config.cwd
      });
    } catch (error) {
      this.readyWaiter = null;
      throw new StartError(`Failed to start ${this.config.command}: ${errorMessage(error)}`, {
        cause: error
      });
    }
    this.process = child;

    child.stdout?.on('data', (data: Buffer) => {
      this.handleData(data);
    });

    child.stdout?.on('close', () => {
      this.finalize();
    });

    child.stderr?.on('data', (data: Buffer) => {
      const text = data.toString('utf8');
      this.logger.debug({ text }, 'gdb stderr');
      this.emit('stderr', text);
    });

    child.on('error', (error: Error) => {
      this.handleProcessError(error);
    });

    child.on('exit', (code: number | null, signal: NodeJS.Signals | null) => {
      this.handleExit(code, signal);
    });

    const startupTimeout = this.config.startupTimeout ?? 10000;
    const timer = setTimeout(() => {
      this.settleReady(new StartError(`GDB did not become ready within ${startupTimeout}ms`));
    }, startupTimeout);

    try {
      await ready;
    } catch (error) {
      await this.stop();
      throw error instanceof StartError
        ? error
        : new StartError(errorMessage(error), { cause: error });
    } finally {
      clearTimeout(timer);
    }

    this.logger.info({ pid: child.pid }, 'gdb ready');
  }

  /**
   * Queue a command and wait for the reply carrying its token
   */
  sendCommand(command: string, timeout?: number): Promise<CommandResponse> {
    return this.queue.run(() => this.execute(command, timeout));
  }

  /**
   * Run several commands as one job, ahead of anything already waiting.
   * Nothing else reaches GDB until the job settles.
   */
  exclusive<T>(job: (execute: CommandExecutor) => Promise<T>): Promise<T> {
    return this.queue.run(
      () => job((command, timeout) => this.execute(command, timeout)),
      true
    );
  }

  /**
   * Every record read from GDB from now on, in arrival order, ending with
   * an `end` record when GDB exits or the client is stopped.
   */
  records(): AsyncIterableIterator<RawRecord> {
    const channel = new AsyncChannel<RawRecord>();
    if (this.finalized) {
      channel.push(this.endRecord());
      channel.close();
      return channel;
    }
    this.channels.add(channel);
    return channel;
  }

  /**
   * Terminate GDB. Resolves once the process is gone; safe to call any
   * number of times and after a failed start.
   */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.terminate();
    }
    return this.stopping;
  }

  isStarted(): boolean {
    return this.ready && !this.exited && !this.stopRequested;
  }

  get pid(): number | undefined {
    return this.process?.pid;
  }

  get queueDepth(): number {
    return this.queue.depth;
  }

  // ============================================
  // Process plumbing
  // ============================================

  private handleData(data: Buffer): void {
    this.parser.append(data);
    for (const record of this.parser.parseAll()) {
      this.handleRecord(record);
    }
  }

  private handleRecord(record: MiRecord): void {
    for (const channel of this.channels) {
      if (!channel.push(record)) {
        this.channels.delete(channel);
      }
    }
    this.emit('record', record);

    switch (record.kind) {
      case 'prompt':
        if (!this.ready) {
          this.ready = true;
          this.settleReady(null);
        }
        break;
      case 'console':
        for (const pending of this.pending.values()) {
          pending.console.push(record.text);
        }
        break;
      case 'result':
        this.handleResult(record.token, record);
        break;
      default:
        break;
    }
  }

  private handleResult(token: number | undefined, record: MiResultRecord): void {
    const pending = token !== undefined ? this.pending.get(token) : undefined;
    if (token === undefined || !pending) {
      // Reply to a command that already timed out, or one we never sent
      this.logger.debug({ token, raw: record.raw }, 'dropping uncorrelated result record');
      return;
    }

    clearTimeout(pending.timeout);
    this.pending.delete(token);

    if (record.resultClass === 'error') {
      pending.reject(
        new CommandError(
          'COMMAND_FAILED',
          miString(record.results, 'msg') ?? `Command '${pending.command}' failed`
        )
      );
      return;
    }

    pending.resolve({
      token,
      command: pending.command,
      resultClass: record.resultClass,
      results: record.results,
      console: pending.console
    });
  }

  private handleProcessError(error: Error): void {
    this.logger.error({ err: error }, 'gdb process error');
    const starting = this.readyWaiter !== null;
    this.settleReady(
      new StartError(`Failed to start ${this.config.command}: ${error.message}`, { cause: error })
    );
    if (this.process?.pid === undefined) {
      // spawn itself failed (e.g. ENOENT); there will be no exit event
      this.handleExit(null, null);
    }
    if (!starting && this.listenerCount('error') > 0) {
      this.emit('error', error);
    }
  }

  private handleExit(code: number | null, signal: NodeJS.Signals | null): void {
    if (this.exited) {
      return;
    }
    this.exited = true;
    this.exitInfo = { code, signal, expected: this.stopRequested };

    const reason = signal ? `signal ${signal}` : `code ${code}`;
    this.logger.info({ code, signal, expected: this.stopRequested }, 'gdb exited');

    this.settleReady(new StartError(`GDB exited with ${reason} before becoming ready`));

    const error = new CommandError('PROCESS_EXITED', `GDB exited with ${reason}`);
    this.queue.close(error);
    this.rejectAllPending(error);

    setTimeout(() => this.finalize(), DRAIN_AFTER_EXIT_MS).unref();
    this.emit('exit', this.exitInfo);
  }

  private settleReady(error: Error | null): void {
    const waiter = this.readyWaiter;
    if (!waiter) {
      return;
    }
    this.readyWaiter = null;
    if (error) {
      waiter.reject(error);
    } else {
      waiter.resolve();
    }
  }

  /**
   * Flush the parser and end every record stream
   */
  private finalize(): void {
    if (this.finalized) {
      return;
    }
    this.finalized = true;

    for (const record of this.parser.flush()) {
      this.handleRecord(record);
    }

    const end = this.endRecord();
    for (const channel of this.channels) {
      channel.push(end);
      channel.close();
    }
    this.channels.clear();
  }

  private endRecord(): EndOfStream {
    return {
      kind: 'end',
      reason: this.stopRequested ? 'stopped' : 'exited',
      exitCode: this.exitInfo?.code ?? null,
      signal: this.exitInfo?.signal ?? null
    };
  }

  private async terminate(): Promise<void> {
    this.stopRequested = true;
    const error = new CommandError('PROCESS_EXITED', 'GDB session was stopped');
    this.queue.close(error);
    this.rejectAllPending(error);

    const child = this.process;
    if (child && !this.hasExited(child)) {
      const killTimeout = this.config.killTimeout ?? 2000;
      const exited = this.waitForExit(child);

      child.stdin?.end();
      child.kill('SIGTERM');

      if (!(await withinTimeout(exited, killTimeout))) {
        this.logger.warn({ pid: child.pid }, 'gdb ignored SIGTERM, sending SIGKILL');
        child.kill('SIGKILL');
        if (!(await withinTimeout(exited, killTimeout))) {
          this.logger.error({ pid: child.pid }, 'gdb did not exit after SIGKILL');
        }
      }
    }

    this.finalize();
    this.parser.clear();
  }

  private hasExited(child: DebuggerProcess): boolean {
    return this.exited || child.exitCode !== null || child.signalCode !== null || child.pid === undefined;
  }

  private waitForExit(child: DebuggerProcess): Promise<void> {
    if (this.hasExited(child)) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      child.once('exit', () => resolve());
    });
  }

  // ============================================
  // Command execution
  // ============================================

  private execute(command: string, timeout?: number): Promise<CommandResponse> {
    if (!this.isStarted()) {
      return Promise.reject(new CommandError('PROCESS_EXITED', 'GDB is not running'));
    }
    if (/[\r\n]/.test(command)) {
      // A second line would reach GDB without a token, outside the queue
      return Promise.reject(
        new CommandError('COMMAND_REJECTED', `Command must be a single line: ${JSON.stringify(command)}`)
      );
    }

    const token = this.nextToken++;
    const timeoutMs = timeout ?? this.defaultTimeout;

    return new Promise((resolve, reject) => {
      const timeoutHandle = setTimeout(() => {
        this.pending.delete(token);
        reject(new CommandError('COMMAND_TIMEOUT', `Command '${command}' timed out after ${timeoutMs}ms`));
      }, timeoutMs);

      this.pending.set(token, {
        command,
        resolve,
        reject,
        timeout: timeoutHandle,
        console: []
      });

      try {
        this.writeLine(`${token}${command}`);
        this.logger.debug({ token, command }, 'sent command');
      } catch (error) {
        clearTimeout(timeoutHandle);
        this.pending.delete(token);
        reject(new CommandError('PROCESS_EXITED', errorMessage(error), { cause: error }));
      }
    });
  }

  private writeLine(line: string): void {
    const stdin = this.process?.stdin;
    if (!stdin?.writable) {
      throw new Error('Cannot send command: gdb stdin is not writable');
    }
    stdin.write(`${line}\n`);
  }

  private rejectAllPending(error: Error): void {
    for (const pending of this.pending.values()) {
      clearTimeout(pending.timeout);
      pending.reject(error);
    }
    this.pending.clear();
  }

  // ============================================
  // High-level MI operations
  // ============================================

  /**
   * Select a target: `host:port` is a remote stub, anything else a local
   * executable
   */
  async connectTarget(target: string): Promise<CommandResponse> {
    const command = isRemoteTarget(target)
      ? `-target-select remote ${target}`
      : `-file-exec-and-symbols ${quoteMiString(target)}`;
    return this.sendCommand(command);
  }

  run(): Promise<CommandResponse> {
    return this.sendCommand('-exec-run');
  }

  continue(): Promise<CommandResponse> {
    return this.sendCommand('-exec-continue');
  }

  next(): Promise<CommandResponse> {
    return this.sendCommand('-exec-next');
  }

  step(): Promise<CommandResponse> {
    return this.sendCommand('-exec-step');
  }

  finish(): Promise<CommandResponse> {
    return this.sendCommand('-exec-finish');
  }

  interrupt(): Promise<CommandResponse> {
    return this.sendCommand('-exec-interrupt');
  }

  /**
   * Run a console command and collect what it printed
   */
  async cliCommand(text: string, timeout?: number): Promise<{ output: string; response: CommandResponse }> {
    const response = await this.sendCommand(`-interpreter-exec console ${quoteMiString(text)}`, timeout);
    return { output: response.console.join(''), response };
  }

  async stackListFrames(execute: CommandExecutor = this.send, timeout?: number): Promise<StackFrame[]> {
    const response = await execute('-stack-list-frames', timeout);
    return miList(response.results, 'stack').filter(isMiTuple).map(convertStackFrame);
  }

  /**
   * Read every named register as hex. Register names are fetched once and
   * cached for the lifetime of the process.
   */
  async listRegisters(execute: CommandExecutor = this.send, timeout?: number): Promise<RegisterSnapshot> {
    if (!this.registerNames) {
      const namesResponse = await execute('-data-list-register-names', timeout);
      this.registerNames = miList(namesResponse.results, 'register-names').map((name) =>
        typeof name === 'string' ? name : ''
      );
    }
    const names = this.registerNames;

    const response = await execute('-data-list-register-values x', timeout);
    const registers: Record<string, string> = {};
    for (const entry of miList(response.results, 'register-values')) {
      if (!isMiTuple(entry)) {
        continue;
      }
      const number = Number.parseInt(miString(entry, 'number') ?? '', 10);
      const value = miString(entry, 'value');
      const name = names[number];
      if (name && value !== undefined) {
        registers[name] = value;
      }
    }
    return Object.freeze(registers);
  }

  async breakInsert(location: string): Promise<BreakpointInfo> {
    const response = await this.sendCommand(`-break-insert ${location}`);
    const bkpt = miTuple(response.results, 'bkpt') ?? {};
    return convertBreakpoint(bkpt, location);
  }

  async readMemory(address: string, size: number): Promise<MemoryBlock> {
    const response = await this.sendCommand(`-data-read-memory-bytes ${address} ${size}`);
    const block = miList(response.results, 'memory').find(isMiTuple);
    return {
      begin: miString(block, 'begin') ?? address,
      end: miString(block, 'end'),
      contents: miString(block, 'contents') ?? ''
    };
  }
}

export function isRemoteTarget(target: string): boolean {
  return /^[^\s/\\]*:\d+$/.test(target);
}

async function withinTimeout(promise: Promise<void>, ms: number): Promise<boolean> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => resolve(false), ms);
  });
  try {
    return await Promise.race([promise.then(() => true), expired]);
  } finally {
    clearTimeout(timer);
  }
}
