/**
 * Event Monitor
 *
 * Reads one MI client's record stream in its own task and turns records
 * into session events. Crashes and breakpoint hits are enriched with a
 * backtrace and a register snapshot before they are published; crashes
 * are also handed to the analysis collaborator.
 *
 * Records are handled strictly one after another, so events come out in
 * the order their records arrived.
 */

import type { CommandExecutor, MiClient, RawRecord } from '../mi/mi-client.js';
import { type MiRecord, type MiTuple, miString, quoteMiString } from '../mi/record-parser.js';
import {
  type RegisterSnapshot,
  type SessionEvent,
  type StackFrame,
  convertStopFrame
} from './types.js';
import type { AnalysisReport, CrashAnalyzer } from '../analysis/types.js';
import { type CrashSnapshot, renderCrashText } from '../analysis/render.js';
import { AnalysisError, errorMessage } from '../errors.js';
import { type Logger, createLogger } from '../logger.js';
import { withTimeout } from '../util/timeout.js';

/** Signals that mean the program faulted rather than was merely interrupted */
export const FAULT_SIGNALS: ReadonlySet<string> = new Set(['SIGSEGV', 'SIGBUS', 'SIGILL', 'SIGABRT']);

const EXIT_REASONS: ReadonlySet<string> = new Set(['exited', 'exited-normally', 'exited-signalled']);

/**
 * What the monitor needs from the MI client
 */
export type MonitoredClient = Pick<MiClient, 'records' | 'exclusive' | 'stackListFrames' | 'listRegisters'>;

export type EventSink = (event: SessionEvent) => void;

export interface EventMonitorOptions {
  /** Timeout for each enrichment command */
  enrichTimeoutMs?: number;
  analysisTimeoutMs?: number;
  /** Omit to publish crashes without analysis */
  analyzer?: CrashAnalyzer;
  logger?: Logger;
}

interface Enrichment {
  backtrace: readonly StackFrame[];
  registers: RegisterSnapshot;
  /** `info frame` output; crashes only */
  frameInfo?: string;
  errors: string[];
}

const INFO_FRAME_COMMAND = `-interpreter-exec console ${quoteMiString('info frame')}`;

export class EventMonitor {
  private records: AsyncIterableIterator<RawRecord> | null = null;
  private task: Promise<void> | null = null;
  private stopped = false;
  private readonly logger: Logger;
  private readonly enrichTimeoutMs: number;
  private readonly analysisTimeoutMs: number;

  constructor(
    private readonly client: MonitoredClient,
    private readonly publish: EventSink,
    private readonly options: EventMonitorOptions = {}
  ) {
    this.logger = options.logger ?? createLogger('event-monitor');
    this.enrichTimeoutMs = options.enrichTimeoutMs ?? 5000;
    this.analysisTimeoutMs = options.analysisTimeoutMs ?? 3000;
  }

  /**
   * Subscribe to the client's records and start classifying them
   */
  start(): void {
    if (this.task) {
      return;
    }
    const records = this.client.records();
    this.records = records;
    this.task = this.consume(records).catch((error: unknown) => {
      this.logger.error({ err: error }, 'event monitor failed');
      this.publish({ kind: 'error', message: `Event monitor failed: ${errorMessage(error)}` });
    });
  }

  /**
   * Stop consuming. An event still being enriched is dropped.
   */
  async stop(): Promise<void> {
    this.stopped = true;
    await this.records?.return?.();
    await this.task;
  }

  /** Resolves when the record stream has ended */
  get finished(): Promise<void> {
    return this.task ?? Promise.resolve();
  }

  private async consume(records: AsyncIterableIterator<RawRecord>): Promise<void> {
    for await (const record of records) {
      if (this.stopped) {
        break;
      }
      if (record.kind === 'end') {
        this.logger.debug({ reason: record.reason, exitCode: record.exitCode }, 'record stream ended');
        break;
      }
      await this.handle(record);
    }
  }

  private emit(event: SessionEvent): void {
    if (this.stopped) {
      this.logger.debug({ kind: event.kind }, 'monitor stopped, dropping event');
      return;
    }
    this.publish(event);
  }

  private async handle(record: MiRecord): Promise<void> {
    switch (record.kind) {
      case 'exec':
        if (record.asyncClass === 'stopped') {
          await this.handleStop(record.results);
        } else if (record.asyncClass === 'running') {
          this.emit({ kind: 'running', threadId: miString(record.results, 'thread-id') });
        } else {
          this.logger.debug({ raw: record.raw }, 'ignoring exec record');
        }
        break;

      case 'notify':
        if (record.asyncClass === 'thread-group-started') {
          const pid = miString(record.results, 'pid');
          this.emit({ kind: 'started', pid: pid !== undefined ? Number.parseInt(pid, 10) : undefined });
        } else {
          this.logger.debug({ raw: record.raw }, 'ignoring notify record');
        }
        break;

      case 'console':
      case 'target':
      case 'log':
      case 'program':
        this.emit({ kind: 'console_output', stream: record.kind, text: record.text });
        break;

      case 'prompt':
      case 'result':
        // prompts carry nothing; results belong to the command that sent them
        break;

      default:
        this.logger.debug({ kind: record.kind, raw: record.raw }, 'unrecognized record dropped');
    }
  }

  private async handleStop(results: MiTuple): Promise<void> {
    const reason = miString(results, 'reason') ?? 'unknown';
    const frame = convertStopFrame(results);

    if (reason === 'signal-received') {
      const signal = miString(results, 'signal-name') ?? 'UNKNOWN';
      if (FAULT_SIGNALS.has(signal)) {
        await this.publishCrash(signal, miString(results, 'signal-meaning'), frame);
      } else {
        this.emit({ kind: 'stopped', reason, signal, frame });
      }
      return;
    }

    if (reason === 'breakpoint-hit') {
      const number = Number.parseInt(miString(results, 'bkptno') ?? '0', 10);
      const enrichment = await this.enrich();
      this.emit({
        kind: 'breakpoint_hit',
        number,
        frame,
        backtrace: enrichment.backtrace,
        registers: enrichment.registers,
        enrichmentErrors: enrichment.errors
      });
      return;
    }

    if (EXIT_REASONS.has(reason)) {
      this.emit(exitEvent(reason, results));
      return;
    }

    this.emit({ kind: 'stopped', reason, frame });
  }

  private async publishCrash(signal: string, meaning: string | undefined, frame: StackFrame | undefined): Promise<void> {
    const enrichment = await this.enrich(true);
    if (this.stopped) {
      return;
    }

    const analysis = await this.analyze({
      signal,
      meaning,
      backtrace: enrichment.backtrace,
      registers: enrichment.registers,
      frameInfo: enrichment.frameInfo
    });

    this.emit({
      kind: 'crashed',
      signal,
      meaning,
      frame,
      backtrace: enrichment.backtrace,
      registers: enrichment.registers,
      frameInfo: enrichment.frameInfo,
      analysis,
      enrichmentErrors: enrichment.errors
    });
  }

  /**
   * Read backtrace and registers (and, for a crash, `info frame`) as one
   * job ahead of any queued command. A failing query leaves its part empty
   * and is reported in `errors`.
   */
  private async enrich(withFrameInfo = false): Promise<Enrichment> {
    const errors: string[] = [];
    let backtrace: readonly StackFrame[] = [];
    let registers: RegisterSnapshot = {};
    let frameInfo: string | undefined;

    try {
      await this.client.exclusive(async (execute: CommandExecutor) => {
        try {
          backtrace = Object.freeze(await this.client.stackListFrames(execute, this.enrichTimeoutMs));
        } catch (error) {
          errors.push(`backtrace: ${errorMessage(error)}`);
        }
        try {
          registers = await this.client.listRegisters(execute, this.enrichTimeoutMs);
        } catch (error) {
          errors.push(`registers: ${errorMessage(error)}`);
        }
        if (withFrameInfo) {
          try {
            const response = await execute(INFO_FRAME_COMMAND, this.enrichTimeoutMs);
            frameInfo = response.console.join('');
          } catch (error) {
            errors.push(`frame info: ${errorMessage(error)}`);
          }
        }
      });
    } catch (error) {
      errors.push(errorMessage(error));
    }

    if (errors.length > 0) {
      this.logger.warn({ errors }, 'enrichment incomplete');
    }
    return { backtrace, registers, frameInfo, errors };
  }

  private async analyze(snapshot: CrashSnapshot): Promise<AnalysisReport | undefined> {
    const analyzer = this.options.analyzer;
    if (!analyzer) {
      return undefined;
    }

    const text = renderCrashText(snapshot);
    try {
      return await withTimeout(
        Promise.resolve().then(() => analyzer.analyze(text)),
        this.analysisTimeoutMs,
        () => new AnalysisError(`Crash analysis timed out after ${this.analysisTimeoutMs}ms`)
      );
    } catch (error) {
      const failure =
        error instanceof AnalysisError
          ? error
          : new AnalysisError(`Crash analysis failed: ${errorMessage(error)}`, { cause: error });
      this.logger.warn({ err: failure }, 'publishing crash without analysis');
      return undefined;
    }
  }
}

function exitEvent(reason: string, results: MiTuple): SessionEvent {
  if (reason === 'exited-normally') {
    return { kind: 'exited', code: 0 };
  }
  if (reason === 'exited-signalled') {
    return { kind: 'exited', code: null, signal: miString(results, 'signal-name') };
  }
  // exit-code is printed in octal
  const code = Number.parseInt(miString(results, 'exit-code') ?? '', 8);
  return { kind: 'exited', code: Number.isNaN(code) ? null : code };
}
