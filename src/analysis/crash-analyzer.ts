/**
 * Crash Analyzer
 *
 * Default analysis collaborator: reads a backtrace and register dump out of
 * GDB console text and reports what looks wrong.
 */

import { rankHypotheses } from './hypotheses.js';
import {
  type ParsedFrame,
  detectArchitecture,
  parseBacktrace,
  parseRegisters,
  registerValue
} from './text-parser.js';
import type { AnalysisReport, Architecture, CrashAnalyzer, Finding } from './types.js';

const ASSERT_FUNCTIONS = new Set(['assert', '__assert_fail', '__assert_rtn', 'assertion']);

const BOGUS_POINTERS = new Set([0n, 0xdeadbeefn, 0xccccccccn]);

interface ArchRegisters {
  ip: string[];
  sp: string;
  pointerArgs: string[];
  nullSeverity: Finding['severity'];
  nullCategory: string;
}

const ARCH_REGISTERS: Record<Exclude<Architecture, 'unknown'>, ArchRegisters> = {
  x86_64: {
    ip: ['rip'],
    sp: 'rsp',
    pointerArgs: ['rax', 'rbx', 'rcx', 'rdx', 'rsi', 'rdi'],
    nullSeverity: 'warning',
    nullCategory: 'null_pointer'
  },
  x86_32: {
    ip: ['eip'],
    sp: 'esp',
    pointerArgs: ['eax', 'ebx', 'ecx', 'edx', 'esi', 'edi'],
    nullSeverity: 'warning',
    nullCategory: 'null_pointer'
  },
  riscv: {
    ip: ['pc', 'sepc'],
    sp: 'sp',
    pointerArgs: ['a0', 'a1', 'a2', 'a3', 'a4', 'a5', 'a6', 'a7'],
    nullSeverity: 'info',
    nullCategory: 'null_value'
  }
};

export class BacktraceAnalyzer implements CrashAnalyzer {
  analyze(text: string): AnalysisReport {
    const frames = parseBacktrace(text);
    const registers = parseRegisters(text);
    const architecture = detectArchitecture(Object.keys(registers));

    const findings = [
      ...analyzeFrames(frames),
      ...analyzeRegisters(registers, architecture)
    ];

    return {
      summary: summarize(frames),
      architecture,
      findings,
      hypotheses: rankHypotheses(findings)
    };
  }
}

function describeLocation(frame: ParsedFrame): string {
  return frame.file !== undefined ? `${frame.file}:${frame.line ?? '?'}` : frame.address;
}

function analyzeFrames(frames: ParsedFrame[]): Finding[] {
  const findings: Finding[] = [];

  const panicIndex = frames.findIndex((frame) => frame.function === 'panic');
  if (panicIndex !== -1) {
    const caller = frames[panicIndex + 1];
    findings.push({
      severity: 'high',
      category: 'panic',
      message: caller
        ? `Panic called from \`${caller.function}()\` at ${describeLocation(caller)}.`
        : 'Panic detected with no calling frame.'
    });
  }

  if (frames.some((frame) => ASSERT_FUNCTIONS.has(frame.function))) {
    findings.push({
      severity: 'high',
      category: 'assertion',
      message: 'Assertion failure in the backtrace.'
    });
  }

  return findings;
}

function analyzeRegisters(registers: Record<string, string>, architecture: Architecture): Finding[] {
  if (architecture === 'unknown') {
    return [];
  }

  const layout = ARCH_REGISTERS[architecture];
  const findings: Finding[] = [];
  const read = (name: string): bigint | null =>
    registers[name] !== undefined ? registerValue(registers[name]) : null;

  for (const name of layout.ip) {
    const value = read(name);
    if (value !== null && BOGUS_POINTERS.has(value)) {
      findings.push({
        severity: 'critical',
        category: 'invalid_ip',
        message: `Invalid instruction pointer (${name.toUpperCase()} = 0x${value.toString(16)}).`
      });
      break;
    }
  }

  if (read(layout.sp) === 0n) {
    findings.push({
      severity: 'critical',
      category: 'invalid_sp',
      message: `Stack pointer (${layout.sp.toUpperCase()}) is null.`
    });
  }

  for (const name of layout.pointerArgs) {
    if (read(name) === 0n) {
      findings.push({
        severity: layout.nullSeverity,
        category: layout.nullCategory,
        message: `Register ${name.toUpperCase()} is 0x0 (NULL).`
      });
    }
  }

  return findings;
}

function summarize(frames: ParsedFrame[]): string {
  if (frames.length === 0) {
    return 'No backtrace found in the input.';
  }
  return `Program crashed in \`${frames[0].function}()\`. Backtrace has ${frames.length} frame(s).`;
}
