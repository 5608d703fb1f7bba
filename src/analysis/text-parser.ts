/**
 * Parsers for GDB console text: `bt` output and `info registers` dumps.
 */

import type { Architecture } from './types.js';

export interface ParsedFrame {
  level: number;
  address: string;
  function: string;
  file?: string;
  line?: number;
}

// #0  0x80100abc in panic () at kernel.c:42
// #1  trap (tf=0x8dffefb4) at trap.c:37
const FRAME_PATTERN =
  /^#(\d+)\s+(?:(0x[0-9a-fA-F]+)\s+in\s+)?([^\s(]+)\s*(?:\([^)]*\))?(?:\s+at\s+([^:\s]+):(\d+))?/;

const REGISTER_PATTERN = /^([a-zA-Z][\w.]*)\s+(0x[0-9a-fA-F]+|-?\d+)\b/;

export function parseBacktrace(text: string): ParsedFrame[] {
  const frames: ParsedFrame[] = [];
  for (const rawLine of text.split('\n')) {
    const match = FRAME_PATTERN.exec(rawLine.trim());
    if (!match) {
      continue;
    }
    const [, level, address, fn, file, line] = match;
    frames.push({
      level: Number.parseInt(level, 10),
      address: address ?? '0x0',
      function: fn,
      file,
      line: line !== undefined ? Number.parseInt(line, 10) : undefined
    });
  }
  return frames;
}

/**
 * Extract `name value` pairs, one register per line
 */
export function parseRegisters(text: string): Record<string, string> {
  const registers: Record<string, string> = {};
  for (const rawLine of text.split('\n')) {
    const line = rawLine.trim();
    if (line.startsWith('#')) {
      continue;
    }
    const match = REGISTER_PATTERN.exec(line);
    if (match) {
      registers[match[1]] = match[2];
    }
  }
  return registers;
}

export function detectArchitecture(registerNames: Iterable<string>): Architecture {
  const names = new Set(Array.from(registerNames, (name) => name.toLowerCase()));
  if (names.has('rip') || names.has('rax') || names.has('rsp')) {
    return 'x86_64';
  }
  if (names.has('eip') || names.has('eax') || names.has('esp')) {
    return 'x86_32';
  }
  // sp and pc alone also match aarch64; require an ABI name only RISC-V uses
  if ((names.has('sp') || names.has('pc')) && ['ra', 'gp', 'tp', 'a0', 's0'].some((name) => names.has(name))) {
    return 'riscv';
  }
  return 'unknown';
}

/**
 * Parse a register value as GDB prints it; null when not numeric
 */
export function registerValue(value: string): bigint | null {
  try {
    return BigInt(value);
  } catch {
    return null;
  }
}
