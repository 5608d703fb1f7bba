/**
 * Render a captured crash as GDB console text, the input format of the
 * analysis collaborator.
 */

import type { RegisterSnapshot, StackFrame } from '../session/types.js';

export interface CrashSnapshot {
  signal: string;
  meaning?: string;
  backtrace: readonly StackFrame[];
  registers: RegisterSnapshot;
  frameInfo?: string;
}

export function renderFrame(frame: StackFrame): string {
  const location = frame.file !== undefined ? ` at ${frame.file}:${frame.line ?? 0}` : '';
  return `#${frame.level}  ${frame.address} in ${frame.function} ()${location}`;
}

export function renderCrashText(snapshot: CrashSnapshot): string {
  const lines: string[] = [];
  lines.push(
    snapshot.meaning
      ? `Program received signal ${snapshot.signal}, ${snapshot.meaning}.`
      : `Program received signal ${snapshot.signal}.`
  );
  lines.push(...snapshot.backtrace.map(renderFrame));
  lines.push('');
  const frameInfo = snapshot.frameInfo?.trimEnd();
  if (frameInfo) {
    lines.push(frameInfo, '');
  }
  for (const [name, value] of Object.entries(snapshot.registers)) {
    lines.push(`${name.padEnd(15)}${value}`);
  }
  return lines.join('\n');
}
