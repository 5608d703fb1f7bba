/**
 * Hypothesis ranking
 *
 * A pure function over findings: nothing is cached between calls, so two
 * sessions analysing crashes at the same time cannot see each other's data.
 */

import type { Finding, Hypothesis, HypothesisPriority } from './types.js';

const PRIORITY_ORDER: Record<HypothesisPriority, number> = { high: 0, medium: 1, low: 2 };

function evidenceFor(findings: readonly Finding[], categories: readonly string[]): string[] {
  return findings
    .filter((finding) => categories.includes(finding.category))
    .map((finding) => finding.message);
}

export function rankHypotheses(findings: readonly Finding[]): Hypothesis[] {
  const hypotheses: Hypothesis[] = [];

  const nullEvidence = evidenceFor(findings, ['null_pointer', 'null_value']);
  if (nullEvidence.length > 0) {
    hypotheses.push({
      priority: 'high',
      scenario: 'Null Pointer Dereference',
      evidence: nullEvidence,
      explanation:
        'A register that is commonly dereferenced holds zero at the faulting instruction.',
      suggestions: [
        'Identify the faulting function from the top frame of the backtrace',
        'Look for uninitialized pointers or missing null checks',
        'Print the suspect variables with `p <name>` at the crash site'
      ]
    });
  }

  const corruptionEvidence = evidenceFor(findings, ['invalid_ip', 'invalid_sp']);
  if (corruptionEvidence.length > 0) {
    hypotheses.push({
      priority: 'high',
      scenario: 'Memory Corruption / Invalid Control Flow',
      evidence: corruptionEvidence,
      explanation:
        'The instruction or stack pointer holds a value no valid program state produces.',
      suggestions: [
        'Check for buffer overflows that may have overwritten a return address',
        'Check function pointers and vtables for corruption',
        'Set a watchpoint on the corrupted location and re-run'
      ]
    });
  }

  const panicEvidence = evidenceFor(findings, ['panic', 'assertion']);
  if (panicEvidence.length > 0) {
    hypotheses.push({
      priority: 'medium',
      scenario: 'Explicit Panic or Failed Assertion',
      evidence: panicEvidence,
      explanation: 'The program stopped itself after detecting an inconsistent state.',
      suggestions: [
        'Inspect the caller of the panic or assert frame',
        'Check the condition that was asserted'
      ]
    });
  }

  return hypotheses.sort((a, b) => PRIORITY_ORDER[a.priority] - PRIORITY_ORDER[b.priority]);
}
