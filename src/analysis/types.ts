/**
 * Analysis Types
 *
 * Contract of the static-analysis collaborator consumed by the event
 * monitor when a crash is detected.
 */

export type Severity = 'critical' | 'high' | 'warning' | 'info';

export type Architecture = 'x86_64' | 'x86_32' | 'riscv' | 'unknown';

export interface Finding {
  severity: Severity;
  category: string;
  message: string;
}

export type HypothesisPriority = 'high' | 'medium' | 'low';

export interface Hypothesis {
  priority: HypothesisPriority;
  scenario: string;
  evidence: string[];
  explanation: string;
  suggestions: string[];
}

export interface AnalysisReport {
  summary: string;
  architecture: Architecture;
  findings: Finding[];
  hypotheses: Hypothesis[];
}

/**
 * Turns a text rendering of a crash (backtrace, registers, ...) into
 * findings. Implementations must be side-effect free and safe to call
 * concurrently from several sessions.
 */
export interface CrashAnalyzer {
  analyze(text: string): AnalysisReport | Promise<AnalysisReport>;
}
