/**
 * Diagnostics System
 * Per-run record of what the analysis decided and why
 */

import type { LoopBlocker, LoopRecord } from '../ast/types';

// Diagnostic severity levels
export type DiagnosticSeverity = 'warning' | 'info';

// Diagnostic categories
export type DiagnosticCategory =
  | 'loop'
  | 'rewrite'
  | 'patch';

/**
 * Diagnostic message interface
 */
export interface Diagnostic {
  code: DiagnosticCode;
  severity: DiagnosticSeverity;
  category: DiagnosticCategory;
  message: string;
  // 1-based; source line for loops, output line for the header and patches
  line?: number;
  suggestions?: string[];
}

/**
 * Diagnostic codes with their descriptions
 */
export const DIAGNOSTIC_CODES = {
  // Loop classification (I1xx / W2xx)
  I100: 'Loop parallelized',
  I101: 'Runtime header inserted',
  I102: 'Loop already annotated',
  I103: 'No counting loops found',
  W200: 'Loop not parallelizable',
  W201: 'Loop body not found',

  // Patches (I3xx)
  I300: 'Text patch applied',
};

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

const BLOCKER_DESCRIPTIONS: Record<LoopBlocker, string> = {
  'no-indexed-access': 'no array access indexed by the loop variable',
  'io': 'input/output call in the loop body',
  'break-continue': 'break or continue in the loop body',
};

const BLOCKER_SUGGESTIONS: Record<LoopBlocker, string> = {
  'no-indexed-access': 'Only loops that subscript an array with their counter are considered',
  'io': 'Move printing or reading out of the loop',
  'break-continue': 'Rewrite the early exit as a condition on the loop body',
};

export function describeBlocker(blocker: LoopBlocker): string {
  return BLOCKER_DESCRIPTIONS[blocker];
}

/**
 * Diagnostics collector class
 */
export class DiagnosticsCollector {
  private diagnostics: Diagnostic[] = [];
  private warningCount = 0;

  add(diagnostic: Diagnostic): void {
    this.diagnostics.push(diagnostic);
    if (diagnostic.severity === 'warning') {
      this.warningCount++;
    }
  }

  addWarning(
    code: DiagnosticCode,
    category: DiagnosticCategory,
    message: string,
    options?: { line?: number; suggestions?: string[] }
  ): void {
    this.add({
      code,
      severity: 'warning',
      category,
      message: `${DIAGNOSTIC_CODES[code]}: ${message}`,
      line: options?.line,
      suggestions: options?.suggestions,
    });
  }

  addInfo(
    code: DiagnosticCode,
    category: DiagnosticCategory,
    message: string,
    options?: { line?: number; suggestions?: string[] }
  ): void {
    this.add({
      code,
      severity: 'info',
      category,
      message: `${DIAGNOSTIC_CODES[code]}: ${message}`,
      line: options?.line,
      suggestions: options?.suggestions,
    });
  }

  getWarningCount(): number {
    return this.warningCount;
  }

  getDiagnostics(): Diagnostic[] {
    return [...this.diagnostics];
  }

  getBySeverity(severity: DiagnosticSeverity): Diagnostic[] {
    return this.diagnostics.filter(d => d.severity === severity);
  }

  getByCode(code: DiagnosticCode): Diagnostic[] {
    return this.diagnostics.filter(d => d.code === code);
  }

  /**
   * Format diagnostics for display, warnings first, in recording order
   * within a severity
   */
  format(): string {
    const severityOrder: Record<DiagnosticSeverity, number> = { warning: 0, info: 1 };
    const sorted = [...this.diagnostics].sort(
      (a, b) => severityOrder[a.severity] - severityOrder[b.severity]
    );

    return sorted.map(formatDiagnostic).join('\n');
  }
}

export function formatDiagnostic(d: Diagnostic): string {
  const location = d.line !== undefined ? ` (line ${d.line})` : '';
  let result = `[${d.severity.toUpperCase()}] ${d.code}${location}: ${d.message}`;

  if (d.suggestions && d.suggestions.length > 0) {
    for (const s of d.suggestions) {
      result += `\n    - ${s}`;
    }
  }

  return result;
}

/**
 * Record the verdict for one loop
 */
export function analyzeLoopDiagnostics(loop: LoopRecord, collector: DiagnosticsCollector): void {
  const line = loop.startLine + 1;
  const where = loop.functionName ? ` in '${loop.functionName}'` : '';

  if (!loop.hasBody) {
    collector.addWarning('W201', 'loop',
      `loop over '${loop.loopVar}'${where} has no balanced braces; its extent is the header line alone`,
      { line }
    );
  }

  if (!loop.isParallelizable) {
    collector.addWarning('W200', 'loop',
      `loop over '${loop.loopVar}'${where}: ${loop.blockers.map(describeBlocker).join(', ')}`,
      { line, suggestions: loop.blockers.map(b => BLOCKER_SUGGESTIONS[b]) }
    );
    return;
  }

  if (loop.alreadyAnnotated) {
    collector.addInfo('I102', 'loop',
      `loop over '${loop.loopVar}'${where} already carries a directive`,
      { line }
    );
    return;
  }

  const reductions = loop.reductionVars.map(r => `${r.operator}:${r.variable}`);
  collector.addInfo('I100', 'loop',
    reductions.length > 0
      ? `loop over '${loop.loopVar}'${where} with reduction ${reductions.join(', ')}`
      : `loop over '${loop.loopVar}'${where}`,
    { line }
  );
}

export function createDiagnosticsCollector(): DiagnosticsCollector {
  return new DiagnosticsCollector();
}
