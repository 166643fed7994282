/**
 * Dependency Analyzer
 * Classifies a loop body by array-access shape, reductions, I/O and early exits
 */

import type { DependencyAnalysis, LoopBlocker, ReductionVar } from './types';
import {
  BREAK_CONTINUE_REGEX,
  COMPOUND_ADD_REGEX,
  buildIndexedArrayRegex,
  buildIndexedSubscriptRegex,
  buildKeywordRegex,
} from '../parser/patterns';

export interface DependencyAnalyzerOptions {
  ioKeywords: readonly string[];
}

const DEFAULT_IO_KEYWORDS = ['cout', 'cin', 'cerr', 'printf', 'scanf', 'iostream'];

export class DependencyAnalyzer {
  private ioRegex: RegExp | null;

  constructor(options: DependencyAnalyzerOptions = { ioKeywords: DEFAULT_IO_KEYWORDS }) {
    this.ioRegex = buildKeywordRegex(options.ioKeywords);
  }

  /**
   * Analyze loop body text (header line included) for the given induction variable
   */
  analyze(body: string, loopVar: string): DependencyAnalysis {
    const isSimpleArrayAccess = buildIndexedSubscriptRegex(loopVar).test(body);
    const reductionVars = this.findReductionVars(body, loopVar);
    const hasIo = this.ioRegex !== null && this.ioRegex.test(body);
    const hasBreakContinue = BREAK_CONTINUE_REGEX.test(body);
    // Placeholder: no cross-iteration dependency analysis is performed
    const hasDependencies = false;

    const blockers: LoopBlocker[] = [];
    if (!isSimpleArrayAccess) blockers.push('no-indexed-access');
    if (hasIo) blockers.push('io');
    if (hasBreakContinue) blockers.push('break-continue');

    return {
      isSimpleArrayAccess,
      reductionVars,
      // Variables declared in the body are already private under the directive
      privateVars: [],
      hasIo,
      hasBreakContinue,
      hasDependencies,
      isParallelizable: isSimpleArrayAccess && !hasIo && !hasBreakContinue && !hasDependencies,
      blockers,
    };
  }

  /**
   * Every `x +=` target becomes a `+` reduction as long as the body reads
   * some array at `[loopVar]`. The accumulated value is not traced back to
   * that read.
   */
  private findReductionVars(body: string, loopVar: string): ReductionVar[] {
    if (!buildIndexedArrayRegex(loopVar).test(body)) {
      return [];
    }

    const seen = new Set<string>();
    const reductions: ReductionVar[] = [];

    for (const match of body.matchAll(COMPOUND_ADD_REGEX)) {
      const variable = match[1];
      if (seen.has(variable)) continue;
      seen.add(variable);
      reductions.push({ variable, operator: '+' });
    }

    return reductions;
  }
}

export const dependencyAnalyzer = new DependencyAnalyzer();
