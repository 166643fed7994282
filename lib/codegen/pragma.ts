// OpenMP Directive Generator - Builds the directive line for a parallelizable loop

import type { LoopRecord } from '../ast/types';

export interface PragmaOptions {
  directive: string;
}

export class PragmaSynthesizer {
  private directive: string;

  constructor(options: PragmaOptions = { directive: '#pragma omp parallel for' }) {
    this.directive = options.directive;
  }

  /**
   * Generate the directive line, indented exactly like the loop header
   */
  synthesize(loop: Pick<LoopRecord, 'indent' | 'loopVar' | 'reductionVars' | 'privateVars'>): string {
    const clauses = this.buildClauses(loop);
    const pragma = clauses.length > 0
      ? `${this.directive} ${clauses.join(' ')}`
      : this.directive;

    return `${loop.indent}${pragma}`;
  }

  /**
   * Reduction clauses first, then a private clause. The two are mutually
   * exclusive: private is only emitted when there is no reduction.
   */
  buildClauses(loop: Pick<LoopRecord, 'loopVar' | 'reductionVars' | 'privateVars'>): string[] {
    const clauses = loop.reductionVars.map(r => `reduction(${r.operator}:${r.variable})`);

    // The induction variable is private already
    const privateVars = loop.privateVars.filter(v => v !== loop.loopVar);
    if (privateVars.length > 0 && loop.reductionVars.length === 0) {
      clauses.push(`private(${privateVars.join(',')})`);
    }

    return clauses;
  }
}

export const pragmaSynthesizer = new PragmaSynthesizer();
