import { describe, it, expect } from 'vitest';
import { formatReport, summarizeLoop } from '../../cli/report';
import { parallelize } from '../../lib/parallelizer';
import { SAMPLE_PROGRAM } from '../helpers/sources';

function fileResult(source: string, written = true) {
  return { ...parallelize(source), inputPath: 'in.cpp', outputPath: 'out.cpp', written };
}

describe('report', () => {
  it('should summarize a loop with 1-based numbering', () => {
    const result = parallelize(SAMPLE_PROGRAM);
    expect(summarizeLoop(result.loops[1], 2)).toEqual({
      index: 2,
      line: 14,
      functionName: 'total',
      loopVar: 'i',
      parallelizable: true,
      alreadyAnnotated: false,
      reductions: ['+:sum'],
      privateVars: [],
      blockers: [],
    });
  });

  it('should list reductions under a parallelized loop', () => {
    const lines = formatReport(fileResult(SAMPLE_PROGRAM), 'plain').split('\n');

    expect(lines.slice(5, 13)).toEqual([
      'Parallelized 2 out of 4 loops:',
      '',
      "✓ Loop 1 in function 'fill' (line 7)",
      "✓ Loop 2 in function 'total' (line 14)",
      '  - Reduction operations: +:sum',
      "✗ Loop 3 in function 'show' (line 21) - Not parallelizable (input/output call in the loop body)",
      "✗ Loop 4 in function 'firstNegative' (line 28) - Not parallelizable (break or continue in the loop body)",
      '',
    ]);
  });

  it('should mark already annotated loops', () => {
    const annotated = parallelize(SAMPLE_PROGRAM).output;
    const report = formatReport(
      { ...parallelize(annotated, { skipAnnotated: true }), inputPath: 'in.cpp', outputPath: 'out.cpp', written: true },
      'plain'
    );

    expect(report.split('\n')[7]).toBe("✓ Loop 1 in function 'fill' (line 9) - already annotated");
  });

  it('should say when there is nothing to do on a dry run', () => {
    const lines = formatReport(fileResult('int main() {\n}\n', false), 'plain').split('\n');

    expect(lines.slice(5)).toEqual([
      'Parallelized 0 out of 0 loops:',
      '',
      'No counting loops found.',
      '',
      '='.repeat(50),
      'Dry run: no output written.',
    ]);
  });
});
