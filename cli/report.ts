import chalk from 'chalk';
import type { ReportFormat } from '../lib/config';
import type { LoopRecord } from '../lib/ast/types';
import type { ParallelizeFileResult } from '../lib/parallelizer';
import { describeBlocker } from '../lib/validation/diagnostics';

const RULE = '='.repeat(50);

interface Palette {
  title: (text: string) => string;
  ok: (text: string) => string;
  fail: (text: string) => string;
  muted: (text: string) => string;
}

const PLAIN: Palette = {
  title: text => text,
  ok: text => text,
  fail: text => text,
  muted: text => text,
};

const PRETTY: Palette = {
  title: text => chalk.bold(text),
  ok: text => chalk.green(text),
  fail: text => chalk.red(text),
  muted: text => chalk.gray(text),
};

export interface LoopSummary {
  index: number;
  line: number;
  functionName: string;
  loopVar: string;
  parallelizable: boolean;
  alreadyAnnotated: boolean;
  reductions: string[];
  privateVars: string[];
  blockers: string[];
}

export function summarizeLoop(loop: LoopRecord, index: number): LoopSummary {
  return {
    index,
    line: loop.startLine + 1,
    functionName: loop.functionName,
    loopVar: loop.loopVar,
    parallelizable: loop.isParallelizable,
    alreadyAnnotated: loop.alreadyAnnotated,
    reductions: loop.reductionVars.map(r => `${r.operator}:${r.variable}`),
    privateVars: [...loop.privateVars],
    blockers: [...loop.blockers],
  };
}

/**
 * Render the run summary: counts, then one status line per loop with its
 * function and 1-based line number
 */
export function formatReport(result: ParallelizeFileResult, format: ReportFormat): string {
  const loops = result.loops.map((loop, i) => summarizeLoop(loop, i + 1));
  const parallelized = loops.filter(l => l.parallelizable).length;

  if (format === 'json') {
    return JSON.stringify({
      input: result.inputPath,
      output: result.outputPath,
      written: result.written,
      parallelized,
      total: loops.length,
      headerInserted: result.headerInserted,
      patchesApplied: result.patchesApplied,
      loops,
    }, null, 2);
  }

  const c = format === 'pretty' ? PRETTY : PLAIN;
  const out: string[] = [
    c.title('Auto-Parallelization Report'),
    RULE,
    `Input file: ${result.inputPath}`,
    `Output file: ${result.outputPath}`,
    '',
    `Parallelized ${parallelized} out of ${loops.length} loops:`,
    '',
  ];

  result.loops.forEach((record, i) => {
    const loop = loops[i];
    const where = `Loop ${loop.index} in function '${loop.functionName}' (line ${loop.line})`;

    if (!loop.parallelizable) {
      const reasons = record.blockers.length > 0
        ? ` (${record.blockers.map(describeBlocker).join(', ')})`
        : '';
      out.push(c.fail(`✗ ${where} - Not parallelizable${reasons}`));
      return;
    }

    out.push(c.ok(`✓ ${where}`) + (loop.alreadyAnnotated ? c.muted(' - already annotated') : ''));
    if (loop.reductions.length > 0) {
      out.push(`  - Reduction operations: ${loop.reductions.join(', ')}`);
    }
    if (loop.privateVars.length > 0) {
      out.push(`  - Private variables: ${loop.privateVars.join(', ')}`);
    }
  });

  if (loops.length === 0) {
    out.push(c.muted('No counting loops found.'));
  }

  out.push('', RULE);
  out.push(result.written
    ? c.ok('Parallel code generated successfully!')
    : c.muted('Dry run: no output written.'));

  return out.join('\n');
}
