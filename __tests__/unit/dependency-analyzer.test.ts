import { describe, it, expect } from 'vitest';
import { DependencyAnalyzer, dependencyAnalyzer } from '../../lib/ast/dependency-analyzer';

const HEADER = 'for (int i = 0; i < N; i++) {';

function loopBody(...statements: string[]): string {
  return [HEADER, ...statements.map(s => `    ${s}`), '}'].join('\n');
}

describe('DependencyAnalyzer', () => {
  it('should classify an indexed sum as a parallel reduction', () => {
    const result = dependencyAnalyzer.analyze(loopBody('sum += arr[i];'), 'i');

    expect(result).toEqual({
      isSimpleArrayAccess: true,
      reductionVars: [{ variable: 'sum', operator: '+' }],
      privateVars: [],
      hasIo: false,
      hasBreakContinue: false,
      hasDependencies: false,
      isParallelizable: true,
      blockers: [],
    });
  });

  it('should accept whitespace inside the subscript', () => {
    const result = dependencyAnalyzer.analyze(loopBody('total += values[ i ];'), 'i');
    expect(result.isSimpleArrayAccess).toBe(true);
    expect(result.reductionVars).toEqual([{ variable: 'total', operator: '+' }]);
  });

  it('should not count offset subscripts as simple access', () => {
    const result = dependencyAnalyzer.analyze(loopBody('b[i + 1] = a[i - 1];'), 'i');
    expect(result.isSimpleArrayAccess).toBe(false);
    expect(result.blockers).toEqual(['no-indexed-access']);
  });

  it('should reject a break inside a nested conditional', () => {
    const result = dependencyAnalyzer.analyze(
      loopBody('if (a[i] < 0) {', '    break;', '}', 'b[i] = a[i];'),
      'i'
    );
    expect(result.hasBreakContinue).toBe(true);
    expect(result.isParallelizable).toBe(false);
    expect(result.blockers).toEqual(['break-continue']);
  });

  it('should reject a continue', () => {
    const result = dependencyAnalyzer.analyze(loopBody('if (a[i] == 0) continue;', 'b[i] = 1 / a[i];'), 'i');
    expect(result.isParallelizable).toBe(false);
  });

  it('should not mistake identifiers containing break for the keyword', () => {
    const result = dependencyAnalyzer.analyze(loopBody('breakpoint[i] = 0;'), 'i');
    expect(result.hasBreakContinue).toBe(false);
    expect(result.isParallelizable).toBe(true);
  });

  it.each([
    ['printf("%d", a[i]);'],
    ['std::cout << a[i];'],
    ['fprintf(log, "%d", a[i]);'],
    ['scanf("%d", &a[i]);'],
  ])('should reject I/O in %s', statement => {
    const result = dependencyAnalyzer.analyze(loopBody(statement), 'i');
    expect(result.hasIo).toBe(true);
    expect(result.isParallelizable).toBe(false);
    expect(result.blockers).toEqual(['io']);
  });

  it('should require an array access for a reduction', () => {
    const result = dependencyAnalyzer.analyze(loopBody('count += 1;'), 'i');
    expect(result.reductionVars).toEqual([]);
    expect(result.blockers).toEqual(['no-indexed-access']);
  });

  it('should pair any accumulation with any indexed access in the body', () => {
    const result = dependencyAnalyzer.analyze(loopBody('out[i] = in[i];', 'count += 1;'), 'i');
    expect(result.reductionVars).toEqual([{ variable: 'count', operator: '+' }]);
    expect(result.isParallelizable).toBe(true);
  });

  it('should list each reduction variable once in first-seen order', () => {
    const result = dependencyAnalyzer.analyze(
      loopBody('sum += a[i];', 'prod += c[i];', 'sum += b[i];'),
      'i'
    );
    expect(result.reductionVars.map(r => r.variable)).toEqual(['sum', 'prod']);
  });

  it('should not treat element updates as reductions', () => {
    const result = dependencyAnalyzer.analyze(loopBody('hist[i] += 1;'), 'i');
    expect(result.reductionVars).toEqual([]);
  });

  it('should report every blocker in a fixed order', () => {
    const result = dependencyAnalyzer.analyze(loopBody('if (x) break;', 'cout << x;'), 'i');
    expect(result.blockers).toEqual(['no-indexed-access', 'io', 'break-continue']);
  });

  it('should always leave private variables empty', () => {
    const result = dependencyAnalyzer.analyze(loopBody('int tmp = a[i] * 2;', 'b[i] = tmp;'), 'i');
    expect(result.privateVars).toEqual([]);
  });

  it('should use configured I/O keywords', () => {
    const analyzer = new DependencyAnalyzer({ ioKeywords: ['log_write'] });
    expect(analyzer.analyze(loopBody('log_write(a[i]);'), 'i').hasIo).toBe(true);
    expect(analyzer.analyze(loopBody('printf("%d", a[i]);'), 'i').hasIo).toBe(false);
  });

  it('should treat an empty keyword list as no I/O', () => {
    const analyzer = new DependencyAnalyzer({ ioKeywords: [] });
    expect(analyzer.analyze(loopBody('cout << a[i];'), 'i').hasIo).toBe(false);
  });
});
