import { describe, it, expect } from 'vitest';
import path from 'path';
import { loadPatches } from '../../lib/config';
import { applyPatches } from '../../lib/rewrite/patches';
import type { TextPatch } from '../../lib/ast/types';

const THREAD_COUNT_LINE = '    cout << "Number of threads: " << omp_get_max_threads() << endl << endl;';

const BENCHMARK_PATCHES: TextPatch[] = [
  {
    find: 'Sequential Image Processing Benchmark',
    replace: 'Parallel Image Processing Benchmark (OpenMP)',
  },
  {
    when: 'Total pixels:',
    find: 'endl << endl',
    replace: 'endl',
    appendLine: THREAD_COUNT_LINE,
    once: true,
  },
];

describe('applyPatches', () => {
  it('should replace the benchmark title', () => {
    const { lines, hits } = applyPatches(
      ['    cout << "=== Sequential Image Processing Benchmark ===" << endl;'],
      BENCHMARK_PATCHES
    );
    expect(lines).toEqual(['    cout << "=== Parallel Image Processing Benchmark (OpenMP) ===" << endl;']);
    expect(hits.map(h => h.line)).toEqual([0]);
  });

  it('should patch only guarded lines and append after the first hit', () => {
    const { lines, hits } = applyPatches(
      [
        '    cout << "Image: " << w << endl << endl;',
        '    cout << "Total pixels: " << n << endl << endl;',
        '    cout << "Total pixels: " << m << endl << endl;',
      ],
      BENCHMARK_PATCHES
    );

    expect(lines).toEqual([
      '    cout << "Image: " << w << endl << endl;',
      '    cout << "Total pixels: " << n << endl;',
      THREAD_COUNT_LINE,
      '    cout << "Total pixels: " << m << endl << endl;',
    ]);
    expect(hits).toHaveLength(1);
    expect(hits[0].line).toBe(1);
  });

  it('should replace every occurrence on a line', () => {
    const { lines } = applyPatches(['a-a-a'], [{ find: 'a', replace: 'b' }]);
    expect(lines).toEqual(['b-b-b']);
  });

  it('should keep CRLF endings on appended lines', () => {
    const { lines } = applyPatches(['x\r'], [{ find: 'x', replace: 'y', appendLine: 'z' }]);
    expect(lines).toEqual(['y\r', 'z\r']);
  });

  it('should return the lines unchanged without patches', () => {
    expect(applyPatches(['a'], [])).toEqual({ lines: ['a'], hits: [], anchors: [] });
  });

  it('should move earlier hits down when a later patch appends above them', () => {
    const { lines, hits } = applyPatches(
      ['x', 'a'],
      [
        { find: 'a', replace: 'A' },
        { find: 'x', replace: 'X', appendLine: 'inserted' },
      ]
    );

    expect(lines).toEqual(['X', 'inserted', 'A']);
    expect(hits.map(h => [h.patch.find, h.line])).toEqual([['a', 2], ['x', 0]]);
  });

  it('should follow anchored lines through appended lines', () => {
    const { anchors } = applyPatches(
      ['x', 'keep', 'y'],
      [{ find: 'x', replace: 'x', appendLine: 'inserted' }],
      [0, 1, 2]
    );
    expect(anchors).toEqual([0, 2, 3]);
  });
});

describe('shipped benchmark patches', () => {
  it('should load the same patches from patches/image-benchmark.yaml', async () => {
    const file = path.join(__dirname, '../../patches/image-benchmark.yaml');
    expect(await loadPatches(file)).toEqual(BENCHMARK_PATCHES);
  });
});
