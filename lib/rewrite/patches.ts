// Text Patches - Optional cosmetic substitutions applied after rewriting

import type { TextPatch } from '../ast/types';

export interface PatchHit {
  patch: TextPatch;
  line: number;
}

export interface PatchResult {
  lines: string[];
  // Line numbers refer to the final lines
  hits: PatchHit[];
  anchors: number[];
}

/**
 * Apply patches in order. A line is patched when it contains both `when`
 * (defaulting to `find`) and `find`; `appendLine` is inserted right after a
 * patched line and is not itself scanned by the same patch. `once` stops a
 * patch after its first hit.
 *
 * `anchors` are input line numbers to follow through the inserted lines.
 */
export function applyPatches(
  input: readonly string[],
  patches: readonly TextPatch[],
  anchors: readonly number[] = []
): PatchResult {
  const lines = [...input];
  const hits: PatchHit[] = [];
  let tracked = [...anchors];

  for (const patch of patches) {
    const guard = patch.when ?? patch.find;

    for (let i = 0; i < lines.length; i++) {
      const line = lines[i];
      if (!line.includes(guard) || !line.includes(patch.find)) continue;

      lines[i] = line.split(patch.find).join(patch.replace);
      hits.push({ patch, line: i });

      if (patch.appendLine !== undefined) {
        // Keep CRLF files consistent
        const eol = line.endsWith('\r') && !patch.appendLine.endsWith('\r') ? '\r' : '';
        lines.splice(i + 1, 0, patch.appendLine + eol);
        const shift = (n: number) => (n > i ? n + 1 : n);
        for (const hit of hits) {
          hit.line = shift(hit.line);
        }
        tracked = tracked.map(shift);
        i++;
      }

      if (patch.once) break;
    }
  }

  return { lines, hits, anchors: tracked };
}
