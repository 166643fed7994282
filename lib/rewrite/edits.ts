// Line Edits - Resolves planned insertions against the original line sequence

import type { EditOrigin, LineEdit } from '../ast/types';

const ORIGIN_ORDER: Record<EditOrigin, number> = {
  header: 0,
  directive: 1,
};

/**
 * Order edits by original position; at the same position the runtime header
 * comes before directives, then planning order breaks the tie.
 */
export function sortEdits(edits: readonly LineEdit[]): LineEdit[] {
  return edits
    .map((edit, index) => ({ edit, index }))
    .sort((a, b) =>
      a.edit.position - b.edit.position ||
      ORIGIN_ORDER[a.edit.origin] - ORIGIN_ORDER[b.edit.origin] ||
      a.index - b.index
    )
    .map(entry => entry.edit);
}

/**
 * Apply all insertions in one pass. Positions always refer to the original
 * lines, so the result does not depend on the order edits were planned in
 * (apart from ties at the same position and origin).
 */
export function applyEdits(lines: readonly string[], edits: readonly LineEdit[]): string[] {
  for (const edit of edits) {
    if (!Number.isInteger(edit.position) || edit.position < 0 || edit.position > lines.length) {
      throw new RangeError(`Edit position ${edit.position} is outside 0..${lines.length}`);
    }
  }

  const ordered = sortEdits(edits);
  const output: string[] = [];
  let next = 0;

  for (let i = 0; i <= lines.length; i++) {
    while (next < ordered.length && ordered[next].position === i) {
      output.push(ordered[next].text);
      next++;
    }
    if (i < lines.length) {
      output.push(lines[i]);
    }
  }

  return output;
}
