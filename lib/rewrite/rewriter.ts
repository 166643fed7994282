// Source Rewriter - Plans header and directive insertions, then resolves them

import type { LineEdit, TextPatch } from '../ast/types';
import { INCLUDE_DIRECTIVE_REGEX } from '../parser/patterns';
import { applyEdits } from './edits';
import { applyPatches, type PatchHit } from './patches';

export interface RewriterOptions {
  runtimeHeader: string;
  patches: readonly TextPatch[];
}

/**
 * A synthesized directive and the original line of the loop header it precedes
 */
export interface PlannedDirective {
  startLine: number;
  text: string;
}

export interface RewriteResult {
  lines: string[];
  edits: LineEdit[];
  headerInserted: boolean;
  // 0-based original line the header was inserted before, or null
  headerPosition: number | null;
  // 0-based index of the header in the rewritten lines, or null
  headerLine: number | null;
  patchHits: PatchHit[];
}

export class Rewriter {
  private options: RewriterOptions;

  constructor(options: RewriterOptions = { runtimeHeader: '#include <omp.h>', patches: [] }) {
    this.options = options;
  }

  /**
   * Rewrite the original lines: header first, then every directive, resolved
   * in a single pass against original positions, then the cosmetic patches.
   */
  rewrite(lines: readonly string[], directives: readonly PlannedDirective[]): RewriteResult {
    const header = this.planHeader(lines);
    const directiveEdits = this.planDirectives(lines, directives);
    const edits = [...(header ? [header] : []), ...directiveEdits];

    const rewritten = applyEdits(lines, edits);
    // Directives above the header push it down; ties put the header first
    const headerIndex = header
      ? header.position + directiveEdits.filter(d => d.position < header.position).length
      : null;
    const patched = applyPatches(
      rewritten,
      this.options.patches,
      headerIndex !== null ? [headerIndex] : []
    );

    return {
      lines: patched.lines,
      edits,
      headerInserted: header !== null,
      headerPosition: header ? header.position : null,
      headerLine: headerIndex !== null ? patched.anchors[0] : null,
      patchHits: patched.hits,
    };
  }

  /**
   * The runtime header goes right after the last existing `#include`, or at
   * the top of the file when there is none. Nothing is planned when a line
   * already contains it.
   */
  planHeader(lines: readonly string[]): LineEdit | null {
    const header = this.options.runtimeHeader;
    if (lines.some(line => line.includes(header))) {
      return null;
    }

    let lastInclude = -1;
    lines.forEach((line, i) => {
      if (INCLUDE_DIRECTIVE_REGEX.test(line.trim())) {
        lastInclude = i;
      }
    });

    const reference = lastInclude >= 0 ? lines[lastInclude] : lines[0];
    return {
      position: lastInclude + 1,
      text: header + lineEndingOf(reference),
      origin: 'header',
    };
  }

  planDirectives(lines: readonly string[], directives: readonly PlannedDirective[]): LineEdit[] {
    return directives.map(d => ({
      position: d.startLine,
      text: d.text + lineEndingOf(lines[d.startLine]),
      origin: 'directive' as const,
    }));
  }
}

// Lines keep their `\r` when the source uses CRLF; inserted lines follow suit
function lineEndingOf(line: string | undefined): string {
  return line !== undefined && line.endsWith('\r') ? '\r' : '';
}

export const rewriter = new Rewriter();
