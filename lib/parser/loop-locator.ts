/**
 * Loop Locator
 * Finds canonical ascending counting loops and their brace-delimited extents
 */

import type { LocatedLoop } from '../ast/types';
import { buildLoopHeaderRegex } from './patterns';

export interface LoopLocatorOptions {
  inductionTypes: readonly string[];
  // Directive keyword; only used to mark loops already carrying one
  directive: string;
  skipAnnotated: boolean;
}

const DEFAULT_OPTIONS: LoopLocatorOptions = {
  inductionTypes: ['int'],
  directive: '#pragma omp parallel for',
  skipAnnotated: false,
};

export interface LoopExtent {
  endLine: number;
  hasBody: boolean;
}

export class LoopLocator {
  private options: LoopLocatorOptions;
  private headerRegex: RegExp;

  constructor(options: Partial<LoopLocatorOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.headerRegex = buildLoopHeaderRegex(this.options.inductionTypes);
  }

  /**
   * Locate top-level counting loops in discovery order.
   * Scanning resumes after each recorded extent, so loops nested inside
   * one are never reported on their own.
   */
  locate(lines: readonly string[]): LocatedLoop[] {
    const loops: LocatedLoop[] = [];
    let i = 0;

    while (i < lines.length) {
      const match = this.headerRegex.exec(lines[i]);

      if (match) {
        const extent = this.findExtent(lines, i);
        loops.push({
          startLine: i,
          endLine: extent.endLine,
          loopVar: match[2],
          indent: match[1],
          hasBody: extent.hasBody,
          alreadyAnnotated: this.options.skipAnnotated && this.isAnnotated(lines, i),
        });
        i = extent.endLine;
      }

      i++;
    }

    return loops;
  }

  /**
   * Scan forward from the header counting braces. The extent ends on the
   * line where depth returns to zero after the first `{`. Without a
   * balanced body the extent is the header line alone.
   */
  findExtent(lines: readonly string[], startLine: number): LoopExtent {
    let depth = 0;
    let opened = false;

    for (let i = startLine; i < lines.length; i++) {
      for (const char of lines[i]) {
        if (char === '{') {
          depth++;
          opened = true;
        } else if (char === '}') {
          depth--;
          if (opened && depth === 0) {
            return { endLine: i, hasBody: true };
          }
        }
      }
    }

    return { endLine: startLine, hasBody: false };
  }

  /**
   * Whether the nearest non-blank line above the header already holds a directive
   */
  private isAnnotated(lines: readonly string[], startLine: number): boolean {
    for (let i = startLine - 1; i >= 0; i--) {
      const trimmed = lines[i].trim();
      if (trimmed === '') continue;
      return trimmed.startsWith(this.options.directive);
    }
    return false;
  }
}

export const loopLocator = new LoopLocator();
