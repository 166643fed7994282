// Function Context Tracker - Maps every source line to its enclosing function name

import type { FunctionContextMap } from './types';
import { buildFunctionHeaderRegex } from '../parser/patterns';

export interface FunctionTrackerOptions {
  returnTypes: readonly string[];
}

const DEFAULT_RETURN_TYPES = ['void', 'int', 'double', 'float', 'unsigned', 'char', 'long'];

export class FunctionContextTracker {
  private headerRegex: RegExp;

  constructor(options: FunctionTrackerOptions = { returnTypes: DEFAULT_RETURN_TYPES }) {
    this.headerRegex = buildFunctionHeaderRegex(options.returnTypes);
  }

  /**
   * Build the line -> function name mapping by a single top-down scan.
   *
   * The last header seen stays current until the next one, even past its
   * closing brace; nested and class-scoped definitions are not modeled.
   */
  track(lines: readonly string[]): FunctionContextMap {
    const contexts: string[] = [];
    let current = '';

    for (const line of lines) {
      const match = this.headerRegex.exec(line);
      if (match) {
        current = match[1];
      }
      contexts.push(current);
    }

    return contexts;
  }

  /**
   * Name of the function active at a line, '' when unresolved
   */
  functionAt(contexts: FunctionContextMap, line: number): string {
    return contexts[line] ?? '';
  }
}

export const functionTracker = new FunctionContextTracker();
