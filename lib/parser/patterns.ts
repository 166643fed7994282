/**
 * Source Patterns
 * Regex builders for the C-like constructs the analysis recognizes
 */

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function alternation(words: readonly string[]): string {
  return words.map(escapeRegExp).join('|');
}

// Build regex for a function header: `<returnType> name(params)`
export function buildFunctionHeaderRegex(returnTypes: readonly string[]): RegExp {
  return new RegExp(`^\\s*(?:${alternation(returnTypes)})\\s+(\\w+)\\s*\\([^)]*\\)`);
}

/**
 * Build regex for the canonical ascending counting loop:
 * `for (<type> v = init; v < bound; v++)`.
 * The backreference forces all three clauses onto the same variable.
 */
export function buildLoopHeaderRegex(inductionTypes: readonly string[]): RegExp {
  return new RegExp(
    `^(\\s*)for\\s*\\(\\s*(?:${alternation(inductionTypes)})\\s+(\\w+)\\s*=\\s*[^;]+;\\s*\\2\\s*<[^;]+;\\s*\\2\\+\\+\\s*\\)`
  );
}

// Subscript indexed exactly by the variable: `[ i ]`
export function buildIndexedSubscriptRegex(loopVar: string): RegExp {
  return new RegExp(`\\[\\s*${escapeRegExp(loopVar)}\\s*\\]`);
}

// Array reference indexed exactly by the variable: `arr[i]`
export function buildIndexedArrayRegex(loopVar: string): RegExp {
  return new RegExp(`\\w+\\s*\\[\\s*${escapeRegExp(loopVar)}\\s*\\]`);
}

// Any of the keywords as a substring, so `fprintf` counts as `printf`
export function buildKeywordRegex(keywords: readonly string[]): RegExp | null {
  if (keywords.length === 0) return null;
  return new RegExp(`(?:${alternation(keywords)})`);
}

export const COMPOUND_ADD_REGEX = /(\w+)\s*\+=/g;
export const BREAK_CONTINUE_REGEX = /\b(?:break|continue)\b/;
export const INCLUDE_DIRECTIVE_REGEX = /^#include\b/;
