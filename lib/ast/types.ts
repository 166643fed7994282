// AST Types for Loop Parallelism Analysis

/**
 * Function name active at each source line, indexed by 0-based line number.
 * An empty string means no function header has been seen yet.
 */
export type FunctionContextMap = readonly string[];

export type ReductionOperator = '+';

export interface ReductionVar {
  readonly variable: string;
  readonly operator: ReductionOperator;
}

// Why a loop was rejected
export type LoopBlocker =
  | 'no-indexed-access'   // No subscript indexed by the induction variable
  | 'io'                  // Input/output call inside the body
  | 'break-continue';     // Early exit from an iteration

/**
 * A counting loop as found by the locator, before classification
 */
export interface LocatedLoop {
  readonly startLine: number;
  readonly endLine: number;
  readonly loopVar: string;
  readonly indent: string;
  readonly hasBody: boolean;
  readonly alreadyAnnotated: boolean;
}

export interface DependencyAnalysis {
  isSimpleArrayAccess: boolean;
  reductionVars: ReductionVar[];
  privateVars: string[];
  hasIo: boolean;
  hasBreakContinue: boolean;
  hasDependencies: boolean;
  isParallelizable: boolean;
  blockers: LoopBlocker[];
}

/**
 * One detected top-level counting loop with its verdict
 */
export interface LoopRecord extends LocatedLoop {
  readonly isParallelizable: boolean;
  readonly reductionVars: readonly ReductionVar[];
  readonly privateVars: readonly string[];
  readonly functionName: string;
  readonly blockers: readonly LoopBlocker[];
}

// Rewrite Types
export type EditOrigin = 'header' | 'directive';

/**
 * Insert `text` as a new line right before original line `position`.
 * A position equal to the line count appends.
 */
export interface LineEdit {
  readonly position: number;
  readonly text: string;
  readonly origin: EditOrigin;
}

export interface TextPatch {
  find: string;
  replace: string;
  when?: string;
  appendLine?: string;
  once?: boolean;
}

export type PipelinePhase =
  | 'LOAD'
  | 'INDEX_FUNCTIONS'
  | 'LOCATE_LOOPS'
  | 'ANALYZE_EACH_LOOP'
  | 'SYNTHESIZE_DIRECTIVES'
  | 'REWRITE'
  | 'EMIT';
