// Loop Auto-Parallelizer
// Static loop-level analysis that annotates safe counting loops with OpenMP directives

import {
  DependencyAnalyzer,
  FunctionContextTracker,
  type LoopRecord,
  type PipelinePhase,
  type TextPatch,
} from './ast';
import { LoopLocator } from './parser';
import { PragmaSynthesizer } from './codegen/pragma';
import { type PlannedDirective, Rewriter } from './rewrite/rewriter';
import { readSource, writeFileAtomic } from './io/source-file';
import { type OmpliftConfig, defaultConfig } from './config';
import {
  type Diagnostic,
  analyzeLoopDiagnostics,
  createDiagnosticsCollector,
} from './validation/diagnostics';

type PipelineSettings = Pick<
  OmpliftConfig,
  'runtimeHeader' | 'directive' | 'returnTypes' | 'inductionTypes' | 'ioKeywords' | 'skipAnnotated' | 'patches'
>;

export type ParallelizeOptions = Partial<PipelineSettings> & {
  // Called as each phase starts
  onPhase?: (phase: PipelinePhase) => void;
};

export interface ParallelizeResult {
  lines: string[];
  output: string;
  loops: LoopRecord[];
  headerInserted: boolean;
  patchesApplied: number;
  diagnostics: Diagnostic[];
}

export interface ParallelizeFileResult extends ParallelizeResult {
  inputPath: string;
  outputPath: string;
  written: boolean;
}

/**
 * Run the analysis and rewrite over in-memory source text.
 * Pure and deterministic: the same source and options give the same output.
 */
export function parallelize(source: string, options: ParallelizeOptions = {}): ParallelizeResult {
  const settings = resolveSettings(options);
  const onPhase = options.onPhase ?? (() => undefined);
  const diagnostics = createDiagnosticsCollector();
  const lines = source.split('\n');

  // Step 1: Index functions
  onPhase('INDEX_FUNCTIONS');
  const tracker = new FunctionContextTracker({ returnTypes: settings.returnTypes });
  const contexts = tracker.track(lines);

  // Step 2: Locate top-level counting loops
  onPhase('LOCATE_LOOPS');
  const located = new LoopLocator({
    inductionTypes: settings.inductionTypes,
    directive: settings.directive,
    skipAnnotated: settings.skipAnnotated,
  }).locate(lines);

  // Step 3: Classify each loop body
  onPhase('ANALYZE_EACH_LOOP');
  const analyzer = new DependencyAnalyzer({ ioKeywords: settings.ioKeywords });
  const loops: LoopRecord[] = located.map(loop => {
    const body = lines.slice(loop.startLine, loop.endLine + 1).join('\n');
    const analysis = analyzer.analyze(body, loop.loopVar);

    return Object.freeze({
      ...loop,
      isParallelizable: analysis.isParallelizable,
      reductionVars: Object.freeze([...analysis.reductionVars]),
      privateVars: Object.freeze([...analysis.privateVars]),
      functionName: tracker.functionAt(contexts, loop.startLine),
      blockers: Object.freeze([...analysis.blockers]),
    });
  });

  for (const loop of loops) {
    analyzeLoopDiagnostics(loop, diagnostics);
  }
  if (loops.length === 0) {
    diagnostics.addInfo('I103', 'loop', 'no ascending counting loop header recognized');
  }

  // Step 4: Synthesize directives
  onPhase('SYNTHESIZE_DIRECTIVES');
  const synthesizer = new PragmaSynthesizer({ directive: settings.directive });
  const directives: PlannedDirective[] = loops
    .filter(loop => loop.isParallelizable && !loop.alreadyAnnotated)
    .map(loop => ({ startLine: loop.startLine, text: synthesizer.synthesize(loop) }));

  // Step 5: Rewrite
  onPhase('REWRITE');
  const result = new Rewriter({
    runtimeHeader: settings.runtimeHeader,
    patches: settings.patches,
  }).rewrite(lines, directives);

  if (result.headerLine !== null) {
    diagnostics.addInfo('I101', 'rewrite', `'${settings.runtimeHeader}' added`, {
      line: result.headerLine + 1,
    });
  }
  for (const hit of result.patchHits) {
    diagnostics.addInfo('I300', 'patch', `'${hit.patch.find}' -> '${hit.patch.replace}'`, {
      line: hit.line + 1,
    });
  }

  return {
    lines: result.lines,
    output: result.lines.join('\n'),
    loops,
    headerInserted: result.headerInserted,
    patchesApplied: result.patchHits.length,
    diagnostics: diagnostics.getDiagnostics(),
  };
}

/**
 * Load -> analyze -> rewrite -> emit. Reading fails before any analysis runs;
 * the output is written atomically, or not at all under `dryRun`.
 */
export async function parallelizeFile(
  inputPath: string,
  outputPath: string,
  options: ParallelizeOptions & { dryRun?: boolean } = {}
): Promise<ParallelizeFileResult> {
  const { dryRun = false, ...pipelineOptions } = options;

  options.onPhase?.('LOAD');
  const source = await readSource(inputPath);

  const result = parallelize(source, pipelineOptions);

  if (!dryRun) {
    options.onPhase?.('EMIT');
    await writeFileAtomic(outputPath, result.output);
  }

  return { ...result, inputPath, outputPath, written: !dryRun };
}

function resolveSettings(options: ParallelizeOptions): PipelineSettings {
  const defaults = defaultConfig();
  return {
    runtimeHeader: options.runtimeHeader ?? defaults.runtimeHeader,
    directive: options.directive ?? defaults.directive,
    returnTypes: options.returnTypes ?? defaults.returnTypes,
    inductionTypes: options.inductionTypes ?? defaults.inductionTypes,
    ioKeywords: options.ioKeywords ?? defaults.ioKeywords,
    skipAnnotated: options.skipAnnotated ?? defaults.skipAnnotated,
    patches: options.patches ?? defaults.patches,
  };
}

export type { LoopRecord, PipelinePhase, TextPatch };
export type { Diagnostic } from './validation/diagnostics';
