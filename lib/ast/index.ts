export * from './types';
export {
  FunctionContextTracker,
  functionTracker,
  type FunctionTrackerOptions,
} from './function-tracker';
export {
  DependencyAnalyzer,
  dependencyAnalyzer,
  type DependencyAnalyzerOptions,
} from './dependency-analyzer';
