/**
 * Parser Module Exports
 * Recognition of counting-loop headers, extents and the source patterns behind them
 */

export {
  escapeRegExp,
  buildFunctionHeaderRegex,
  buildLoopHeaderRegex,
  buildIndexedSubscriptRegex,
  buildIndexedArrayRegex,
  buildKeywordRegex,
  COMPOUND_ADD_REGEX,
  BREAK_CONTINUE_REGEX,
  INCLUDE_DIRECTIVE_REGEX,
} from './patterns';

export type { LoopLocatorOptions, LoopExtent } from './loop-locator';
export { LoopLocator, loopLocator } from './loop-locator';
