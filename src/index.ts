// 공개 API
export { LogItem, escapeTags, ESC_PATTERN, type LogItemInit } from './core/logs/LogItem.js';
export { LogItems, type LogItemsOptions } from './core/logs/LogItems.js';
export { LogViewState } from './core/logs/LogViewState.js';
export { colorFor, colorize, type RandomSource } from './core/logs/color.js';
export { ModifierRegistry, type IModifierRegistry, type LogModifier } from './core/logs/LogModifier.js';
export { defaultModifiers, registerLogModifier, ZapPrettyModifier } from './core/logs/modifiers/index.js';
export {
  classifyQuery,
  compilePattern,
  filterByFuzzy,
  filterByRegex,
  isFuzzySelector,
  isInverseSelector,
  type QueryKind,
} from './core/logs/filter/index.js';
export { sanitizeLine, sanitizeLineBytes, type SanitizeOptions } from './core/logs/Sanitizer.js';
export {
  defaultViewConfig,
  loadViewConfig,
  parseViewConfig,
  type ViewConfig,
  type ViewConfigInput,
} from './core/config/schema.js';
export { getLogger, type Logger } from './core/logging/console-logger.js';
export { globalProfiler, measure, measureBlock } from './core/logging/perf.js';
export { ErrorCategory, XError, isXError } from './shared/errors.js';
export { err, ok, type Err, type FilterResult, type LogSource, type Ok, type Result } from './shared/types.js';
export * from './shared/const.js';
