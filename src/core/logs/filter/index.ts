export { filterByFuzzy, orderedPositions } from './FuzzyFilter.js';
export { compilePattern, filterByRegex, matchSpans } from './RegexFilter.js';
export { classifyQuery, fuzzyPattern, isFuzzySelector, isInverseSelector, type QueryKind } from './query.js';
