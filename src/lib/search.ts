export {
  search,
  searchCaseInsensitive,
  searchCaseSensitive,
  searchLines,
} from './search/engine.js';
export { splitLines } from './search/lines.js';
export { createLineMatcher } from './search/match-strategy.js';
export type { LineMatcher } from './search/match-strategy.js';
