export {
  DEFAULT_EXCLUDE_PATTERNS,
  combinePatterns,
  isPathExcluded,
  partitionExcluded,
  pathComponents,
} from './patterns.js';
