/**
 * Tool output parsers
 */

export { parseLintReport, SUMMARY_HEADING } from './lint-report.js';
export { parseAuthorLog, uniqueInOrder } from './author-log.js';
export { classifyAnnotateResult, findSkipSignal, SKIP_SIGNALS } from './annotate-result.js';
