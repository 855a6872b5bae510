/**
 * @reuseify/core - Author collection and annotation pipelines
 *
 * Stateless orchestration over the tool contracts in @reuseify/types:
 * - collectAuthors: linter report -> filtered files -> authors per file
 * - driveAnnotation: author map -> one annotator call per file -> report
 * - author artifact read/write between the two
 */

export const VERSION = '0.1.0';

// Exclusion rules
export * from './exclusion/index.js';

// Collector
export * from './collector/index.js';

// Annotation driver
export * from './annotator/index.js';

// Artifact persistence
export * from './artifact/index.js';

// Errors
export { ArtifactError, ArtifactNotFoundError, ArtifactParseError } from './errors.js';
