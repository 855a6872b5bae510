/**
 * Author record types
 *
 * The collector resolves every file to the people who committed to it. The
 * resulting map is the only thing the two phases share.
 */

/**
 * Default artifact location, relative to the working directory
 */
export const DEFAULT_ARTIFACT_PATH = 'reuse_annotate_authors.json';

/**
 * File path to authors, in discovery order
 */
export type AuthorMap = Map<string, string[]>;
