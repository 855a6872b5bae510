/**
 * Author artifact persistence
 *
 * The artifact is a JSON object mapping relative paths to author arrays.
 * Serialization keeps insertion order for every key, including keys that
 * look like array indices, so identical maps always produce identical bytes.
 */

import * as fs from 'fs';
import * as path from 'path';

import type { AuthorMap } from '@reuseify/types';
import { z } from 'zod';

import { ArtifactError, ArtifactNotFoundError, ArtifactParseError } from '../errors.js';

/**
 * Artifact shape: path -> author names (empty array = not tracked)
 */
export const authorArtifactSchema = z.record(z.string().min(1), z.array(z.string()));

const INDENT = '  ';

function formatAuthors(authors: readonly string[]): string {
  if (authors.length === 0) {
    return '[]';
  }
  const items = authors.map((author) => `${INDENT}${INDENT}${JSON.stringify(author)}`);
  return `[\n${items.join(',\n')}\n${INDENT}]`;
}

/**
 * Pretty-print an AuthorMap as JSON (2-space indent, trailing newline)
 */
export function serializeAuthorMap(authors: AuthorMap): string {
  if (authors.size === 0) {
    return '{}\n';
  }
  const entries = Array.from(
    authors,
    ([filePath, names]) => `${INDENT}${JSON.stringify(filePath)}: ${formatAuthors(names)}`,
  );
  return `{\n${entries.join(',\n')}\n}\n`;
}

/**
 * Parse and validate artifact text
 * @throws ArtifactParseError if the text is not JSON or not a path -> string[] object
 */
export function parseAuthorArtifact(text: string, artifactPath: string): AuthorMap {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new ArtifactParseError(artifactPath, error instanceof Error ? error.message : String(error));
  }

  const result = authorArtifactSchema.safeParse(data);
  if (!result.success) {
    const reason = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ArtifactParseError(artifactPath, reason);
  }

  return new Map(Object.entries(result.data));
}

/**
 * Read an artifact from disk
 */
export async function readAuthorArtifact(artifactPath: string): Promise<AuthorMap> {
  let text: string;
  try {
    text = await fs.promises.readFile(artifactPath, 'utf-8');
  } catch (error) {
    if (isErrnoCode(error, 'ENOENT')) {
      throw new ArtifactNotFoundError(artifactPath);
    }
    throw new ArtifactError(
      `Failed to read ${artifactPath}: ${error instanceof Error ? error.message : String(error)}`,
      artifactPath,
    );
  }

  return parseAuthorArtifact(text, artifactPath);
}

/**
 * Write an artifact to disk, creating the parent directory if needed
 */
export async function writeAuthorArtifact(artifactPath: string, authors: AuthorMap): Promise<void> {
  try {
    await fs.promises.mkdir(path.dirname(artifactPath), { recursive: true });
    await fs.promises.writeFile(artifactPath, serializeAuthorMap(authors), 'utf-8');
  } catch (error) {
    throw new ArtifactError(
      `Failed to write ${artifactPath}: ${error instanceof Error ? error.message : String(error)}`,
      artifactPath,
    );
  }
}

function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}
