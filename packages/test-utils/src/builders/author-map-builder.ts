/**
 * Fluent builder for AuthorMap test data
 */

import type { AuthorMap } from '@reuseify/types';

export class AuthorMapBuilder {
  private readonly entries: Array<[string, string[]]> = [];

  /**
   * Add a file with history
   */
  tracked(path: string, ...authors: string[]): this {
    this.entries.push([path, authors]);
    return this;
  }

  /**
   * Add a file without history (empty author list)
   */
  untracked(path: string): this {
    this.entries.push([path, []]);
    return this;
  }

  build(): AuthorMap {
    return new Map(this.entries.map(([path, authors]) => [path, [...authors]]));
  }
}

/**
 * Start a new AuthorMap builder
 */
export function authorMap(): AuthorMapBuilder {
  return new AuthorMapBuilder();
}
