/**
 * Collector -> artifact -> driver integration
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { createMockAnnotator, createMockCollectorTools } from '@reuseify/test-utils';

import { driveAnnotation } from '../annotator/annotation-driver.js';
import { readAuthorArtifact, writeAuthorArtifact } from '../artifact/author-artifact.js';
import { collectAuthors } from '../collector/author-collector.js';

describe('collector to driver round trip', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'reuseify-roundtrip-'));
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  const createTools = () =>
    createMockCollectorTools({
      linter: { files: ['src/app.py', 'build/gen.py', 'src/new.py', 'src/lib.py'] },
      history: {
        commits: {
          'src/app.py': ['Alice', 'Bob', 'Alice'],
          'src/lib.py': ['Carol'],
        },
      },
    });

  it('should annotate every artifact key exactly once', async () => {
    const file = path.join(dir, 'authors.json');
    const { authors } = await collectAuthors(createTools(), { includeUntracked: true });
    await writeAuthorArtifact(file, authors);

    const annotator = createMockAnnotator();
    const report = await driveAnnotation(annotator, await readAuthorArtifact(file), {
      defaultContributors: ['Maintainer'],
    });

    expect(annotator.annotate.mock.calls.map(([filePath, contributors]) => [filePath, contributors])).toEqual([
      ['src/app.py', ['Alice', 'Bob']],
      ['src/new.py', ['Maintainer']],
      ['src/lib.py', ['Carol']],
    ]);
    expect(report.total).toBe(3);
  });

  it('should produce byte-identical artifacts across runs', async () => {
    const first = path.join(dir, 'first.json');
    const second = path.join(dir, 'second.json');

    await writeAuthorArtifact(first, (await collectAuthors(createTools(), { includeUntracked: true })).authors);
    await writeAuthorArtifact(second, (await collectAuthors(createTools(), { includeUntracked: true })).authors);

    const text = await fs.promises.readFile(first, 'utf-8');
    expect(await fs.promises.readFile(second, 'utf-8')).toBe(text);
    expect(text).toBe(
      '{\n  "src/app.py": [\n    "Alice",\n    "Bob"\n  ],\n  "src/new.py": [],\n  "src/lib.py": [\n    "Carol"\n  ]\n}\n',
    );
  });
});
