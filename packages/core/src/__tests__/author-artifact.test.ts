/**
 * Author artifact tests
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { authorMap } from '@reuseify/test-utils';

import {
  parseAuthorArtifact,
  readAuthorArtifact,
  serializeAuthorMap,
  writeAuthorArtifact,
} from '../artifact/author-artifact.js';
import { ArtifactNotFoundError, ArtifactParseError } from '../errors.js';

describe('serializeAuthorMap', () => {
  it('should pretty-print with two-space indent and a trailing newline', () => {
    const authors = authorMap().tracked('a.py', 'Alice', 'Bob').untracked('b.py').build();

    expect(serializeAuthorMap(authors)).toBe(
      '{\n  "a.py": [\n    "Alice",\n    "Bob"\n  ],\n  "b.py": []\n}\n',
    );
  });

  it('should match JSON.stringify layout', () => {
    const authors = authorMap().tracked('src/x.py', 'Zoë "Z" Ng').untracked('y.py').build();

    expect(serializeAuthorMap(authors)).toBe(
      `${JSON.stringify({ 'src/x.py': ['Zoë "Z" Ng'], 'y.py': [] }, null, 2)}\n`,
    );
  });

  it('should keep insertion order for index-like keys', () => {
    const authors = authorMap().tracked('b.py', 'Bob').tracked('10', 'Alice').build();

    expect(serializeAuthorMap(authors).indexOf('"b.py"')).toBeLessThan(
      serializeAuthorMap(authors).indexOf('"10"'),
    );
  });

  it('should serialize an empty map', () => {
    expect(serializeAuthorMap(new Map())).toBe('{}\n');
  });
});

describe('parseAuthorArtifact', () => {
  it('should parse a valid artifact in key order', () => {
    const authors = parseAuthorArtifact('{"a.py": ["Alice"], "b.py": []}', 'authors.json');

    expect([...authors.entries()]).toEqual([
      ['a.py', ['Alice']],
      ['b.py', []],
    ]);
  });

  it('should reject invalid JSON', () => {
    expect(() => parseAuthorArtifact('{not json', 'authors.json')).toThrow(ArtifactParseError);
  });

  it('should reject a non-object', () => {
    expect(() => parseAuthorArtifact('["a.py"]', 'authors.json')).toThrow(ArtifactParseError);
  });

  it('should reject non-string authors with the offending key', () => {
    expect(() => parseAuthorArtifact('{"a.py": [1]}', 'authors.json')).toThrow(/a\.py\.0/);
  });

  it('should reject an author list that is not an array', () => {
    expect(() => parseAuthorArtifact('{"a.py": "Alice"}', 'authors.json')).toThrow(ArtifactParseError);
  });
});

describe('artifact files', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'reuseify-artifact-'));
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  it('should write and read back the same map', async () => {
    const file = path.join(dir, 'authors.json');
    const authors = authorMap().tracked('a.py', 'Alice').untracked('b.py').build();

    await writeAuthorArtifact(file, authors);

    expect(await readAuthorArtifact(file)).toEqual(authors);
  });

  it('should write identical bytes for identical maps', async () => {
    const first = path.join(dir, 'first.json');
    const second = path.join(dir, 'second.json');
    const build = () => authorMap().tracked('a.py', 'Alice', 'Bob').untracked('c.py').build();

    await writeAuthorArtifact(first, build());
    await writeAuthorArtifact(second, build());

    expect(await fs.promises.readFile(second)).toEqual(await fs.promises.readFile(first));
  });

  it('should create missing parent directories', async () => {
    const file = path.join(dir, 'nested', 'out', 'authors.json');

    await writeAuthorArtifact(file, authorMap().untracked('a.py').build());

    expect(fs.existsSync(file)).toBe(true);
  });

  it('should fail with ArtifactNotFoundError for a missing file', async () => {
    const file = path.join(dir, 'missing.json');

    await expect(readAuthorArtifact(file)).rejects.toThrow(ArtifactNotFoundError);
    await expect(readAuthorArtifact(file)).rejects.toThrow(`Input file not found: ${file}`);
  });

  it('should fail with ArtifactParseError for a malformed file', async () => {
    const file = path.join(dir, 'bad.json');
    await fs.promises.writeFile(file, '{"a.py": ', 'utf-8');

    await expect(readAuthorArtifact(file)).rejects.toThrow(ArtifactParseError);
  });
});
