/**
 * Exclusion rule tests
 */

import { describe, it, expect } from 'vitest';

import {
  DEFAULT_EXCLUDE_PATTERNS,
  combinePatterns,
  isPathExcluded,
  partitionExcluded,
  pathComponents,
} from '../exclusion/patterns.js';

describe('pathComponents', () => {
  it('should split on forward and back slashes', () => {
    expect(pathComponents('src/pkg/mod.py')).toEqual(['src', 'pkg', 'mod.py']);
    expect(pathComponents('src\\pkg\\mod.py')).toEqual(['src', 'pkg', 'mod.py']);
  });

  it('should drop empty and current-directory parts', () => {
    expect(pathComponents('./src//mod.py')).toEqual(['src', 'mod.py']);
  });
});

describe('isPathExcluded', () => {
  it('should exclude build output by the built-in pattern', () => {
    expect(isPathExcluded('build/output.py', DEFAULT_EXCLUDE_PATTERNS)).toBe(true);
  });

  it('should match any component, not just the first', () => {
    expect(isPathExcluded('pkg/__pycache__/mod.cpython-312.pyc', DEFAULT_EXCLUDE_PATTERNS)).toBe(true);
    expect(isPathExcluded('web/node_modules/lib/index.js', DEFAULT_EXCLUDE_PATTERNS)).toBe(true);
  });

  it('should match glob patterns against dotted names', () => {
    expect(isPathExcluded('reuseify.egg-info/PKG-INFO', DEFAULT_EXCLUDE_PATTERNS)).toBe(true);
    expect(isPathExcluded('.venv/lib/site.py', DEFAULT_EXCLUDE_PATTERNS)).toBe(true);
    expect(isPathExcluded('src/mod.pyc', DEFAULT_EXCLUDE_PATTERNS)).toBe(true);
  });

  it('should not match partial component names', () => {
    expect(isPathExcluded('src/builder.py', DEFAULT_EXCLUDE_PATTERNS)).toBe(false);
    expect(isPathExcluded('environment/setup.py', DEFAULT_EXCLUDE_PATTERNS)).toBe(false);
  });

  it('should keep ordinary source files', () => {
    expect(isPathExcluded('src/reuseify/cli.py', DEFAULT_EXCLUDE_PATTERNS)).toBe(false);
  });

  it('should apply extra patterns', () => {
    expect(isPathExcluded('docs/conf.py', ['docs'])).toBe(true);
    expect(isPathExcluded('tests/data/sample.json', ['*.json'])).toBe(true);
  });
});

describe('combinePatterns', () => {
  it('should append extra patterns after the built-in ones', () => {
    const patterns = combinePatterns(['docs']);
    expect(patterns.slice(0, DEFAULT_EXCLUDE_PATTERNS.length)).toEqual([...DEFAULT_EXCLUDE_PATTERNS]);
    expect(patterns[patterns.length - 1]).toBe('docs');
  });

  it('should not repeat a built-in pattern', () => {
    expect(combinePatterns(['build'])).toHaveLength(DEFAULT_EXCLUDE_PATTERNS.length);
  });
});

describe('partitionExcluded', () => {
  it('should split paths preserving order', () => {
    const result = partitionExcluded(
      ['src/a.py', 'build/b.py', 'src/c.py', 'dist/d.py'],
      DEFAULT_EXCLUDE_PATTERNS,
    );
    expect(result.kept).toEqual(['src/a.py', 'src/c.py']);
    expect(result.excluded).toEqual(['build/b.py', 'dist/d.py']);
  });
});
