/**
 * Command tests against an in-process stand-in for reuse and git
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { createFakeRunner, type FakeResponse } from '@reuseify/test-utils';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { runAnnotate } from '../commands/annotate.js';
import { runGetAuthors } from '../commands/get-authors.js';
import {
  AnnotationFailedError,
  CliError,
  InputError,
  RepositoryError,
  ToolUnavailableError,
} from '../errors/cli-errors.js';
import { ProgressReporter } from '../progress/reporter.js';

const LINT_OUTPUT = `# MISSING COPYRIGHT AND LICENSING INFORMATION

The following files have no copyright and licensing information:
* src/app.py
* build/gen.py
* src/new.py
* vendor/lib.py

# SUMMARY

* Bad licenses: 0
`;

const HISTORY: Record<string, string> = {
  'src/app.py': 'Alice\nBob\nAlice\n',
};

interface RepoOptions {
  repository?: boolean;
  lint?: FakeResponse;
  reuseMissing?: boolean;
  annotateFailures?: Record<string, string>;
}

/**
 * Fake reuse and git for a small repository
 */
function createRepoRunner(options: RepoOptions = {}) {
  return createFakeRunner((command, args) => {
    if (command === 'reuse' && options.reuseMissing) {
      return new Error('Command not found: reuse');
    }
    if (args[0] === '--version') {
      return { stdout: `${command} 1.0.0\n` };
    }
    if (command === 'git' && args[0] === 'rev-parse') {
      return options.repository === false ? { exitCode: 128, stderr: 'fatal: not a git repository' } : { stdout: '.git\n' };
    }
    if (command === 'git' && args[0] === 'check-ignore') {
      return { exitCode: args[3] === 'vendor/lib.py' ? 0 : 1 };
    }
    if (command === 'git' && args[0] === 'log') {
      return { stdout: HISTORY[args[4] ?? ''] ?? '' };
    }
    if (command === 'reuse' && args[0] === 'lint') {
      return options.lint ?? { exitCode: 1, stdout: LINT_OUTPUT };
    }
    if (command === 'reuse' && args[0] === 'annotate') {
      const error = options.annotateFailures?.[args[args.length - 1] ?? ''];
      return error === undefined ? { stdout: 'Successfully changed header\n' } : { exitCode: 1, stderr: error };
    }
    return new Error(`unexpected call: ${command} ${args.join(' ')}`);
  });
}

describe('commands', () => {
  let dir: string;
  const reporter = new ProgressReporter({ silent: true });

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'reuseify-cmd-'));
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  describe('runGetAuthors', () => {
    it('should write authors of every reported, non-excluded file', async () => {
      const runner = createRepoRunner();
      const output = path.join(dir, 'authors.json');

      await runGetAuthors(
        { output, includeNotInGit: true },
        { runner, env: { REUSEIFY_CWD: dir }, searchFrom: dir, reporter },
      );

      expect(await fs.promises.readFile(output, 'utf-8')).toBe(
        '{\n  "src/app.py": [\n    "Alice",\n    "Bob"\n  ],\n  "src/new.py": []\n}\n',
      );
    });

    it('should omit untracked files by default', async () => {
      const output = path.join(dir, 'authors.json');

      await runGetAuthors({ output }, { runner: createRepoRunner(), env: { REUSEIFY_CWD: dir }, searchFrom: dir, reporter });

      expect(JSON.parse(await fs.promises.readFile(output, 'utf-8'))).toEqual({ 'src/app.py': ['Alice', 'Bob'] });
    });

    it('should run every tool in the repository directory', async () => {
      const runner = createRepoRunner();

      await runGetAuthors(
        { output: path.join(dir, 'authors.json') },
        { runner, env: { REUSEIFY_CWD: dir }, searchFrom: dir, reporter },
      );

      expect(runner).toHaveBeenCalledWith('reuse', ['lint'], { cwd: dir });
      expect(runner).toHaveBeenCalledWith('git', ['log', '--reverse', '--format=%aN', '--', 'src/app.py'], {
        cwd: dir,
      });
      expect(runner).not.toHaveBeenCalledWith('git', ['check-ignore', '-q', '--', 'build/gen.py'], { cwd: dir });
    });

    it('should use raw author names when mailmap is off', async () => {
      const runner = createRepoRunner();

      await runGetAuthors(
        { output: path.join(dir, 'authors.json') },
        { runner, env: { REUSEIFY_CWD: dir, REUSEIFY_USE_MAILMAP: 'false' }, searchFrom: dir, reporter },
      );

      expect(runner).toHaveBeenCalledWith('git', ['log', '--reverse', '--format=%an', '--', 'src/app.py'], {
        cwd: dir,
      });
    });

    it('should write an empty object when nothing is missing headers', async () => {
      const output = path.join(dir, 'authors.json');

      await runGetAuthors(
        { output },
        { runner: createRepoRunner({ lint: { stdout: '# SUMMARY\n\n* Bad licenses: 0\n' } }), env: { REUSEIFY_CWD: dir }, searchFrom: dir, reporter },
      );

      expect(await fs.promises.readFile(output, 'utf-8')).toBe('{}\n');
    });

    it('should fail outside a git repository', async () => {
      const run = runGetAuthors(
        { output: path.join(dir, 'authors.json') },
        { runner: createRepoRunner({ repository: false }), env: { REUSEIFY_CWD: dir }, searchFrom: dir, reporter },
      );

      await expect(run).rejects.toThrow(RepositoryError);
    });

    it('should fail when the linter cannot produce a report', async () => {
      const output = path.join(dir, 'authors.json');
      const run = runGetAuthors(
        { output },
        { runner: createRepoRunner({ lint: { exitCode: 2, stderr: 'boom' } }), env: { REUSEIFY_CWD: dir }, searchFrom: dir, reporter },
      );

      await expect(run).rejects.toThrow(CliError);
      await expect(
        runGetAuthors(
          { output },
          { runner: createRepoRunner({ lint: { exitCode: 2, stderr: 'boom' } }), env: { REUSEIFY_CWD: dir }, searchFrom: dir, reporter },
        ),
      ).rejects.toThrow("'reuse lint' exited with code 2: boom");
      expect(fs.existsSync(output)).toBe(false);
    });

    it('should fail when reuse is not installed', async () => {
      const run = runGetAuthors(
        { output: path.join(dir, 'authors.json') },
        { runner: createRepoRunner({ reuseMissing: true }), env: { REUSEIFY_CWD: dir }, searchFrom: dir, reporter },
      );

      await expect(run).rejects.toThrow(ToolUnavailableError);
    });
  });

  describe('runAnnotate', () => {
    async function writeRepo(artifact: Record<string, string[]>, files: string[]): Promise<string> {
      for (const file of files) {
        await fs.promises.writeFile(path.join(dir, file), 'print("hi")\n');
      }
      const input = path.join(dir, 'authors.json');
      await fs.promises.writeFile(input, JSON.stringify(artifact));
      return input;
    }

    it('should annotate with authors or default contributors and forward extra arguments', async () => {
      const input = await writeRepo({ 'a.py': ['Alice'], 'b.py': [] }, ['a.py', 'b.py']);
      const runner = createRepoRunner();

      const report = await runAnnotate(
        { input, defaultContributors: ['Bob'], passthrough: ['--license', 'MIT'] },
        { runner, env: { REUSEIFY_CWD: dir }, searchFrom: dir, reporter },
      );

      expect(runner).toHaveBeenCalledWith('reuse', ['annotate', '--contributor', 'Alice', '--license', 'MIT', 'a.py'], {
        cwd: dir,
      });
      expect(runner).toHaveBeenCalledWith('reuse', ['annotate', '--contributor', 'Bob', '--license', 'MIT', 'b.py'], {
        cwd: dir,
      });
      expect(report?.succeeded.map((outcome) => outcome.path)).toEqual(['a.py', 'b.py']);
    });

    it('should skip files that no longer exist', async () => {
      const input = await writeRepo({ 'gone.py': ['Alice'], 'a.py': ['Alice'] }, ['a.py']);
      const runner = createRepoRunner();

      const report = await runAnnotate({ input }, { runner, env: { REUSEIFY_CWD: dir }, searchFrom: dir, reporter });

      expect(report?.skipped).toEqual([{ status: 'skipped', path: 'gone.py', reason: 'file not found' }]);
      expect(runner).not.toHaveBeenCalledWith('reuse', ['annotate', '--contributor', 'Alice', 'gone.py'], { cwd: dir });
    });

    it('should fail after processing every file when one fails', async () => {
      const input = await writeRepo({ 'bad.py': ['Alice'], 'a.py': ['Bob'] }, ['bad.py', 'a.py']);
      const runner = createRepoRunner({ annotateFailures: { 'bad.py': 'Error: could not write' } });

      await expect(
        runAnnotate({ input }, { runner, env: { REUSEIFY_CWD: dir }, searchFrom: dir, reporter }),
      ).rejects.toThrow(AnnotationFailedError);
      expect(runner).toHaveBeenCalledWith('reuse', ['annotate', '--contributor', 'Bob', 'a.py'], { cwd: dir });
    });

    it('should fail with a hint when the input is missing', async () => {
      const input = path.join(dir, 'missing.json');

      await expect(
        runAnnotate({ input }, { runner: createRepoRunner(), env: { REUSEIFY_CWD: dir }, searchFrom: dir, reporter }),
      ).rejects.toThrow(InputError);
      await expect(
        runAnnotate({ input }, { runner: createRepoRunner(), env: { REUSEIFY_CWD: dir }, searchFrom: dir, reporter }),
      ).rejects.toThrow(`Input file not found: ${input}`);
    });

    it('should fail on a malformed input', async () => {
      const input = path.join(dir, 'authors.json');
      await fs.promises.writeFile(input, '{"a.py": "Alice"}');

      await expect(
        runAnnotate({ input }, { runner: createRepoRunner(), env: { REUSEIFY_CWD: dir }, searchFrom: dir, reporter }),
      ).rejects.toThrow(InputError);
    });

    it('should not annotate anything when reuse is missing', async () => {
      const input = await writeRepo({ 'a.py': ['Alice'] }, ['a.py']);
      const runner = createRepoRunner({ reuseMissing: true });

      await expect(
        runAnnotate({ input }, { runner, env: { REUSEIFY_CWD: dir }, searchFrom: dir, reporter }),
      ).rejects.toThrow(ToolUnavailableError);
      expect(runner).toHaveBeenCalledTimes(1);
    });

    it('should print config and stop with --show-config', async () => {
      const runner = createRepoRunner();

      const report = await runAnnotate({ showConfig: true }, { runner, env: {}, searchFrom: dir, reporter });

      expect(report).toBeNull();
      expect(runner).not.toHaveBeenCalled();
    });
  });
});
