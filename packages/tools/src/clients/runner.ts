/**
 * Default process runner backed by child_process.execFile
 */

import { execFile } from 'child_process';

import type { ProcessRunner } from '@reuseify/types';

import { ToolError, ToolNotFoundError } from '../errors.js';

/**
 * Output cap per stream; lint reports of large trees run to megabytes
 */
const MAX_BUFFER_BYTES = 64 * 1024 * 1024;

/**
 * Run a command without a shell and collect its output.
 * Non-zero exits resolve; spawn failures reject.
 */
export const execFileRunner: ProcessRunner = (command, args, options = {}) =>
  new Promise((resolve, reject) => {
    execFile(
      command,
      [...args],
      {
        cwd: options.cwd,
        encoding: 'utf8',
        maxBuffer: MAX_BUFFER_BYTES,
        windowsHide: true,
      },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ exitCode: 0, stdout, stderr });
          return;
        }

        const code: unknown = error.code;
        if (typeof code === 'number') {
          resolve({ exitCode: code, stdout, stderr });
          return;
        }
        if (code === 'ENOENT') {
          reject(new ToolNotFoundError(command));
          return;
        }
        if (error.signal) {
          reject(new ToolError(`${command} was terminated by ${error.signal}`, command));
          return;
        }
        reject(new ToolError(`Failed to run ${command}: ${error.message}`, command));
      },
    );
  });
