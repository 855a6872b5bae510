/**
 * In-process stand-in for the subprocess runner
 */

import type { ProcessResult, RunOptions } from '@reuseify/types';
import { vi } from 'vitest';

/**
 * Scripted response for one invocation; omitted fields default to success
 */
export interface FakeResponse {
  exitCode?: number;
  stdout?: string;
  stderr?: string;
}

/**
 * Decide the response for a command line. Returning an Error makes the run reject,
 * as when the executable cannot be started.
 */
export type FakeRunnerHandler = (command: string, args: readonly string[]) => FakeResponse | Error;

/**
 * Create a runner that answers from a handler and records every call
 */
export function createFakeRunner(handler: FakeRunnerHandler = () => ({})) {
  return vi.fn(
    async (command: string, args: readonly string[], _options: RunOptions = {}): Promise<ProcessResult> => {
      const response = handler(command, args);
      if (response instanceof Error) {
        throw response;
      }
      return {
        exitCode: response.exitCode ?? 0,
        stdout: response.stdout ?? '',
        stderr: response.stderr ?? '',
      };
    },
  );
}

export type FakeRunner = ReturnType<typeof createFakeRunner>;

/**
 * Create a runner that answers by the first argument (the subcommand)
 */
export function createSubcommandRunner(responses: Record<string, FakeResponse | Error>): FakeRunner {
  const table = new Map(Object.entries(responses));
  return createFakeRunner((_command, args) => table.get(args[0] ?? '') ?? {});
}
