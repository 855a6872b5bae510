/**
 * Separates reuseify's own annotate options from tokens meant for `reuse annotate`.
 *
 * The annotate command line is scanned here rather than by commander, which
 * drops a leading `--` and so cannot tell forwarded tokens from reuseify's own.
 */

import { CliError } from './errors/cli-errors.js';

/**
 * Annotate options found on the command line, plus what is left to forward
 */
export interface ExtractedAnnotateOptions {
  input?: string;
  config?: string;
  showConfig: boolean;
  noColor: boolean;
  defaultContributors: string[];
  /** Tokens for reuse, in original order */
  passthrough: string[];
}

type ValueOption = 'input' | 'config' | 'defaultContributor';

/**
 * Flags taking a value, by every spelling
 */
const VALUE_FLAGS: ReadonlyMap<string, ValueOption> = new Map([
  ['-i', 'input'],
  ['--input', 'input'],
  ['--config', 'config'],
  ['-d', 'defaultContributor'],
  ['--default-contributor', 'defaultContributor'],
]);

/**
 * Split `--flag=value` into its parts
 */
function splitInlineValue(token: string): [string, string | undefined] {
  if (!token.startsWith('--')) {
    return [token, undefined];
  }
  const index = token.indexOf('=');
  return index === -1 ? [token, undefined] : [token.slice(0, index), token.slice(index + 1)];
}

/**
 * Pull reuseify's annotate options out of a token list.
 * Everything else is kept verbatim, in order; tokens after `--` are never interpreted.
 */
export function extractAnnotateOptions(tokens: readonly string[]): ExtractedAnnotateOptions {
  const result: ExtractedAnnotateOptions = {
    showConfig: false,
    noColor: false,
    defaultContributors: [],
    passthrough: [],
  };

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (token === undefined) continue;

    if (token === '--') {
      result.passthrough.push(...tokens.slice(i + 1));
      break;
    }
    if (token === '--show-config') {
      result.showConfig = true;
      continue;
    }
    if (token === '--no-color') {
      result.noColor = true;
      continue;
    }

    const [flag, inlineValue] = splitInlineValue(token);
    const option = VALUE_FLAGS.get(flag);
    if (option === undefined) {
      result.passthrough.push(token);
      continue;
    }

    let value = inlineValue;
    if (value === undefined) {
      value = tokens[i + 1];
      i++;
    }
    if (value === undefined) {
      throw new CliError(`option '${flag}' argument missing`, 'Run reuseify annotate --help for usage');
    }

    if (option === 'defaultContributor') {
      result.defaultContributors.push(value);
    } else {
      result[option] = value;
    }
  }

  return result;
}
