#!/usr/bin/env node

/**
 * reuseify CLI
 *
 * Main entry point for the reuseify command-line interface.
 */

import { createProgram } from './cli.js';
import { handleError } from './errors/index.js';

export { VERSION } from './cli.js';

/**
 * Main entry point
 */
export async function main(): Promise<void> {
  try {
    const program = createProgram(process.argv);
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error);
  }
}

main().catch(handleError);
