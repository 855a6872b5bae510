/**
 * Combined mock tools factory for collector tests
 */

import {
  createMockHistory,
  createMockIgnoreChecker,
  createMockLinter,
  type MockHistory,
  type MockHistoryConfig,
  type MockIgnoreChecker,
  type MockLinter,
  type MockLinterConfig,
} from './mock-tools.js';

/**
 * Configuration for all collector-side mocks
 */
export interface MockCollectorToolsConfig {
  linter?: MockLinterConfig;
  history?: MockHistoryConfig;
  /** Paths reported as ignored */
  ignored?: Iterable<string>;
}

/**
 * The adapters the collector needs, all mocked
 */
export interface MockCollectorTools {
  linter: MockLinter;
  history: MockHistory;
  ignoreChecker: MockIgnoreChecker;
}

/**
 * Create linter, history and ignore mocks in one call
 */
export function createMockCollectorTools(config: MockCollectorToolsConfig = {}): MockCollectorTools {
  return {
    linter: createMockLinter(config.linter),
    history: createMockHistory(config.history),
    ignoreChecker: createMockIgnoreChecker(config.ignored),
  };
}
