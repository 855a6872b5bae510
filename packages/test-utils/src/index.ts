/**
 * @reuseify/test-utils
 *
 * Shared test utilities: in-process fakes of every external tool
 */

// Process runner stand-in
export {
  createFakeRunner,
  createSubcommandRunner,
  type FakeRunner,
  type FakeRunnerHandler,
  type FakeResponse,
} from './mocks/fake-runner.js';

// Tool adapter mocks
export {
  createMockLinter,
  createMockHistory,
  createMockIgnoreChecker,
  createMockAnnotator,
  type MockLinter,
  type MockLinterConfig,
  type MockHistory,
  type MockHistoryConfig,
  type MockIgnoreChecker,
  type MockAnnotator,
  type MockAnnotatorConfig,
} from './mocks/mock-tools.js';

export {
  createMockCollectorTools,
  type MockCollectorTools,
  type MockCollectorToolsConfig,
} from './mocks/mock-services.js';

// Builders
export { AuthorMapBuilder, authorMap } from './builders/author-map-builder.js';
