/**
 * Orchestrator module exports
 */

export {
  createTools,
  performHealthChecks,
  requireAvailable,
  requireRepository,
  type Tools,
} from './services.js';
