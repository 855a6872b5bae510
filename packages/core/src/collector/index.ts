export {
  collectAuthors,
  type CollectorTools,
  type CollectorOptions,
  type CollectorEvent,
  type ExclusionReason,
  type CollectionStats,
  type CollectionResult,
} from './author-collector.js';
