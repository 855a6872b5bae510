export {
  driveAnnotation,
  resolveContributors,
  hasFailures,
  FILE_NOT_FOUND_REASON,
  type AnnotationOptions,
  type AnnotationEvent,
} from './annotation-driver.js';
