export {
  authorArtifactSchema,
  serializeAuthorMap,
  parseAuthorArtifact,
  readAuthorArtifact,
  writeAuthorArtifact,
} from './author-artifact.js';
