export {
  EmbeddingCollection,
  type OutputRecord,
  type AppendResult,
  type RejectReason,
  type CollectionSnapshot,
} from './collection.js';

export {
  buildArtifact,
  writeArtifact,
  readArtifact,
  EmbeddingArtifactSchema,
  ARTIFACT_VERSION,
  type EmbeddingArtifact,
} from './artifact.js';
