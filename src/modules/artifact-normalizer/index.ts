export {
  normalizeArtifact,
  normalizePipelineDefinition,
  buildLearningJob,
  DEFAULT_NORMALIZER_OPTIONS,
  type NormalizerOptions,
} from './artifact-normalizer.js'
export {
  parsePipelineDocument,
  listJobs,
  jobScript,
  RESERVED_KEYWORDS,
  IMPLICIT_STAGE,
  type PipelineDocument,
  type JobEntry,
} from './pipeline-document.js'
