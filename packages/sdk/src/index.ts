/**
 * Model Repository SDK
 *
 * On-disk lifecycle for model repositories: validation, archive bootstrap,
 * persisted config merge, label correspondence and similarity index facade
 */

// Re-export types
export type {
  ParameterValue,
  ParameterSet,
  InitializationOptions,
  IndexConfiguration,
  StepResult,
  SimilarityIndexBackend,
  BackendContext,
  BackendFactory,
  ArchiveFetcher,
  OpenRepositoryInit,
  BootstrapOutcome,
} from "./types.js";

// Lifecycle
export {
  ModelRepository,
  initializeRepository,
  openRepository,
  attachRepository,
  BEST_MODEL_FILENAME,
} from "./repository.js";
export type { ModelRepositoryOptions } from "./repository.js";
export { ensureRepositoryDir, REPOSITORY_DIR_MODE } from "./path-validator.js";
export { bootstrapRepository } from "./bootstrap.js";
export type { BootstrapOptions } from "./bootstrap.js";
export { mergePersistedConfig, toConfigDocument, CONFIG_FILENAME } from "./config.js";
export { CorrespondenceTable } from "./correspondence.js";

// Archives and sources
export { parseSourceReference, isRemote, FALLBACK_ARCHIVE_NAME } from "./source.js";
export type { SourceReference, SourceScheme } from "./source.js";
export { fetchArchive } from "./fetch.js";
export { detectArchiveFormat, extractArchive } from "./archive.js";
export type { ArchiveFormat } from "./archive.js";

// Similarity search
export { SimilaritySearch } from "./similarity/facade.js";
export type { SimilaritySearchOptions } from "./similarity/facade.js";
export {
  BACKEND_NAMES,
  isBackendName,
  resolveBackendFactory,
  noBackend,
  treeBackend,
  invertedFileBackend,
} from "./similarity/backends.js";
export type { BackendName } from "./similarity/backends.js";
export { ApproximateTreeBackend, TREE_INDEX_FILENAME } from "./similarity/tree-backend.js";
export type { TreeIndexOptions } from "./similarity/tree-backend.js";
export {
  InvertedFileBackend,
  INVERTED_FILE_INDEX_FILENAME,
  INVERTED_FILE_DEFAULTS,
  resolveInvertedFileOptions,
} from "./similarity/inverted-file-backend.js";
export type { InvertedFileOptions } from "./similarity/inverted-file-backend.js";

// Validation
export {
  parseInitializationOptions,
  parseIndexConfiguration,
  InitializationOptionsSchema,
  IndexConfigurationSchema,
} from "./validation.js";

// Formatting
export { canonicalize, safeParseConfig } from "./format/canonical.js";

// Observability
export { logger, LifecycleLogger, formatLogEntry } from "./observability/logs.js";
export type {
  LogLevel,
  LogThreshold,
  LogEntry,
  LogData,
  RepositoryLogger,
} from "./observability/logs.js";
export { metrics, LIFECYCLE_STEPS } from "./observability/metrics.js";
export type { LifecycleStep, StepMetrics } from "./observability/metrics.js";

// Errors
export { ModelRepositoryError, BadParameterError, FetchError } from "./errors.js";
export type { BadParameterReason } from "./errors.js";
