/**
 * Core types for model repositories
 */

import type { BadParameterError } from "./errors.js";
import type { RepositoryLogger } from "./observability/logs.js";

/**
 * Any value a persisted configuration may hold
 *
 * Numbers may be NaN or ±Infinity: config files accept those literals.
 */
export type ParameterValue =
  | string
  | number
  | boolean
  | null
  | ParameterValue[]
  | { [key: string]: ParameterValue };

/**
 * Nested key/value parameter set handed to the model engine
 */
export type ParameterSet = Record<string, ParameterValue>;

/**
 * Options recognized when opening a repository
 */
export interface InitializationOptions {
  /** Repository directory (absolute or relative) */
  repository: string;
  /** Create the directory when it does not exist (default: false) */
  create_repository?: boolean;
  /** Archive source to bootstrap from: local path, http(s):// or file:// URL */
  init?: string;
  /** Populate the similarity index in memory when it is opened (default: false) */
  index_preload?: boolean;
}

/**
 * Backend-agnostic similarity index options
 *
 * Absent fields mean "use the backend default". Backends ignore fields they do
 * not support.
 */
export interface IndexConfiguration {
  /** Backend-specific index key (e.g. "IVF256,Flat") */
  index_type?: string;
  /** Number of vectors sampled for training */
  train_samples?: number;
  /** Keep the index on disk instead of in memory */
  ondisk?: boolean;
  /** Number of cells probed per query */
  nprobe?: number;
  /** Place the index on GPU */
  index_gpu?: boolean;
  /** GPU device identifiers; a non-empty list implies `index_gpu` */
  index_gpuid?: number[];
}

/**
 * Outcome of one lifecycle step
 */
export type StepResult<T> = { ok: true; value: T } | { ok: false; error: BadParameterError };

/**
 * Capability set every similarity index backend implements
 */
export interface SimilarityIndexBackend {
  /** Short backend name, used in logs */
  readonly kind: string;
  /** Construct (or open) the index structure */
  createIndex(): Promise<void>;
  /** Update or rebuild the index from current repository contents */
  updateIndex(): Promise<void>;
  /** Delete the index's persisted state */
  removeIndex(): Promise<void>;
  /** Release in-memory resources held by the backend */
  dispose(): Promise<void>;
}

/**
 * Everything a backend factory receives when the facade is created
 */
export interface BackendContext {
  dimension: number;
  repository: string;
  preload: boolean;
  config: IndexConfiguration;
}

/**
 * Builds the single backend wired into a deployment
 *
 * Returning `null` means similarity search is absent.
 */
export type BackendFactory = (context: BackendContext) => SimilarityIndexBackend | null;

/**
 * Fetches the raw bytes of a remote archive in a single attempt
 *
 * Implementations throw a FetchError on failure.
 */
export type ArchiveFetcher = (source: string) => Promise<Uint8Array>;

/**
 * Runtime collaborators for opening a repository
 */
export interface OpenRepositoryInit {
  /**
   * Outgoing parameter set. When given and `init` is present, the persisted
   * `parameters` section of config.json is merged into it.
   */
  outgoing?: ParameterSet;
  /** Logger for lifecycle events (default: global console logger) */
  logger?: RepositoryLogger;
  /** Fetcher for remote archives (default: single-attempt fetch) */
  fetcher?: ArchiveFetcher;
  /** Similarity index backend factory (default: no backend) */
  backend?: BackendFactory;
}

/**
 * What bootstrap did with the source reference
 */
export interface BootstrapOutcome {
  /** Local archive that was extracted */
  archive: string;
  /** True when the archive was fetched during this call */
  fetched: boolean;
  /** True when an archive already in the repository was reused */
  reused: boolean;
}
