/**
 * geocell - hierarchical spatial index keys and query coverings
 *
 * Encodes coordinates as geohash, S2 or H3 keys and computes the cells or
 * key ranges a key-value store must scan to answer proximity and
 * bounding-box queries.
 *
 * @packageDocumentation
 */

// =============================================================================
// Provider (Recommended Entry Point)
// =============================================================================

export {
  GeospatialProvider,
  type CoverQuery,
  type RadiusCoverQuery,
  type BoundsCoverQuery,
  type CoverResult,
  type RangeCoverResult,
  type CellCoverResult,
} from './provider'

// =============================================================================
// Geographic Primitives
// =============================================================================

export * from './geo'

// =============================================================================
// Index Schemes, Cells and Coverings
// =============================================================================

export * from './indexes'

// =============================================================================
// Query Helpers
// =============================================================================

export * from './query'

// =============================================================================
// Configuration
// =============================================================================

export {
  DEFAULT_CONFIG,
  DEFAULT_PRECISION_BUCKETS,
  resolveConfig,
  defineConfig,
  getConfig,
  setConfig,
  clearConfig,
  configFromEnv,
  configFromEnvFile,
  configureFromEnv,
  type GeoCellConfig,
  type GeoCellConfigInput,
  type PrecisionBuckets,
  type EnvSource,
} from './config'

export * from './constants'

// =============================================================================
// Errors
// =============================================================================

export * from './errors'

// =============================================================================
// Logging
// =============================================================================

export {
  type Logger,
  type LogLevel,
  LOG_LEVELS,
  consoleLogger,
  noopLogger,
  logger,
  setLogger,
  createLogger,
  createConsoleLogger,
} from './utils/logger'
