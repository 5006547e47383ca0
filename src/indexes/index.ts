/**
 * Spatial index schemes, cells and coverings
 *
 * @module indexes
 */

// Scheme contract
export { SPATIAL_INDEX_TYPES, SCHEME_LEVEL_BOUNDS, type GridScheme, type SpatialIndexType } from './types'
export { getScheme, isSpatialIndexType, assertSchemeLevel } from './schemes'

// Encoders
export * from './geohash'
export * from './s2'
export * from './h3'

// Cells
export { GeoCell } from './cell'

// Coverings
export * from './covering'

// Precision
export {
  precisionBucket,
  selectPrecision,
  resolvePrecision,
  type PrecisionBucket,
  type PrecisionInput,
  type PrecisionSelection,
} from './precision'
