/**
 * geocell Constants
 *
 * Centralized constants used throughout the codebase.
 * Eliminates magic numbers and provides single source of truth.
 */

// =============================================================================
// Earth Model
// =============================================================================

/**
 * Mean Earth radius in meters, used by the haversine formula
 */
export const EARTH_RADIUS_METERS = 6371000

/**
 * Meters in one statute mile
 */
export const METERS_PER_MILE = 1609.344

/**
 * Kilometers per degree of latitude for the planar box approximation
 * Used when turning a radius into a bounding rectangle
 */
export const KM_PER_DEGREE_LAT = 111.32

// =============================================================================
// Coordinate Domain
// =============================================================================

export const MIN_LATITUDE = -90
export const MAX_LATITUDE = 90
export const MIN_LONGITUDE = -180
export const MAX_LONGITUDE = 180

/**
 * Latitude (absolute, degrees) above which a point counts as near a pole
 */
export const DEFAULT_POLE_THRESHOLD_DEGREES = 85

// =============================================================================
// Covering Limits
// =============================================================================

/**
 * Default cap on the number of cells a ring-expansion covering returns
 */
export const DEFAULT_MAX_CELLS = 100

/**
 * Hard upper bound a caller may request for maxCells
 */
export const ABSOLUTE_MAX_CELLS = 500

// =============================================================================
// Adaptive Precision
// =============================================================================

/**
 * Radius (km) at or below which the finest precision bucket is chosen
 */
export const FINE_RADIUS_KM = 2

/**
 * Radius (km) at or below which the medium precision bucket is chosen
 */
export const MEDIUM_RADIUS_KM = 10

// =============================================================================
// Scheme Bounds
// =============================================================================

export const GEOHASH_MIN_PRECISION = 1
export const GEOHASH_MAX_PRECISION = 12

export const S2_MIN_LEVEL = 0
export const S2_MAX_LEVEL = 30

export const H3_MIN_RESOLUTION = 0
export const H3_MAX_RESOLUTION = 15
