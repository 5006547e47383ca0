/**
 * Geohash Encoding/Decoding
 *
 * Standard geohash: alternate bisection of longitude and latitude
 * (longitude first), 5 bits per base32 symbol. Longer hashes are nested
 * inside their prefixes.
 *
 * @module indexes/geohash/geohash
 */

import { GEOHASH_MAX_PRECISION, GEOHASH_MIN_PRECISION, KM_PER_DEGREE_LAT } from '../../constants'
import { CellHierarchyError, ErrorCode, InvalidCellError, ValidationError } from '../../errors'
import { GeoBoundingBox } from '../../geo/bounding-box'
import { assertCoordinate } from '../../geo/point'

// Base32 character set for geohash (lowercase)
export const BASE32 = '0123456789bcdefghjkmnpqrstuvwxyz'
const BASE32_MAP = new Map<string, number>()
for (let i = 0; i < BASE32.length; i++) {
  BASE32_MAP.set(BASE32[i]!, i)
}

export type CardinalDirection = 'n' | 's' | 'e' | 'w'
export type Direction = CardinalDirection | 'ne' | 'se' | 'sw' | 'nw'

type Parity = 'even' | 'odd'

// Neighbor lookup: the neighbor of symbol c in a direction is
// BASE32[row.indexOf(c)]. Rows are keyed by hash length parity.
const NEIGHBORS: Record<CardinalDirection, Record<Parity, string>> = {
  n: { even: 'p0r21436x8zb9dcf5h7kjnmqesgutwvy', odd: 'bc01fg45238967deuvhjyznpkmstqrwx' },
  s: { even: '14365h7k9dcfesgujnmqp0r2twvyx8zb', odd: '238967debc01fg45kmstqrwxuvhjyznp' },
  e: { even: 'bc01fg45238967deuvhjyznpkmstqrwx', odd: 'p0r21436x8zb9dcf5h7kjnmqesgutwvy' },
  w: { even: '238967debc01fg45kmstqrwxuvhjyznp', odd: '14365h7k9dcfesgujnmqp0r2twvyx8zb' },
}

// Symbols on the edge of their parent cell in each direction
const BORDERS: Record<CardinalDirection, Record<Parity, string>> = {
  n: { even: 'prxz', odd: 'bcfguvyz' },
  s: { even: '028b', odd: '0145hjnp' },
  e: { even: 'bcfguvyz', odd: 'prxz' },
  w: { even: '0145hjnp', odd: '028b' },
}

// =============================================================================
// Validation
// =============================================================================

/**
 * Throw unless `precision` is an integer in 1..12
 */
export function assertGeohashPrecision(precision: number): void {
  if (!Number.isInteger(precision) || precision < GEOHASH_MIN_PRECISION || precision > GEOHASH_MAX_PRECISION) {
    throw new ValidationError(
      `Geohash precision must be an integer between ${GEOHASH_MIN_PRECISION} and ${GEOHASH_MAX_PRECISION}, got ${precision}`,
      ErrorCode.INVALID_LEVEL,
      { field: 'precision', value: precision }
    )
  }
}

export function isValidGeohash(hash: string): boolean {
  if (hash.length < GEOHASH_MIN_PRECISION || hash.length > GEOHASH_MAX_PRECISION) return false
  for (const ch of hash.toLowerCase()) {
    if (!BASE32_MAP.has(ch)) return false
  }
  return true
}

/**
 * Lower-case and validate a geohash
 *
 * @throws {InvalidCellError} For an empty, over-long or non-base32 hash
 */
export function normalizeGeohash(hash: string): string {
  if (hash.length < GEOHASH_MIN_PRECISION || hash.length > GEOHASH_MAX_PRECISION) {
    throw new InvalidCellError('geohash', hash, `length must be ${GEOHASH_MIN_PRECISION}-${GEOHASH_MAX_PRECISION}`)
  }
  const lower = hash.toLowerCase()
  for (const ch of lower) {
    if (!BASE32_MAP.has(ch)) {
      throw new InvalidCellError('geohash', hash, `invalid character "${ch}"`)
    }
  }
  return lower
}

// =============================================================================
// Encode / Decode
// =============================================================================

/**
 * Encode latitude/longitude to geohash
 *
 * @param lat - Latitude (-90 to 90)
 * @param lng - Longitude (-180 to 180)
 * @param precision - Number of characters (1-12, default 9 = ~5m precision)
 * @returns Geohash string
 */
export function encodeGeohash(lat: number, lng: number, precision: number = 9): string {
  assertCoordinate('latitude', lat)
  assertCoordinate('longitude', lng)
  assertGeohashPrecision(precision)

  let minLat = -90
  let maxLat = 90
  let minLng = -180
  let maxLng = 180

  let hash = ''
  let bit = 0
  let ch = 0
  let isLng = true // Start with longitude

  while (hash.length < precision) {
    if (isLng) {
      const mid = (minLng + maxLng) / 2
      if (lng >= mid) {
        ch |= 1 << (4 - bit)
        minLng = mid
      } else {
        maxLng = mid
      }
    } else {
      const mid = (minLat + maxLat) / 2
      if (lat >= mid) {
        ch |= 1 << (4 - bit)
        minLat = mid
      } else {
        maxLat = mid
      }
    }

    isLng = !isLng
    bit++

    if (bit === 5) {
      hash += BASE32[ch]
      bit = 0
      ch = 0
    }
  }

  return hash
}

/**
 * Decoded geohash result with error bounds
 */
export interface GeohashDecodeResult {
  lat: number
  lng: number
  latError: number
  lngError: number
}

/**
 * Decode geohash to the cell center with half-extent error bounds
 *
 * @throws {InvalidCellError} For a malformed hash
 */
export function decodeGeohash(hash: string): GeohashDecodeResult {
  const normalized = normalizeGeohash(hash)

  let minLat = -90
  let maxLat = 90
  let minLng = -180
  let maxLng = 180

  let isLng = true

  for (const char of normalized) {
    const bits = BASE32_MAP.get(char) ?? 0

    for (let bit = 4; bit >= 0; bit--) {
      const bitValue = (bits >> bit) & 1
      if (isLng) {
        const mid = (minLng + maxLng) / 2
        if (bitValue === 1) {
          minLng = mid
        } else {
          maxLng = mid
        }
      } else {
        const mid = (minLat + maxLat) / 2
        if (bitValue === 1) {
          minLat = mid
        } else {
          maxLat = mid
        }
      }
      isLng = !isLng
    }
  }

  return {
    lat: (minLat + maxLat) / 2,
    lng: (minLng + maxLng) / 2,
    latError: (maxLat - minLat) / 2,
    lngError: (maxLng - minLng) / 2,
  }
}

/**
 * Get bounding box for a geohash
 *
 * @returns Bounding box [minLat, minLng, maxLat, maxLng]
 */
export function geohashBounds(hash: string): [number, number, number, number] {
  const decoded = decodeGeohash(hash)
  return [
    decoded.lat - decoded.latError,
    decoded.lng - decoded.lngError,
    decoded.lat + decoded.latError,
    decoded.lng + decoded.lngError,
  ]
}

export function decodeGeohashBounds(hash: string): GeoBoundingBox {
  const [south, west, north, east] = geohashBounds(hash)
  return GeoBoundingBox.fromCorners(south, west, north, east)
}

// =============================================================================
// Neighbors
// =============================================================================

function isCardinal(direction: Direction): direction is CardinalDirection {
  return direction.length === 1
}

function adjacent(hash: string, direction: CardinalDirection): string | null {
  const lastChar = hash[hash.length - 1]!
  const type: Parity = hash.length % 2 === 0 ? 'even' : 'odd'
  let parent = hash.slice(0, -1)

  // Check if we need to propagate to parent
  if (BORDERS[direction][type].includes(lastChar)) {
    if (parent === '') {
      // Top row/column of the world: north/south has nothing beyond the
      // pole, east/west wraps through the lookup row itself
      if (direction === 'n' || direction === 's') return null
    } else {
      const shifted = adjacent(parent, direction)
      if (shifted === null) return null
      parent = shifted
    }
  }

  return parent + BASE32[NEIGHBORS[direction][type].indexOf(lastChar)]
}

/**
 * Get adjacent geohash in a direction
 *
 * East and west wrap across the antimeridian; stepping north or south
 * beyond a pole returns null.
 *
 * @throws {InvalidCellError} For a malformed hash
 */
export function getNeighbor(hash: string, direction: Direction): string | null {
  const normalized = normalizeGeohash(hash)
  if (isCardinal(direction)) {
    return adjacent(normalized, direction)
  }

  const vertical: CardinalDirection = direction[0] === 'n' ? 'n' : 's'
  const horizontal: CardinalDirection = direction[1] === 'e' ? 'e' : 'w'
  const stepped = adjacent(normalized, vertical)
  return stepped === null ? null : adjacent(stepped, horizontal)
}

export type GeohashNeighbors = Record<Direction, string | null>

/**
 * Get all 8 neighbors of a geohash cell
 *
 * Diagonals are composed from two cardinal steps. Directions beyond a
 * pole are null.
 */
export function getNeighbors(hash: string): GeohashNeighbors {
  const normalized = normalizeGeohash(hash)
  const n = adjacent(normalized, 'n')
  const s = adjacent(normalized, 's')

  return {
    n,
    ne: n === null ? null : adjacent(n, 'e'),
    e: adjacent(normalized, 'e'),
    se: s === null ? null : adjacent(s, 'e'),
    s,
    sw: s === null ? null : adjacent(s, 'w'),
    w: adjacent(normalized, 'w'),
    nw: n === null ? null : adjacent(n, 'w'),
  }
}

/**
 * Distinct existing neighbors, excluding the cell itself
 * (fewer than 8 in the polar rows and at precision 1)
 */
export function neighborList(hash: string): string[] {
  const normalized = normalizeGeohash(hash)
  const unique = new Set<string>()
  for (const neighbor of Object.values(getNeighbors(normalized))) {
    if (neighbor !== null && neighbor !== normalized) unique.add(neighbor)
  }
  return [...unique]
}

// =============================================================================
// Hierarchy
// =============================================================================

/**
 * @throws {CellHierarchyError} At precision 1
 */
export function geohashParent(hash: string): string {
  const normalized = normalizeGeohash(hash)
  if (normalized.length === GEOHASH_MIN_PRECISION) {
    throw new CellHierarchyError('geohash', normalized, 'parent')
  }
  return normalized.slice(0, -1)
}

/**
 * The 32 one-symbol extensions of `hash`, in base32 order
 *
 * @throws {CellHierarchyError} At precision 12
 */
export function geohashChildren(hash: string): string[] {
  const normalized = normalizeGeohash(hash)
  if (normalized.length === GEOHASH_MAX_PRECISION) {
    throw new CellHierarchyError('geohash', normalized, 'children')
  }
  return Array.from(BASE32, (ch) => normalized + ch)
}

// =============================================================================
// Sizes
// =============================================================================

/**
 * Cell extent in degrees at a precision
 */
export function geohashCellDegrees(precision: number): { width: number; height: number } {
  assertGeohashPrecision(precision)
  const bits = precision * 5
  const lngBits = Math.ceil(bits / 2)
  const latBits = Math.floor(bits / 2)
  return { width: 360 / 2 ** lngBits, height: 180 / 2 ** latBits }
}

/**
 * Larger of cell width and height at the equator, in km
 */
export function geohashCellSizeKm(precision: number): number {
  const { width, height } = geohashCellDegrees(precision)
  return Math.max(width, height) * KM_PER_DEGREE_LAT
}

/**
 * Get geohash precision error in meters (approximate)
 *
 * @param precision - Geohash precision (1-12)
 * @returns Error in meters at equator
 */
export function precisionToMeters(precision: number): number {
  // Approximate error bounds at equator for each precision
  const errors = [
    2500000, // 1
    625000,  // 2
    78000,   // 3
    19500,   // 4
    2450,    // 5
    610,     // 6
    76.5,    // 7
    19,      // 8
    2.4,     // 9
    0.6,     // 10
    0.074,   // 11
    0.018,   // 12
  ]
  return errors[Math.max(0, Math.min(11, precision - 1))]!
}

/**
 * Get optimal geohash precision for a given radius
 */
export function radiusToPrecision(radiusMeters: number): number {
  // Cell sizes in meters for each precision level (at equator)
  const cellSizes = [
    5000000, // 1: ~5000km
    1250000, // 2: ~1250km
    156000,  // 3: ~156km
    39000,   // 4: ~39km
    4900,    // 5: ~4.9km
    1200,    // 6: ~1.2km
    153,     // 7: ~153m
    38,      // 8: ~38m
    4.8,     // 9: ~4.8m
    1.2,     // 10: ~1.2m
    0.15,    // 11: ~15cm
    0.019,   // 12: ~2cm
  ]

  // Find the precision where cell size is roughly equal to radius
  // Use a slightly larger cell to ensure coverage
  for (let i = 0; i < cellSizes.length; i++) {
    if (cellSizes[i]! <= radiusMeters * 2) {
      return i + 1
    }
  }

  return GEOHASH_MAX_PRECISION
}
