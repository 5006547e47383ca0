/**
 * S2 cell encoding (scheme B)
 *
 * Public API over tokens. Cells are squares of a cube projected onto the
 * sphere and numbered along a Hilbert curve; each level splits a cell in
 * four. Levels run 0 (the six faces) to 30 (≈1 cm).
 *
 * @module indexes/s2/s2
 */

import { S2_MAX_LEVEL, S2_MIN_LEVEL } from '../../constants'
import { CellHierarchyError, ErrorCode, InvalidCellError, ValidationError } from '../../errors'
import { GeoBoundingBox } from '../../geo/bounding-box'
import { assertCoordinate } from '../../geo/point'
import {
  cellIdChildren,
  cellIdFromFaceIj,
  cellIdFromToken,
  cellIdLevel,
  cellIdParent,
  cellIdToFaceIj,
  cellIdToToken,
  isLeaf,
  type S2CellId,
} from './cell-id'
import {
  MAX_SIZE,
  faceUvToXyz,
  faceXyzToUv,
  ijToSt,
  latLngToXyz,
  stToIj,
  stToUv,
  uvToSt,
  xyzToFace,
  xyzToLatLng,
  type Face,
} from './projection'

/**
 * Average cell edge at level 0 in km (1.4592 rad on a 6,371 km sphere)
 */
const LEVEL0_EDGE_KM = 9297

/** Lowest latitude reached by the polar faces (corner of the cube) */
const POLAR_FACE_MIN_LAT = 35.264389682754654

// Face bounds: each equatorial face spans 90° of longitude and ±45° of
// latitude (edge midpoints), the polar faces reach down to their corners
const FACE_BOUNDS: readonly [number, number, number, number][] = [
  [-45, -45, 45, 45],
  [-45, 45, 45, 135],
  [POLAR_FACE_MIN_LAT, -180, 90, 180],
  [-45, 135, 45, -135],
  [-45, -135, 45, -45],
  [-90, -180, -POLAR_FACE_MIN_LAT, 180],
]

// =============================================================================
// Validation
// =============================================================================

export function assertS2Level(level: number): void {
  if (!Number.isInteger(level) || level < S2_MIN_LEVEL || level > S2_MAX_LEVEL) {
    throw new ValidationError(
      `S2 level must be an integer between ${S2_MIN_LEVEL} and ${S2_MAX_LEVEL}, got ${level}`,
      ErrorCode.INVALID_LEVEL,
      { field: 'level', value: level }
    )
  }
}

export function isValidS2Token(token: string): boolean {
  return cellIdFromToken(token) !== null
}

/**
 * @throws {InvalidCellError} Unless `token` is the token of a valid cell id
 */
export function parseS2Token(token: string): S2CellId {
  const id = cellIdFromToken(token)
  if (id === null) {
    throw new InvalidCellError('s2', token, 'not a valid cell token')
  }
  return id
}

// =============================================================================
// Encode / Decode
// =============================================================================

function cellIdFromXyz(p: readonly [number, number, number], level: number): S2CellId {
  const face = xyzToFace(p)
  const [u, v] = faceXyzToUv(face, p)
  return cellIdFromFaceIj(face, stToIj(uvToSt(u)), stToIj(uvToSt(v)), level)
}

export function encodeS2CellId(lat: number, lng: number, level: number): S2CellId {
  assertCoordinate('latitude', lat)
  assertCoordinate('longitude', lng)
  assertS2Level(level)
  return cellIdFromXyz(latLngToXyz(lat, lng), level)
}

/**
 * Token of the level-`level` cell containing the point
 */
export function encodeS2(lat: number, lng: number, level: number): string {
  return cellIdToToken(encodeS2CellId(lat, lng, level))
}

function faceStToLatLng(face: Face, s: number, t: number): [number, number] {
  return xyzToLatLng(faceUvToXyz(face, stToUv(s), stToUv(t)))
}

/**
 * Centre of the cell
 */
export function decodeS2(token: string): { lat: number; lng: number } {
  const id = parseS2Token(token)
  const { face, i, j } = cellIdToFaceIj(id)
  // The decoded leaf sits next to the centre; shift onto the shared corner
  const delta = isLeaf(id) ? 1 : ((i ^ Number((id >> 2n) & 1n)) & 1) === 1 ? 2 : 0
  const [lat, lng] = faceStToLatLng(face, ijToSt(2 * i + delta), ijToSt(2 * j + delta))
  return { lat, lng }
}

/**
 * Leaf-grid extent [iLo, jLo, size] of the cell
 */
function cellExtent(id: S2CellId): { face: Face; iLo: number; jLo: number; size: number; level: number } {
  const { face, i, j, level } = cellIdToFaceIj(id)
  const size = 2 ** (S2_MAX_LEVEL - level)
  return { face, iLo: i - (i % size), jLo: j - (j % size), size, level }
}

/**
 * Bounding rectangle from the corners and edge midpoints of the cell.
 * Face cells use fixed bounds.
 */
export function s2Bounds(token: string): GeoBoundingBox {
  const id = parseS2Token(token)
  const { face, iLo, jLo, size, level } = cellExtent(id)
  if (level === 0) {
    const [south, west, north, east] = FACE_BOUNDS[face]!
    return GeoBoundingBox.fromCorners(south, west, north, east)
  }

  const ring: [number, number][] = [
    [iLo, jLo],
    [iLo + size / 2, jLo],
    [iLo + size, jLo],
    [iLo + size, jLo + size / 2],
    [iLo + size, jLo + size],
    [iLo + size / 2, jLo + size],
    [iLo, jLo + size],
    [iLo, jLo + size / 2],
  ]
  return GeoBoundingBox.fromVertices(ring.map(([i, j]) => faceStToLatLng(face, ijToSt(2 * i), ijToSt(2 * j))))
}

// =============================================================================
// Neighbors
// =============================================================================

/**
 * Same-level cell at leaf (i, j) that may lie beyond the face edge:
 * project the point back onto the sphere and re-encode it on its own face
 */
function cellIdFromFaceIjWrapped(face: Face, i: number, j: number, level: number): S2CellId {
  const ci = Math.max(-1, Math.min(MAX_SIZE, i))
  const cj = Math.max(-1, Math.min(MAX_SIZE, j))
  const p = faceUvToXyz(face, stToUv(ijToSt(2 * ci + 1)), stToUv(ijToSt(2 * cj + 1)))
  return cellIdFromXyz(p, level)
}

/**
 * Cells sharing an edge or corner: 8 in general, 7 at the cube corners
 * where three faces meet. Never includes the cell itself.
 */
export function s2NeighborIds(id: S2CellId): S2CellId[] {
  const { face, i, j, level } = cellIdToFaceIj(id)
  const size = 2 ** (S2_MAX_LEVEL - level)
  const result: S2CellId[] = []

  for (const di of [-size, 0, size]) {
    for (const dj of [-size, 0, size]) {
      if (di === 0 && dj === 0) continue
      const ni = i + di
      const nj = j + dj
      const sameFace = ni >= 0 && ni < MAX_SIZE && nj >= 0 && nj < MAX_SIZE
      const neighbor = sameFace ? cellIdFromFaceIj(face, ni, nj, level) : cellIdFromFaceIjWrapped(face, ni, nj, level)
      if (neighbor !== id && !result.includes(neighbor)) {
        result.push(neighbor)
      }
    }
  }

  return result
}

export function s2Neighbors(token: string): string[] {
  return s2NeighborIds(parseS2Token(token)).map(cellIdToToken)
}

// =============================================================================
// Hierarchy
// =============================================================================

export function s2Level(token: string): number {
  return cellIdLevel(parseS2Token(token))
}

/**
 * @param level - Target level (defaults to one coarser)
 * @throws {CellHierarchyError} For a face cell
 */
export function s2Parent(token: string, level?: number): string {
  const id = parseS2Token(token)
  const current = cellIdLevel(id)
  if (current === S2_MIN_LEVEL) {
    throw new CellHierarchyError('s2', token, 'parent')
  }
  const target = level ?? current - 1
  assertS2Level(target)
  if (target >= current) {
    throw new ValidationError(`Parent level ${target} must be coarser than ${current}`, ErrorCode.INVALID_LEVEL, {
      field: 'level',
      value: target,
    })
  }
  return cellIdToToken(cellIdParent(id, target))
}

/**
 * @throws {CellHierarchyError} For a leaf cell
 */
export function s2Children(token: string): string[] {
  const id = parseS2Token(token)
  if (isLeaf(id)) {
    throw new CellHierarchyError('s2', token, 'children')
  }
  return cellIdChildren(id).map(cellIdToToken)
}

/**
 * Typical edge length of a level-`level` cell in km
 */
export function s2CellSizeKm(level: number): number {
  assertS2Level(level)
  return LEVEL0_EDGE_KM / 2 ** level
}
