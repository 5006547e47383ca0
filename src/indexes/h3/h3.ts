/**
 * H3 hexagonal cells (scheme C)
 *
 * Topology comes from the h3-js reference implementation: hexagons have
 * six neighbors, and each resolution has exactly twelve pentagons with
 * five. Resolutions run 0 (122 base cells) to 15.
 *
 * @module indexes/h3/h3
 */

import {
  UNITS,
  cellToBoundary,
  cellToChildren,
  cellToLatLng,
  cellToParent,
  getHexagonEdgeLengthAvg,
  getPentagons,
  getRes0Cells,
  getResolution,
  gridDisk,
  isPentagon,
  isValidCell,
  latLngToCell,
} from 'h3-js'
import { H3_MAX_RESOLUTION, H3_MIN_RESOLUTION } from '../../constants'
import { CellHierarchyError, ErrorCode, GeoCellError, InvalidCellError, ValidationError } from '../../errors'
import { GeoBoundingBox } from '../../geo/bounding-box'
import { assertCoordinate } from '../../geo/point'

function toLatLng(pair: readonly number[]): [number, number] {
  const [lat, lng] = pair
  if (lat === undefined || lng === undefined) {
    throw new GeoCellError('h3-js returned a malformed coordinate pair', ErrorCode.INTERNAL, { pair })
  }
  return [lat, lng]
}

// =============================================================================
// Validation
// =============================================================================

export function assertH3Resolution(resolution: number): void {
  if (!Number.isInteger(resolution) || resolution < H3_MIN_RESOLUTION || resolution > H3_MAX_RESOLUTION) {
    throw new ValidationError(
      `H3 resolution must be an integer between ${H3_MIN_RESOLUTION} and ${H3_MAX_RESOLUTION}, got ${resolution}`,
      ErrorCode.INVALID_LEVEL,
      { field: 'resolution', value: resolution }
    )
  }
}

export function isValidH3Cell(cell: string): boolean {
  return isValidCell(cell)
}

/**
 * @throws {InvalidCellError} Unless `cell` is a valid H3 cell index
 */
export function assertH3Cell(cell: string): void {
  if (!isValidCell(cell)) {
    throw new InvalidCellError('h3', cell, 'not a valid cell index')
  }
}

// =============================================================================
// Encode / Decode
// =============================================================================

export function encodeH3(lat: number, lng: number, resolution: number): string {
  assertCoordinate('latitude', lat)
  assertCoordinate('longitude', lng)
  assertH3Resolution(resolution)
  return latLngToCell(lat, lng, resolution)
}

export function decodeH3(cell: string): { lat: number; lng: number } {
  assertH3Cell(cell)
  const [lat, lng] = toLatLng(cellToLatLng(cell))
  return { lat, lng }
}

/**
 * Cell boundary as [lat, lng] vertices (5 or 6, more where the cell
 * crosses an icosahedron edge)
 */
export function h3Boundary(cell: string): [number, number][] {
  assertH3Cell(cell)
  return cellToBoundary(cell).map(toLatLng)
}

/**
 * Bounding rectangle of the boundary. Polar cells span every longitude;
 * cells straddling the antimeridian yield a crossing box.
 */
export function h3Bounds(cell: string): GeoBoundingBox {
  return GeoBoundingBox.fromVertices(h3Boundary(cell))
}

// =============================================================================
// Topology
// =============================================================================

/**
 * Ring-1 neighbors: 6 for a hexagon, 5 for a pentagon
 */
export function h3Neighbors(cell: string): string[] {
  assertH3Cell(cell)
  return gridDisk(cell, 1).filter((neighbor) => neighbor !== cell)
}

export function isH3Pentagon(cell: string): boolean {
  assertH3Cell(cell)
  return isPentagon(cell)
}

/**
 * The twelve pentagons of a resolution
 */
export function h3Pentagons(resolution: number): string[] {
  assertH3Resolution(resolution)
  return getPentagons(resolution)
}

/**
 * The 122 resolution-0 cells
 */
export function h3BaseCells(): string[] {
  return getRes0Cells()
}

// =============================================================================
// Hierarchy
// =============================================================================

export function h3Resolution(cell: string): number {
  assertH3Cell(cell)
  return getResolution(cell)
}

/**
 * @throws {CellHierarchyError} At resolution 0
 */
export function h3Parent(cell: string, resolution?: number): string {
  const current = h3Resolution(cell)
  if (current === H3_MIN_RESOLUTION) {
    throw new CellHierarchyError('h3', cell, 'parent')
  }
  const target = resolution ?? current - 1
  assertH3Resolution(target)
  if (target >= current) {
    throw new ValidationError(`Parent resolution ${target} must be coarser than ${current}`, ErrorCode.INVALID_LEVEL, {
      field: 'resolution',
      value: target,
    })
  }
  return cellToParent(cell, target)
}

/**
 * Children one resolution finer: 7 for a hexagon, 6 for a pentagon
 *
 * @throws {CellHierarchyError} At resolution 15
 */
export function h3Children(cell: string): string[] {
  const current = h3Resolution(cell)
  if (current === H3_MAX_RESOLUTION) {
    throw new CellHierarchyError('h3', cell, 'children')
  }
  return cellToChildren(cell, current + 1)
}

/**
 * Mean edge length at a resolution in km
 */
export function h3EdgeLengthKm(resolution: number): number {
  assertH3Resolution(resolution)
  return getHexagonEdgeLengthAvg(resolution, UNITS.km)
}

/**
 * Distance between neighbouring hexagon centres (√3 × edge) in km
 */
export function h3CellSizeKm(resolution: number): number {
  return Math.sqrt(3) * h3EdgeLengthKm(resolution)
}
