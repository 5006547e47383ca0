/**
 * Ring-expansion cell covering
 *
 * Breadth-first search over cell neighbors from the cell holding the query
 * centre. A neighbor is accepted when its centre lies inside the query
 * rectangle grown by one cell width (and, for radius queries, within
 * radius + cell width of the centre). Accepted cells join the result and
 * the next frontier. The search stops when the frontier empties or the
 * result reaches maxCells.
 *
 * Rectangles that cross the antimeridian need no special casing: the
 * containment test uses modular longitude and every scheme's neighbors
 * wrap across ±180°.
 *
 * @module indexes/covering/ring-expansion
 */

import { getConfig, type GeoCellConfig } from '../../config'
import { ErrorCode, ValidationError } from '../../errors'
import { GeoBoundingBox } from '../../geo/bounding-box'
import type { GeoPoint } from '../../geo/point'
import { createLogger } from '../../utils/logger'
import { assertSchemeLevel } from '../schemes'
import type { GridScheme } from '../types'
import { estimateCellCount } from './estimate'
import type { CellCovering, CoveredCell, CoveringOptions } from './types'

const log = createLogger('covering')

/**
 * Resolve and validate maxCells against the configured limits
 *
 * @throws {ValidationError} OUT_OF_RANGE unless 1 ≤ maxCells ≤ absoluteMaxCells
 */
export function resolveMaxCells(maxCells: number | undefined, config: Readonly<GeoCellConfig> = getConfig()): number {
  const value = maxCells ?? config.defaultMaxCells
  if (!Number.isInteger(value) || value < 1 || value > config.absoluteMaxCells) {
    throw new ValidationError(
      `maxCells must be an integer between 1 and ${config.absoluteMaxCells}, got ${value}`,
      ErrorCode.OUT_OF_RANGE,
      { field: 'maxCells', value }
    )
  }
  return value
}

interface ExpansionQuery {
  scheme: GridScheme
  level: number
  origin: GeoPoint
  maxCells: number
  accept(center: GeoPoint, distanceKm: number): boolean
}

function compareCells(a: CoveredCell, b: CoveredCell): number {
  if (a.distanceKm !== b.distanceKm) return a.distanceKm - b.distanceKm
  return a.cell < b.cell ? -1 : a.cell > b.cell ? 1 : 0
}

function expand(query: ExpansionQuery): CellCovering {
  const { scheme, level, origin, maxCells } = query

  const seed = scheme.encode(origin, level)
  const visited = new Set<string>([seed])
  const cells: CoveredCell[] = [{ cell: seed, distanceKm: origin.distanceToKilometers(scheme.decode(seed)) }]

  let frontier: string[] = [seed]
  // Cells whose neighbors were not (all) examined when the cap was hit
  let pending: string[] = []

  if (cells.length >= maxCells) {
    pending = frontier
    frontier = []
  }

  while (frontier.length > 0) {
    const nextFrontier: string[] = []

    for (let index = 0; index < frontier.length && pending.length === 0; index++) {
      const current = frontier[index]!
      for (const neighbor of scheme.neighbors(current)) {
        if (visited.has(neighbor)) continue
        visited.add(neighbor)

        const center = scheme.decode(neighbor)
        const distanceKm = origin.distanceToKilometers(center)
        if (!query.accept(center, distanceKm)) continue

        cells.push({ cell: neighbor, distanceKm })
        nextFrontier.push(neighbor)

        if (cells.length >= maxCells) {
          pending = [...frontier.slice(index), ...nextFrontier]
          break
        }
      }
    }

    if (pending.length > 0) break
    frontier = nextFrontier
  }

  const complete = pending.length === 0 || !hasAcceptableNeighbor(query, pending, visited)
  if (!complete) {
    log.warn(`maxCells (${maxCells}) reached for ${scheme.name} level ${level}; covering is partial`)
  }

  cells.sort(compareCells)
  log.debug(`${scheme.name} level ${level}: seed ${seed}, visited ${visited.size}, accepted ${cells.length}, complete ${complete}`)

  return {
    scheme: scheme.name,
    level,
    cells: cells.slice(0, maxCells),
    complete,
    cellsVisited: visited.size,
  }
}

/**
 * One-step lookahead: whether any unvisited neighbor of the pending cells
 * would have been accepted
 */
function hasAcceptableNeighbor(query: ExpansionQuery, pending: readonly string[], visited: ReadonlySet<string>): boolean {
  const checked = new Set<string>()
  for (const cell of pending) {
    for (const neighbor of query.scheme.neighbors(cell)) {
      if (visited.has(neighbor) || checked.has(neighbor)) continue
      checked.add(neighbor)
      const center = query.scheme.decode(neighbor)
      if (query.accept(center, query.origin.distanceToKilometers(center))) return true
    }
  }
  return false
}

function notePolarQuery(
  scheme: GridScheme,
  origin: GeoPoint,
  bounds: GeoBoundingBox,
  config: Readonly<GeoCellConfig>
): void {
  if (origin.isNearPole(config.poleThresholdDegrees)) {
    log.debug(`${scheme.name} covering near a pole (lat=${origin.latitude.toFixed(2)}); cells shrink in longitude`)
  }
  if (bounds.includesPole()) {
    log.debug(`${scheme.name} covering includes a pole; using the full longitude range`)
  }
}

function warnIfOversized(scheme: GridScheme, estimate: number, level: number, maxCells: number): void {
  if (estimate > maxCells) {
    log.warn(
      `${scheme.name} level ${level} query needs ~${estimate} cells but maxCells is ${maxCells}; ` +
        'consider a coarser level'
    )
  }
}

/**
 * Cells covering a rectangle, nearest to its centre first
 *
 * @throws {ValidationError} For a level outside the scheme's bounds or an
 * invalid maxCells
 */
export function getCellsForBoundingBox(
  scheme: GridScheme,
  bounds: GeoBoundingBox,
  level: number,
  options: CoveringOptions = {}
): CellCovering {
  const config = options.config ?? getConfig()
  assertSchemeLevel(scheme, level)
  const maxCells = resolveMaxCells(options.maxCells, config)

  const origin = bounds.center
  const expanded = bounds.expandByKilometers(scheme.cellSizeKm(level))
  notePolarQuery(scheme, origin, bounds, config)
  warnIfOversized(scheme, estimateCellCount(scheme, bounds, level), level, maxCells)

  return expand({
    scheme,
    level,
    origin,
    maxCells,
    accept: (center) => expanded.contains(center),
  })
}

/**
 * Cells covering the circle of `radiusKm` around `center`, nearest first
 *
 * @throws {ValidationError} For a negative radius, a level outside the
 * scheme's bounds or an invalid maxCells
 */
export function getCellsForRadius(
  scheme: GridScheme,
  center: GeoPoint,
  radiusKm: number,
  level: number,
  options: CoveringOptions = {}
): CellCovering {
  const config = options.config ?? getConfig()
  const bounds = GeoBoundingBox.fromCenterAndRadius(center, radiusKm)
  assertSchemeLevel(scheme, level)
  const maxCells = resolveMaxCells(options.maxCells, config)

  const cellWidthKm = scheme.cellSizeKm(level)
  const expanded = bounds.expandByKilometers(cellWidthKm)
  const limitKm = radiusKm + cellWidthKm
  notePolarQuery(scheme, center, bounds, config)
  warnIfOversized(scheme, estimateCellCount(scheme, radiusKm, level), level, maxCells)

  return expand({
    scheme,
    level,
    origin: center,
    maxCells,
    accept: (cellCenter, distanceKm) => distanceKm <= limitKm && expanded.contains(cellCenter),
  })
}
