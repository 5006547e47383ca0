/**
 * Covering result types
 *
 * @module indexes/covering/types
 */

import type { GeoCellConfig } from '../../config'
import type { SpatialIndexType } from '../types'

export interface CoveredCell {
  cell: string
  /** Great-circle distance from the query centre to the cell centre */
  distanceKm: number
}

/**
 * Cells to scan for a query, nearest first
 */
export interface CellCovering {
  scheme: SpatialIndexType
  level: number
  /** Ascending by distanceKm, ties broken by key */
  cells: CoveredCell[]
  /** False only when maxCells cut the search short */
  complete: boolean
  /** Cells decoded while searching (visited set size) */
  cellsVisited: number
}

export interface CoveringOptions {
  /** Cap on returned cells (defaults to config.defaultMaxCells) */
  maxCells?: number
  /** Limits and thresholds (defaults to getConfig()) */
  config?: Readonly<GeoCellConfig>
}

/**
 * Keys of a covering in order
 */
export function coveringKeys(covering: CellCovering): string[] {
  return covering.cells.map((entry) => entry.cell)
}
