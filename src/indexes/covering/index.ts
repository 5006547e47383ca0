export { cellAreaKm2, estimateCellCount } from './estimate'
export { getCellsForBoundingBox, getCellsForRadius, resolveMaxCells } from './ring-expansion'
export { coveringKeys, type CellCovering, type CoveredCell, type CoveringOptions } from './types'
