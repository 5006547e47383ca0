/**
 * Query helpers
 *
 * @module query
 */

export {
  encodeContinuationToken,
  decodeContinuationToken,
  remainingCells,
  type SpatialContinuationToken,
} from './continuation-token'
export { filterByDistance, filterByBoundingBox, type DistanceMatch, type Locator } from './post-filter'
