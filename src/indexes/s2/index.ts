/**
 * S2 cell index keys (scheme B)
 *
 * @module indexes/s2
 */

export {
  encodeS2,
  encodeS2CellId,
  decodeS2,
  s2Bounds,
  s2Neighbors,
  s2NeighborIds,
  s2Parent,
  s2Children,
  s2Level,
  s2CellSizeKm,
  isValidS2Token,
  parseS2Token,
  assertS2Level,
} from './s2'
export { cellIdToToken, cellIdFromToken, cellIdLevel, type S2CellId } from './cell-id'
export { s2Scheme } from './scheme'
