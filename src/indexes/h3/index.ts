/**
 * H3 hexagonal index keys (scheme C)
 *
 * @module indexes/h3
 */

export {
  encodeH3,
  decodeH3,
  h3Boundary,
  h3Bounds,
  h3Neighbors,
  h3Parent,
  h3Children,
  h3Resolution,
  h3Pentagons,
  h3BaseCells,
  h3EdgeLengthKm,
  h3CellSizeKm,
  isH3Pentagon,
  isValidH3Cell,
  assertH3Cell,
  assertH3Resolution,
} from './h3'
export { h3Scheme } from './scheme'
