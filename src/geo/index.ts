/**
 * Geographic primitives
 *
 * @module geo
 */

export { GeoPoint, assertCoordinate } from './point'
export { GeoBoundingBox } from './bounding-box'
export {
  haversineDistance,
  haversineDistanceKm,
  haversineDistanceMiles,
  normalizeLongitude,
  toRadians,
  toDegrees,
} from './distance'
