/**
 * Great-circle distance and angle helpers
 *
 * Haversine on a spherical Earth (R = 6,371 km). Kilometer and mile
 * variants are divisions of the same meter value.
 *
 * @module geo/distance
 */

import { EARTH_RADIUS_METERS, METERS_PER_MILE } from '../constants'

export function toRadians(deg: number): number {
  return deg * (Math.PI / 180)
}

export function toDegrees(rad: number): number {
  return rad * (180 / Math.PI)
}

/**
 * Wrap a longitude into [-180, 180]. Values already in range are
 * returned unchanged, so 180 stays 180.
 */
export function normalizeLongitude(lng: number): number {
  if (lng >= -180 && lng <= 180) return lng
  const wrapped = ((((lng + 180) % 360) + 360) % 360) - 180
  return wrapped === -180 && lng > 0 ? 180 : wrapped
}

/**
 * Haversine distance between two points on Earth
 *
 * @param lat1 - Latitude of first point in degrees
 * @param lng1 - Longitude of first point in degrees
 * @param lat2 - Latitude of second point in degrees
 * @param lng2 - Longitude of second point in degrees
 * @returns Distance in meters
 */
export function haversineDistance(
  lat1: number,
  lng1: number,
  lat2: number,
  lng2: number
): number {
  const dLat = toRadians(lat2 - lat1)
  const dLng = toRadians(lng2 - lng1)
  const lat1Rad = toRadians(lat1)
  const lat2Rad = toRadians(lat2)

  const a =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos(lat1Rad) * Math.cos(lat2Rad) * Math.sin(dLng / 2) * Math.sin(dLng / 2)

  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a))

  return EARTH_RADIUS_METERS * c
}

export function haversineDistanceKm(lat1: number, lng1: number, lat2: number, lng2: number): number {
  return haversineDistance(lat1, lng1, lat2, lng2) / 1000
}

export function haversineDistanceMiles(lat1: number, lng1: number, lat2: number, lng2: number): number {
  return haversineDistance(lat1, lng1, lat2, lng2) / METERS_PER_MILE
}
