/**
 * GeoPoint - an immutable, validated latitude/longitude pair
 *
 * @module geo/point
 */

import {
  DEFAULT_POLE_THRESHOLD_DEGREES,
  MAX_LATITUDE,
  MAX_LONGITUDE,
  MIN_LATITUDE,
  MIN_LONGITUDE,
} from '../constants'
import { ErrorCode, ValidationError } from '../errors'
import { haversineDistance, haversineDistanceKm, haversineDistanceMiles } from './distance'

/**
 * Throw unless `value` is a finite number within [min, max]
 */
export function assertCoordinate(field: 'latitude' | 'longitude', value: number): void {
  const [min, max] = field === 'latitude' ? [MIN_LATITUDE, MAX_LATITUDE] : [MIN_LONGITUDE, MAX_LONGITUDE]
  if (!Number.isFinite(value) || value < min || value > max) {
    throw new ValidationError(
      `${field} must be a finite number between ${min} and ${max}, got ${value}`,
      ErrorCode.OUT_OF_RANGE,
      { field, value }
    )
  }
}

export class GeoPoint {
  readonly latitude: number
  readonly longitude: number

  /**
   * @throws {ValidationError} OUT_OF_RANGE when a coordinate is not finite
   * or lies outside [-90, 90] / [-180, 180]
   */
  constructor(latitude: number, longitude: number) {
    assertCoordinate('latitude', latitude)
    assertCoordinate('longitude', longitude)
    this.latitude = latitude
    this.longitude = longitude
    Object.freeze(this)
  }

  static of(latitude: number, longitude: number): GeoPoint {
    return new GeoPoint(latitude, longitude)
  }

  distanceToMeters(other: GeoPoint): number {
    return haversineDistance(this.latitude, this.longitude, other.latitude, other.longitude)
  }

  distanceToKilometers(other: GeoPoint): number {
    return haversineDistanceKm(this.latitude, this.longitude, other.latitude, other.longitude)
  }

  distanceToMiles(other: GeoPoint): number {
    return haversineDistanceMiles(this.latitude, this.longitude, other.latitude, other.longitude)
  }

  /**
   * Whether |latitude| exceeds the threshold, where longitude-based
   * approximations degrade
   */
  isNearPole(thresholdDegrees: number = DEFAULT_POLE_THRESHOLD_DEGREES): boolean {
    return Math.abs(this.latitude) > thresholdDegrees
  }

  equals(other: GeoPoint): boolean {
    return this.latitude === other.latitude && this.longitude === other.longitude
  }

  toString(): string {
    return `${this.latitude},${this.longitude}`
  }

  toJSON(): { latitude: number; longitude: number } {
    return { latitude: this.latitude, longitude: this.longitude }
  }
}
