/**
 * GeoBoundingBox - latitude/longitude rectangle
 *
 * Boxes whose west edge is east of their east edge cross the antimeridian;
 * containment, width and center all use modular longitude for them.
 *
 * @module geo/bounding-box
 */

import { KM_PER_DEGREE_LAT, METERS_PER_MILE } from '../constants'
import { ErrorCode, ValidationError, assertValid } from '../errors'
import { normalizeLongitude, toRadians } from './distance'
import { GeoPoint } from './point'

const POLE_EPSILON = 1e-9

function assertRadius(radiusKm: number): void {
  if (!Number.isFinite(radiusKm) || radiusKm < 0) {
    throw new ValidationError(`radius must be a finite non-negative number, got ${radiusKm}`, ErrorCode.OUT_OF_RANGE, {
      field: 'radius',
      value: radiusKm,
    })
  }
}

/**
 * Longitude span [west, east] after widening by `delta` degrees on both
 * sides, or null when the result covers every longitude
 */
function widenLongitude(west: number, east: number, width: number, delta: number): [number, number] | null {
  if (width + 2 * delta >= 360) return null
  return [normalizeLongitude(west - delta), normalizeLongitude(east + delta)]
}

export class GeoBoundingBox {
  readonly southwest: GeoPoint
  readonly northeast: GeoPoint

  /**
   * @throws {ValidationError} If the southwest corner is north of the northeast corner
   */
  constructor(southwest: GeoPoint, northeast: GeoPoint) {
    if (southwest.latitude > northeast.latitude) {
      throw new ValidationError(
        'Southwest corner latitude must be less than or equal to northeast corner latitude',
        ErrorCode.VALIDATION_FAILED,
        { field: 'southwest', value: southwest.toJSON() }
      )
    }
    this.southwest = southwest
    this.northeast = northeast
    Object.freeze(this)
  }

  static fromCorners(south: number, west: number, north: number, east: number): GeoBoundingBox {
    return new GeoBoundingBox(new GeoPoint(south, west), new GeoPoint(north, east))
  }

  /**
   * Rectangle enclosing the circle of `radiusKm` around `center`, using
   * 111.32 km per degree of latitude and cos(lat) for longitude.
   *
   * Longitude wraps at the antimeridian (yielding a crossing box). The box
   * spans every longitude when it reaches a pole or is wider than the globe.
   *
   * @throws {ValidationError} OUT_OF_RANGE for a negative or non-finite radius
   */
  static fromCenterAndRadius(center: GeoPoint, radiusKm: number): GeoBoundingBox {
    assertRadius(radiusKm)
    const latDelta = radiusKm / KM_PER_DEGREE_LAT
    const south = Math.max(-90, center.latitude - latDelta)
    const north = Math.min(90, center.latitude + latDelta)

    const cosLat = Math.cos(toRadians(center.latitude))
    if (north >= 90 || south <= -90 || cosLat < POLE_EPSILON) {
      return GeoBoundingBox.fromCorners(south, -180, north, 180)
    }

    const lngDelta = radiusKm / (KM_PER_DEGREE_LAT * cosLat)
    const span = widenLongitude(center.longitude, center.longitude, 0, lngDelta)
    if (span === null) {
      return GeoBoundingBox.fromCorners(south, -180, north, 180)
    }
    return GeoBoundingBox.fromCorners(south, span[0], north, span[1])
  }

  static fromCenterAndRadiusMeters(center: GeoPoint, radiusMeters: number): GeoBoundingBox {
    assertRadius(radiusMeters)
    return GeoBoundingBox.fromCenterAndRadius(center, radiusMeters / 1000)
  }

  static fromCenterAndRadiusMiles(center: GeoPoint, radiusMiles: number): GeoBoundingBox {
    assertRadius(radiusMiles)
    return GeoBoundingBox.fromCenterAndRadius(center, (radiusMiles * METERS_PER_MILE) / 1000)
  }

  /**
   * Smallest box around a closed polygon ring given as [lat, lng] vertices.
   *
   * Longitude jumps of more than 180° between consecutive vertices are
   * counted: an odd count means the ring winds around a pole (full
   * longitude, latitude extended to that pole), two mean it straddles the
   * antimeridian. A vertex on a pole makes the box span every longitude,
   * since the pole point belongs to the cell whatever its longitude.
   */
  static fromVertices(vertices: ReadonlyArray<readonly [number, number]>): GeoBoundingBox {
    assertValid(vertices.length > 0, 'Cannot bound an empty vertex list', ErrorCode.VALIDATION_FAILED, {
      field: 'vertices',
    })

    let south = 90
    let north = -90
    let latSum = 0
    const lngs: number[] = []
    for (const [lat, lng] of vertices) {
      south = Math.min(south, lat)
      north = Math.max(north, lat)
      latSum += lat
      if (Math.abs(lat) < 90 - POLE_EPSILON) lngs.push(lng)
    }

    let jumps = 0
    for (let i = 0; i < lngs.length; i++) {
      const a = lngs[i]!
      const b = lngs[(i + 1) % lngs.length]!
      if (Math.abs(b - a) > 180) jumps++
    }

    if (jumps % 2 === 1) {
      return latSum >= 0
        ? GeoBoundingBox.fromCorners(south, -180, 90, 180)
        : GeoBoundingBox.fromCorners(-90, -180, north, 180)
    }
    if (lngs.length < vertices.length) {
      return GeoBoundingBox.fromCorners(south, -180, north, 180)
    }
    if (jumps === 0) {
      return GeoBoundingBox.fromCorners(south, Math.min(...lngs), north, Math.max(...lngs))
    }

    // Edges are the vertices' own longitudes, never values shifted back by 360
    const shifted = lngs.map((lng) => (lng < 0 ? lng + 360 : lng))
    let iWest = 0
    let iEast = 0
    for (let i = 1; i < shifted.length; i++) {
      if (shifted[i]! < shifted[iWest]!) iWest = i
      if (shifted[i]! > shifted[iEast]!) iEast = i
    }
    return GeoBoundingBox.fromCorners(south, lngs[iWest]!, north, lngs[iEast]!)
  }

  get south(): number {
    return this.southwest.latitude
  }

  get west(): number {
    return this.southwest.longitude
  }

  get north(): number {
    return this.northeast.latitude
  }

  get east(): number {
    return this.northeast.longitude
  }

  /** True when the box wraps across ±180° longitude */
  crossesDateLine(): boolean {
    return this.west > this.east
  }

  get widthDegrees(): number {
    return this.crossesDateLine() ? this.east - this.west + 360 : this.east - this.west
  }

  get heightDegrees(): number {
    return this.north - this.south
  }

  /** Midpoint; for crossing boxes it lies on the wrapped side */
  get center(): GeoPoint {
    const lat = (this.south + this.north) / 2
    const lng = this.crossesDateLine()
      ? normalizeLongitude(this.west + this.widthDegrees / 2)
      : (this.west + this.east) / 2
    return new GeoPoint(lat, lng)
  }

  /**
   * Inclusive containment test on both axes
   */
  contains(point: GeoPoint): boolean {
    if (point.latitude < this.south || point.latitude > this.north) {
      return false
    }

    if (this.crossesDateLine()) {
      return point.longitude >= this.west || point.longitude <= this.east
    }

    return point.longitude >= this.west && point.longitude <= this.east
  }

  includesPole(): boolean {
    return this.north >= 90 || this.south <= -90
  }

  /**
   * Split a crossing box into [western part up to 180, eastern part from -180].
   * Non-crossing boxes are returned as a single element.
   */
  splitAtDateLine(): GeoBoundingBox[] {
    if (!this.crossesDateLine()) return [this]
    return [
      GeoBoundingBox.fromCorners(this.south, this.west, this.north, 180),
      GeoBoundingBox.fromCorners(this.south, -180, this.north, this.east),
    ]
  }

  /**
   * Grow the box by `km` on every side. Longitude growth uses the cosine
   * of the box's most poleward latitude.
   */
  expandByKilometers(km: number): GeoBoundingBox {
    assertRadius(km)
    const latDelta = km / KM_PER_DEGREE_LAT
    const south = Math.max(-90, this.south - latDelta)
    const north = Math.min(90, this.north + latDelta)

    const poleward = Math.max(Math.abs(south), Math.abs(north))
    const cosLat = Math.cos(toRadians(poleward))
    if (north >= 90 || south <= -90 || cosLat < POLE_EPSILON) {
      return GeoBoundingBox.fromCorners(south, -180, north, 180)
    }

    const span = widenLongitude(this.west, this.east, this.widthDegrees, km / (KM_PER_DEGREE_LAT * cosLat))
    if (span === null) {
      return GeoBoundingBox.fromCorners(south, -180, north, 180)
    }
    return GeoBoundingBox.fromCorners(south, span[0], north, span[1])
  }

  equals(other: GeoBoundingBox): boolean {
    return this.southwest.equals(other.southwest) && this.northeast.equals(other.northeast)
  }

  toString(): string {
    return `SW: ${this.southwest}, NE: ${this.northeast}`
  }
}
