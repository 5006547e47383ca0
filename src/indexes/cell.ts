/**
 * GeoCell - a cell key bound to its scheme
 *
 * @module indexes/cell
 */

import type { GeoBoundingBox } from '../geo/bounding-box'
import type { GeoPoint } from '../geo/point'
import { InvalidCellError } from '../errors'
import type { GridScheme, SpatialIndexType } from './types'

export class GeoCell {
  readonly scheme: GridScheme
  readonly key: string

  /**
   * @throws {InvalidCellError} If `key` is not a valid cell of `scheme`
   */
  constructor(scheme: GridScheme, key: string) {
    if (!scheme.isValid(key)) {
      throw new InvalidCellError(scheme.name, key, 'not a valid cell')
    }
    this.scheme = scheme
    this.key = key
  }

  static fromPoint(scheme: GridScheme, point: GeoPoint, level: number): GeoCell {
    return new GeoCell(scheme, scheme.encode(point, level))
  }

  get type(): SpatialIndexType {
    return this.scheme.name
  }

  get level(): number {
    return this.scheme.level(this.key)
  }

  get center(): GeoPoint {
    return this.scheme.decode(this.key)
  }

  get bounds(): GeoBoundingBox {
    return this.scheme.decodeBounds(this.key)
  }

  get isPentagon(): boolean {
    return this.scheme.isPentagon(this.key)
  }

  get sizeKm(): number {
    return this.scheme.cellSizeKm(this.level)
  }

  neighbors(): GeoCell[] {
    return this.scheme.neighbors(this.key).map((key) => new GeoCell(this.scheme, key))
  }

  parent(): GeoCell {
    return new GeoCell(this.scheme, this.scheme.parent(this.key))
  }

  children(): GeoCell[] {
    return this.scheme.children(this.key).map((key) => new GeoCell(this.scheme, key))
  }

  /**
   * Whether `other` is this cell or lies inside it
   */
  contains(other: GeoCell): boolean {
    if (other.scheme !== this.scheme || other.level < this.level) return false
    let cursor: GeoCell = other
    while (cursor.level > this.level) cursor = cursor.parent()
    return cursor.key === this.key
  }

  equals(other: GeoCell): boolean {
    return this.scheme === other.scheme && this.key === other.key
  }

  toString(): string {
    return this.key
  }
}
