/**
 * Tests for H3 hexagonal cells
 */

import { describe, it, expect } from 'vitest'
import {
  decodeH3,
  encodeH3,
  h3BaseCells,
  h3Boundary,
  h3Bounds,
  h3CellSizeKm,
  h3Children,
  h3EdgeLengthKm,
  h3Neighbors,
  h3Parent,
  h3Pentagons,
  h3Resolution,
  isH3Pentagon,
  isValidH3Cell,
} from '../../../src/indexes/h3/h3'
import { h3Scheme } from '../../../src/indexes/h3/scheme'
import { GeoPoint } from '../../../src/geo/point'
import { CellHierarchyError, ErrorCode, InvalidCellError, ValidationError } from '../../../src/errors'
import { randomCoordinate, randomInt, seededRandom } from '../../helpers/random'

// Base cell 4 is one of the twelve pentagons
const PENTAGON_RES0 = '8009fffffffffff'

describe('encodeH3 / decodeH3', () => {
  it('should index a point at resolution 7', () => {
    const cell = encodeH3(37.3615593, -122.0553238, 7)
    expect(cell).toBe('87283472bffffff')
    expect(h3Resolution(cell)).toBe(7)
  })

  it('should decode a centre that encodes back to the same cell', () => {
    const random = seededRandom(53)
    for (let i = 0; i < 300; i++) {
      const { lat, lng } = randomCoordinate(random, 90)
      const resolution = randomInt(random, 0, 15)
      const cell = encodeH3(lat, lng, resolution)
      const center = decodeH3(cell)
      expect(encodeH3(center.lat, center.lng, resolution)).toBe(cell)
    }
  })

  it('should reject resolutions outside 0..15', () => {
    try {
      encodeH3(0, 0, 16)
      expect.fail('Should have thrown')
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError)
      if (error instanceof ValidationError) expect(error.code).toBe(ErrorCode.INVALID_LEVEL)
    }
  })

  it('should reject malformed cells', () => {
    expect(isValidH3Cell('not-a-cell')).toBe(false)
    expect(() => decodeH3('not-a-cell')).toThrow(InvalidCellError)
    expect(() => h3Neighbors('')).toThrow(InvalidCellError)
  })
})

describe('H3 topology', () => {
  it('should give a hexagon six neighbors', () => {
    const neighbors = h3Neighbors('87283472bffffff')
    expect(neighbors).toHaveLength(6)
    expect(neighbors).not.toContain('87283472bffffff')
  })

  it('should give a pentagon five neighbors and six children', () => {
    expect(isH3Pentagon(PENTAGON_RES0)).toBe(true)
    expect(h3Neighbors(PENTAGON_RES0)).toHaveLength(5)
    expect(h3Children(PENTAGON_RES0)).toHaveLength(6)
  })

  it('should have exactly twelve pentagons at every resolution', () => {
    for (let resolution = 0; resolution <= 15; resolution++) {
      const pentagons = h3Pentagons(resolution)
      expect(pentagons).toHaveLength(12)
      for (const pentagon of pentagons) {
        expect(isH3Pentagon(pentagon)).toBe(true)
        expect(h3Neighbors(pentagon)).toHaveLength(5)
      }
    }
  })

  it('should enumerate 122 base cells with 5 or 6 neighbors each', () => {
    const baseCells = h3BaseCells()
    expect(baseCells).toHaveLength(122)
    const counts = baseCells.map((cell) => h3Neighbors(cell).length)
    expect(counts.filter((count) => count === 5)).toHaveLength(12)
    expect(counts.filter((count) => count === 6)).toHaveLength(110)
  })

  it('should be symmetric', () => {
    const random = seededRandom(59)
    for (let i = 0; i < 200; i++) {
      const { lat, lng } = randomCoordinate(random, 90)
      const cell = encodeH3(lat, lng, randomInt(random, 0, 15))
      for (const neighbor of h3Neighbors(cell)) {
        expect(h3Neighbors(neighbor)).toContain(cell)
      }
    }
  })
})

describe('H3 hierarchy', () => {
  it('should contain the cell among its parent\'s seven children', () => {
    const parent = h3Parent('87283472bffffff')
    expect(h3Resolution(parent)).toBe(6)
    const children = h3Children(parent)
    expect(children).toHaveLength(7)
    expect(children).toContain('87283472bffffff')
  })

  it('should jump several resolutions when asked', () => {
    expect(h3Resolution(h3Parent('87283472bffffff', 3))).toBe(3)
  })

  it('should refuse to leave resolutions 0..15', () => {
    expect(() => h3Parent(PENTAGON_RES0)).toThrow(CellHierarchyError)
    expect(() => h3Children(encodeH3(0, 0, 15))).toThrow(CellHierarchyError)
  })
})

describe('H3 geometry', () => {
  it('should bound the boundary and the centre', () => {
    const random = seededRandom(61)
    for (let i = 0; i < 300; i++) {
      const { lat, lng } = randomCoordinate(random, 90)
      const cell = encodeH3(lat, lng, randomInt(random, 0, 15))
      const bounds = h3Bounds(cell)
      expect(bounds.contains(h3Scheme.decode(cell))).toBe(true)
      for (const [vLat, vLng] of h3Boundary(cell)) {
        expect(bounds.contains(GeoPoint.of(vLat, vLng))).toBe(true)
      }
    }
  })

  it('should contain every vertex of a cell crossing the antimeridian', () => {
    const cell = '81057ffffffffff'
    const bounds = h3Bounds(cell)
    expect(bounds.crossesDateLine()).toBe(true)
    const outside = h3Boundary(cell).filter(([lat, lng]) => !bounds.contains(GeoPoint.of(lat, lng)))
    expect(outside).toEqual([])
  })

  it('should extend the polar cell to the pole with every longitude', () => {
    const bounds = h3Bounds(encodeH3(90, 0, 2))
    expect(bounds.north).toBe(90)
    expect(bounds.includesPole()).toBe(true)
    expect(bounds.widthDegrees).toBe(360)
  })

  it('should space neighbour centres √3 edges apart', () => {
    expect(h3CellSizeKm(7)).toBeCloseTo(Math.sqrt(3) * h3EdgeLengthKm(7), 12)
  })
})

describe('h3Scheme', () => {
  it('should report pentagons through the GridScheme contract', () => {
    expect(h3Scheme.isPentagon(PENTAGON_RES0)).toBe(true)
    expect(h3Scheme.isPentagon('87283472bffffff')).toBe(false)
    expect(h3Scheme.level(PENTAGON_RES0)).toBe(0)
    expect('87283472bffffff').toBeValidCell('h3')
  })
})
