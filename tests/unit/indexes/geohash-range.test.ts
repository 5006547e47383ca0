/**
 * Tests for geohash range covering
 */

import { describe, it, expect } from 'vitest'
import {
  getRangeForBoundingBox,
  getRangeForRadius,
  getRangesForBoundingBox,
  getRangesForRadius,
  rangeContains,
} from '../../../src/indexes/geohash/range'
import { encodeGeohash } from '../../../src/indexes/geohash/geohash'
import { GeoBoundingBox } from '../../../src/geo/bounding-box'
import { GeoPoint } from '../../../src/geo/point'
import { ErrorCode, ValidationError } from '../../../src/errors'

describe('getRangeForBoundingBox', () => {
  it('should span the encoded southwest and northeast corners', () => {
    const box = GeoBoundingBox.fromCorners(37.7, -122.5, 37.9, -122.3)
    const range = getRangeForBoundingBox(box, 6)
    expect(range).toEqual({ minHash: '9q8ykr', maxHash: '9q9p8g' })
    expect(range.minHash).toBe(encodeGeohash(37.7, -122.5, 6))
    expect(range.maxHash).toBe(encodeGeohash(37.9, -122.3, 6))
    expect(range.minHash < range.maxHash).toBe(true)
  })

  it('should refuse a box crossing the antimeridian', () => {
    const box = GeoBoundingBox.fromCorners(-1, 178.5, 1, -179.5)
    try {
      getRangeForBoundingBox(box, 4)
      expect.fail('Should have thrown')
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError)
      if (error instanceof ValidationError) expect(error.code).toBe(ErrorCode.DATELINE_CROSSING)
    }
  })
})

describe('getRangesForBoundingBox', () => {
  it('should return a single range for an ordinary box', () => {
    const box = GeoBoundingBox.fromCorners(37.7, -122.5, 37.9, -122.3)
    expect(getRangesForBoundingBox(box, 6)).toEqual([{ minHash: '9q8ykr', maxHash: '9q9p8g' }])
  })

  it('should split a crossing box into western then eastern ranges', () => {
    const box = GeoBoundingBox.fromCorners(-1, 178.5, 1, -179.5)
    expect(getRangesForBoundingBox(box, 4)).toEqual([
      { minHash: 'rzyf', maxHash: 'xbpv' },
      { minHash: '2pb4', maxHash: '800m' },
    ])
  })
})

describe('radius ranges', () => {
  it('should compose the radius rectangle with the box range', () => {
    const center = GeoPoint.of(37.7749, -122.4194)
    expect(getRangeForRadius(center, 1, 6)).toEqual(
      getRangeForBoundingBox(GeoBoundingBox.fromCenterAndRadius(center, 1), 6)
    )
  })

  it('should split radius queries that wrap the antimeridian', () => {
    const ranges = getRangesForRadius(GeoPoint.of(0, 179.5), 111.32, 4)
    expect(ranges).toHaveLength(2)
    expect(() => getRangeForRadius(GeoPoint.of(0, 179.5), 111.32, 4)).toThrow(ValidationError)
  })
})

describe('rangeContains', () => {
  const range = { minHash: '9q8ykr', maxHash: '9q9p8g' }

  it('should compare the hash prefix at the range precision', () => {
    expect(rangeContains(range, '9q8yyk8yt')).toBe(true)
    expect(rangeContains(range, '9Q8YKR')).toBe(true)
    expect(rangeContains(range, '9q9p8g')).toBe(true)
    expect(rangeContains(range, 'dr5reg')).toBe(false)
  })

  it('should include every point of the box (superset guarantee)', () => {
    const box = GeoBoundingBox.fromCorners(37.7, -122.5, 37.9, -122.3)
    const r = getRangeForBoundingBox(box, 6)
    for (const [lat, lng] of [[37.7, -122.5], [37.8, -122.4], [37.9, -122.3], [37.75, -122.35]] as const) {
      expect(rangeContains(r, encodeGeohash(lat, lng, 9))).toBe(true)
    }
  })
})
