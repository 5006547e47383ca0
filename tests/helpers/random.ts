/**
 * Seeded random sampling for property-style tests
 *
 * mulberry32: small, fast, and reproducible across runs.
 */

export type Random = () => number

export function seededRandom(seed: number): Random {
  let state = seed >>> 0
  return () => {
    state = (state + 0x6d2b79f5) >>> 0
    let t = state
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

/** Uniform float in [min, max) */
export function randomBetween(random: Random, min: number, max: number): number {
  return min + random() * (max - min)
}

/** Uniform integer in [min, max] */
export function randomInt(random: Random, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1))
}

/** Latitude in [-maxLat, maxLat], longitude in [-180, 180) */
export function randomCoordinate(random: Random, maxLat = 89): { lat: number; lng: number } {
  return { lat: randomBetween(random, -maxLat, maxLat), lng: randomBetween(random, -180, 180) }
}
