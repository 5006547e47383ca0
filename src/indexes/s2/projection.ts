/**
 * Cube-face projection for S2 cells
 *
 * point → unit vector → face (largest axis) → (u, v) on the face plane →
 * (s, t) through the quadratic area-equalising transform → integer leaf
 * coordinates (i, j) in [0, 2^30).
 *
 * (s, t) here span [-1, 1] across a face.
 *
 * @module indexes/s2/projection
 */

import { toDegrees, toRadians } from '../../geo/distance'

export const MAX_LEVEL = 30

/** Leaf cells along one face edge */
export const MAX_SIZE = 2 ** MAX_LEVEL

export type Vector3 = readonly [number, number, number]

export type Face = 0 | 1 | 2 | 3 | 4 | 5

export function latLngToXyz(lat: number, lng: number): Vector3 {
  const phi = toRadians(lat)
  const theta = toRadians(lng)
  const cosPhi = Math.cos(phi)
  return [Math.cos(theta) * cosPhi, Math.sin(theta) * cosPhi, Math.sin(phi)]
}

export function xyzToLatLng([x, y, z]: Vector3): [number, number] {
  return [toDegrees(Math.atan2(z, Math.sqrt(x * x + y * y))), toDegrees(Math.atan2(y, x))]
}

/**
 * Face whose axis has the largest absolute component
 * (x → 0/3, y → 1/4, z → 2/5)
 */
export function xyzToFace([x, y, z]: Vector3): Face {
  const ax = Math.abs(x)
  const ay = Math.abs(y)
  const az = Math.abs(z)
  if (ax > ay && ax > az) return x > 0 ? 0 : 3
  if (ay > az) return y > 0 ? 1 : 4
  return z > 0 ? 2 : 5
}

export function faceXyzToUv(face: Face, [x, y, z]: Vector3): [number, number] {
  switch (face) {
    case 0:
      return [y / x, z / x]
    case 1:
      return [-x / y, z / y]
    case 2:
      return [-x / z, -y / z]
    case 3:
      return [z / x, y / x]
    case 4:
      return [z / y, -x / y]
    case 5:
      return [-y / z, -x / z]
  }
}

function faceUvToRaw(face: Face, u: number, v: number): Vector3 {
  switch (face) {
    case 0:
      return [1, u, v]
    case 1:
      return [-u, 1, v]
    case 2:
      return [-u, -v, 1]
    case 3:
      return [-1, -v, -u]
    case 4:
      return [v, -1, -u]
    case 5:
      return [v, u, -1]
  }
}

/**
 * Unit vector of the face point (u, v)
 */
export function faceUvToXyz(face: Face, u: number, v: number): Vector3 {
  const [x, y, z] = faceUvToRaw(face, u, v)
  const norm = Math.hypot(x, y, z)
  return [x / norm, y / norm, z / norm]
}

export function uvToSt(u: number): number {
  return u >= 0 ? Math.sqrt(1 + 3 * u) - 1 : 1 - Math.sqrt(1 - 3 * u)
}

export function stToUv(s: number): number {
  return s >= 0 ? ((1 + s) * (1 + s) - 1) / 3 : (1 - (1 - s) * (1 - s)) / 3
}

/**
 * Leaf coordinate containing s, clamped to the face
 */
export function stToIj(s: number): number {
  const half = MAX_SIZE / 2
  return Math.max(0, Math.min(MAX_SIZE - 1, Math.round(half * s + (half - 0.5))))
}

/**
 * s/t of a leaf-grid position, where `twice` is 2·i (+1 for a leaf centre)
 */
export function ijToSt(twice: number): number {
  return (twice - MAX_SIZE) / MAX_SIZE
}

export function isFace(value: number): value is Face {
  return Number.isInteger(value) && value >= 0 && value <= 5
}
