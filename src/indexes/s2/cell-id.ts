/**
 * S2 cell ids
 *
 * A 64-bit id (held as a bigint) is laid out as
 *
 *   face (3 bits) | Hilbert position (2 bits per level) | 1 | 0…
 *
 * so the lowest set bit marks the level: leaf cells end in `1`, a level-k
 * cell has its sentinel at bit 2·(30 − k). Tokens are the lower-case hex
 * form with trailing zeros removed ("X" for the invalid id 0).
 *
 * @module indexes/s2/cell-id
 */

import { LOOKUP_BITS, LOOKUP_IJ, LOOKUP_POS, SWAP_MASK } from './hilbert'
import { MAX_LEVEL, isFace, type Face } from './projection'

export type S2CellId = bigint

const FACE_BITS = 3n
const POS_BITS = 2n * BigInt(MAX_LEVEL) + 1n
const LEVEL_MASK = 0x1555555555555555n
const LOOKUP_MASK = (1 << LOOKUP_BITS) - 1

/**
 * Lowest set bit of the id
 */
export function lsb(id: S2CellId): bigint {
  return id & -id
}

export function lsbForLevel(level: number): bigint {
  return 1n << BigInt(2 * (MAX_LEVEL - level))
}

export function cellIdFace(id: S2CellId): number {
  return Number(id >> POS_BITS)
}

/**
 * Face < 6 and the sentinel bit sits at an even position
 */
export function isValidCellId(id: S2CellId): boolean {
  return id > 0n && id >> (POS_BITS + FACE_BITS) === 0n && cellIdFace(id) < 6 && (lsb(id) & LEVEL_MASK) !== 0n
}

export function cellIdLevel(id: S2CellId): number {
  const trailingZeros = lsb(id).toString(2).length - 1
  return MAX_LEVEL - (trailingZeros >> 1)
}

export function isLeaf(id: S2CellId): boolean {
  return (id & 1n) === 1n
}

/**
 * Cell at `level` containing leaf (i, j) of `face`
 */
export function cellIdFromFaceIj(face: Face, i: number, j: number, level: number): S2CellId {
  let n = BigInt(face) << (POS_BITS - 1n)
  let bits = face & SWAP_MASK

  for (let k = 7; k >= 0; k--) {
    bits += ((i >> (k * LOOKUP_BITS)) & LOOKUP_MASK) << (LOOKUP_BITS + 2)
    bits += ((j >> (k * LOOKUP_BITS)) & LOOKUP_MASK) << 2
    bits = LOOKUP_POS[bits]!
    n |= BigInt(bits >> 2) << BigInt(k * 2 * LOOKUP_BITS)
    bits &= SWAP_MASK | 2
  }

  const leaf = n * 2n + 1n
  if (level >= MAX_LEVEL) return leaf
  const sentinel = lsbForLevel(level)
  return (leaf & -sentinel) | sentinel
}

export interface FaceIj {
  face: Face
  i: number
  j: number
  level: number
}

/**
 * Face and leaf coordinates of the leaf cell at the id's Hilbert position
 * (the leaf next to the cell centre for non-leaf cells)
 */
export function cellIdToFaceIj(id: S2CellId): FaceIj {
  const faceNumber = cellIdFace(id)
  if (!isFace(faceNumber)) {
    throw new RangeError(`cell id face out of range: ${faceNumber}`)
  }
  const face = faceNumber
  let bits = face & SWAP_MASK
  let i = 0
  let j = 0

  for (let k = 7; k >= 0; k--) {
    const nbits = k === 7 ? MAX_LEVEL - 7 * LOOKUP_BITS : LOOKUP_BITS
    const posBits = Number((id >> BigInt(k * 2 * LOOKUP_BITS + 1)) & ((1n << BigInt(2 * nbits)) - 1n))
    bits += posBits << 2
    bits = LOOKUP_IJ[bits]!
    i += (bits >> (LOOKUP_BITS + 2)) << (k * LOOKUP_BITS)
    j += ((bits >> 2) & LOOKUP_MASK) << (k * LOOKUP_BITS)
    bits &= SWAP_MASK | 2
  }

  return { face, i, j, level: cellIdLevel(id) }
}

export function cellIdParent(id: S2CellId, level: number): S2CellId {
  const sentinel = lsbForLevel(level)
  return (id & -sentinel) | sentinel
}

/**
 * The four children in Hilbert order
 */
export function cellIdChildren(id: S2CellId): S2CellId[] {
  const low = lsb(id)
  const childLsb = low >> 2n
  const first = id - low + childLsb
  return [0n, 1n, 2n, 3n].map((k) => first + k * 2n * childLsb)
}

export function cellIdToToken(id: S2CellId): string {
  if (id === 0n) return 'X'
  return id.toString(16).padStart(16, '0').replace(/0+$/, '')
}

const TOKEN_PATTERN = /^[0-9a-f]{1,16}$/

/**
 * Parse a token; returns null when it is not hex or names an invalid id
 */
export function cellIdFromToken(token: string): S2CellId | null {
  const lower = token.toLowerCase()
  if (!TOKEN_PATTERN.test(lower)) return null
  const id = BigInt(`0x${lower.padEnd(16, '0')}`)
  return isValidCellId(id) ? id : null
}
