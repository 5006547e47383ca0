/**
 * Hilbert-curve lookup tables for S2 cell ids
 *
 * Both tables translate 4 levels (8 bits) at a time between (i, j) and the
 * position along the curve, carrying the 2-bit curve orientation through:
 *
 *   LOOKUP_POS[(ij << 2) | orientation] = (pos << 2) | nextOrientation
 *   LOOKUP_IJ[(pos << 2) | orientation] = (ij << 2) | nextOrientation
 *
 * with ij = (i4 << 4) | j4. Built once at module load.
 *
 * @module indexes/s2/hilbert
 */

export const LOOKUP_BITS = 4

export const SWAP_MASK = 0x01
export const INVERT_MASK = 0x02

// Sub-cell (i, j) bits visited at each curve position, per orientation
const POS_TO_IJ: ReadonlyArray<readonly [number, number, number, number]> = [
  [0, 1, 3, 2], // canonical
  [0, 2, 3, 1], // swapped
  [3, 2, 0, 1], // inverted
  [3, 1, 0, 2], // swapped and inverted
]

// Orientation change applied when descending into each curve position
const POS_TO_ORIENTATION: readonly [number, number, number, number] = [SWAP_MASK, 0, 0, INVERT_MASK | SWAP_MASK]

export const LOOKUP_POS = new Uint16Array(1 << (2 * LOOKUP_BITS + 2))
export const LOOKUP_IJ = new Uint16Array(1 << (2 * LOOKUP_BITS + 2))

function initLookupCell(
  level: number,
  i: number,
  j: number,
  origOrientation: number,
  pos: number,
  orientation: number
): void {
  if (level === LOOKUP_BITS) {
    const ij = (i << LOOKUP_BITS) + j
    LOOKUP_POS[(ij << 2) + origOrientation] = (pos << 2) + orientation
    LOOKUP_IJ[(pos << 2) + origOrientation] = (ij << 2) + orientation
    return
  }

  const order = POS_TO_IJ[orientation]!
  for (let subPos = 0; subPos < 4; subPos++) {
    const ij = order[subPos]!
    initLookupCell(
      level + 1,
      (i << 1) + ((ij >> 1) & 1),
      (j << 1) + (ij & 1),
      origOrientation,
      (pos << 2) + subPos,
      orientation ^ POS_TO_ORIENTATION[subPos]!
    )
  }
}

for (let orientation = 0; orientation < 4; orientation++) {
  initLookupCell(0, 0, 0, orientation, 0, orientation)
}
