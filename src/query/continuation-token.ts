/**
 * Continuation tokens for paginated spatial queries
 *
 * A token records which cell of the (distance-ordered) covering the next page
 * starts at, and the store's last evaluated key inside that cell. It travels
 * to clients as base64-encoded JSON.
 *
 * @module query/continuation-token
 */

import { InvalidTokenError } from '../errors'
import { base64ToString, stringToBase64 } from '../utils/base64'
import { isNonNegativeInteger, isRecord, isString } from '../utils/guards'

export interface SpatialContinuationToken {
  /** Index into the covering's cell list */
  cellIndex: number
  /** Resume point inside the cell; absent once the cell is exhausted */
  lastEvaluatedKey?: string
}

/**
 * @throws {InvalidTokenError} For a negative or fractional cellIndex
 */
export function encodeContinuationToken(token: SpatialContinuationToken): string {
  if (!isNonNegativeInteger(token.cellIndex)) {
    throw new InvalidTokenError(`cellIndex must be a non-negative integer, got ${token.cellIndex}`)
  }
  const payload: SpatialContinuationToken =
    token.lastEvaluatedKey === undefined
      ? { cellIndex: token.cellIndex }
      : { cellIndex: token.cellIndex, lastEvaluatedKey: token.lastEvaluatedKey }
  return stringToBase64(JSON.stringify(payload))
}

/**
 * @throws {InvalidTokenError} When the token is not base64, not JSON, or
 * does not have the token's shape
 */
export function decodeContinuationToken(encoded: string): SpatialContinuationToken {
  let parsed: unknown
  try {
    parsed = JSON.parse(base64ToString(encoded))
  } catch (error) {
    throw new InvalidTokenError('Continuation token is not base64-encoded JSON', error instanceof Error ? error : undefined)
  }

  if (!isRecord(parsed)) {
    throw new InvalidTokenError('Continuation token must encode an object')
  }
  const { cellIndex, lastEvaluatedKey } = parsed
  if (!isNonNegativeInteger(cellIndex)) {
    throw new InvalidTokenError('Continuation token cellIndex must be a non-negative integer')
  }
  if (lastEvaluatedKey === undefined || lastEvaluatedKey === null) {
    return { cellIndex }
  }
  if (!isString(lastEvaluatedKey)) {
    throw new InvalidTokenError('Continuation token lastEvaluatedKey must be a string')
  }
  return { cellIndex, lastEvaluatedKey }
}

/**
 * Cells still to scan when resuming from `token` (all of them without one)
 */
export function remainingCells<T>(cells: readonly T[], token?: SpatialContinuationToken): T[] {
  if (token === undefined) return [...cells]
  return cells.slice(token.cellIndex)
}
