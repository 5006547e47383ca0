/**
 * Tests for spatial pagination tokens
 */

import { describe, it, expect } from 'vitest'
import {
  decodeContinuationToken,
  encodeContinuationToken,
  remainingCells,
} from '../../../src/query/continuation-token'
import { ErrorCode, InvalidTokenError, ValidationError } from '../../../src/errors'

function expectInvalidToken(encoded: string, message: string): void {
  try {
    decodeContinuationToken(encoded)
    expect.fail('Should have thrown')
  } catch (error) {
    expect(error).toBeInstanceOf(InvalidTokenError)
    if (error instanceof InvalidTokenError) {
      expect(error.code).toBe(ErrorCode.INVALID_TOKEN)
      expect(error.message).toBe(message)
    }
  }
}

describe('encodeContinuationToken', () => {
  it('should encode the cell index as base64 JSON', () => {
    expect(encodeContinuationToken({ cellIndex: 3 })).toBe('eyJjZWxsSW5kZXgiOjN9')
  })

  it('should include the last evaluated key when present', () => {
    expect(encodeContinuationToken({ cellIndex: 2, lastEvaluatedKey: 'item#42' })).toBe(
      'eyJjZWxsSW5kZXgiOjIsImxhc3RFdmFsdWF0ZWRLZXkiOiJpdGVtIzQyIn0='
    )
  })

  it('should reject a negative or fractional cell index', () => {
    expect(() => encodeContinuationToken({ cellIndex: -1 })).toThrow(InvalidTokenError)
    expect(() => encodeContinuationToken({ cellIndex: 1.5 })).toThrow(
      'cellIndex must be a non-negative integer, got 1.5'
    )
  })
})

describe('decodeContinuationToken', () => {
  it('should round-trip a token', () => {
    const token = { cellIndex: 7, lastEvaluatedKey: 'pk=cafe|sk=0042' }
    expect(decodeContinuationToken(encodeContinuationToken(token))).toEqual(token)
  })

  it('should decode a token without a last evaluated key', () => {
    expect(decodeContinuationToken('eyJjZWxsSW5kZXgiOjN9')).toEqual({ cellIndex: 3 })
  })

  it('should treat a null last evaluated key as absent', () => {
    expect(decodeContinuationToken('eyJjZWxsSW5kZXgiOjEsImxhc3RFdmFsdWF0ZWRLZXkiOm51bGx9')).toEqual({ cellIndex: 1 })
  })

  it('should reject text that is not base64', () => {
    expectInvalidToken('not a token!', 'Continuation token is not base64-encoded JSON')
  })

  it('should keep the underlying parse failure as the cause', () => {
    try {
      decodeContinuationToken('bm90IGpzb24=')
      expect.fail('Should have thrown')
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidTokenError)
      if (error instanceof InvalidTokenError) {
        expect(error.cause).toBeInstanceOf(SyntaxError)
      }
    }
  })

  it('should reject JSON that is not an object', () => {
    expectInvalidToken('WzEsMl0=', 'Continuation token must encode an object')
  })

  it('should reject a negative cell index', () => {
    expectInvalidToken('eyJjZWxsSW5kZXgiOi0xfQ==', 'Continuation token cellIndex must be a non-negative integer')
  })

  it('should reject a non-string last evaluated key', () => {
    expectInvalidToken(
      'eyJjZWxsSW5kZXgiOjEsImxhc3RFdmFsdWF0ZWRLZXkiOjd9',
      'Continuation token lastEvaluatedKey must be a string'
    )
  })

  it('should be a validation error', () => {
    expect(() => decodeContinuationToken('')).toThrow(ValidationError)
  })
})

describe('remainingCells', () => {
  const cells = ['9q8yy', '9q8yz', '9q8yv', '9q8zn']

  it('should return every cell without a token', () => {
    const rest = remainingCells(cells)
    expect(rest).toEqual(cells)
    expect(rest).not.toBe(cells)
  })

  it('should resume at the token cell', () => {
    expect(remainingCells(cells, { cellIndex: 2, lastEvaluatedKey: 'k' })).toEqual(['9q8yv', '9q8zn'])
  })

  it('should return nothing past the end', () => {
    expect(remainingCells(cells, { cellIndex: 4 })).toEqual([])
  })
})
