import { describe, expect, it } from 'vitest'
import { MSMError, ErrorType, errorCategory, errorMessage } from '../types/errors'

describe('errorCategory', () => {
  it('groups the concurrency errors', () => {
    const codes = Object.values(ErrorType).filter((code) => errorCategory(code) === 'CONCURRENCY')
    expect(codes).toEqual(['NOT_RUNNING', 'BUSY', 'CONFLICT', 'CANCELLED'])
  })

  it('is exposed on the error', () => {
    const err = new MSMError(ErrorType.HASH_ERROR, 'Invalid SHA256', { path: 'server.jar' })
    expect(err).toBeInstanceOf(Error)
    expect(err.category).toBe('VERIFICATION')
    expect(err.details).toEqual({ path: 'server.jar' })
  })
})

describe('errorMessage', () => {
  it('reads errors and other thrown values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom')
    expect(errorMessage('plain')).toBe('plain')
  })
})
