import { describe, it, expect } from 'vitest'
import {
  CofferError,
  AuthenticationError,
  KeyLengthError,
  InvalidBlobIdError,
  ConfigError,
  ModeMismatchError,
  ResponseTimeoutError,
} from './catalog.js'

describe('CofferError', () => {
  it('has errorCode, message, and details', () => {
    const err = new CofferError('BAD_INPUT', 'Bad input', { reason: 'test' })

    expect(err.errorCode).toBe('BAD_INPUT')
    expect(err.message).toBe('Bad input')
    expect(err.details).toEqual({ reason: 'test' })
  })

  it('toJSON() returns serializable object', () => {
    const err = new CofferError('BAD_INPUT', 'Bad input', { field: 'blobId' })

    expect(err.toJSON()).toEqual({
      error: {
        errorCode: 'BAD_INPUT',
        message: 'Bad input',
        details: { field: 'blobId' },
      },
    })

    // Omits details when undefined
    expect(new CofferError('BAD_INPUT', 'Bad input').toJSON()).toEqual({
      error: { errorCode: 'BAD_INPUT', message: 'Bad input' },
    })
  })

  it('subclasses carry their error codes', () => {
    const cases: Array<{ err: CofferError; errorCode: string }> = [
      { err: new AuthenticationError(), errorCode: 'AUTHENTICATION_FAILED' },
      { err: new KeyLengthError(32, 16), errorCode: 'INVALID_KEY_LENGTH' },
      { err: new InvalidBlobIdError('../x'), errorCode: 'INVALID_BLOB_ID' },
      { err: new ConfigError('nope'), errorCode: 'INVALID_CONFIG' },
      {
        err: new ModeMismatchError('per-document', 'node-keyed'),
        errorCode: 'MODE_MISMATCH',
      },
      {
        err: new ResponseTimeoutError('proof', 'b1', 500),
        errorCode: 'RESPONSE_TIMEOUT',
      },
    ]

    for (const { err, errorCode } of cases) {
      expect(err).toBeInstanceOf(Error)
      expect(err).toBeInstanceOf(CofferError)
      expect(err.errorCode).toBe(errorCode)
    }
  })

  it('KeyLengthError reports expected and actual lengths', () => {
    const err = new KeyLengthError(32, 16)
    expect(err.message).toBe('Invalid key length: expected 32 bytes, got 16')
    expect(err.details).toEqual({ expected: 32, actual: 16 })
  })

  it('ResponseTimeoutError names the response kind and blob', () => {
    const err = new ResponseTimeoutError('retrieve', 'b9', 250)
    expect(err.message).toBe('No retrieve response for b9 within 250ms')
  })

  it('error name property is set to the class name', () => {
    expect(new CofferError('X', 'x').name).toBe('CofferError')
    expect(new AuthenticationError().name).toBe('AuthenticationError')
    expect(new KeyLengthError(32, 1).name).toBe('KeyLengthError')
    expect(new InvalidBlobIdError('').name).toBe('InvalidBlobIdError')
    expect(new ModeMismatchError('a', 'b').name).toBe('ModeMismatchError')
    expect(new ResponseTimeoutError('store', 'b', 1).name).toBe(
      'ResponseTimeoutError',
    )
  })
})
