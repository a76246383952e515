import { describe, it, expect } from 'vitest'
import { Ok, Err, unwrap, isOk, isErr, attempt, VaultError, errorMessage } from '../../src/common/index.js'

describe('Result', () => {
  it('Ok wraps a value', () => {
    const result = Ok(42)
    expect(result.ok).toBe(true)
    if (result.ok) expect(result.value).toBe(42)
  })

  it('Err wraps an error', () => {
    const result = Err(VaultError.io('disk gone'))
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.code).toBe('IO_ERROR')
      expect(result.error.message).toBe('disk gone')
    }
  })

  it('unwrap returns value for Ok and throws for Err', () => {
    expect(unwrap(Ok('hello'))).toBe('hello')
    expect(() => unwrap(Err(VaultError.config('no key')))).toThrow('no key')
    expect(() => unwrap(Err('string error'))).toThrow('string error')
  })

  it('isOk / isErr narrow', () => {
    expect(isOk(Ok(10))).toBe(true)
    expect(isErr(Ok(10))).toBe(false)
    expect(isErr(Err('fail'))).toBe(true)
  })

  it('attempt maps thrown values', () => {
    const ok = attempt(() => 3, () => 'unused')
    expect(ok).toEqual({ ok: true, value: 3 })

    const failed = attempt(() => {
      throw new Error('boom')
    }, (err) => VaultError.db(errorMessage(err)))
    expect(failed.ok).toBe(false)
    if (!failed.ok) {
      expect(failed.error.code).toBe('DB_ERROR')
      expect(failed.error.message).toBe('boom')
    }
  })
})

describe('VaultError', () => {
  it('carries code, name and cause', () => {
    const cause = new Error('root')
    const err = VaultError.provider('upstream failed', cause)
    expect(err).toBeInstanceOf(Error)
    expect(err.name).toBe('VaultError')
    expect(err.code).toBe('PROVIDER_ERROR')
    expect(err.cause).toBe(cause)
  })

  it('formats not-found messages', () => {
    expect(VaultError.notFound('note', 'a.md').message).toBe('note not found: a.md')
  })

  it('errorMessage stringifies non-errors', () => {
    expect(errorMessage(new Error('x'))).toBe('x')
    expect(errorMessage(42)).toBe('42')
  })
})
