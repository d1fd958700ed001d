import { describe, it, expect } from '@jest/globals'
import { resolveConnectionConfig } from '../client'
import { classifyStoreError, StoreConflictError, StoreUnavailableError } from '../errors'

describe('resolveConnectionConfig', () => {
  it('should prefer DATABASE_URL', () => {
    expect(resolveConnectionConfig({ DATABASE_URL: ' postgres://cafe@db/cafe ' })).toEqual({
      connectionString: 'postgres://cafe@db/cafe',
    })
  })

  it('should fall back to discrete settings with defaults', () => {
    expect(resolveConnectionConfig({ POSTGRES_HOST: 'db', POSTGRES_PASSWORD: 'test-secret' })).toEqual({
      host: 'db',
      port: 5432,
      user: 'cafe',
      password: 'test-secret',
      database: 'cafe',
    })
  })

  it('should reject a non-numeric port', () => {
    expect(() => resolveConnectionConfig({ POSTGRES_PORT: 'abc' })).toThrow('Invalid env var: POSTGRES_PORT=abc')
  })
})

describe('classifyStoreError', () => {
  const withCode = (code: string) => Object.assign(new Error(`failure ${code}`), { code })

  it('should map integrity violations to StoreConflictError', () => {
    expect(classifyStoreError(withCode('23503'))).toBeInstanceOf(StoreConflictError)
  })

  it('should map connection failures to StoreUnavailableError', () => {
    expect(classifyStoreError(withCode('08006'))).toBeInstanceOf(StoreUnavailableError)
    expect(classifyStoreError(withCode('57P01'))).toBeInstanceOf(StoreUnavailableError)
    expect(classifyStoreError(withCode('ECONNRESET'))).toBeInstanceOf(StoreUnavailableError)
  })

  it('should leave other errors untouched', () => {
    const error = withCode('42P01')
    expect(classifyStoreError(error)).toBe(error)
  })
})
