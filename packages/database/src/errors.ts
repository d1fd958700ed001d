// Store error taxonomy shared by every CafeStore implementation

export type StoreErrorKind = 'store_conflict' | 'store_unavailable'

export abstract class StoreError extends Error {
  abstract readonly kind: StoreErrorKind

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/** A constraint violation the natural-key check did not anticipate. */
export class StoreConflictError extends StoreError {
  readonly kind = 'store_conflict' as const
}

/** The store cannot be reached; nothing further can be persisted. */
export class StoreUnavailableError extends StoreError {
  readonly kind = 'store_unavailable' as const
}

const UNAVAILABLE_SQLSTATES = new Set(['57P01', '57P02', '57P03', '53300'])
const UNAVAILABLE_SOCKET_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'ENOTFOUND', 'EPIPE', 'EHOSTUNREACH'])

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code
  }
  return undefined
}

/**
 * Maps driver errors onto the store taxonomy.
 * SQLSTATE class 23 is a conflict, class 08 and server shutdown codes
 * mean the store is gone. Anything else is returned unchanged.
 */
export function classifyStoreError(error: unknown): unknown {
  if (error instanceof StoreError) {
    return error
  }

  const message = error instanceof Error ? error.message : String(error)
  const code = errorCode(error)
  if (!code) {
    return error
  }

  if (code.startsWith('23')) {
    return new StoreConflictError(`Constraint violation (${code}): ${message}`, { cause: error })
  }

  if (code.startsWith('08') || UNAVAILABLE_SQLSTATES.has(code) || UNAVAILABLE_SOCKET_CODES.has(code)) {
    return new StoreUnavailableError(`Store unavailable (${code}): ${message}`, { cause: error })
  }

  return error
}
