// Database package exports for the café transform-and-load pipeline

// Store contract
export type { CafeStore, UnitOfWork, ProductIdentity, TransactionNaturalKey } from './types'

// Errors
export { StoreError, StoreConflictError, StoreUnavailableError, classifyStoreError } from './errors'
export type { StoreErrorKind } from './errors'

// Clients and stores
export { createPool, resolveConnectionConfig, checkConnection } from './client'
export { PostgresCafeStore } from './PostgresCafeStore'
export { MemoryCafeStore } from './MemoryCafeStore'
export type { MemoryTables } from './MemoryCafeStore'
