// Store contract for the café schema
// Implemented by PostgresCafeStore (pg) and MemoryCafeStore (in-process)

import type { ProductInsert, TransactionInsert } from '@cafe-etl/types'

export interface ProductIdentity {
  product_name: string
  size: string
  flavour: string
}

// Every column of a transaction except its surrogate id
export type TransactionNaturalKey = TransactionInsert

/**
 * Mutations and lookups available inside one unit of work.
 * Lookups on names are case-insensitive; callers pass trimmed values.
 */
export interface UnitOfWork {
  findBranch(name: string): Promise<number | null>
  insertBranch(name: string): Promise<number>
  findProduct(identity: ProductIdentity): Promise<number | null>
  insertProduct(product: ProductInsert): Promise<number>
  findTransaction(key: TransactionNaturalKey): Promise<number | null>
  insertTransaction(transaction: TransactionInsert): Promise<number>
  insertTransactionProduct(transactionId: number, productId: number): Promise<number>
}

export interface CafeStore {
  /**
   * Runs `work` atomically. Commits when it resolves, rolls back when it
   * throws and rethrows the error.
   */
  withUnitOfWork<T>(work: (uow: UnitOfWork) => Promise<T>): Promise<T>
  close(): Promise<void>
}
