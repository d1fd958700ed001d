import type { Pool, PoolClient, QueryResultRow } from 'pg'
import type { ProductInsert, TransactionInsert } from '@cafe-etl/types'
import type { CafeStore, ProductIdentity, TransactionNaturalKey, UnitOfWork } from './types'
import { StoreUnavailableError, classifyStoreError } from './errors'

interface IdRow extends QueryResultRow {
  id: number
}

const errorMessage = (error: unknown) => (error instanceof Error ? error.message : String(error))

class PostgresUnitOfWork implements UnitOfWork {
  constructor(private readonly client: PoolClient) {}

  findBranch(name: string) {
    return this.selectId('select id from branches where lower(name) = lower($1) limit 1', [name])
  }

  insertBranch(name: string) {
    return this.insertReturningId('insert into branches (name) values ($1) returning id', [name])
  }

  findProduct(identity: ProductIdentity) {
    return this.selectId(
      `select id from products
        where lower(product_name) = lower($1)
          and lower(size) = lower($2)
          and lower(flavour) = lower($3)
        limit 1`,
      [identity.product_name, identity.size, identity.flavour]
    )
  }

  insertProduct(product: ProductInsert) {
    return this.insertReturningId(
      'insert into products (product_name, size, flavour, price) values ($1, $2, $3, $4) returning id',
      [product.product_name, product.size, product.flavour, product.price]
    )
  }

  findTransaction(key: TransactionNaturalKey) {
    return this.selectId(
      `select id from transactions
        where branch_id = $1
          and date_time = $2
          and qty = $3
          and price = $4
          and payment_type is not distinct from $5
        limit 1`,
      [key.branch_id, key.date_time, key.qty, key.price, key.payment_type]
    )
  }

  insertTransaction(transaction: TransactionInsert) {
    return this.insertReturningId(
      `insert into transactions (branch_id, date_time, qty, price, payment_type)
       values ($1, $2, $3, $4, $5) returning id`,
      [transaction.branch_id, transaction.date_time, transaction.qty, transaction.price, transaction.payment_type]
    )
  }

  insertTransactionProduct(transactionId: number, productId: number) {
    return this.insertReturningId(
      'insert into transaction_product (transaction_id, product_id) values ($1, $2) returning id',
      [transactionId, productId]
    )
  }

  private async selectId(text: string, params: unknown[]): Promise<number | null> {
    const result = await this.client.query<IdRow>(text, params)
    return result.rows[0]?.id ?? null
  }

  private async insertReturningId(text: string, params: unknown[]): Promise<number> {
    const result = await this.client.query<IdRow>(text, params)
    const row = result.rows[0]
    if (!row) {
      throw new Error(`Insert returned no id: ${text.split('(')[0].trim()}`)
    }
    return row.id
  }
}

/**
 * CafeStore backed by a pg Pool. Each unit of work checks out one client
 * and wraps the callback in begin/commit, rolling back on any throw.
 */
export class PostgresCafeStore implements CafeStore {
  constructor(private readonly pool: Pool) {}

  async withUnitOfWork<T>(work: (uow: UnitOfWork) => Promise<T>): Promise<T> {
    let client: PoolClient
    try {
      client = await this.pool.connect()
    } catch (error) {
      // any failure to check out a client means the store is unreachable
      throw new StoreUnavailableError(`Cannot connect to the store: ${errorMessage(error)}`, { cause: error })
    }

    let broken = false
    try {
      await client.query('begin')
      const result = await work(new PostgresUnitOfWork(client))
      await client.query('commit')
      return result
    } catch (error) {
      try {
        await client.query('rollback')
      } catch (rollbackError) {
        broken = true
        throw new StoreUnavailableError(
          `Rollback failed: ${errorMessage(rollbackError)}`,
          { cause: error }
        )
      }
      throw classifyStoreError(error)
    } finally {
      client.release(broken)
    }
  }

  async close(): Promise<void> {
    await this.pool.end()
  }
}
