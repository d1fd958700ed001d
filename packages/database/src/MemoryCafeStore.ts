import type {
  Branch,
  Product,
  ProductInsert,
  TableName,
  Transaction,
  TransactionInsert,
  TransactionProduct,
} from '@cafe-etl/types'
import type { CafeStore, ProductIdentity, TransactionNaturalKey, UnitOfWork } from './types'
import { StoreConflictError } from './errors'

export interface MemoryTables {
  branches: Branch[]
  products: Product[]
  transactions: Transaction[]
  transaction_product: TransactionProduct[]
}

interface MemoryState {
  tables: MemoryTables
  sequences: Record<TableName, number>
}

const fold = (value: string) => value.trim().toLowerCase()

const toCents = (value: number) => Math.round(value * 100)

function emptyState(): MemoryState {
  return {
    tables: { branches: [], products: [], transactions: [], transaction_product: [] },
    sequences: { branches: 0, products: 0, transactions: 0, transaction_product: 0 },
  }
}

class MemoryUnitOfWork implements UnitOfWork {
  constructor(private readonly state: MemoryState) {}

  async findBranch(name: string) {
    return this.state.tables.branches.find(b => fold(b.name) === fold(name))?.id ?? null
  }

  async insertBranch(name: string) {
    if ((await this.findBranch(name)) !== null) {
      throw new StoreConflictError(`Duplicate branch name: ${name}`)
    }
    const id = this.nextId('branches')
    this.state.tables.branches.push({ id, name })
    return id
  }

  async findProduct(identity: ProductIdentity) {
    const match = this.state.tables.products.find(p =>
      fold(p.product_name) === fold(identity.product_name) &&
      fold(p.size) === fold(identity.size) &&
      fold(p.flavour) === fold(identity.flavour)
    )
    return match?.id ?? null
  }

  async insertProduct(product: ProductInsert) {
    if ((await this.findProduct(product)) !== null) {
      throw new StoreConflictError(`Duplicate product: ${product.product_name}/${product.size}/${product.flavour}`)
    }
    const id = this.nextId('products')
    this.state.tables.products.push({ id, ...product })
    return id
  }

  async findTransaction(key: TransactionNaturalKey) {
    const match = this.state.tables.transactions.find(t =>
      t.branch_id === key.branch_id &&
      t.date_time === key.date_time &&
      t.qty === key.qty &&
      toCents(t.price) === toCents(key.price) &&
      t.payment_type === key.payment_type
    )
    return match?.id ?? null
  }

  async insertTransaction(transaction: TransactionInsert) {
    if (!this.state.tables.branches.some(b => b.id === transaction.branch_id)) {
      throw new StoreConflictError(`Foreign key violation: branch ${transaction.branch_id} does not exist`)
    }
    const id = this.nextId('transactions')
    this.state.tables.transactions.push({ id, ...transaction })
    return id
  }

  async insertTransactionProduct(transactionId: number, productId: number) {
    if (!this.state.tables.transactions.some(t => t.id === transactionId)) {
      throw new StoreConflictError(`Foreign key violation: transaction ${transactionId} does not exist`)
    }
    if (!this.state.tables.products.some(p => p.id === productId)) {
      throw new StoreConflictError(`Foreign key violation: product ${productId} does not exist`)
    }
    const id = this.nextId('transaction_product')
    this.state.tables.transaction_product.push({ id, transaction_id: transactionId, product_id: productId })
    return id
  }

  private nextId(table: TableName): number {
    this.state.sequences[table] += 1
    return this.state.sequences[table]
  }
}

// Tables only grow, so a unit of work is undone by truncating to its start
interface UndoMark {
  lengths: Record<TableName, number>
  sequences: Record<TableName, number>
}

const TABLE_NAMES: TableName[] = ['branches', 'products', 'transactions', 'transaction_product']

/**
 * In-process CafeStore with the same constraints as the SQL schema.
 * Used for dry runs and tests. Rows written by a failed unit of work are
 * dropped again and its ids are handed out anew.
 */
export class MemoryCafeStore implements CafeStore {
  private readonly state: MemoryState = emptyState()
  private inUnitOfWork = false

  async withUnitOfWork<T>(work: (uow: UnitOfWork) => Promise<T>): Promise<T> {
    if (this.inUnitOfWork) {
      throw new Error('MemoryCafeStore does not support nested units of work')
    }

    const mark = this.mark()
    this.inUnitOfWork = true
    try {
      return await work(new MemoryUnitOfWork(this.state))
    } catch (error) {
      this.undo(mark)
      throw error
    } finally {
      this.inUnitOfWork = false
    }
  }

  private mark(): UndoMark {
    const { tables, sequences } = this.state
    return {
      lengths: {
        branches: tables.branches.length,
        products: tables.products.length,
        transactions: tables.transactions.length,
        transaction_product: tables.transaction_product.length,
      },
      sequences: { ...sequences },
    }
  }

  private undo(mark: UndoMark): void {
    for (const table of TABLE_NAMES) {
      this.state.tables[table].length = mark.lengths[table]
    }
    Object.assign(this.state.sequences, mark.sequences)
  }

  snapshot(): MemoryTables {
    return structuredClone(this.state.tables)
  }

  async close(): Promise<void> {
    // nothing to release
  }
}
