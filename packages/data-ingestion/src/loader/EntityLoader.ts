import {
  CafeStore,
  StoreConflictError,
  StoreUnavailableError,
  UnitOfWork
} from '@cafe-etl/database';
import type { TransactionInsert } from '@cafe-etl/types';
import { LoadOutcome, NormalizedTransaction, ProductLine, ProgressCallback, RejectedRecord } from '../types';
import { getErrorMessage } from '../utils/errorUtils';
import logger from '../utils/logger';

export type Resolution =
  | { status: 'found'; id: number }
  | { status: 'created'; id: number };

export interface LoadReport {
  transactionsLoaded: number;
  transactionsSkippedAsDuplicate: number;
  branchesCreated: number;
  productsCreated: number;
  rejected: RejectedRecord[];
  // set when the store went away; counts cover what was committed before it
  fatalError?: StoreUnavailableError;
}

const countCreated = (resolutions: Resolution[]) =>
  resolutions.filter(resolution => resolution.status === 'created').length;

/**
 * Writes normalized transactions into the café schema.
 *
 * Each record gets its own unit of work: branch and products are resolved
 * (found or created), then the transaction is inserted unless its natural
 * key is already stored, then one junction row per product line.
 */
export class EntityLoader {
  constructor(private readonly store: CafeStore) {}

  async resolveBranch(uow: UnitOfWork, name: string): Promise<Resolution> {
    const existing = await uow.findBranch(name);
    if (existing !== null) {
      return { status: 'found', id: existing };
    }
    return { status: 'created', id: await uow.insertBranch(name) };
  }

  async resolveProduct(uow: UnitOfWork, line: ProductLine): Promise<Resolution> {
    const identity = { product_name: line.productName, size: line.size, flavour: line.flavour };
    const existing = await uow.findProduct(identity);
    if (existing !== null) {
      return { status: 'found', id: existing };
    }
    return { status: 'created', id: await uow.insertProduct({ ...identity, price: line.price }) };
  }

  /**
   * Load one record atomically. Store outages propagate; any other failure
   * rolls the record back and comes back as a `failed` outcome.
   */
  async loadRecord(record: NormalizedTransaction): Promise<LoadOutcome> {
    try {
      return await this.store.withUnitOfWork(async (uow): Promise<LoadOutcome> => {
        const branch = await this.resolveBranch(uow, record.branchName);

        const products: Resolution[] = [];
        for (const line of record.productLines) {
          products.push(await this.resolveProduct(uow, line));
        }

        const created = {
          branchesCreated: countCreated([branch]),
          productsCreated: countCreated(products)
        };

        const naturalKey: TransactionInsert = {
          branch_id: branch.id,
          date_time: record.dateTime,
          qty: record.qty,
          price: record.price,
          payment_type: record.paymentType
        };

        const existing = await uow.findTransaction(naturalKey);
        if (existing !== null) {
          return { status: 'skipped', transactionId: existing, ...created };
        }

        const transactionId = await uow.insertTransaction(naturalKey);
        for (const product of products) {
          await uow.insertTransactionProduct(transactionId, product.id);
        }

        return { status: 'loaded', transactionId, ...created };
      });
    } catch (error) {
      if (error instanceof StoreUnavailableError) {
        throw error;
      }
      return { status: 'failed', rejection: this.toRejection(record, error) };
    }
  }

  /**
   * Load records in order, stopping at the first store outage
   */
  async loadAll(records: NormalizedTransaction[], progressCallback?: ProgressCallback): Promise<LoadReport> {
    const report: LoadReport = {
      transactionsLoaded: 0,
      transactionsSkippedAsDuplicate: 0,
      branchesCreated: 0,
      productsCreated: 0,
      rejected: []
    };

    for (const [index, record] of records.entries()) {
      let outcome: LoadOutcome;
      try {
        outcome = await this.loadRecord(record);
      } catch (error) {
        if (error instanceof StoreUnavailableError) {
          logger.error('Store unavailable, aborting load', {
            rowNumber: record.rowNumber,
            loaded: report.transactionsLoaded,
            error: error.message
          });
          report.fatalError = error;
          return report;
        }
        throw error;
      }

      if (outcome.status === 'failed') {
        report.rejected.push(outcome.rejection);
        logger.warn('Row rejected during load', { rowNumber: record.rowNumber, code: outcome.rejection.code });
      } else {
        if (outcome.status === 'loaded') {
          report.transactionsLoaded++;
        } else {
          report.transactionsSkippedAsDuplicate++;
          logger.debug('Transaction already stored', { rowNumber: record.rowNumber, transactionId: outcome.transactionId });
        }
        report.branchesCreated += outcome.branchesCreated;
        report.productsCreated += outcome.productsCreated;
      }

      progressCallback?.(Math.round(((index + 1) / records.length) * 100), 'Loading transactions');
    }

    logger.info('Load complete', {
      loaded: report.transactionsLoaded,
      skipped: report.transactionsSkippedAsDuplicate,
      failed: report.rejected.length,
      branchesCreated: report.branchesCreated,
      productsCreated: report.productsCreated
    });

    return report;
  }

  private toRejection(record: NormalizedTransaction, error: unknown): RejectedRecord {
    const conflict = error instanceof StoreConflictError;
    return {
      rowNumber: record.rowNumber,
      stage: 'loading',
      kind: conflict ? 'store_conflict' : 'load_failed',
      code: conflict ? 'STORE_CONFLICT' : 'LOAD_FAILED',
      message: getErrorMessage(error),
      record: record.source
    };
  }
}

export default EntityLoader;
