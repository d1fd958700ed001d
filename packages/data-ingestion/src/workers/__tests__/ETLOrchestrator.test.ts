import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import os from 'os';
import path from 'path';
import {
  CafeStore,
  MemoryCafeStore,
  StoreConflictError,
  StoreUnavailableError
} from '@cafe-etl/database';
import type { RawRecord } from '@cafe-etl/types';
import { resolvePipelineConfig } from '../../config/PipelineConfig';
import { ExtractionError } from '../../utils/errorUtils';
import { ETLOrchestrator } from '../ETLOrchestrator';

const purchase = (overrides: RawRecord = {}): RawRecord => ({
  'Date/Time': '25/08/2021 09:00',
  Branch: 'Chesterfield',
  'Customer Name': 'Alex Example',
  Product: 'Regular Latte - 2.45',
  Price: '2.45',
  'Payment Type': 'CARD',
  'Card Number': '1234',
  ...overrides
});

describe('ETLOrchestrator', () => {
  let store: MemoryCafeStore;
  let orchestrator: ETLOrchestrator;

  beforeEach(() => {
    store = new MemoryCafeStore();
    orchestrator = new ETLOrchestrator(store, resolvePipelineConfig());
  });

  it('should load a repeated purchase once', async () => {
    const summary = await orchestrator.run([
      purchase(),
      purchase({ 'Customer Name': 'Sam Example', 'Card Number': '5678' })
    ]);

    expect(summary).toMatchObject({
      status: 'completed',
      rowsRead: 2,
      duplicatesRemoved: 1,
      piiFieldsRedacted: 2,
      normalizationErrors: 0,
      transactionsLoaded: 1,
      transactionsSkippedAsDuplicate: 0,
      loadErrors: 0,
      branchesCreated: 1,
      productsCreated: 1,
      rejected: [],
      warnings: []
    });
    expect(summary.fatalError).toBeUndefined();
    expect(store.snapshot()).toEqual({
      branches: [{ id: 1, name: 'Chesterfield' }],
      products: [{ id: 1, product_name: 'Latte', size: 'Regular', flavour: '', price: 2.45 }],
      transactions: [{
        id: 1,
        branch_id: 1,
        date_time: '2021-08-25 09:00:00',
        qty: 1,
        price: 2.45,
        payment_type: 'CARD'
      }],
      transaction_product: [{ id: 1, transaction_id: 1, product_id: 1 }]
    });
  });

  it('should skip everything when the same batch is loaded twice', async () => {
    const batch = [
      purchase(),
      purchase({ 'Date/Time': '25/08/2021 09:05', Product: 'Regular Latte - 2.45, Large Mocha - 3.10', Price: '5.55' })
    ];

    await orchestrator.run(batch);
    const before = store.snapshot();
    const summary = await orchestrator.run(batch);

    expect(summary.transactionsLoaded).toBe(0);
    expect(summary.transactionsSkippedAsDuplicate).toBe(2);
    expect(summary.branchesCreated).toBe(0);
    expect(summary.productsCreated).toBe(0);
    expect(store.snapshot()).toEqual(before);
  });

  it('should reject a negative price and load the rest', async () => {
    const summary = await orchestrator.run([
      purchase(),
      purchase({ 'Date/Time': '25/08/2021 09:05', Price: '-1.00' })
    ]);

    expect(summary.transactionsLoaded).toBe(1);
    expect(summary.normalizationErrors).toBe(1);
    expect(summary.rejected).toHaveLength(1);
    expect(summary.rejected[0]).toMatchObject({
      rowNumber: 2,
      stage: 'normalization',
      kind: 'validation_error',
      code: 'NON_POSITIVE_PRICE',
      field: 'price'
    });
  });

  it('should isolate a store conflict to its own record', async () => {
    const conflicting: CafeStore = {
      withUnitOfWork: work => store.withUnitOfWork(uow => work({
        findBranch: name => uow.findBranch(name),
        insertBranch: name => uow.insertBranch(name),
        findProduct: identity => uow.findProduct(identity),
        insertProduct: product => uow.insertProduct(product),
        findTransaction: key => uow.findTransaction(key),
        insertTransaction: async row => {
          if (row.date_time === '2021-08-25 09:05:00') {
            throw new StoreConflictError('duplicate key value violates unique constraint');
          }
          return uow.insertTransaction(row);
        },
        insertTransactionProduct: (transactionId, productId) => uow.insertTransactionProduct(transactionId, productId)
      })),
      close: () => store.close()
    };

    const summary = await new ETLOrchestrator(conflicting, resolvePipelineConfig()).run([
      purchase(),
      purchase({ 'Date/Time': '25/08/2021 09:05', Product: 'Large Mocha - 3.10', Price: '3.10' }),
      purchase({ 'Date/Time': '25/08/2021 09:10' })
    ]);

    expect(summary.status).toBe('completed');
    expect(summary.transactionsLoaded).toBe(2);
    expect(summary.loadErrors).toBe(1);
    expect(summary.productsCreated).toBe(1);
    expect(summary.rejected[0]).toMatchObject({ rowNumber: 2, stage: 'loading', kind: 'store_conflict', code: 'STORE_CONFLICT' });
    expect(store.snapshot().products.map(product => product.product_name)).toEqual(['Latte']);
  });

  it('should abort on a store outage with counts of what was committed', async () => {
    let calls = 0;
    const flaky: CafeStore = {
      withUnitOfWork: work => {
        calls++;
        if (calls === 2) {
          return Promise.reject(new StoreUnavailableError('connection lost'));
        }
        return store.withUnitOfWork(work);
      },
      close: () => store.close()
    };

    const summary = await new ETLOrchestrator(flaky, resolvePipelineConfig()).run([
      purchase(),
      purchase({ 'Date/Time': '25/08/2021 09:05' }),
      purchase({ 'Date/Time': '25/08/2021 09:10' })
    ]);

    expect(summary.status).toBe('aborted');
    expect(summary.transactionsLoaded).toBe(1);
    expect(summary.fatalError).toEqual({ kind: 'store_unavailable', message: 'connection lost' });
    expect(store.snapshot().transactions).toHaveLength(1);
  });

  it('should only write junction rows that reference stored rows', async () => {
    await orchestrator.run([
      purchase(),
      purchase({ Branch: 'Leeds', Product: 'Small Tea - Earl Grey - 1.80, Large Latte - 2.95', Price: '4.75' }),
      purchase({ 'Date/Time': '26/08/2021 14:30', Product: 'large latte - 2.95', Price: '2.95', 'Payment Type': 'CASH' })
    ]);

    const tables = store.snapshot();
    const transactionIds = new Set(tables.transactions.map(row => row.id));
    const productIds = new Set(tables.products.map(row => row.id));
    const branchIds = new Set(tables.branches.map(row => row.id));

    expect(tables.transaction_product).toHaveLength(4);
    expect(tables.transaction_product.every(row => transactionIds.has(row.transaction_id) && productIds.has(row.product_id))).toBe(true);
    expect(tables.transactions.every(row => branchIds.has(row.branch_id))).toBe(true);
    expect(tables.products.map(row => [row.product_name, row.size, row.flavour])).toEqual([
      ['Latte', 'Regular', ''],
      ['Tea', 'Small', 'Earl Grey'],
      ['Latte', 'Large', '']
    ]);
  });

  it('should return an empty completed summary when no rows are given', async () => {
    const summary = await orchestrator.run([]);

    expect(summary.status).toBe('completed');
    expect(summary.transactionsLoaded).toBe(0);
    expect(summary.warnings).toEqual([{ code: 'NO_DATA', message: 'No rows extracted' }]);
  });

  describe('runFiles', () => {
    let workDir: string;

    beforeEach(() => {
      workDir = mkdtempSync(path.join(os.tmpdir(), 'cafe-etl-run-'));
    });

    afterEach(() => {
      rmSync(workDir, { recursive: true, force: true });
    });

    it('should warn when no files are given', async () => {
      const summary = await orchestrator.runFiles([]);

      expect(summary.status).toBe('completed');
      expect(summary.warnings).toEqual([{ code: 'NO_DATA', message: 'No input files given' }]);
    });

    it('should extract and load a headerless export', async () => {
      const file = path.join(workDir, 'chesterfield.csv');
      writeFileSync(file, [
        '25/08/2021 09:00,Chesterfield,Alex Example,Regular Latte - 2.45,2.45,CARD,1234',
        '25/08/2021 09:00,Chesterfield,Sam Example,Regular Latte - 2.45,2.45,CARD,5678',
        ''
      ].join('\n'));

      const summary = await orchestrator.runFiles([file]);

      expect(summary.rowsRead).toBe(2);
      expect(summary.duplicatesRemoved).toBe(1);
      expect(summary.transactionsLoaded).toBe(1);
    });

    it('should propagate extraction errors', async () => {
      await expect(orchestrator.runFiles([path.join(workDir, 'absent.csv')])).rejects.toBeInstanceOf(ExtractionError);
    });
  });
});
