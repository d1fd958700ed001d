import type { CafeStore } from '@cafe-etl/database';
import type { RawRecord } from '@cafe-etl/types';
import { PipelineConfig, resolvePipelineConfig } from '../config/PipelineConfig';
import { EntityLoader } from '../loader/EntityLoader';
import { CsvExtractor } from '../parsers/CsvExtractor';
import { PipelineWarning, ProgressCallback, RunSummary } from '../types';
import { ETLPipeline } from '../validation/ETLPipeline';
import logger from '../utils/logger';

export interface RunOptions {
  progressCallback?: ProgressCallback;
}

/**
 * ETL Orchestrator runs one batch end to end: extract, transform, then
 * load each surviving record in its own unit of work.
 */
export class ETLOrchestrator {
  private readonly extractor: CsvExtractor;
  private readonly etlPipeline: ETLPipeline;
  private readonly entityLoader: EntityLoader;

  constructor(store: CafeStore, config: PipelineConfig = resolvePipelineConfig()) {
    this.extractor = new CsvExtractor(config);
    this.etlPipeline = new ETLPipeline(config);
    this.entityLoader = new EntityLoader(store);
  }

  /**
   * Extract the given files in order and run them as one batch
   */
  async runFiles(filePaths: string[], options: RunOptions = {}): Promise<RunSummary> {
    if (filePaths.length === 0) {
      return this.emptySummary(Date.now(), 'No input files given');
    }

    options.progressCallback?.(0, 'Extracting files');
    const rows = await this.extractor.extractFiles(filePaths);
    return this.run(rows, options);
  }

  /**
   * Transform and load an extracted batch
   */
  async run(rows: RawRecord[], options: RunOptions = {}): Promise<RunSummary> {
    const startTime = Date.now();
    if (rows.length === 0) {
      return this.emptySummary(startTime, 'No rows extracted');
    }

    logger.info('Starting ETL run', { rows: rows.length });

    // Transform maps to 5-45% of overall progress, load to 45-100%
    const transform = this.etlPipeline.transform(rows, {
      progressCallback: (progress, step) => options.progressCallback?.(5 + progress * 0.4, step)
    });

    const load = await this.entityLoader.loadAll(transform.records, (progress, step) =>
      options.progressCallback?.(45 + progress * 0.55, step)
    );

    const summary: RunSummary = {
      status: load.fatalError ? 'aborted' : 'completed',
      ...transform.metrics,
      transactionsLoaded: load.transactionsLoaded,
      transactionsSkippedAsDuplicate: load.transactionsSkippedAsDuplicate,
      loadErrors: load.rejected.length,
      branchesCreated: load.branchesCreated,
      productsCreated: load.productsCreated,
      rejected: [...transform.rejected, ...load.rejected],
      warnings: transform.warnings,
      durationMs: Date.now() - startTime
    };

    if (load.fatalError) {
      summary.fatalError = { kind: load.fatalError.kind, message: load.fatalError.message };
    }

    logger.info('ETL run finished', {
      status: summary.status,
      transactionsLoaded: summary.transactionsLoaded,
      transactionsSkippedAsDuplicate: summary.transactionsSkippedAsDuplicate,
      normalizationErrors: summary.normalizationErrors,
      loadErrors: summary.loadErrors,
      durationMs: summary.durationMs
    });

    return summary;
  }

  private emptySummary(startTime: number, message: string): RunSummary {
    const warning: PipelineWarning = { code: 'NO_DATA', message };
    logger.warn(message);

    return {
      status: 'completed',
      rowsRead: 0,
      duplicatesRemoved: 0,
      flaggedRecords: 0,
      piiFieldsRedacted: 0,
      normalizationErrors: 0,
      transactionsLoaded: 0,
      transactionsSkippedAsDuplicate: 0,
      loadErrors: 0,
      branchesCreated: 0,
      productsCreated: 0,
      rejected: [],
      warnings: [warning],
      durationMs: Date.now() - startTime
    };
  }
}

export default ETLOrchestrator;
