import type { RawRecord } from '@cafe-etl/types';
import { PipelineConfig, resolvePipelineConfig } from '../config/PipelineConfig';
import { PipelineWarning, ProgressCallback, SourceRow, TransformResult } from '../types';
import logger from '../utils/logger';
import DataNormalizer from './DataNormalizer';
import DeduplicationEngine from './DeduplicationEngine';
import PIIScrubber from './PIIScrubber';

/**
 * Transform stage coordinator: deduplication, PII scrubbing and
 * normalization, in that order. Nothing here touches the store.
 */
export class ETLPipeline {
  private readonly deduplicationEngine: DeduplicationEngine;
  private readonly piiScrubber: PIIScrubber;
  private readonly dataNormalizer: DataNormalizer;

  constructor(config: PipelineConfig = resolvePipelineConfig()) {
    this.deduplicationEngine = new DeduplicationEngine(config.columns);
    this.piiScrubber = new PIIScrubber(config);
    this.dataNormalizer = new DataNormalizer(config);
  }

  /**
   * Run the transform stages over an extracted batch. Plain records are
   * numbered from 1 in the order given.
   *
   * @throws PiiLeakError when a scrubbed row still carries a configured PII field
   */
  transform(
    input: ReadonlyArray<RawRecord | SourceRow>,
    options: { progressCallback?: ProgressCallback } = {}
  ): TransformResult {
    const { progressCallback } = options;
    const rows = input.map(toSourceRow);
    const warnings: PipelineWarning[] = [];

    progressCallback?.(0, 'Starting transform');

    // Step 1: Deduplication
    progressCallback?.(10, 'Removing duplicate rows');
    const deduplication = this.deduplicationEngine.deduplicate(rows);
    warnings.push(...deduplication.flagged.map(flagged => ({
      code: 'INCOMPARABLE_RECORD' as const,
      rowNumber: flagged.rowNumber,
      message: `Row ${flagged.rowNumber} lacks ${flagged.missingFields.join(', ')} and was not checked for duplicates`
    })));

    // Step 2: PII scrubbing
    progressCallback?.(40, 'Scrubbing personal data');
    const scrubbed = this.piiScrubber.scrubRows(deduplication.uniqueRows);
    warnings.push(...scrubbed.ambiguousFields.map(({ rowNumber, field }) => ({
      code: 'PII_AMBIGUOUS' as const,
      rowNumber,
      field,
      message: `Column "${field}" may hold personal data and was redacted`
    })));

    // Step 3: Normalization
    progressCallback?.(70, 'Normalizing records');
    const normalized = this.dataNormalizer.normalizeRows(scrubbed.rows);

    progressCallback?.(100, 'Transform complete');

    const metrics = {
      rowsRead: rows.length,
      duplicatesRemoved: deduplication.duplicatesRemoved,
      flaggedRecords: deduplication.flagged.length,
      piiFieldsRedacted: scrubbed.fieldsRedacted,
      normalizationErrors: normalized.rejected.length
    };
    logger.info('Transform complete', { ...metrics, records: normalized.records.length });

    return {
      records: normalized.records,
      rejected: normalized.rejected,
      warnings,
      metrics
    };
  }
}

function toSourceRow(row: RawRecord | SourceRow, index: number): SourceRow {
  if (isSourceRow(row)) {
    return row;
  }
  return { rowNumber: index + 1, record: row };
}

function isSourceRow(row: RawRecord | SourceRow): row is SourceRow {
  return typeof row.rowNumber === 'number' && typeof row.record === 'object' && row.record !== null;
}

export default ETLPipeline;
