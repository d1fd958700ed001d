import crypto from 'crypto';
import type { RawRecord } from '@cafe-etl/types';
import type { ColumnMapping } from '../config/PipelineConfig';
import { DeduplicationResult, FlaggedRecord, SemanticField, SourceRow } from '../types';
import { isBlank, readField } from '../utils/fieldNames';
import logger from '../utils/logger';

// Fields that make up a purchase. PII and unmapped columns never enter the key.
const BUSINESS_FIELDS: SemanticField[] = [
  SemanticField.BRANCH,
  SemanticField.DATE_TIME,
  SemanticField.QTY,
  SemanticField.PRICE,
  SemanticField.PAYMENT_TYPE,
  SemanticField.PRODUCT,
  SemanticField.PRODUCT_NAME,
  SemanticField.SIZE,
  SemanticField.FLAVOUR,
  SemanticField.PRODUCT_PRICE
];

const REQUIRED_FIELDS: SemanticField[] = [
  SemanticField.BRANCH,
  SemanticField.DATE_TIME,
  SemanticField.PRICE
];

/**
 * Removes repeated purchases from a batch before any other processing.
 * Two rows are duplicates when every business column matches once
 * surrounding whitespace is ignored. The first occurrence wins.
 */
export class DeduplicationEngine {
  constructor(private readonly columns: ColumnMapping) {}

  /**
   * Business fields a row lacks. A row missing any of them cannot be compared.
   */
  missingBusinessFields(record: RawRecord): SemanticField[] {
    const missing = REQUIRED_FIELDS.filter(field => isBlank(readField(record, this.columns[field])));

    const hasProduct =
      !isBlank(readField(record, this.columns.product)) ||
      !isBlank(readField(record, this.columns.product_name));
    if (!hasProduct) {
      missing.push(SemanticField.PRODUCT);
    }

    return missing;
  }

  /**
   * Generate composite key for a row, or null when the row is not comparable
   */
  generateCompositeKey(record: RawRecord): string | null {
    if (this.missingBusinessFields(record).length > 0) {
      return null;
    }

    const components = BUSINESS_FIELDS.map(field => (readField(record, this.columns[field]) ?? '').trim());
    return this.hashComponents(components);
  }

  /**
   * Deduplicate rows, preserving first-occurrence order
   */
  deduplicate(rows: SourceRow[]): DeduplicationResult {
    const seen = new Set<string>();
    const uniqueRows: SourceRow[] = [];
    const flagged: FlaggedRecord[] = [];
    let duplicatesRemoved = 0;

    for (const row of rows) {
      const key = this.generateCompositeKey(row.record);

      if (key === null) {
        flagged.push({ rowNumber: row.rowNumber, missingFields: this.missingBusinessFields(row.record) });
        uniqueRows.push(row);
        continue;
      }

      if (seen.has(key)) {
        duplicatesRemoved++;
        logger.debug('Duplicate row removed', { rowNumber: row.rowNumber });
        continue;
      }

      seen.add(key);
      uniqueRows.push(row);
    }

    logger.info('Deduplication complete', {
      totalRows: rows.length,
      uniqueRows: uniqueRows.length,
      duplicatesRemoved,
      flagged: flagged.length
    });

    return { uniqueRows, duplicatesRemoved, flagged };
  }

  private hashComponents(components: string[]): string {
    // JSON keeps component boundaries unambiguous
    return crypto.createHash('sha256').update(JSON.stringify(components)).digest('hex');
  }
}

export default DeduplicationEngine;
