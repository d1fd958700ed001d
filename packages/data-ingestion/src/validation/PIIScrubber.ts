import type { RawRecord } from '@cafe-etl/types';
import type { PiiAction, PipelineConfig } from '../config/PipelineConfig';
import { ScrubResult, SourceRow } from '../types';
import { PiiLeakError } from '../utils/errorUtils';
import { normalizeFieldName } from '../utils/fieldNames';
import logger from '../utils/logger';

type FieldClassification =
  | { type: 'business' }
  | { type: 'pii'; action: PiiAction }
  | { type: 'ambiguous' }
  | { type: 'other' };

export type PIIScrubberConfig = Pick<
  PipelineConfig,
  'columns' | 'piiFields' | 'passthroughFields' | 'suspectPatterns' | 'redactionMarker'
>;

/**
 * Strips customer-identifying columns from raw rows.
 *
 * Listed PII fields are removed or replaced by the redaction marker. Columns
 * claimed by the column mapping or the passthrough list are kept. Any other
 * column whose name looks personal is redacted as well, since it cannot be
 * classified with confidence.
 */
export class PIIScrubber {
  private readonly piiFields: Map<string, PiiAction>;
  private readonly trustedFields: Set<string>;
  private readonly suspectPatterns: RegExp[];
  private readonly redactionMarker: string;
  private readonly classificationCache = new Map<string, FieldClassification>();

  constructor(config: PIIScrubberConfig) {
    this.piiFields = new Map(
      Object.entries(config.piiFields).map(([field, action]) => [normalizeFieldName(field), action])
    );
    this.trustedFields = new Set(
      [...Object.values(config.columns), ...config.passthroughFields].map(normalizeFieldName)
    );
    this.suspectPatterns = config.suspectPatterns.map(source => new RegExp(source, 'i'));
    this.redactionMarker = config.redactionMarker;
  }

  classifyField(fieldName: string): FieldClassification {
    const key = normalizeFieldName(fieldName);
    const cached = this.classificationCache.get(key);
    if (cached) {
      return cached;
    }

    let classification: FieldClassification;
    const action = this.piiFields.get(key);
    if (action) {
      // an explicit PII entry wins over the column mapping
      classification = { type: 'pii', action };
    } else if (this.trustedFields.has(key)) {
      classification = { type: 'business' };
    } else if (this.suspectPatterns.some(pattern => pattern.test(key))) {
      classification = { type: 'ambiguous' };
    } else {
      classification = { type: 'other' };
    }

    this.classificationCache.set(key, classification);
    return classification;
  }

  /**
   * Scrub a single record. The input is left untouched.
   */
  scrubRecord(record: RawRecord): ScrubResult {
    const scrubbed: RawRecord = {};
    const removed: string[] = [];
    const redacted: string[] = [];
    const ambiguous: string[] = [];

    for (const [field, value] of Object.entries(record)) {
      const classification = this.classifyField(field);

      switch (classification.type) {
        case 'pii':
          if (classification.action === 'remove') {
            removed.push(field);
          } else {
            scrubbed[field] = this.redactionMarker;
            redacted.push(field);
          }
          break;

        case 'ambiguous':
          scrubbed[field] = this.redactionMarker;
          redacted.push(field);
          ambiguous.push(field);
          break;

        default:
          scrubbed[field] = value;
      }
    }

    return { record: scrubbed, removed, redacted, ambiguous };
  }

  /**
   * Configured PII fields still present with content other than the marker
   */
  findLeakedFields(record: RawRecord): string[] {
    return Object.entries(record)
      .filter(([field, value]) =>
        this.piiFields.has(normalizeFieldName(field)) && value !== this.redactionMarker
      )
      .map(([field]) => field);
  }

  /**
   * Postcondition checked before a record may reach the normalizer
   */
  assertScrubbed(row: SourceRow): void {
    const leaked = this.findLeakedFields(row.record);
    if (leaked.length > 0) {
      throw new PiiLeakError(leaked, row.rowNumber);
    }
  }

  /**
   * Scrub a batch, checking the postcondition on every output row
   */
  scrubRows(rows: SourceRow[]): {
    rows: SourceRow[];
    fieldsRedacted: number;
    ambiguousFields: Array<{ rowNumber: number; field: string }>;
  } {
    const output: SourceRow[] = [];
    const ambiguousFields: Array<{ rowNumber: number; field: string }> = [];
    let fieldsRedacted = 0;

    for (const row of rows) {
      const result = this.scrubRecord(row.record);
      const scrubbedRow = { rowNumber: row.rowNumber, record: result.record };
      this.assertScrubbed(scrubbedRow);

      fieldsRedacted += result.removed.length + result.redacted.length;
      ambiguousFields.push(...result.ambiguous.map(field => ({ rowNumber: row.rowNumber, field })));
      output.push(scrubbedRow);
    }

    logger.info('PII scrubbing complete', {
      rows: rows.length,
      fieldsRedacted,
      ambiguousFields: ambiguousFields.length
    });

    return { rows: output, fieldsRedacted, ambiguousFields };
  }
}

export default PIIScrubber;
