import { UTCDate } from '@date-fns/utc';
import { format, getYear, isValid, parse } from 'date-fns';
import { EMPTY_ATTRIBUTE } from '@cafe-etl/types';
import type { PipelineConfig } from '../config/PipelineConfig';
import { NormalizedTransaction, ProductLine, RejectedRecord, SourceRow } from '../types';
import { ParseError, PipelineError, ValidationError } from '../utils/errorUtils';
import { hasText, readField } from '../utils/fieldNames';
import logger from '../utils/logger';
import { ParsedProductEntry, ProductDescriptorParser, parseMoney } from './ProductDescriptorParser';

export const CANONICAL_DATE_TIME_FORMAT = 'yyyy-MM-dd HH:mm:ss';

// Upper bound of the store's integer quantity column
export const MAX_QTY = 2147483647;

// `yyyy` also matches one to three digits; shorter years are truncated input
const MIN_YEAR = 1000;

// Spreadsheet exports write these for empty cells
const PLACEHOLDER_VALUES = new Set(['null', 'none', 'undefined']);

export type FieldResult<T> =
  | { isValid: true; normalized: T; original: string | undefined }
  | { isValid: false; error: PipelineError; original: string | undefined };

export type DataNormalizerConfig = Pick<PipelineConfig, 'columns' | 'knownSizes' | 'dateFormats' | 'defaultQty'>;

/**
 * Data normalization for the transform stage.
 * Turns scrubbed rows into typed transactions with canonical timestamps,
 * numeric amounts and case-folded identity keys.
 */
export class DataNormalizer {
  private readonly productParser: ProductDescriptorParser;
  // UTC reference: parsed wall-clock values ignore the host timezone and the current date
  private readonly referenceDate = new UTCDate(2000, 0, 1);

  constructor(private readonly config: DataNormalizerConfig) {
    this.productParser = new ProductDescriptorParser(config.knownSizes);
  }

  /**
   * Trimmed display value plus its case-folded comparison key
   */
  normalizeText(value: string): { display: string; key: string } {
    const display = value.trim().replace(/\s+/g, ' ');
    return { display, key: display.toLowerCase() };
  }

  /**
   * Size and flavour: blank cells and placeholder words become the empty sentinel
   */
  normalizeAttribute(value: string | undefined): string {
    if (!hasText(value)) {
      return EMPTY_ATTRIBUTE;
    }
    const { display } = this.normalizeText(value);
    return PLACEHOLDER_VALUES.has(display.toLowerCase()) ? EMPTY_ATTRIBUTE : display;
  }

  identityKey(productName: string, size: string, flavour: string): string {
    return [productName, size, flavour].map(part => this.normalizeText(part).key).join('|');
  }

  /**
   * Parse a date/time against the configured formats into the canonical form
   */
  normalizeTimestamp(value: string | undefined): FieldResult<string> {
    if (!hasText(value)) {
      return { isValid: false, original: value, error: new ValidationError('MISSING_FIELD', 'date_time is required', 'date_time') };
    }

    const trimmed = value.trim();
    for (const pattern of this.config.dateFormats) {
      const parsed = parse(trimmed, pattern, this.referenceDate);
      if (isValid(parsed) && getYear(parsed) >= MIN_YEAR) {
        return { isValid: true, original: value, normalized: format(parsed, CANONICAL_DATE_TIME_FORMAT) };
      }
    }

    return {
      isValid: false,
      original: value,
      error: new ParseError('INVALID_DATE_TIME', `Unrecognised date/time "${trimmed}"`, 'date_time')
    };
  }

  /**
   * Quantity as a non-negative integer. Exports without a quantity column use the default.
   */
  normalizeQuantity(value: string | undefined): FieldResult<number> {
    if (!hasText(value)) {
      return { isValid: true, original: value, normalized: this.config.defaultQty };
    }

    const trimmed = value.trim();
    if (!/^[-+]?\d+$/.test(trimmed)) {
      return { isValid: false, original: value, error: new ParseError('INVALID_QTY', `Invalid quantity "${trimmed}"`, 'qty') };
    }

    const qty = Number(trimmed);
    if (qty < 0) {
      return { isValid: false, original: value, error: new ValidationError('NEGATIVE_QTY', `Quantity must not be negative, got ${qty}`, 'qty') };
    }
    if (qty > MAX_QTY) {
      return { isValid: false, original: value, error: new ParseError('INVALID_QTY', `Quantity "${trimmed}" is out of range`, 'qty') };
    }
    return { isValid: true, original: value, normalized: qty };
  }

  /**
   * Positive money amount rounded to pence
   */
  normalizePrice(value: string | undefined, field: string): FieldResult<number> {
    if (!hasText(value)) {
      return { isValid: false, original: value, error: new ValidationError('MISSING_FIELD', `${field} is required`, field) };
    }

    const price = parseMoney(value);
    if (price === null) {
      return { isValid: false, original: value, error: new ParseError('INVALID_PRICE', `Invalid ${field} "${value.trim()}"`, field) };
    }
    if (price <= 0) {
      return { isValid: false, original: value, error: new ValidationError('NON_POSITIVE_PRICE', `${field} must be positive, got ${price.toFixed(2)}`, field) };
    }
    return { isValid: true, original: value, normalized: price };
  }

  /**
   * Product lines from the combined product column, or from the
   * separate name/size/flavour/price columns when it is absent
   */
  normalizeProductLines(row: SourceRow): FieldResult<ProductLine[]> {
    const { columns } = this.config;
    const descriptor = readField(row.record, columns.product);

    let entries: ParsedProductEntry[];
    if (hasText(descriptor)) {
      try {
        entries = this.productParser.parse(descriptor);
      } catch (error) {
        if (error instanceof PipelineError) {
          return { isValid: false, original: descriptor, error };
        }
        throw error;
      }
    } else {
      const name = readField(row.record, columns.product_name);
      if (!hasText(name)) {
        return { isValid: false, original: name, error: new ValidationError('MISSING_FIELD', 'product is required', 'product') };
      }

      const price = this.normalizePrice(readField(row.record, columns.product_price), 'product_price');
      if (!price.isValid) {
        return { isValid: false, original: name, error: price.error };
      }

      entries = [{
        productName: name,
        size: readField(row.record, columns.size) ?? '',
        flavour: readField(row.record, columns.flavour) ?? '',
        price: price.normalized
      }];
    }

    if (entries.length === 0) {
      return { isValid: false, original: descriptor, error: new ValidationError('MISSING_FIELD', 'product is required', 'product') };
    }

    const lines = entries.map(entry => {
      const productName = this.normalizeText(entry.productName).display;
      const size = this.normalizeAttribute(entry.size);
      const flavour = this.normalizeAttribute(entry.flavour);
      return {
        productName,
        size,
        flavour,
        price: entry.price,
        identityKey: this.identityKey(productName, size, flavour)
      };
    });

    return { isValid: true, original: descriptor, normalized: lines };
  }

  /**
   * Normalize one scrubbed row into a transaction
   */
  normalizeRecord(row: SourceRow):
    | { isValid: true; transaction: NormalizedTransaction }
    | { isValid: false; error: PipelineError } {
    const { columns } = this.config;
    const record = row.record;

    const branch = readField(record, columns.branch);
    if (!hasText(branch)) {
      return { isValid: false, error: new ValidationError('MISSING_FIELD', 'branch is required', 'branch') };
    }

    const dateTime = this.normalizeTimestamp(readField(record, columns.date_time));
    if (!dateTime.isValid) return { isValid: false, error: dateTime.error };

    const qty = this.normalizeQuantity(readField(record, columns.qty));
    if (!qty.isValid) return { isValid: false, error: qty.error };

    const price = this.normalizePrice(readField(record, columns.price), 'price');
    if (!price.isValid) return { isValid: false, error: price.error };

    const productLines = this.normalizeProductLines(row);
    if (!productLines.isValid) return { isValid: false, error: productLines.error };

    const paymentType = readField(record, columns.payment_type);
    const branchName = this.normalizeText(branch);

    return {
      isValid: true,
      transaction: {
        rowNumber: row.rowNumber,
        branchName: branchName.display,
        branchKey: branchName.key,
        dateTime: dateTime.normalized,
        qty: qty.normalized,
        price: price.normalized,
        paymentType: hasText(paymentType) ? paymentType.trim() : null,
        productLines: productLines.normalized,
        source: record
      }
    };
  }

  /**
   * Normalize a batch. Rows that fail go to `rejected` with the reason.
   */
  normalizeRows(rows: SourceRow[]): { records: NormalizedTransaction[]; rejected: RejectedRecord[] } {
    const records: NormalizedTransaction[] = [];
    const rejected: RejectedRecord[] = [];

    for (const row of rows) {
      const result = this.normalizeRecord(row);
      if (result.isValid) {
        records.push(result.transaction);
        continue;
      }

      const { error } = result;
      logger.warn('Row rejected during normalization', {
        rowNumber: row.rowNumber,
        code: error.code,
        field: error.field
      });
      rejected.push({
        rowNumber: row.rowNumber,
        stage: 'normalization',
        kind: error.kind,
        code: error.code,
        field: error.field,
        message: error.message,
        record: row.record
      });
    }

    logger.info('Normalization complete', { valid: records.length, rejected: rejected.length });
    return { records, rejected };
  }
}

export default DataNormalizer;
