import type { RawRecord } from '@cafe-etl/types';

/**
 * Canonical form of a column name: lower case, runs of anything that is not
 * a letter or digit collapsed to '_'. "Customer Name" -> "customer_name".
 */
export function normalizeFieldName(name: string): string {
  return name
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

/** Finds the key of `record` that names `column`, exact match first. */
export function findFieldKey(record: RawRecord, column: string): string | undefined {
  if (Object.prototype.hasOwnProperty.call(record, column)) {
    return column;
  }
  const wanted = normalizeFieldName(column);
  return Object.keys(record).find(key => normalizeFieldName(key) === wanted);
}

export function readField(record: RawRecord, column: string): string | undefined {
  const key = findFieldKey(record, column);
  return key === undefined ? undefined : record[key];
}

export function isBlank(value: string | undefined): boolean {
  return value === undefined || value.trim() === '';
}

export function hasText(value: string | undefined): value is string {
  return !isBlank(value);
}
