import csv from 'csv-parser';
import { promises as fs } from 'fs';
import { Readable } from 'stream';
import type { RawRecord } from '@cafe-etl/types';
import type { PipelineConfig } from '../config/PipelineConfig';
import { ExtractionError, getErrorMessage } from '../utils/errorUtils';
import logger from '../utils/logger';

export type CsvExtractorConfig = Pick<PipelineConfig, 'csv'>;

/**
 * Reads branch exports into raw records. Values stay as the strings found
 * in the file; cleaning is left to the transform stages.
 */
export class CsvExtractor {
  constructor(private readonly config: CsvExtractorConfig) {}

  /**
   * Extract one file
   */
  async extractFile(filePath: string): Promise<RawRecord[]> {
    let buffer: Buffer;
    try {
      buffer = await fs.readFile(filePath);
    } catch (error) {
      throw new ExtractionError(`Cannot read input file ${filePath}: ${getErrorMessage(error)}`, { cause: error });
    }

    const rows = await this.extractBuffer(buffer);
    logger.info('Extracted CSV file', { filePath, rows: rows.length });
    return rows;
  }

  /**
   * Extract several files, concatenated in the order given
   */
  async extractFiles(filePaths: string[]): Promise<RawRecord[]> {
    const rows: RawRecord[] = [];
    for (const filePath of filePaths) {
      rows.push(...await this.extractFile(filePath));
    }
    return rows;
  }

  async extractBuffer(buffer: Buffer): Promise<RawRecord[]> {
    const rows = await this.parseCsvData(buffer);
    return this.dropRepeatedHeader(rows);
  }

  private parseCsvData(buffer: Buffer): Promise<RawRecord[]> {
    const { headers, separator } = this.config.csv;

    return new Promise((resolve, reject) => {
      const rows: RawRecord[] = [];
      // Readable.from emits a string as one chunk
      const stream = Readable.from(buffer.toString('utf8').replace(/^\uFEFF/, ''));

      stream
        .pipe(csv({
          separator,
          strict: false,
          ...(headers ? { headers } : {}),
          mapHeaders: ({ header }) => header.trim()
        }))
        .on('data', (row: RawRecord) => {
          rows.push(row);
        })
        .on('end', () => {
          resolve(rows);
        })
        .on('error', (error: Error) => {
          reject(new ExtractionError(`CSV parsing failed: ${error.message}`, { cause: error }));
        });
    });
  }

  // Headerless exports sometimes start with the header line anyway
  private dropRepeatedHeader(rows: RawRecord[]): RawRecord[] {
    const { headers } = this.config.csv;
    if (!headers || rows.length === 0) {
      return rows;
    }

    const first = rows[0];
    const repeatsHeaders = headers.every(header => (first[header] ?? '').trim() === header);
    return repeatsHeaders ? rows.slice(1) : rows;
  }
}

export default CsvExtractor;
