import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import os from 'os';
import path from 'path';
import { resolvePipelineConfig } from '../../config/PipelineConfig';
import { ExtractionError } from '../../utils/errorUtils';
import { CsvExtractor } from '../CsvExtractor';

const HEADERLESS_ROW = '25/08/2021 09:00,Chesterfield,Alex Example,"Regular Latte - 2.45, Large Mocha - 3.10",5.55,CARD,1234';

describe('CsvExtractor', () => {
  const extractor = new CsvExtractor(resolvePipelineConfig());

  it('should name the columns of a headerless export from the configured headers', async () => {
    const rows = await extractor.extractBuffer(Buffer.from(`${HEADERLESS_ROW}\n`));

    expect(rows).toEqual([{
      'Date/Time': '25/08/2021 09:00',
      Branch: 'Chesterfield',
      'Customer Name': 'Alex Example',
      Product: 'Regular Latte - 2.45, Large Mocha - 3.10',
      Price: '5.55',
      'Payment Type': 'CARD',
      'Card Number': '1234'
    }]);
  });

  it('should skip a leading row that repeats the headers', async () => {
    const header = 'Date/Time,Branch,Customer Name,Product,Price,Payment Type,Card Number';
    const rows = await extractor.extractBuffer(Buffer.from(`${header}\n${HEADERLESS_ROW}\n`));

    expect(rows).toHaveLength(1);
    expect(rows[0].Branch).toBe('Chesterfield');
  });

  it('should keep cell text exactly as written', async () => {
    const rows = await extractor.extractBuffer(Buffer.from('  25/08/2021 09:00 , Leeds ,,Latte - 2.45,2.45,,\n'));

    expect(rows[0]['Date/Time']).toBe('  25/08/2021 09:00 ');
    expect(rows[0].Branch).toBe(' Leeds ');
    expect(rows[0]['Customer Name']).toBe('');
  });

  it('should read the header row when no headers are configured', async () => {
    const withHeaderRow = new CsvExtractor(resolvePipelineConfig({ csv: { headers: null, separator: ';' } }));

    const rows = await withHeaderRow.extractBuffer(Buffer.from('Branch;Date/Time;Price\nLeeds;2021-08-25 09:00;3.10\n'));

    expect(rows).toEqual([{ Branch: 'Leeds', 'Date/Time': '2021-08-25 09:00', Price: '3.10' }]);
  });

  it('should return no rows for an empty file', async () => {
    expect(await extractor.extractBuffer(Buffer.from(''))).toEqual([]);
  });

  describe('files', () => {
    let workDir: string;

    beforeEach(() => {
      workDir = mkdtempSync(path.join(os.tmpdir(), 'cafe-etl-csv-'));
    });

    afterEach(() => {
      rmSync(workDir, { recursive: true, force: true });
    });

    it('should concatenate files in the order given', async () => {
      const first = path.join(workDir, 'leeds.csv');
      const second = path.join(workDir, 'chesterfield.csv');
      writeFileSync(first, '25/08/2021 09:00,Leeds,,Latte - 2.45,2.45,CASH,\n');
      writeFileSync(second, `${HEADERLESS_ROW}\n`);

      const rows = await extractor.extractFiles([first, second]);

      expect(rows.map(row => row.Branch)).toEqual(['Leeds', 'Chesterfield']);
    });

    it('should raise an extraction error for a missing file', async () => {
      await expect(extractor.extractFile(path.join(workDir, 'absent.csv'))).rejects.toBeInstanceOf(ExtractionError);
    });
  });
});
