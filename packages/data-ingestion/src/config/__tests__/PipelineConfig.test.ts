import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import os from 'os';
import path from 'path';
import { ConfigurationError } from '../../utils/errorUtils';
import {
  DEFAULT_CSV_HEADERS,
  loadPipelineConfig,
  parsePipelineConfig,
  resolvePipelineConfig
} from '../PipelineConfig';

describe('PipelineConfig', () => {
  describe('resolvePipelineConfig', () => {
    it('should fill in defaults for every field', () => {
      const config = resolvePipelineConfig();

      expect(config.columns.branch).toBe('Branch');
      expect(config.columns.date_time).toBe('Date/Time');
      expect(config.piiFields).toEqual({
        customer_name: 'remove',
        email: 'remove',
        phone: 'remove',
        card_number: 'remove',
        card_last4: 'remove'
      });
      expect(config.redactionMarker).toBe('[REDACTED]');
      expect(config.knownSizes).toEqual(['regular', 'large', 'small']);
      expect(config.defaultQty).toBe(1);
      expect(config.csv).toEqual({ headers: DEFAULT_CSV_HEADERS, separator: ',' });
    });

    it('should merge a partial column mapping with the defaults', () => {
      const config = resolvePipelineConfig({ columns: { branch: 'Store' } });

      expect(config.columns.branch).toBe('Store');
      expect(config.columns.price).toBe('Price');
    });

    it('should not share default arrays between configurations', () => {
      const first = resolvePipelineConfig();
      first.knownSizes.push('medium');

      expect(resolvePipelineConfig().knownSizes).toEqual(['regular', 'large', 'small']);
    });

    it('should accept null headers for files with a header row', () => {
      expect(resolvePipelineConfig({ csv: { headers: null } }).csv.headers).toBeNull();
    });
  });

  describe('parsePipelineConfig', () => {
    it('should list every invalid field', () => {
      let thrown: unknown;
      try {
        parsePipelineConfig({ defaultQty: -1, suspectPatterns: ['('] });
      } catch (error) {
        thrown = error;
      }

      expect(thrown).toBeInstanceOf(ConfigurationError);
      if (thrown instanceof ConfigurationError) {
        expect(thrown.issues).toHaveLength(2);
        expect(thrown.issues).toContain('suspectPatterns.0: Invalid regular expression');
        expect(thrown.issues.some(issue => issue.startsWith('defaultQty: '))).toBe(true);
      }
    });

    it('should reject unknown PII actions', () => {
      expect(() => parsePipelineConfig({ piiFields: { email: 'hash' } })).toThrow(ConfigurationError);
    });
  });

  describe('loadPipelineConfig', () => {
    let workDir: string;

    beforeEach(() => {
      workDir = mkdtempSync(path.join(os.tmpdir(), 'cafe-etl-config-'));
    });

    afterEach(() => {
      rmSync(workDir, { recursive: true, force: true });
    });

    it('should fall back to defaults when the default file is absent', () => {
      expect(loadPipelineConfig(undefined, workDir)).toEqual(resolvePipelineConfig());
    });

    it('should read the default file from the working directory', () => {
      mkdirSync(path.join(workDir, 'config'));
      writeFileSync(path.join(workDir, 'config', 'pipeline.config.json'), JSON.stringify({ defaultQty: 2 }));

      expect(loadPipelineConfig(undefined, workDir).defaultQty).toBe(2);
    });

    it('should read an explicit file', () => {
      writeFileSync(path.join(workDir, 'custom.json'), JSON.stringify({ redactionMarker: '***' }));

      expect(loadPipelineConfig('custom.json', workDir).redactionMarker).toBe('***');
    });

    it('should fail when an explicit file is missing', () => {
      expect(() => loadPipelineConfig('missing.json', workDir)).toThrow(ConfigurationError);
    });

    it('should fail on malformed JSON', () => {
      writeFileSync(path.join(workDir, 'broken.json'), '{ "defaultQty": ');

      expect(() => loadPipelineConfig('broken.json', workDir)).toThrow(/not valid JSON/);
    });
  });
});
