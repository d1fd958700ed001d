// Transform stages: deduplication, PII scrubbing and normalization

export { default as DeduplicationEngine } from './DeduplicationEngine';
export { default as PIIScrubber } from './PIIScrubber';
export type { PIIScrubberConfig } from './PIIScrubber';
export { default as DataNormalizer, CANONICAL_DATE_TIME_FORMAT } from './DataNormalizer';
export type { DataNormalizerConfig, FieldResult } from './DataNormalizer';
export { default as ProductDescriptorParser, parseMoney } from './ProductDescriptorParser';
export type { ParsedProductEntry } from './ProductDescriptorParser';
export { default as ETLPipeline } from './ETLPipeline';

// Re-export types for convenience
export type {
  DeduplicationResult,
  FlaggedRecord,
  ScrubResult,
  TransformResult
} from '../types';
