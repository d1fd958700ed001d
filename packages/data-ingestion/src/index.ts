// Main exports for the data-ingestion package

// Types
export * from './types';

// Configuration
export {
  PipelineConfigSchema,
  ColumnMappingSchema,
  resolvePipelineConfig,
  parsePipelineConfig,
  loadPipelineConfig,
  DEFAULT_CONFIG_PATH,
  DEFAULT_CSV_HEADERS
} from './config/PipelineConfig';
export type { ColumnMapping, PiiAction, PipelineConfig, PipelineConfigInput } from './config/PipelineConfig';

// Errors
export {
  PipelineError,
  ParseError,
  ValidationError,
  PiiLeakError,
  ExtractionError,
  ConfigurationError,
  getErrorMessage
} from './utils/errorUtils';
export type { ReasonCode, RecordErrorKind } from './utils/errorUtils';

// Extraction
export { CsvExtractor } from './parsers/CsvExtractor';

// Transform stages
export {
  DeduplicationEngine,
  PIIScrubber,
  DataNormalizer,
  ProductDescriptorParser,
  ETLPipeline
} from './validation';

// Loading and orchestration
export { EntityLoader } from './loader/EntityLoader';
export type { LoadReport, Resolution } from './loader/EntityLoader';
export { ETLOrchestrator } from './workers/ETLOrchestrator';
export type { RunOptions } from './workers/ETLOrchestrator';

export { default as logger } from './utils/logger';
