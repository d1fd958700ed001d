import type { RawRecord } from '@cafe-etl/types';
import type { ReasonCode, RecordErrorKind } from '../utils/errorUtils';

export type { RawRecord };

// A raw record with its 1-based position in the extracted batch
export interface SourceRow {
  rowNumber: number;
  record: RawRecord;
}

// Semantic fields a source column can be mapped to
export const SemanticField = {
  BRANCH: 'branch' as const,
  DATE_TIME: 'date_time' as const,
  QTY: 'qty' as const,
  PRICE: 'price' as const,
  PAYMENT_TYPE: 'payment_type' as const,
  PRODUCT: 'product' as const,
  PRODUCT_NAME: 'product_name' as const,
  SIZE: 'size' as const,
  FLAVOUR: 'flavour' as const,
  PRODUCT_PRICE: 'product_price' as const
} as const;

export type SemanticField = typeof SemanticField[keyof typeof SemanticField];

// Deduplication types
export interface FlaggedRecord {
  rowNumber: number;
  missingFields: SemanticField[];
}

export interface DeduplicationResult {
  uniqueRows: SourceRow[];
  duplicatesRemoved: number;
  flagged: FlaggedRecord[];
}

// PII scrubbing types
export interface ScrubResult {
  record: RawRecord;
  removed: string[];
  redacted: string[];
  ambiguous: string[];
}

// Normalized domain records
export interface ProductLine {
  productName: string;
  size: string;
  flavour: string;
  price: number;
  // case-folded (product_name, size, flavour)
  identityKey: string;
}

export interface NormalizedTransaction {
  rowNumber: number;
  branchName: string;
  branchKey: string;
  dateTime: string;
  qty: number;
  price: number;
  paymentType: string | null;
  productLines: ProductLine[];
  // scrubbed row the transaction was built from, kept for reporting
  source: RawRecord;
}

// Reporting
export interface RejectedRecord {
  rowNumber: number;
  stage: 'normalization' | 'loading';
  kind: RecordErrorKind;
  code: ReasonCode;
  field?: string;
  message: string;
  record: RawRecord;
}

export type WarningCode = 'PII_AMBIGUOUS' | 'INCOMPARABLE_RECORD' | 'NO_DATA';

export interface PipelineWarning {
  code: WarningCode;
  message: string;
  rowNumber?: number;
  field?: string;
}

export type ProgressCallback = (progress: number, step: string) => void;

export interface TransformResult {
  records: NormalizedTransaction[];
  rejected: RejectedRecord[];
  warnings: PipelineWarning[];
  metrics: {
    rowsRead: number;
    duplicatesRemoved: number;
    flaggedRecords: number;
    piiFieldsRedacted: number;
    normalizationErrors: number;
  };
}

export type LoadOutcome =
  | { status: 'loaded'; transactionId: number; branchesCreated: number; productsCreated: number }
  | { status: 'skipped'; transactionId: number; branchesCreated: number; productsCreated: number }
  | { status: 'failed'; rejection: RejectedRecord };

export type RunStatus = 'completed' | 'aborted';

export interface RunSummary {
  status: RunStatus;
  rowsRead: number;
  duplicatesRemoved: number;
  flaggedRecords: number;
  piiFieldsRedacted: number;
  normalizationErrors: number;
  transactionsLoaded: number;
  transactionsSkippedAsDuplicate: number;
  loadErrors: number;
  branchesCreated: number;
  productsCreated: number;
  rejected: RejectedRecord[];
  warnings: PipelineWarning[];
  fatalError?: { kind: string; message: string };
  durationMs: number;
}
