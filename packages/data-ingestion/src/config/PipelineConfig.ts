import { existsSync, readFileSync } from 'fs';
import path from 'path';
import { z } from 'zod';
import { ConfigurationError, getErrorMessage } from '../utils/errorUtils';

// Headerless branch export layout
export const DEFAULT_CSV_HEADERS = [
  'Date/Time',
  'Branch',
  'Customer Name',
  'Product',
  'Price',
  'Payment Type',
  'Card Number'
];

export const DEFAULT_PII_FIELDS = {
  customer_name: 'remove',
  email: 'remove',
  phone: 'remove',
  card_number: 'remove',
  card_last4: 'remove'
} as const;

export const DEFAULT_SUSPECT_PATTERNS = [
  'name',
  'customer',
  'e_?mail',
  'phone',
  'mobile',
  'card',
  'address',
  'postcode',
  'zip',
  'dob',
  'birth'
];

export const DEFAULT_DATE_FORMATS = [
  'yyyy-MM-dd HH:mm:ss',
  'yyyy-MM-dd HH:mm',
  "yyyy-MM-dd'T'HH:mm:ss",
  'dd/MM/yyyy HH:mm:ss',
  'dd/MM/yyyy HH:mm'
];

export const DEFAULT_CONFIG_PATH = path.join('config', 'pipeline.config.json');

const isRegExpSource = (source: string) => {
  try {
    new RegExp(source);
    return true;
  } catch {
    return false;
  }
};

export const ColumnMappingSchema = z.object({
  branch: z.string().min(1).default('Branch'),
  date_time: z.string().min(1).default('Date/Time'),
  qty: z.string().min(1).default('Qty'),
  price: z.string().min(1).default('Price'),
  payment_type: z.string().min(1).default('Payment Type'),
  product: z.string().min(1).default('Product'),
  product_name: z.string().min(1).default('Product Name'),
  size: z.string().min(1).default('Size'),
  flavour: z.string().min(1).default('Flavour'),
  product_price: z.string().min(1).default('Product Price')
});

export const PiiActionSchema = z.enum(['remove', 'redact']);

export const PipelineConfigSchema = z.object({
  columns: ColumnMappingSchema.default({}),
  piiFields: z.record(PiiActionSchema).default(() => ({ ...DEFAULT_PII_FIELDS })),
  passthroughFields: z.array(z.string().min(1)).default(() => []),
  suspectPatterns: z
    .array(z.string().min(1).refine(isRegExpSource, 'Invalid regular expression'))
    .default(() => [...DEFAULT_SUSPECT_PATTERNS]),
  redactionMarker: z.string().min(1).default('[REDACTED]'),
  knownSizes: z.array(z.string().min(1)).default(() => ['regular', 'large', 'small']),
  dateFormats: z.array(z.string().min(1)).min(1).default(() => [...DEFAULT_DATE_FORMATS]),
  defaultQty: z.number().int().nonnegative().default(1),
  csv: z
    .object({
      headers: z.array(z.string().min(1)).min(1).nullable().default(() => [...DEFAULT_CSV_HEADERS]),
      separator: z.string().length(1).default(',')
    })
    .default({})
});

export type ColumnMapping = z.infer<typeof ColumnMappingSchema>;
export type PiiAction = z.infer<typeof PiiActionSchema>;
export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;

/**
 * Validate a partial configuration and fill in defaults
 */
export function resolvePipelineConfig(input: PipelineConfigInput = {}): PipelineConfig {
  return parsePipelineConfig(input);
}

export function parsePipelineConfig(input: unknown): PipelineConfig {
  const parsed = PipelineConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(
      'Invalid pipeline configuration',
      parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return parsed.data;
}

/**
 * Load configuration from a JSON file. Without an explicit path the default
 * location is used when present, built-in defaults otherwise.
 */
export function loadPipelineConfig(configPath?: string, cwd: string = process.cwd()): PipelineConfig {
  const resolved = path.resolve(cwd, configPath ?? DEFAULT_CONFIG_PATH);

  if (!existsSync(resolved)) {
    if (configPath) {
      throw new ConfigurationError(`Configuration file not found: ${resolved}`);
    }
    return resolvePipelineConfig();
  }

  let json: unknown;
  try {
    json = JSON.parse(readFileSync(resolved, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`Configuration file is not valid JSON: ${resolved} (${getErrorMessage(error)})`);
  }

  return parsePipelineConfig(json);
}
