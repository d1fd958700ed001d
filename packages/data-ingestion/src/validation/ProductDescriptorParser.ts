import { ParseError, ValidationError } from '../utils/errorUtils';

export interface ParsedProductEntry {
  productName: string;
  size: string;
  flavour: string;
  price: number;
}

const ENTRY_SEPARATOR = ',';
const PART_SEPARATOR = ' - ';

/**
 * Reads money such as "2.45", "£2.45" or "-1.00" as a number rounded to pence.
 * Returns null when the text is not a decimal amount.
 */
export function parseMoney(value: string): number | null {
  const stripped = value.trim().replace(/^(-?)\s*[£$€]\s*/, '$1');
  if (!/^-?(\d+(\.\d*)?|\.\d+)$/.test(stripped)) {
    return null;
  }
  return Math.round(Number(stripped) * 100) / 100;
}

// At most `limit` cuts; the remainder stays in the last part
function splitWithLimit(value: string, separator: string, limit: number): string[] {
  const parts: string[] = [];
  let rest = value;
  while (parts.length < limit) {
    const index = rest.indexOf(separator);
    if (index === -1) {
      break;
    }
    parts.push(rest.slice(0, index));
    rest = rest.slice(index + separator.length);
  }
  parts.push(rest);
  return parts;
}

/**
 * Parses the combined product column of a branch export.
 *
 * A cell holds comma-separated entries, each either "<name> - <price>" or
 * "<name> - <flavour> - <price>". A leading word found in `knownSizes`
 * becomes the size, e.g. "Large Latte - Hazelnut - 2.45".
 */
export class ProductDescriptorParser {
  private readonly knownSizes: Set<string>;

  constructor(knownSizes: string[]) {
    this.knownSizes = new Set(knownSizes.map(size => size.trim().toLowerCase()));
  }

  parse(descriptor: string): ParsedProductEntry[] {
    return descriptor
      .split(ENTRY_SEPARATOR)
      .map(entry => entry.trim())
      .filter(entry => entry.length > 0)
      .map(entry => this.parseEntry(entry));
  }

  parseEntry(entry: string): ParsedProductEntry {
    const parts = splitWithLimit(entry, PART_SEPARATOR, 2).map(part => part.trim());
    if (parts.length < 2) {
      throw new ParseError('INVALID_PRODUCT', `Product entry "${entry}" has no price`, 'product');
    }

    const { size, productName } = this.splitSize(parts[0]);
    if (!productName) {
      throw new ParseError('INVALID_PRODUCT', `Product entry "${entry}" has no product name`, 'product');
    }

    const priceText = parts[parts.length - 1];
    const price = parseMoney(priceText);
    if (price === null) {
      throw new ParseError('INVALID_PRICE', `Invalid price "${priceText}" in product entry "${entry}"`, 'product');
    }
    if (price <= 0) {
      throw new ValidationError('NON_POSITIVE_PRICE', `Product price must be positive in entry "${entry}"`, 'product');
    }

    return {
      productName,
      size,
      flavour: parts.length === 3 ? parts[1] : '',
      price
    };
  }

  private splitSize(text: string): { size: string; productName: string } {
    const tokens = text.split(/\s+/).filter(Boolean);
    if (tokens.length > 1 && this.knownSizes.has(tokens[0].toLowerCase())) {
      return { size: tokens[0], productName: tokens.slice(1).join(' ') };
    }
    return { size: '', productName: tokens.join(' ') };
  }
}

export default ProductDescriptorParser;
