// Raw extractor output: one CSV row, column name -> raw cell text
export type RawRecord = Record<string, string>;

// Core table rows
export interface Branch {
  id: number;
  name: string;
}

export interface Product {
  id: number;
  product_name: string;
  size: string;
  flavour: string;
  price: number;
}

export interface Transaction {
  id: number;
  branch_id: number;
  date_time: string;
  qty: number;
  price: number;
  payment_type: string | null;
}

export interface TransactionProduct {
  id: number;
  transaction_id: number;
  product_id: number;
}

// Insert types
export type ProductInsert = Omit<Product, 'id'>;
export type TransactionInsert = Omit<Transaction, 'id'>;

// Size and flavour use '' rather than null when the export leaves them blank
export const EMPTY_ATTRIBUTE = '' as const;

export type TableName = 'branches' | 'products' | 'transactions' | 'transaction_product';
