// stock types in catalogue order - order matters for tie-breaks and receipts
export const BARCODES = ['EGG', 'MILK', 'JAM', 'WOOL'] as const;
export type Barcode = (typeof BARCODES)[number];

// lowest to highest
export const QUALITIES = ['REGULAR', 'SILVER', 'GOLD', 'IRIDIUM'] as const;
export type Quality = (typeof QUALITIES)[number];

export interface StockType {
  displayName: string;
  basePrice: number; // cents
}

export const STOCK_CATALOGUE: Readonly<Record<Barcode, StockType>> = {
  EGG: { displayName: 'egg', basePrice: 50 },
  MILK: { displayName: 'milk', basePrice: 440 },
  JAM: { displayName: 'jam', basePrice: 670 },
  WOOL: { displayName: 'wool', basePrice: 3000 },
};

export const DEFAULT_POPULAR_PRODUCT: Barcode = BARCODES[0];

export interface Product {
  readonly barcode: Barcode;
  readonly quality: Quality;
  readonly displayName: string;
  readonly basePrice: number;
}

// integer percentage per stock type, absent = 0%
export type DiscountMap = Partial<Record<Barcode, number>>;

export type TransactionVariant =
  | { kind: 'standard' }
  | { kind: 'categorised' }
  | { kind: 'specialSale'; discounts: DiscountMap };

export type TransactionKind = TransactionVariant['kind'];

export interface ReceiptData {
  headers: string[];
  rows: string[][];
  total: string;
  customerName: string;
  savings?: string;
}
