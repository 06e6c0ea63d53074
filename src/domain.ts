// Domain types shared across the application

export const CATEGORIES = ['book', 'food', 'electronics', 'other'] as const;

export type Category = typeof CATEGORIES[number];

export type LineItem = {
  readonly sku: string;
  // Kept as a plain string so callers can pass whatever their source gave them;
  // the validator reports anything outside CATEGORIES.
  readonly category: Category | string;
  readonly unitPrice: number;
  readonly qty: number;
  readonly fragile?: boolean;
};

export type Membership = 'none' | 'gold' | 'platinum';

export type Invoice = {
  readonly invoiceId: string;
  readonly customerId: string;
  readonly country: string;
  readonly membership: Membership | string;
  readonly coupon?: string | null;
  readonly items: readonly LineItem[];
};

export type InvoiceTotal = {
  readonly invoiceId: string;
  readonly subtotal: number;
  readonly fragileFee: number;
  readonly shipping: number;
  readonly baseDiscount: number;
  readonly couponDiscount: number;
  readonly discount: number;
  readonly tax: number;
  readonly total: number;
  readonly warnings: string[];
};
