// Module product types

export type ShippingRule = {
  readonly threshold: number;
  readonly fee: number;
};

export type PricingTables = {
  readonly couponRates: ReadonlyMap<string, number>;
  readonly shippingRules: ReadonlyMap<string, ShippingRule>;
  readonly defaultShipping: ShippingRule;
  readonly taxRates: ReadonlyMap<string, number>;
  readonly defaultTaxRate: number;
};

export type SubtotalBreakdown = {
  readonly subtotal: number;
  readonly fragileFee: number;
};

export type CouponResult = {
  readonly discount: number;
  readonly warnings: string[];
};
