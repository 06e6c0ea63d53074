import {PricingTables, ShippingRule} from './types';

export type PricingTablesInput = {
  readonly couponRates: Readonly<Record<string, number>>;
  readonly shippingRules: Readonly<Record<string, ShippingRule>>;
  readonly defaultShipping: ShippingRule;
  readonly taxRates: Readonly<Record<string, number>>;
  readonly defaultTaxRate: number;
};

/**
 * Build read-only pricing tables from plain records.
 * The input is copied, so later changes to it do not leak into the tables.
 */
export function makePricingTables(input: PricingTablesInput): PricingTables {
  return Object.freeze({
    couponRates: new Map(Object.entries(input.couponRates)),
    shippingRules: new Map(
      Object.entries(input.shippingRules).map(([country, rule]) => [country, Object.freeze({...rule})] as const)
    ),
    defaultShipping: Object.freeze({...input.defaultShipping}),
    taxRates: new Map(Object.entries(input.taxRates)),
    defaultTaxRate: input.defaultTaxRate,
  });
}

export const DEFAULT_PRICING_TABLES: PricingTables = makePricingTables({
  couponRates: {
    WELCOME10: 0.10,
    VIP20: 0.20,
    STUDENT5: 0.05,
  },
  shippingRules: {
    TH: {threshold: 500, fee: 60},
    JP: {threshold: 4000, fee: 600},
    US: {threshold: 100, fee: 15},
  },
  defaultShipping: {threshold: 200, fee: 25},
  taxRates: {
    TH: 0.07,
    JP: 0.10,
    US: 0.08,
  },
  defaultTaxRate: 0.05,
});
