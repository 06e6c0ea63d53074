/**
 * PURE BUSINESS LOGIC
 *
 * These functions take values and return values. No effects whatsoever.
 * Each step of the invoice pipeline lives here on its own so it can be
 * tested with plain inputs and outputs.
 *
 * Note that for simplicity currency and decimal precision are not
 * integrated into calculations with prices.
 */

import {CATEGORIES, Invoice, InvoiceTotal, LineItem} from '../domain';
import {CouponResult, PricingTables, SubtotalBreakdown} from './types';
import {Either, Left, Maybe, NonEmptyList} from 'purify-ts';

export const FRAGILE_FEE_PER_UNIT = 5.0;
export const VOLUME_DISCOUNT_THRESHOLD = 3000;
export const VOLUME_DISCOUNT = 20;
export const UPGRADE_SUGGESTION_THRESHOLD = 10000;

export const INVOICE_MISSING = 'Invoice is missing';
export const UNKNOWN_COUPON = 'Unknown coupon';
export const CONSIDER_UPGRADE = 'Consider membership upgrade';

// Tiers with their own discount rate. Members never get the flat volume discount.
const membershipDiscountRates: ReadonlyMap<string, number> = new Map([
  ['gold', 0.03],
  ['platinum', 0.05],
]);

function membershipRate(membership: string): Maybe<number> {
  return Maybe.fromNullable(membershipDiscountRates.get(membership));
}

function isKnownCategory(category: string): boolean {
  return CATEGORIES.some(known => known === category);
}

// ============================================================================
// Validation
// ============================================================================

function validateLineItem(item: LineItem): string[] {
  return [
    ...(!item.sku ? ['Item sku is missing'] : []),
    ...(item.qty <= 0 ? [`Invalid qty for ${item.sku}`] : []),
    ...(item.unitPrice < 0 ? [`Invalid price for ${item.sku}`] : []),
    ...(!isKnownCategory(item.category) ? [`Unknown category for ${item.sku}`] : []),
  ];
}

/**
 * Collect every structural problem with the invoice, in order.
 * An empty list means the invoice can be priced.
 */
export function validateInvoice(invoice: Invoice | null | undefined): string[] {
  if (!invoice) return [INVOICE_MISSING];

  return [
    ...(!invoice.invoiceId ? ['Missing invoice_id'] : []),
    ...(!invoice.customerId ? ['Missing customer_id'] : []),
    ...(invoice.items.length === 0 ? ['Invoice must contain items'] : []),
    ...invoice.items.flatMap(validateLineItem),
  ];
}

export function checkInvoice(
  invoice: Invoice | null | undefined
): Either<NonEmptyList<string>, Invoice> {
  if (!invoice) return Left(NonEmptyList([INVOICE_MISSING]));
  return NonEmptyList.fromArray(validateInvoice(invoice)).toEither(invoice).swap();
}

// ============================================================================
// Core Calculations
// ============================================================================

export function calculateSubtotalAndFragileFee(items: readonly LineItem[]): SubtotalBreakdown {
  return items.reduce(
    (acc, item) => ({
      subtotal: acc.subtotal + item.unitPrice * item.qty,
      fragileFee: acc.fragileFee + (item.fragile ? FRAGILE_FEE_PER_UNIT * item.qty : 0),
    }),
    {subtotal: 0, fragileFee: 0}
  );
}

export function calculateShipping(
  country: string,
  subtotal: number,
  tables: PricingTables
): number {
  const rule = Maybe.fromNullable(tables.shippingRules.get(country))
    .orDefault(tables.defaultShipping);
  return subtotal < rule.threshold ? rule.fee : 0;
}

export function calculateBaseDiscount(membership: string, subtotal: number): number {
  return membershipRate(membership).caseOf({
    Just: rate => subtotal * rate,
    Nothing: () => (subtotal > VOLUME_DISCOUNT_THRESHOLD ? VOLUME_DISCOUNT : 0),
  });
}

export function applyCoupon(
  coupon: string | null | undefined,
  subtotal: number,
  tables: PricingTables
): CouponResult {
  return Maybe.fromNullable(coupon)
    .map(code => code.trim())
    .filter(code => code !== '')
    .caseOf<CouponResult>({
      Nothing: () => ({discount: 0, warnings: []}),
      Just: code => Maybe.fromNullable(tables.couponRates.get(code)).caseOf<CouponResult>({
        Just: rate => ({discount: subtotal * rate, warnings: []}),
        Nothing: () => ({discount: 0, warnings: [UNKNOWN_COUPON]}),
      }),
    });
}

/**
 * Tax on (subtotal - discount). The base is not clamped, so a discount larger
 * than the subtotal yields negative tax; only the final total is floored at zero.
 */
export function calculateTax(
  country: string,
  subtotal: number,
  discount: number,
  tables: PricingTables
): number {
  const rate = Maybe.fromNullable(tables.taxRates.get(country))
    .orDefault(tables.defaultTaxRate);
  return (subtotal - discount) * rate;
}

export function isMember(membership: string): boolean {
  return membershipRate(membership).isJust();
}

// ============================================================================
// Data Transformations
// ============================================================================

/**
 * Run every pricing step for an invoice that already passed validation.
 */
export function toInvoiceTotal(invoice: Invoice, tables: PricingTables): InvoiceTotal {
  const {subtotal, fragileFee} = calculateSubtotalAndFragileFee(invoice.items);
  const shipping = calculateShipping(invoice.country, subtotal, tables);
  const baseDiscount = calculateBaseDiscount(invoice.membership, subtotal);
  const coupon = applyCoupon(invoice.coupon, subtotal, tables);
  const discount = baseDiscount + coupon.discount;
  const tax = calculateTax(invoice.country, subtotal, discount, tables);
  const total = Math.max(subtotal + shipping + fragileFee + tax - discount, 0);

  const upgradeWarnings =
    subtotal > UPGRADE_SUGGESTION_THRESHOLD && !isMember(invoice.membership) ? [CONSIDER_UPGRADE] : [];

  return {
    invoiceId: invoice.invoiceId,
    subtotal,
    fragileFee,
    shipping,
    baseDiscount,
    couponDiscount: coupon.discount,
    discount,
    tax,
    total,
    warnings: [...coupon.warnings, ...upgradeWarnings],
  };
}
