import {Invoice} from '../domain';
import {InvoiceCalculator} from '../InvoiceCalculator';
import {ValidationError} from '../pure/ValidationError';
import {DEFAULT_PRICING_TABLES, makePricingTables} from '../pure/pricingTables';

const invoice: Invoice = {
  invoiceId: 'inv-100',
  customerId: 'cust-7',
  country: 'US',
  membership: 'none',
  coupon: null,
  items: [{sku: 'A', category: 'book', unitPrice: 100, qty: 2, fragile: true}],
};

const bigOrder: Invoice = {
  ...invoice,
  items: [{sku: 'TV', category: 'electronics', unitPrice: 6000, qty: 2}],
};

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected an error to be thrown');
}

describe('InvoiceCalculator.computeTotal', () => {
  const calculator = new InvoiceCalculator();

  it('uses the default pricing tables', () => {
    expect(calculator.tables).toBe(DEFAULT_PRICING_TABLES);
  });

  it('prices a simple fragile order', () => {
    const result = calculator.computeTotal(invoice);

    expect(result.invoiceId).toBe('inv-100');
    expect(result.total).toBeCloseTo(226);
    expect(result.warnings).toEqual([]);
  });

  it('returns the same result for the same invoice', () => {
    expect(calculator.computeTotal(invoice)).toEqual(calculator.computeTotal(invoice));
  });

  it('charges shipping below the country threshold', () => {
    const small: Invoice = {...invoice, items: [{sku: 'S', category: 'food', unitPrice: 50, qty: 1}]};

    const result = calculator.computeTotal(small);

    // 50 + 15 shipping + 4 tax
    expect(result.shipping).toBe(15);
    expect(result.total).toBeCloseTo(69);
  });

  it('suggests an upgrade to large non-member orders only', () => {
    expect(calculator.computeTotal(bigOrder).warnings).toEqual(['Consider membership upgrade']);
    expect(calculator.computeTotal({...bigOrder, membership: 'platinum'}).warnings).toEqual([]);
    expect(calculator.computeTotal({...bigOrder, membership: 'gold'}).warnings).toEqual([]);
  });

  it('warns about an unknown coupon exactly once', () => {
    const result = calculator.computeTotal({...invoice, coupon: 'NOPE'});

    expect(result.couponDiscount).toBe(0);
    expect(result.warnings).toEqual(['Unknown coupon']);
  });

  it('throws a ValidationError listing every problem', () => {
    const broken: Invoice = {
      ...invoice,
      items: [{sku: '', category: 'toys', unitPrice: 10, qty: 0}],
    };

    const error = captureError(() => calculator.computeTotal(broken));

    expect(error).toBeInstanceOf(ValidationError);
    if (error instanceof ValidationError) {
      expect(error.name).toBe('ValidationError');
      expect(error.problems).toEqual(['Item sku is missing', 'Invalid qty for ', 'Unknown category for ']);
      expect(error.message).toBe('Item sku is missing; Invalid qty for ; Unknown category for ');
    }
  });

  it('throws for a missing invoice', () => {
    expect(() => calculator.computeTotal(null)).toThrow('Invoice is missing');
  });

  it('never returns a negative total', () => {
    const generous = new InvoiceCalculator(makePricingTables({
      couponRates: {OVER150: 1.5},
      shippingRules: {US: {threshold: 100, fee: 15}},
      defaultShipping: {threshold: 200, fee: 25},
      taxRates: {US: 0.08},
      defaultTaxRate: 0.05,
    }));
    const order: Invoice = {
      ...invoice,
      coupon: 'OVER150',
      items: [{sku: 'B', category: 'book', unitPrice: 100, qty: 1}],
    };

    const result = generous.computeTotal(order);

    // 100 + 0 shipping + (100 - 150) * 0.08 tax - 150 discount = -54
    expect(result.discount).toBeCloseTo(150);
    expect(result.tax).toBeCloseTo(-4);
    expect(result.total).toBe(0);
  });
});

describe('InvoiceCalculator.tryComputeTotal', () => {
  const calculator = new InvoiceCalculator();

  it('returns the total on the right', () => {
    const result = calculator.tryComputeTotal(invoice);

    expect(result.isRight()).toBe(true);
    result.ifRight(total => expect(total.subtotal).toBe(200));
  });

  it('returns the validation error on the left', () => {
    const result = calculator.tryComputeTotal({...invoice, invoiceId: '', customerId: ''});

    expect(result.isLeft()).toBe(true);
    result.ifLeft(error => {
      expect(error.problems).toEqual(['Missing invoice_id', 'Missing customer_id']);
      expect(error.message).toBe('Missing invoice_id; Missing customer_id');
    });
  });
});

describe('makePricingTables', () => {
  it('copies its input', () => {
    const couponRates: Record<string, number> = {SPRING: 0.1};
    const calculator = new InvoiceCalculator(makePricingTables({
      couponRates,
      shippingRules: {},
      defaultShipping: {threshold: 200, fee: 25},
      taxRates: {},
      defaultTaxRate: 0.05,
    }));

    couponRates.SUMMER = 0.5;

    expect(calculator.computeTotal({...invoice, coupon: 'SUMMER'}).warnings).toEqual(['Unknown coupon']);
  });
});
