import {Either} from 'purify-ts';
import {Invoice, InvoiceTotal} from './domain';
import {PricingTables} from './pure/types';
import {DEFAULT_PRICING_TABLES} from './pure/pricingTables';
import {priceInvoice} from './pure/invoiceProcessing';
import {ValidationError} from './pure/ValidationError';

/**
 * Computes the payable total of an invoice against a fixed set of pricing
 * tables. The tables are read-only, so one calculator can be shared freely.
 */
export class InvoiceCalculator {
  constructor(readonly tables: PricingTables = DEFAULT_PRICING_TABLES) {}

  tryComputeTotal(invoice: Invoice | null | undefined): Either<ValidationError, InvoiceTotal> {
    return priceInvoice(invoice, this.tables).mapLeft(problems => new ValidationError(problems));
  }

  /**
   * @throws ValidationError listing every problem when the invoice is malformed
   */
  computeTotal(invoice: Invoice | null | undefined): InvoiceTotal {
    return this.tryComputeTotal(invoice).caseOf<InvoiceTotal>({
      Left: error => {
        throw error;
      },
      Right: total => total,
    });
  }
}
