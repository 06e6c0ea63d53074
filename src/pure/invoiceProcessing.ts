/**
 * INVOICE PROCESSOR - The Coordinator
 *
 * priceInvoice is the whole pricing pipeline as a pure function.
 * processInvoice is the thin effectful shell around it: price the invoice,
 * then tell the reporter about warnings or rejection.
 */

import {Either, EitherAsync, NonEmptyList} from 'purify-ts';
import {Invoice, InvoiceTotal} from '../domain';
import {AppEffects} from './effects';
import {PricingTables} from './types';
import {checkInvoice, toInvoiceTotal} from './businessLogic';
import {EffectsError} from '../effects/EffectsError';

export const MISSING_INVOICE_ID = '<missing>';

/**
 * Validate and price an invoice.
 * @return either every validation problem, or the priced invoice
 */
export function priceInvoice(
    invoice: Invoice | null | undefined,
    tables: PricingTables
): Either<NonEmptyList<string>, InvoiceTotal> {
    return checkInvoice(invoice).map(valid => toInvoiceTotal(valid, tables));
}

/**
 * Price the given invoice and report the outcome.
 * @return a function to process the invoice using the given app effects returning
 * either the validation problems or the priced invoice
 * @throws EffectsError when the reporter fails
 */
export function processInvoice(
    invoice: Invoice | null | undefined,
    tables: PricingTables
): (appEffects: AppEffects) => Promise<Either<NonEmptyList<string>, InvoiceTotal>> {
    return async (appEffects: AppEffects) => {
        const invoiceId = invoice?.invoiceId || MISSING_INVOICE_ID;
        const priced = priceInvoice(invoice, tables);

        const report = priced.caseOf({
            Left: problems => () => appEffects.reporting.reportRejection(invoiceId, problems),
            Right: result => () => result.warnings.length > 0
                ? appEffects.reporting.reportWarnings(invoiceId, result.warnings)
                : Promise.resolve(),
        });

        const outcome = await EitherAsync(report).run();
        outcome.ifLeft(err => {
            throw new EffectsError([(err instanceof Error) ? err : new Error(String(err))]);
        });
        return priced;
    };
}
