/**
 * EFFECTS LAYER
 *
 * The pricing core never decides how warnings or rejected invoices are
 * surfaced. It hands them to these interfaces, and the caller plugs in a
 * logger, a UI banner or a test double.
 */

import {NonEmptyList} from 'purify-ts';

// ============================================================================
// Effect Interfaces
// ============================================================================

export interface InvoiceReporter {
  reportWarnings(invoiceId: string, warnings: string[]): Promise<void>;
  reportRejection(invoiceId: string, problems: NonEmptyList<string>): Promise<void>;
}

// ============================================================================
// Combined Dependencies
// ============================================================================

export type AppEffects = {
  readonly reporting: InvoiceReporter;
}
