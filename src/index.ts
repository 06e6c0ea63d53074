export {InvoiceCalculator} from './InvoiceCalculator';
export {ValidationError} from './pure/ValidationError';
export {EffectsError} from './effects/EffectsError';
export {DEFAULT_PRICING_TABLES, makePricingTables} from './pure/pricingTables';
export type {PricingTablesInput} from './pure/pricingTables';
export {priceInvoice, processInvoice} from './pure/invoiceProcessing';
export {validateInvoice} from './pure/businessLogic';
export {ConsoleInvoiceReporter, loadConfigFromEnv, makeAppEffects} from './effects/EffectsFactory';
export type {AppEffects, InvoiceReporter} from './pure/effects';
export type {PricingTables, ShippingRule} from './pure/types';
export type {AppConfig, LogLevel, LoggingConfig} from './effects/types';
export type {Category, Invoice, InvoiceTotal, LineItem, Membership} from './domain';
export {CATEGORIES} from './domain';
