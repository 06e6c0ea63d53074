/**
 * PRODUCTION EFFECTS IMPLEMENTATION
 *
 * Invoice warnings and rejections are written to the console, filtered by
 * the configured log level.
 */
import {NonEmptyList} from 'purify-ts';
import {AppEffects, InvoiceReporter} from '../pure/effects';
import {AppConfig, LOG_LEVELS, LoggingConfig, LogLevel} from './types';

const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

function parseLogLevel(value: string | undefined): LogLevel {
  return LOG_LEVELS.find(level => level === value) ?? DEFAULT_LOG_LEVEL;
}

// Load configuration from environment variables
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    logging: {
      level: parseLogLevel(env.INVOICE_LOG_LEVEL),
    },
  };
}

// ============================================================================
// Console Invoice Reporter
// ============================================================================

export class ConsoleInvoiceReporter implements InvoiceReporter {
  constructor(private readonly config: LoggingConfig) {}

  async reportWarnings(invoiceId: string, warnings: string[]): Promise<void> {
    if (this.config.level === 'silent' || warnings.length === 0) {
      return;
    }
    console.warn(`Invoice ${invoiceId}: ${warnings.join('; ')}`);
  }

  async reportRejection(invoiceId: string, problems: NonEmptyList<string>): Promise<void> {
    if (this.config.level === 'silent') {
      return;
    }
    console.error(`Invoice ${invoiceId} rejected: ${problems.join('; ')}`);
  }
}

// ============================================================================
// Production EffectsFactory
// ============================================================================

class EffectsFactory implements AppEffects {
  private _reporter?: InvoiceReporter;

  constructor(private readonly config: AppConfig) {}

  get reporting(): InvoiceReporter {
    if (!this._reporter) {
      this._reporter = new ConsoleInvoiceReporter(this.config.logging);
    }
    return this._reporter;
  }

  /**
   * Static factory method to create production effects
   */
  static make(config?: AppConfig): AppEffects {
    const cfg = config || loadConfigFromEnv();
    const effects = new EffectsFactory(cfg);
    if (cfg.logging.level === 'info') {
      console.log('Invoice reporting initialised');
    }
    return effects;
  }
}

// Export a factory function
export function makeAppEffects(config?: AppConfig): AppEffects {
  return EffectsFactory.make(config);
}
