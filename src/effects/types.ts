// ============================================================================
// Configuration
// ============================================================================

export const LOG_LEVELS = ['info', 'warn', 'silent'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

export type LoggingConfig = {
    readonly level: LogLevel;
}

export type AppConfig = {
    readonly logging: LoggingConfig;
}
