/**
 * Structured Logging for the Transcript Relay
 *
 * Provides structured logging with consistent formatting, log levels,
 * and per-component contexts.
 *
 * Features:
 * - Structured JSON logging for log collectors
 * - Multiple log levels (debug, info, warn, error)
 * - Context-aware logging with timestamps and video identification
 * - Redaction of header-like secrets in metadata
 * - Environment-aware logging (human-readable in development)
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogContext = 'transcript_api' | 'timedtext' | 'transcript_service' | 'http' | 'system';

/**
 * Base log entry structure for consistent formatting
 */
export interface LogEntry {
    timestamp: string;
    level: LogLevel;
    context: LogContext;
    message: string;
    video_id?: string;
    duration_ms?: number;
    error?: string;
    metadata?: Record<string, unknown>;
}

/**
 * Configuration for the logging system
 */
export interface LoggerConfig {
    minLevel: LogLevel;
    enableConsoleLogging: boolean;
    enableStructuredLogging: boolean;
    enableTimestamps: boolean;
    redactSensitiveData: boolean;
}

/**
 * Log level priorities for filtering
 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3
};

function isLogLevel(value: string | undefined): value is LogLevel {
    return value !== undefined && value in LOG_LEVEL_PRIORITY;
}

/**
 * Resolve the minimum level from the environment
 *
 * An unset or unknown LOG_LEVEL falls back to 'warn' in test mode,
 * 'debug' in development and 'info' otherwise.
 */
function resolveMinLevel(): LogLevel {
    const fromEnv = process.env.LOG_LEVEL;
    if (isLogLevel(fromEnv)) {
        return fromEnv;
    }
    if (process.env.NODE_ENV === 'test') return 'warn';
    return process.env.NODE_ENV === 'development' ? 'debug' : 'info';
}

/**
 * Default logger configuration with environment-aware settings
 */
function defaultLoggerConfig(): LoggerConfig {
    return {
        minLevel: resolveMinLevel(),
        enableConsoleLogging: true,
        enableStructuredLogging: process.env.NODE_ENV !== 'development', // JSON logs in production
        enableTimestamps: true,
        redactSensitiveData: process.env.NODE_ENV !== 'development'
    };
}

/**
 * Sensitive data patterns to redact from logs
 */
const SENSITIVE_PATTERNS = [
    /api_key/i,
    /authorization/i,
    /cookie/i,
    /password/i,
    /secret/i,
    /token/i
];

/**
 * Redact sensitive keys from log metadata, recursing into nested objects
 */
export function redactSensitiveData(data: Record<string, unknown>): Record<string, unknown> {
    const redacted: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(data)) {
        if (SENSITIVE_PATTERNS.some(pattern => pattern.test(key))) {
            redacted[key] = '[REDACTED]';
        } else if (Array.isArray(value)) {
            redacted[key] = value.map(item => isPlainRecord(item) ? redactSensitiveData(item) : item);
        } else if (isPlainRecord(value)) {
            redacted[key] = redactSensitiveData(value);
        } else {
            redacted[key] = value;
        }
    }

    return redacted;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Core logger class
 */
export class Logger {
    private config: LoggerConfig;

    constructor(config: Partial<LoggerConfig> = {}) {
        this.config = { ...defaultLoggerConfig(), ...config };
    }

    private shouldLog(level: LogLevel): boolean {
        return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.config.minLevel];
    }

    private createLogEntry(
        level: LogLevel,
        context: LogContext,
        message: string,
        additional: Partial<LogEntry> = {}
    ): LogEntry {
        const entry: LogEntry = {
            ...additional,
            timestamp: new Date().toISOString(),
            level,
            context,
            message
        };

        if (this.config.redactSensitiveData && entry.metadata) {
            entry.metadata = redactSensitiveData(entry.metadata);
        }

        return entry;
    }

    /**
     * Output a log entry to console with proper formatting
     */
    private outputLog(entry: LogEntry): void {
        if (!this.shouldLog(entry.level) || !this.config.enableConsoleLogging) {
            return;
        }

        const logFunction = this.getConsoleFunction(entry.level);

        if (this.config.enableStructuredLogging) {
            logFunction(JSON.stringify(entry));
            return;
        }

        // Human-readable logging for development
        const timestamp = this.config.enableTimestamps ? `[${entry.timestamp}] ` : '';
        const contextPrefix = `[${entry.context.toUpperCase()}]`;
        const videoSuffix = entry.video_id ? ` [Video: ${entry.video_id}]` : '';
        const durationSuffix = entry.duration_ms !== undefined ? ` (${entry.duration_ms}ms)` : '';
        const errorSuffix = entry.error ? ` - ${entry.error}` : '';

        const line = `${timestamp}${contextPrefix}${videoSuffix} ${entry.message}${durationSuffix}${errorSuffix}`;

        if (entry.metadata) {
            logFunction(line, entry.metadata);
        } else {
            logFunction(line);
        }
    }

    private getConsoleFunction(level: LogLevel): (...args: unknown[]) => void {
        switch (level) {
            case 'debug':
                return console.debug;
            case 'info':
                return console.log;
            case 'warn':
                return console.warn;
            case 'error':
                return console.error;
        }
    }

    debug(context: LogContext, message: string, additional: Partial<LogEntry> = {}): void {
        this.outputLog(this.createLogEntry('debug', context, message, additional));
    }

    info(context: LogContext, message: string, additional: Partial<LogEntry> = {}): void {
        this.outputLog(this.createLogEntry('info', context, message, additional));
    }

    warn(context: LogContext, message: string, additional: Partial<LogEntry> = {}): void {
        this.outputLog(this.createLogEntry('warn', context, message, additional));
    }

    error(context: LogContext, message: string, additional: Partial<LogEntry> = {}): void {
        this.outputLog(this.createLogEntry('error', context, message, additional));
    }
}

// Global logger instance
const globalLogger = new Logger();

/**
 * Quick logging functions for common use cases
 * Errors always carry their stack trace in metadata
 */
export const log = {
    error: (context: LogContext, message: string, error?: Error, metadata?: Record<string, unknown>) => {
        const logEntry: Partial<LogEntry> = {
            metadata: {
                ...metadata,
                stack_trace: error?.stack
            }
        };
        if (error?.message) {
            logEntry.error = error.message;
        }
        globalLogger.error(context, message, logEntry);
    }
};

// Export the global logger instance for direct use
export { globalLogger as logger };

/**
 * Create a new logger instance
 * @param config - Optional overrides on top of the environment defaults
 */
export function createLogger(config: Partial<LoggerConfig> = {}): Logger {
    return new Logger(config);
}
