// src/core/logging/Logger.ts

/**
 * Structured Logger Service
 *
 * Centralizes logging to ensure:
 * 1. Structured output (timestamps, levels, modules)
 * 2. Secret redaction (step failure reasons often echo downstream responses)
 * 3. Configurable verbosity
 */

import { ENV } from '../../config/env';
import { SagaError } from '../errors/SagaError';

export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
    SILENT = 4,
}

const LEVEL_BY_NAME: Record<NonNullable<typeof ENV.LOG_LEVEL>, LogLevel> = {
    debug: LogLevel.DEBUG,
    info: LogLevel.INFO,
    warn: LogLevel.WARN,
    error: LogLevel.ERROR,
    silent: LogLevel.SILENT,
};

function initialLevel(): LogLevel {
    if (ENV.LOG_LEVEL) {
        return LEVEL_BY_NAME[ENV.LOG_LEVEL];
    }
    return ENV.NODE_ENV === 'production' ? LogLevel.INFO : LogLevel.DEBUG;
}

export class Logger {
    private static currentLevel: LogLevel = initialLevel();

    /**
     * API keys (sk-...) and bearer tokens.
     */
    private static SECRET_REGEX = /sk-[a-zA-Z0-9_\-]{20,}|Bearer\s+[a-zA-Z0-9._\-]+/g;

    public static setLevel(level: LogLevel): void {
        this.currentLevel = level;
    }

    public static getLevel(): LogLevel {
        return this.currentLevel;
    }

    public static redact(message: string): string {
        return message.replace(this.SECRET_REGEX, '[REDACTED]');
    }

    private static stringify(value: unknown): string {
        if (typeof value === 'string') {
            return value;
        }
        try {
            return JSON.stringify(value);
        } catch (e) {
            return String(value); // Circular reference or BigInt
        }
    }

    public static formatMessage(level: string, module: string, message: string, context?: unknown): string {
        const timestamp = new Date().toISOString();
        let log = `[${timestamp}] [${level}] [${module}] ${this.redact(message)}`;

        if (context !== undefined) {
            log += ` ${this.redact(this.stringify(context))}`;
        }

        return log;
    }

    public static debug(module: string, message: string, context?: unknown): void {
        if (this.currentLevel <= LogLevel.DEBUG) {
            console.error(this.formatMessage('DEBUG', module, message, context));
        }
    }

    public static info(module: string, message: string, context?: unknown): void {
        if (this.currentLevel <= LogLevel.INFO) {
            console.error(this.formatMessage('INFO', module, message, context));
        }
    }

    public static warn(module: string, message: string, context?: unknown): void {
        if (this.currentLevel <= LogLevel.WARN) {
            console.error(this.formatMessage('WARN', module, message, context));
        }
    }

    public static error(module: string, message: string, error?: unknown): void {
        if (this.currentLevel <= LogLevel.ERROR) {
            let errorDetails = '';
            if (error instanceof SagaError) {
                errorDetails = ` Details: ${this.redact(this.stringify(error.toJSON()))} Stack: ${this.redact(error.stack ?? error.message)}`;
            } else if (error instanceof Error) {
                errorDetails = ` Stack: ${this.redact(error.stack ?? error.message)}`;
            } else if (error !== undefined) {
                errorDetails = ` Details: ${this.redact(this.stringify(error))}`;
            }

            console.error(this.formatMessage('ERROR', module, message) + errorDetails);
        }
    }
}
