/**
 * Structured logger.
 *
 * Errors are categorized before they are logged so that a skipped item
 * always carries the reason it was skipped.
 */

import winston from 'winston';
import 'winston-daily-rotate-file';

export enum ErrorCategory {
    NETWORK = 'NETWORK',       // Timeout, DNS, connection refused, 5xx
    PARSING = 'PARSING',       // HTML/CSV/JSON parsing failures
    VALIDATION = 'VALIDATION', // Data validation failures (zod, malformed rows)
    AUTH = 'AUTH',             // API key invalid, rate limited
    STORAGE = 'STORAGE',       // SQLite failures
    LOGIC = 'LOGIC'            // Programmer error (bugs)
}

export interface LogContext {
    run_id?: string;
    company_number?: string;
    company_name?: string;
    url?: string;
    error?: Error;
    error_category?: ErrorCategory;
    duration_ms?: number;
    [key: string]: unknown;
}

export interface LoggerOptions {
    level: string;
    production: boolean;
    serviceName: string;
    logDir?: string;
}

const devFormat = winston.format.printf(({ level, message, timestamp, ...meta }) => {
    const brief = Object.fromEntries(
        Object.entries(meta).filter(([key, v]) => v !== undefined && key !== 'error_stack' && key !== 'service')
    );
    const suffix = Object.keys(brief).length > 0 ? ` ${JSON.stringify(brief)}` : '';
    const stack = typeof meta.error_stack === 'string' && (level.includes('error') || level.includes('fatal'))
        ? `\n${meta.error_stack}`
        : '';
    return `[${String(timestamp)}] [${level.toUpperCase()}] ${String(message)}${suffix}${stack}`;
});

function buildWinston(options: LoggerOptions): winston.Logger {
    const transports: winston.transport[] = [
        new winston.transports.Console({
            format: options.production
                ? winston.format.combine(winston.format.timestamp(), winston.format.json())
                : winston.format.combine(winston.format.timestamp(), devFormat),
        }),
    ];

    if (options.logDir) {
        transports.push(new winston.transports.DailyRotateFile({
            filename: `${options.logDir}/lead-radar-%DATE%.log`,
            datePattern: 'YYYY-MM-DD',
            zippedArchive: true,
            maxSize: '20m',
            maxFiles: '14d',
            format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
        }));
    }

    return winston.createLogger({
        level: options.level,
        levels: { fatal: 0, error: 1, warn: 2, info: 3, debug: 4 },
        defaultMeta: { service: options.serviceName },
        transports,
    });
}

export class Logger {
    private static instance: winston.Logger = buildWinston({
        level: process.env.LOG_LEVEL || 'info',
        production: process.env.NODE_ENV === 'production',
        serviceName: process.env.SERVICE_NAME || 'lead-radar',
    });

    /**
     * Rebuild transports once the application config is known.
     */
    static configure(options: LoggerOptions): void {
        this.instance = buildWinston(options);
    }

    static silence(silent = true): void {
        this.instance.silent = silent;
    }

    static debug(msg: string, context?: LogContext) {
        this.log('debug', msg, context);
    }

    static info(msg: string, context?: LogContext) {
        this.log('info', msg, context);
    }

    static warn(msg: string, context?: LogContext) {
        this.log('warn', msg, context);
    }

    static error(msg: string, context?: LogContext) {
        this.log('error', msg, context);
    }

    /**
     * Unrecoverable errors: configuration problems that abort the run.
     */
    static fatal(msg: string, context?: LogContext) {
        this.log('fatal', msg, context);
    }

    static categorizeError(error: Error): ErrorCategory {
        const msg = error.message.toLowerCase();

        if (msg.includes('timeout') || msg.includes('econnrefused') || msg.includes('enotfound') || msg.includes('socket') || /\b5\d\d\b/.test(msg)) {
            return ErrorCategory.NETWORK;
        }
        if (msg.includes('401') || msg.includes('403') || msg.includes('429') || msg.includes('api key') || msg.includes('rate limit')) {
            return ErrorCategory.AUTH;
        }
        if (msg.includes('parse') || msg.includes('unexpected token') || msg.includes('json') || msg.includes('csv')) {
            return ErrorCategory.PARSING;
        }
        if (msg.includes('validation') || msg.includes('zod') || msg.includes('invalid')) {
            return ErrorCategory.VALIDATION;
        }
        if (msg.includes('sqlite') || msg.includes('database')) {
            return ErrorCategory.STORAGE;
        }
        return ErrorCategory.LOGIC;
    }

    static logError(msg: string, error: Error, extraContext?: Partial<LogContext>) {
        this.error(msg, {
            ...extraContext,
            error,
            error_category: this.categorizeError(error),
        });
    }

    private static log(level: string, msg: string, context?: LogContext) {
        if (!context) {
            this.instance.log(level, msg);
            return;
        }
        const { error, ...rest } = context;
        const meta: Record<string, unknown> = error instanceof Error
            ? { ...rest, error_message: error.message, error_stack: error.stack }
            : rest;
        this.instance.log(level, msg, meta);
    }
}
