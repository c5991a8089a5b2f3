import { config, parseLogLevel } from '../config/config';
import type { LogLevel } from '../config/config';

export type { LogLevel };

export type LoggerConfig = {
    level?: LogLevel;
    prefix?: string;
};

const LOG_LEVELS: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

/**
 * Logger class with support for isolated instances to prevent prefix/level conflicts
 * between different parts of the codebase.
 */
export class Logger {
    private static rootInstance: Logger | undefined;
    private readonly level: LogLevel;
    private readonly prefix: string;

    /**
     * Create a new Logger instance with isolated state
     */
    constructor(loggerConfig?: LoggerConfig) {
        this.level = loggerConfig?.level ?? parseLogLevel(process.env.LOG_LEVEL, config.logging.level);
        this.prefix = loggerConfig?.prefix ?? '';
    }

    /**
     * Get the global singleton root logger instance
     */
    public static getInstance(): Logger {
        if (!Logger.rootInstance) {
            Logger.rootInstance = new Logger();
        }
        return Logger.rootInstance;
    }

    /**
     * Create a new isolated logger instance. The level defaults to LOG_LEVEL
     * as it is at call time, so a test can raise or lower it per case.
     */
    public createLogger(loggerConfig?: LoggerConfig): Logger {
        return new Logger(loggerConfig);
    }

    private shouldLog(level: LogLevel): boolean {
        return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
    }

    private formatMessage(message: string): string {
        return this.prefix ? `[${this.prefix}] ${message}` : message;
    }

    public debug(message: string, ...args: unknown[]): void {
        if (this.shouldLog('debug')) {
            console.log(this.formatMessage(message), ...args);
        }
    }

    public info(message: string, ...args: unknown[]): void {
        if (this.shouldLog('info')) {
            console.log(this.formatMessage(message), ...args);
        }
    }

    public warn(message: string, ...args: unknown[]): void {
        if (this.shouldLog('warn')) {
            console.warn(this.formatMessage(message), ...args);
        }
    }

    public error(message: string, ...args: unknown[]): void {
        if (this.shouldLog('error')) {
            console.error(this.formatMessage(message), ...args);
        }
    }
}

// Export the root logger instance
export const logger = Logger.getInstance();
