/**
 * Logger Types and Interfaces
 */

/**
 * Log levels in order of severity
 * Following Winston convention: error < warn < info < debug < silly
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silly';

/**
 * Component identifiers for structured logging
 * Mirrors ErrorScope, with additional execution context components
 */
export enum TasklaneLogComponent {
    CONFIG = 'config',
    TODO = 'todo',
    STORAGE = 'storage',
    TOKEN = 'token',

    API = 'api',
    SERVER = 'server',
}

/**
 * Structured log entry
 * All logs are converted to this format before being sent to transports
 */
export interface LogEntry {
    level: LogLevel;
    message: string;
    /** ISO timestamp */
    timestamp: string;
    component: TasklaneLogComponent;
    /** Name of the service instance that produced the entry */
    service: string;
    context?: Record<string, unknown> | undefined;
}

export type Logger = {
    debug(message: string, context?: Record<string, unknown>): void;
    silly(message: string, context?: Record<string, unknown>): void;
    info(message: string, context?: Record<string, unknown>): void;
    warn(message: string, context?: Record<string, unknown>): void;
    error(message: string, context?: Record<string, unknown>): void;

    /**
     * Log an exception with its name and stack
     */
    trackException(error: Error, context?: Record<string, unknown>): void;

    /**
     * Create a child logger with a different component.
     * Shares transports and level with the parent.
     */
    createChild(component: TasklaneLogComponent): Logger;

    /**
     * Set the log level. Affects this logger and all loggers sharing its level.
     */
    setLevel(level: LogLevel): void;
    getLevel(): LogLevel;

    /**
     * Cleanup resources and close transports
     */
    destroy(): Promise<void>;
};

export type LoggerTransport = {
    write(entry: LogEntry): void | Promise<void>;
    destroy?(): void | Promise<void>;
};
