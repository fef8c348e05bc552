/**
 * Tasklane Logger
 *
 * Multi-transport logger with structured entries and component-based categorization.
 */

import type { Logger, LoggerTransport, LogEntry, LogLevel, TasklaneLogComponent } from './types.js';

export interface TasklaneLoggerConfig {
    level: LogLevel;
    component: TasklaneLogComponent;
    service: string;
    transports: LoggerTransport[];
}

/**
 * Level holder shared between a logger and its children,
 * so setLevel on any of them applies to the whole tree.
 */
type LevelRef = { current: LogLevel };

export class TasklaneLogger implements Logger {
    private levelRef: LevelRef;
    private component: TasklaneLogComponent;
    private service: string;
    private transports: LoggerTransport[];

    // Lower number = more severe
    private static readonly LEVELS: Record<LogLevel, number> = {
        error: 0,
        warn: 1,
        info: 2,
        debug: 3,
        silly: 4,
    };

    constructor(config: TasklaneLoggerConfig, levelRef?: LevelRef) {
        this.levelRef = levelRef ?? { current: config.level };
        this.component = config.component;
        this.service = config.service;
        this.transports = config.transports;
    }

    debug(message: string, context?: Record<string, unknown>): void {
        this.log('debug', message, context);
    }

    silly(message: string, context?: Record<string, unknown>): void {
        this.log('silly', message, context);
    }

    info(message: string, context?: Record<string, unknown>): void {
        this.log('info', message, context);
    }

    warn(message: string, context?: Record<string, unknown>): void {
        this.log('warn', message, context);
    }

    error(message: string, context?: Record<string, unknown>): void {
        this.log('error', message, context);
    }

    trackException(error: Error, context?: Record<string, unknown>): void {
        this.error(error.message, {
            ...context,
            errorName: error.name,
            errorStack: error.stack,
            errorType: error.constructor.name,
        });
    }

    createChild(component: TasklaneLogComponent): TasklaneLogger {
        return new TasklaneLogger(
            {
                level: this.levelRef.current,
                component,
                service: this.service,
                transports: this.transports,
            },
            this.levelRef
        );
    }

    setLevel(level: LogLevel): void {
        this.levelRef.current = level;
    }

    getLevel(): LogLevel {
        return this.levelRef.current;
    }

    async destroy(): Promise<void> {
        for (const transport of this.transports) {
            if (transport.destroy) {
                try {
                    await transport.destroy();
                } catch (error) {
                    console.error('Error destroying transport:', error);
                }
            }
        }
    }

    private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
        if (TasklaneLogger.LEVELS[level] > TasklaneLogger.LEVELS[this.levelRef.current]) {
            return;
        }

        const entry: LogEntry = {
            level,
            message,
            timestamp: new Date().toISOString(),
            component: this.component,
            service: this.service,
            context,
        };

        for (const transport of this.transports) {
            try {
                const result = transport.write(entry);
                if (result instanceof Promise) {
                    result.catch((error: unknown) => {
                        console.error('Logger transport error:', error);
                    });
                }
            } catch (error) {
                // A failing transport must not break the caller
                console.error('Logger transport error:', error);
            }
        }
    }
}
