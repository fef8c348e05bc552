/**
 * Logger Factory
 *
 * Bridges validated logger configuration and the TasklaneLogger implementation.
 */

import type { ValidatedLoggerConfig } from './schemas.js';
import type { Logger } from './types.js';
import { TasklaneLogComponent } from './types.js';
import { TasklaneLogger } from './tasklane-logger.js';
import { createTransport } from './transport-factory.js';

export interface CreateLoggerOptions {
    config: ValidatedLoggerConfig;
    /** Service name stamped on every entry */
    service: string;
    /** Component identifier (defaults to SERVER) */
    component?: TasklaneLogComponent;
}

/**
 * @example
 * ```typescript
 * const logger = createLogger({
 *   config: appConfig.logger,
 *   service: 'tasklane',
 * });
 *
 * logger.info('Server started');
 * ```
 */
export function createLogger(options: CreateLoggerOptions): Logger {
    const { config, service, component = TasklaneLogComponent.SERVER } = options;

    return new TasklaneLogger({
        level: config.level,
        component,
        service,
        transports: config.transports.map(createTransport),
    });
}
