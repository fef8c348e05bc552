import type { Server } from 'node:http';
import {
    TodoManager,
    createLogger,
    createTokenCodec,
    type Logger,
    type TokenCodec,
    type ValidatedAppConfig,
} from '@tasklane/core';
import { createTodoStore } from '@tasklane/storage';
import { createTasklaneApp } from './index.js';
import { createNodeServer } from './node/index.js';
import type { TasklaneApp } from './types.js';

export type StartTasklaneServerOptions = {
    /** Logger to use instead of one built from `config.logger` */
    logger?: Logger;
};

export type StartTasklaneServerResult = {
    /** HTTP server instance */
    server: Server;
    /** Hono app instance */
    app: TasklaneApp;
    /** Port the server was asked to listen on */
    port: number;
    /** Codec built from `config.token`, when token settings are present */
    tokenCodec?: TokenCodec;
    /** Close the server, disconnect the store and flush the logger */
    stop: () => Promise<void>;
};

/**
 * Start a Tasklane server from validated configuration.
 *
 * 1. Builds the logger and the todo store, then connects the store
 * 2. Builds the token codec when the config carries token settings
 * 3. Creates the Hono app and serves it over node:http
 *
 * @example
 * ```typescript
 * const config = loadAppConfig(loadEnvironment());
 * const { stop } = await startTasklaneServer(config);
 * ```
 */
export async function startTasklaneServer(
    config: ValidatedAppConfig,
    options: StartTasklaneServerOptions = {}
): Promise<StartTasklaneServerResult> {
    const logger = options.logger ?? createLogger({ config: config.logger, service: 'tasklane' });
    const { port, hostname, allowedOrigins } = config.server;

    logger.info(`Initializing Tasklane server on ${hostname}:${port}...`);

    const store = createTodoStore(config.storage, logger);
    await store.connect();
    const todoManager = new TodoManager(store, logger);

    // Fails fast on a bad algorithm or empty secret
    const tokenCodec = config.token ? createTokenCodec(config.token, logger) : undefined;

    logger.debug('Creating Hono application...');
    const app = createTasklaneApp({
        getTodoManager: () => todoManager,
        logger,
        allowedOrigins,
    });

    logger.debug('Creating Node.js HTTP server...');
    const { server } = createNodeServer(app, { logger, port, hostname });

    return {
        server,
        app,
        port,
        ...(tokenCodec ? { tokenCodec } : {}),
        stop: async () => {
            logger.info('Stopping Tasklane server...');
            await new Promise<void>((resolve, reject) => {
                server.close((err) => (err ? reject(err) : resolve()));
            });
            await store.disconnect();
            logger.info('Server stopped');
            await logger.destroy();
        },
    };
}
