#!/usr/bin/env node
import {
    createLogger,
    loadAppConfig,
    loadEnvironment,
    TasklaneValidationError,
    type ValidatedAppConfig,
} from '@tasklane/core';
import { startTasklaneServer } from '../hono/start-server.js';
import { registerGracefulShutdown } from '../utils/graceful-shutdown.js';

function loadConfigOrExit(): ValidatedAppConfig {
    try {
        return loadAppConfig(loadEnvironment());
    } catch (error) {
        if (error instanceof TasklaneValidationError) {
            for (const issue of error.errors) {
                console.error(`config: ${issue.message}`);
            }
        } else {
            console.error(error instanceof Error ? error.message : String(error));
        }
        process.exit(1);
    }
}

async function main(): Promise<void> {
    const config = loadConfigOrExit();
    const logger = createLogger({ config: config.logger, service: 'tasklane' });
    const { stop } = await startTasklaneServer(config, { logger });
    registerGracefulShutdown(stop, logger);
}

main().catch((error: unknown) => {
    console.error(error instanceof Error ? (error.stack ?? error.message) : String(error));
    process.exit(1);
});
