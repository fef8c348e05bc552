import type { Logger } from '@tasklane/core';

/**
 * Run `stop` once on SIGTERM/SIGINT, then exit.
 */
export function registerGracefulShutdown(stop: () => Promise<void>, logger: Logger): void {
    const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];
    let isShuttingDown = false;

    const performShutdown = async (signal: string, exitCode = 0) => {
        if (isShuttingDown) return;
        isShuttingDown = true;

        logger.info(`Received ${signal}, shutting down gracefully...`);
        try {
            await stop();
            process.exit(exitCode);
        } catch (error) {
            logger.error(
                `Shutdown error: ${error instanceof Error ? error.message : String(error)}`
            );
            process.exit(1);
        }
    };

    signals.forEach((signal) => {
        process.on(signal, () => void performShutdown(signal));
    });

    process.on('unhandledRejection', (reason) => {
        logger.error(`Unhandled rejection: ${String(reason)}`);
        void performShutdown('unhandledRejection', 1);
    });
}
