import type { SqliteTodoStoreConfig } from '@tasklane/core';
import { SqliteTodoStore } from '../sqlite-todo-store.js';
import type { TodoStoreProvider } from './types.js';

/**
 * Provider for SQLite todo storage.
 *
 * Features:
 * - Synchronous statements through better-sqlite3
 * - WAL mode for concurrent readers
 * - No external server required
 */
export const sqliteTodoStoreProvider: TodoStoreProvider<'sqlite', SqliteTodoStoreConfig> = {
    type: 'sqlite',
    create: (config, logger) => {
        logger.info(`Creating SQLite todo store: ${config.path}`);
        return new SqliteTodoStore(config, logger);
    },
    metadata: {
        displayName: 'SQLite',
        description: 'Local SQLite database for persistent storage',
        persistent: true,
    },
};
