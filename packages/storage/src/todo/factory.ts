import type { Logger, TodoStore } from '@tasklane/core';
import { StorageError, TodoStoreConfigSchema } from '@tasklane/core';
import { inMemoryTodoStoreProvider, sqliteTodoStoreProvider } from './providers/index.js';

/**
 * Create a todo store from configuration.
 * The store is returned unconnected; call `connect()` before use.
 *
 * @example
 * ```typescript
 * const store = createTodoStore({ type: 'sqlite', path: './data/todos.db' }, logger);
 * await store.connect();
 * ```
 */
export function createTodoStore(config: unknown, logger: Logger): TodoStore {
    const parsed = TodoStoreConfigSchema.safeParse(config);
    if (!parsed.success) {
        throw StorageError.invalidConfig(parsed.error.message);
    }

    const validated = parsed.data;
    switch (validated.type) {
        case 'in-memory':
            logger.info(`Using ${inMemoryTodoStoreProvider.metadata.displayName} todo store`);
            return inMemoryTodoStoreProvider.create(validated, logger);
        case 'sqlite':
            logger.info(`Using ${sqliteTodoStoreProvider.metadata.displayName} todo store`);
            return sqliteTodoStoreProvider.create(validated, logger);
    }
}
