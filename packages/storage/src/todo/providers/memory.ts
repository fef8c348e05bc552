import type { InMemoryTodoStoreConfig } from '@tasklane/core';
import { MemoryTodoStore } from '../memory-todo-store.js';
import type { TodoStoreProvider } from './types.js';

/**
 * Provider for in-memory todo storage: no setup, nothing survives a restart.
 */
export const inMemoryTodoStoreProvider: TodoStoreProvider<'in-memory', InMemoryTodoStoreConfig> = {
    type: 'in-memory',
    create: (_config, _logger) => new MemoryTodoStore(),
    metadata: {
        displayName: 'In-Memory',
        description: 'Store todos in RAM (ephemeral, for testing and development)',
        persistent: false,
    },
};
