import { TodoManager, type Logger } from '@tasklane/core';
import { createSilentMockLogger } from '@tasklane/core/test-utils';
import { MemoryTodoStore } from '@tasklane/storage';
import { createTasklaneApp } from '../index.js';
import type { TasklaneApp } from '../types.js';

/**
 * In-process app over a connected memory store.
 * Requests go through app.request(); no socket is opened.
 */
export interface TestApp {
    app: TasklaneApp;
    store: MemoryTodoStore;
    manager: TodoManager;
    logger: Logger;
    cleanup: () => Promise<void>;
}

export async function createTestApp(logger: Logger = createSilentMockLogger()): Promise<TestApp> {
    const store = new MemoryTodoStore();
    await store.connect();
    const manager = new TodoManager(store, logger);
    const app = createTasklaneApp({ getTodoManager: () => manager, logger });

    return {
        app,
        store,
        manager,
        logger,
        cleanup: () => store.disconnect(),
    };
}

export function jsonRequest(method: string, body: unknown): RequestInit {
    return {
        method,
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
    };
}

export async function seedTodos(store: MemoryTodoStore, texts: string[]): Promise<void> {
    for (const text of texts) {
        await store.create({ text, is_completed: false });
    }
}
