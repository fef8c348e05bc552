/**
 * @tasklane/storage
 *
 * Concrete record-store backends and their factory.
 * Core keeps only the `TodoStore` contract and its config schema.
 */

export { createTodoStore } from './todo/index.js';
export { MemoryTodoStore, SqliteTodoStore } from './todo/index.js';
export {
    inMemoryTodoStoreProvider,
    sqliteTodoStoreProvider,
    type TodoStoreProvider,
} from './todo/index.js';
