export type { TodoRecord, NewTodoRecord, TodoStore } from './types.js';
export { StorageError } from './errors.js';
export { StorageErrorCode } from './error-codes.js';
export {
    TODO_STORE_TYPES,
    TodoStoreConfigSchema,
    InMemoryTodoStoreSchema,
    SqliteTodoStoreSchema,
    type TodoStoreType,
    type TodoStoreConfig,
    type ValidatedTodoStoreConfig,
    type InMemoryTodoStoreConfig,
    type SqliteTodoStoreConfig,
} from './schemas.js';
