export { createTodoStore } from './factory.js';
export { MemoryTodoStore } from './memory-todo-store.js';
export { SqliteTodoStore } from './sqlite-todo-store.js';
export {
    inMemoryTodoStoreProvider,
    sqliteTodoStoreProvider,
    type TodoStoreProvider,
} from './providers/index.js';
