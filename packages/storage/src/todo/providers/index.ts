export { inMemoryTodoStoreProvider } from './memory.js';
export { sqliteTodoStoreProvider } from './sqlite.js';
export type { TodoStoreProvider } from './types.js';
