export { TodoManager } from './manager.js';
export { toTodo } from './types.js';
export type { Todo, CreateTodoInput, UpdateTodoInput } from './types.js';
export {
    TodoSchema,
    TodoIdSchema,
    CreateTodoInputSchema,
    UpdateTodoInputSchema,
    type ValidatedTodo,
    type ValidatedCreateTodoInput,
    type ValidatedUpdateTodoInput,
} from './schemas.js';
export { TodoError } from './errors.js';
export { TodoErrorCode } from './error-codes.js';
