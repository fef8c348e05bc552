import type { TodoRecord } from '../storage/types.js';

/**
 * Todo as exposed to clients
 */
export interface Todo {
    id: number;
    text: string;
    isCompleted: boolean;
}

export interface CreateTodoInput {
    text: string;
}

/**
 * Partial update. A field that is undefined is left as stored.
 */
export interface UpdateTodoInput {
    text?: string | undefined;
    isCompleted?: boolean | undefined;
}

/**
 * Project a stored record onto the wire shape
 */
export function toTodo(record: TodoRecord): Todo {
    return {
        id: record.id,
        text: record.text,
        isCompleted: record.is_completed,
    };
}
