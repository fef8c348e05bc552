import { z } from 'zod';

export const TodoIdSchema = z.number().int().positive().describe('Store-assigned identifier');

/**
 * Wire shape of a todo
 */
export const TodoSchema = z
    .object({
        id: TodoIdSchema,
        text: z.string().describe('Todo text'),
        isCompleted: z.boolean().describe('Whether the todo is done'),
    })
    .strict()
    .describe('Todo item');

/**
 * Input for creating a todo. Only `text` is accepted; new todos always start
 * uncompleted, so any completion flag in the body is stripped.
 */
export const CreateTodoInputSchema = z
    .object({
        text: z.string({ required_error: 'Todo text is required' }).describe('Todo text'),
    })
    .strip()
    .describe('Input for creating a new todo');

/**
 * Partial update. Absent fields are left unchanged.
 */
export const UpdateTodoInputSchema = z
    .object({
        text: z.string().optional().describe('Updated text'),
        isCompleted: z.boolean().optional().describe('Updated completion flag'),
    })
    .strip()
    .describe('Input for updating an existing todo');

export type ValidatedTodo = z.output<typeof TodoSchema>;
export type ValidatedCreateTodoInput = z.output<typeof CreateTodoInputSchema>;
export type ValidatedUpdateTodoInput = z.output<typeof UpdateTodoInputSchema>;
