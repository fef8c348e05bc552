/**
 * Response schemas for OpenAPI documentation
 *
 * Reuses the domain schemas from @tasklane/core; only the envelopes are defined here.
 */

import { z } from '@hono/zod-openapi';
import { TodoSchema } from '@tasklane/core';

export { TodoSchema } from '@tasklane/core';

export const TodoResponseSchema = z
    .object({
        data: TodoSchema.describe('The created or updated todo'),
    })
    .strict()
    .describe('Single todo response');

export const TodoListResponseSchema = z
    .object({
        data: z.array(TodoSchema).describe('Todos ordered by ascending id'),
    })
    .strict()
    .describe('Todo list response');

export const ErrorEnvelopeSchema = z
    .object({
        error: z.string().openapi({ example: 'An error has occurred. Please try again.' }),
    })
    .strict()
    .describe('Generic failure payload; the cause is never exposed');

export type TodoResponse = z.output<typeof TodoResponseSchema>;
export type TodoListResponse = z.output<typeof TodoListResponseSchema>;
export type ErrorEnvelope = z.output<typeof ErrorEnvelopeSchema>;
