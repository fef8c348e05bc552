import { OpenAPIHono, createRoute, z } from '@hono/zod-openapi';
import { CreateTodoInputSchema, TodoError, UpdateTodoInputSchema } from '@tasklane/core';
import type { TodoManager } from '@tasklane/core';
import {
    ErrorEnvelopeSchema,
    TodoListResponseSchema,
    TodoResponseSchema,
} from '../schemas/responses.js';
import { methodNotAllowed, rejectHead } from '../utils/response.js';

export const COLLECTION_METHODS = ['GET', 'POST', 'DELETE'] as const;
export const ITEM_METHODS = ['PUT', 'DELETE'] as const;

const TodoIdParamSchema = z
    .object({
        // Digits only: Number() would also read 1.0, 1e0 and 0x1 as 1
        id: z
            .string()
            .regex(/^\d+$/, 'Todo id must be a positive integer')
            .pipe(z.coerce.number().int().positive())
            .openapi({ param: { name: 'id', in: 'path' }, example: '1' })
            .describe('Todo identifier'),
    })
    .describe('Path parameters for todo item endpoints');

const errorResponse = {
    description: 'Any failure; the cause is logged, never returned',
    content: { 'application/json': { schema: ErrorEnvelopeSchema } },
} as const;

export function createTodosRouter(getTodoManager: () => TodoManager) {
    const app = new OpenAPIHono({
        // Invalid params or bodies go through the app error handler like any other failure
        defaultHook: (result, ctx) => {
            if (!result.success) {
                throw TodoError.validationFailed(`${ctx.req.method} ${ctx.req.path}`, result.error);
            }
        },
    });

    app.use('/todo', rejectHead(COLLECTION_METHODS));

    const listRoute = createRoute({
        method: 'get',
        path: '/todo',
        summary: 'List Todos',
        description: 'Returns every todo in ascending id order',
        tags: ['todos'],
        responses: {
            200: {
                description: 'All todos',
                content: { 'application/json': { schema: TodoListResponseSchema } },
            },
            500: errorResponse,
        },
    });
    app.openapi(listRoute, async (ctx) => {
        const todos = await getTodoManager().list();
        return ctx.json({ data: todos }, 200);
    });

    const createTodoRoute = createRoute({
        method: 'post',
        path: '/todo',
        summary: 'Create Todo',
        description: 'Creates an uncompleted todo. A completion flag in the body is ignored',
        tags: ['todos'],
        request: {
            body: {
                required: true,
                content: { 'application/json': { schema: CreateTodoInputSchema } },
            },
        },
        responses: {
            200: {
                description: 'Todo created',
                content: { 'application/json': { schema: TodoResponseSchema } },
            },
            500: errorResponse,
        },
    });
    app.openapi(createTodoRoute, async (ctx) => {
        const input = ctx.req.valid('json');
        const todo = await getTodoManager().create(input);
        return ctx.json({ data: todo }, 200);
    });

    const deleteAllRoute = createRoute({
        method: 'delete',
        path: '/todo',
        summary: 'Delete All Todos',
        description: 'Permanently deletes every todo',
        tags: ['todos'],
        responses: {
            204: { description: 'All todos deleted' },
            500: errorResponse,
        },
    });
    app.openapi(deleteAllRoute, async (ctx) => {
        await getTodoManager().deleteAll();
        return ctx.body(null, 204);
    });

    const updateRoute = createRoute({
        method: 'put',
        path: '/todo/{id}',
        summary: 'Update Todo',
        description: 'Updates an existing todo. Only provided fields are changed',
        tags: ['todos'],
        request: {
            params: TodoIdParamSchema,
            body: {
                required: true,
                content: { 'application/json': { schema: UpdateTodoInputSchema } },
            },
        },
        responses: {
            200: {
                description: 'Todo updated',
                content: { 'application/json': { schema: TodoResponseSchema } },
            },
            500: errorResponse,
        },
    });
    app.openapi(updateRoute, async (ctx) => {
        const { id } = ctx.req.valid('param');
        const input = ctx.req.valid('json');
        const todo = await getTodoManager().update(id, input);
        return ctx.json({ data: todo }, 200);
    });

    const deleteRoute = createRoute({
        method: 'delete',
        path: '/todo/{id}',
        summary: 'Delete Todo',
        description: 'Permanently deletes a todo',
        tags: ['todos'],
        request: { params: TodoIdParamSchema },
        responses: {
            204: { description: 'Todo deleted' },
            500: errorResponse,
        },
    });
    app.openapi(deleteRoute, async (ctx) => {
        const { id } = ctx.req.valid('param');
        await getTodoManager().delete(id);
        return ctx.body(null, 204);
    });

    // Must come after the real routes so only unsupported methods reach them
    app.all('/todo', methodNotAllowed(COLLECTION_METHODS));
    app.all('/todo/:id', methodNotAllowed(ITEM_METHODS));

    return app;
}
