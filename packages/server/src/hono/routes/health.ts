import { OpenAPIHono, createRoute, z } from '@hono/zod-openapi';

export function createHealthRouter() {
    const app = new OpenAPIHono();

    const route = createRoute({
        method: 'get',
        path: '/',
        tags: ['system'],
        responses: {
            200: {
                description: 'Server health',
                content: { 'text/plain': { schema: z.string().openapi({ example: 'OK' }) } },
            },
        },
    });
    app.openapi(route, (c) => c.text('OK'));

    return app;
}
