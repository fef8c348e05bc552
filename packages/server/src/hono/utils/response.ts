import type { Context, Handler, MiddlewareHandler } from 'hono';

function rejectMethod(ctx: Context, allow: string): Response {
    ctx.header('Allow', allow);
    return ctx.body(null, 405);
}

/**
 * Handler answering 405 with the methods a path does support.
 * Registered after a path's real routes so it only sees the leftovers.
 */
export function methodNotAllowed(allowed: readonly string[]): Handler {
    const allow = allowed.join(', ');
    return (ctx) => rejectMethod(ctx, allow);
}

/**
 * Hono dispatches HEAD to the GET route, so a path whose GET exists needs this
 * ahead of its routes to keep HEAD out of the allowed set.
 */
export function rejectHead(allowed: readonly string[]): MiddlewareHandler {
    const allow = allowed.join(', ');
    return async (ctx, next) => {
        if (ctx.req.method === 'HEAD') {
            return rejectMethod(ctx, allow);
        }
        await next();
    };
}
