import { cors } from 'hono/cors';
import type { MiddlewareHandler } from 'hono';

/**
 * CORS middleware that allows:
 * 1. All localhost/127.0.0.1 origins on any port (for local development)
 * 2. Origins listed in the server config (ALLOWED_ORIGINS)
 * 3. Server-to-server requests with no origin header
 *
 * Only real preflights (Origin plus Access-Control-Request-Method) are answered here;
 * any other OPTIONS request reaches the routes and gets their 405.
 */
export function createCorsMiddleware(allowedOrigins: string[] = []): MiddlewareHandler {
    const handler = cors({
        origin: (origin) => {
            // No origin header: omit CORS headers entirely
            if (!origin) {
                return null;
            }

            try {
                const hostname = new URL(origin).hostname;
                if (hostname === 'localhost' || hostname === '127.0.0.1' || hostname === '[::1]') {
                    return origin;
                }
            } catch {
                return null;
            }

            return allowedOrigins.includes(origin) ? origin : null;
        },
        allowMethods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
        allowHeaders: ['Content-Type', 'Authorization'],
        credentials: true,
    });

    return async (ctx, next) => {
        const isPreflight =
            ctx.req.header('Origin') !== undefined &&
            ctx.req.header('Access-Control-Request-Method') !== undefined;
        if (ctx.req.method === 'OPTIONS' && !isPreflight) {
            await next();
            return;
        }
        return handler(ctx, next);
    };
}
