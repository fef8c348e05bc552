import { OpenAPIHono } from '@hono/zod-openapi';
import type { Logger, TodoManager } from '@tasklane/core';
import { createHealthRouter } from './routes/health.js';
import { createTodosRouter } from './routes/todos.js';
import { handleHonoError } from './middleware/error.js';
import { createCorsMiddleware } from './middleware/cors.js';
import { existsSync, readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

function readPackageVersion(): string {
    const packageJsonPath = join(__dirname, '../../package.json');
    if (!existsSync(packageJsonPath)) {
        return '0.0.0';
    }
    const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (typeof parsed === 'object' && parsed !== null && 'version' in parsed) {
        return String(parsed.version);
    }
    return '0.0.0';
}

export type CreateTasklaneAppOptions = {
    getTodoManager: () => TodoManager;
    logger: Logger;
    /** Origins allowed by CORS besides localhost */
    allowedOrigins?: string[];
};

export function createTasklaneApp(options: CreateTasklaneAppOptions) {
    const { getTodoManager, logger, allowedOrigins = [] } = options;
    const app = new OpenAPIHono({ strict: false });

    // Global CORS middleware for cross-origin requests (must be first)
    app.use('*', createCorsMiddleware(allowedOrigins));

    // Every failure ends up here and leaves as the generic envelope
    app.onError((err, ctx) => handleHonoError(ctx, err, logger));

    const fullApp = app
        .route('/health', createHealthRouter())
        .route('/', createTodosRouter(getTodoManager));

    fullApp.doc('/openapi.json', {
        openapi: '3.0.0',
        info: {
            title: 'Tasklane API',
            version: readPackageVersion(),
            description: 'OpenAPI document for the Tasklane todo service',
        },
        servers: [
            {
                url: 'http://localhost:{port}',
                description: 'Local development server',
                variables: {
                    port: {
                        default: '3000',
                        description: 'API server port',
                    },
                },
            },
        ],
        tags: [
            {
                name: 'system',
                description: 'System health endpoints',
            },
            {
                name: 'todos',
                description: 'Create, update and delete todos',
            },
        ],
    });

    return fullApp;
}
