export { createTasklaneApp } from './hono/index.js';
export type { CreateTasklaneAppOptions } from './hono/index.js';
export type { TasklaneApp } from './hono/types.js';
export { createNodeServer } from './hono/node/index.js';
export type { NodeBridgeOptions, NodeBridgeResult } from './hono/node/index.js';
export { startTasklaneServer } from './hono/start-server.js';
export type {
    StartTasklaneServerOptions,
    StartTasklaneServerResult,
} from './hono/start-server.js';
export {
    ERROR_RESPONSE_TABLE,
    GENERIC_ERROR_MESSAGE,
    classifyError,
    mapErrorToResponse,
} from './hono/middleware/error.js';
