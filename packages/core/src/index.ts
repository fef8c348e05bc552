/**
 * @tasklane/core - Main entry point
 *
 * Domain services, the token codec, configuration, errors and logging.
 * Storage adapters live in @tasklane/storage; HTTP wiring in @tasklane/server.
 */

// Configuration
export * from './config/index.js';

// Errors
export * from './errors/index.js';

// Logger
export * from './logger/index.js';

// Record store contract
export * from './storage/index.js';

// Todos
export * from './todo/index.js';

// Token codec
export * from './token/index.js';

// Utilities
export { ok, fail, hasErrors, zodToIssues, type Result } from './utils/result.js';
export { readBooleanEnv, readStringEnv, type EnvMap } from './utils/env.js';
