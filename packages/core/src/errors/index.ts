export { ErrorScope, ErrorType } from './types.js';
export type { Issue, Severity, TasklaneErrorCode } from './types.js';
export { TasklaneRuntimeError, toRuntimeError } from './TasklaneRuntimeError.js';
export { TasklaneValidationError } from './TasklaneValidationError.js';
