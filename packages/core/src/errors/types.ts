import type { ConfigErrorCode } from '../config/error-codes.js';
import type { StorageErrorCode } from '../storage/error-codes.js';
import type { TodoErrorCode } from '../todo/error-codes.js';
import type { TokenErrorCode } from '../token/error-codes.js';

/**
 * Error scopes representing functional domains in the system
 * Each scope owns its validation and error logic
 */
export enum ErrorScope {
    CONFIG = 'config', // Environment parsing and config validation
    TODO = 'todo', // Todo record lifecycle and input validation
    STORAGE = 'storage', // Record store backend operations
    TOKEN = 'token', // Token signing and verification
    API = 'api', // HTTP boundary
}

/**
 * Error types describing the nature of a failure.
 * The HTTP layer decides which of these are surfaced and how.
 */
export enum ErrorType {
    USER = 'user', // bad input, config errors, validation failures
    FORBIDDEN = 'forbidden', // credential rejected
    NOT_FOUND = 'not_found', // record doesn't exist
    SYSTEM = 'system', // internal or storage failures
    UNKNOWN = 'unknown', // unclassified errors, fallback
}

/**
 * Union type for all error codes across domains
 */
export type TasklaneErrorCode = ConfigErrorCode | StorageErrorCode | TodoErrorCode | TokenErrorCode;

/** Severity of an issue */
export type Severity = 'error' | 'warning';

/** Generic issue type for validation results */
export interface Issue<C = unknown> {
    code: TasklaneErrorCode | string;
    message: string;
    scope: ErrorScope | string; // Domain that generated this issue
    type: ErrorType;
    severity: Severity;
    path?: Array<string | number>;
    context?: C;
}
