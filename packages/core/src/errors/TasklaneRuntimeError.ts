import { ErrorScope, ErrorType } from './types.js';
import type { TasklaneErrorCode } from './types.js';

/**
 * Runtime error carrying a typed code, the domain that raised it and the kind of failure.
 * Thrown directly by services; the HTTP layer decides how (and whether) to expose it.
 */
export class TasklaneRuntimeError<C = unknown> extends Error {
    public readonly code: TasklaneErrorCode | string;
    public readonly scope: ErrorScope | string;
    public readonly type: ErrorType;
    public readonly context: C | undefined;

    constructor(
        code: TasklaneErrorCode | string,
        scope: ErrorScope | string,
        type: ErrorType,
        message: string,
        context?: C,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'TasklaneRuntimeError';
        this.code = code;
        this.scope = scope;
        this.type = type;
        this.context = context;
    }

    toJSON() {
        return {
            code: this.code,
            message: this.message,
            scope: this.scope,
            type: this.type,
            ...(this.context !== undefined ? { context: this.context } : {}),
        };
    }
}

/** Error thrown when something fails outside any known domain */
export function toRuntimeError(error: unknown): TasklaneRuntimeError {
    if (error instanceof TasklaneRuntimeError) {
        return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new TasklaneRuntimeError(
        'unknown_error',
        ErrorScope.API,
        ErrorType.UNKNOWN,
        message,
        undefined,
        { cause: error }
    );
}
