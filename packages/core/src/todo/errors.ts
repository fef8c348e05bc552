import type { ZodError } from 'zod';
import { TasklaneRuntimeError, TasklaneValidationError } from '../errors/index.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { zodToIssues } from '../utils/result.js';
import { TodoErrorCode } from './error-codes.js';

/**
 * Todo error factory
 */
export class TodoError {
    static validationFailed(operation: string, error: ZodError): TasklaneValidationError {
        return new TasklaneValidationError(
            zodToIssues(error, 'error', ErrorScope.TODO).map((issue) => ({
                ...issue,
                code: TodoErrorCode.TODO_VALIDATION_FAILED,
                context: { operation },
            }))
        );
    }

    static invalidId(id: unknown): TasklaneRuntimeError {
        return new TasklaneRuntimeError(
            TodoErrorCode.TODO_INVALID_ID,
            ErrorScope.TODO,
            ErrorType.USER,
            `Invalid todo ID: ${String(id)}`,
            { id }
        );
    }

    static notFound(id: number): TasklaneRuntimeError {
        return new TasklaneRuntimeError(
            TodoErrorCode.TODO_NOT_FOUND,
            ErrorScope.TODO,
            ErrorType.NOT_FOUND,
            `Todo not found: ${id}`,
            { id }
        );
    }
}
