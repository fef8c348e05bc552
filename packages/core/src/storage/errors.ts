import { TasklaneRuntimeError, TasklaneValidationError } from '../errors/index.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { StorageErrorCode } from './error-codes.js';

function reasonOf(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Storage error factory. Every method creates an error with STORAGE scope;
 * the originating error is kept as `cause`.
 */
export class StorageError {
    static connectionFailed(reason: string, cause?: unknown) {
        return new TasklaneRuntimeError(
            StorageErrorCode.CONNECTION_FAILED,
            ErrorScope.STORAGE,
            ErrorType.SYSTEM,
            `Storage connection failed: ${reason}`,
            { reason },
            { cause }
        );
    }

    static notConnected(storeType: string) {
        return new TasklaneRuntimeError(
            StorageErrorCode.NOT_CONNECTED,
            ErrorScope.STORAGE,
            ErrorType.SYSTEM,
            `${storeType} store not connected`,
            { storeType }
        );
    }

    static readFailed(operation: string, error: unknown, details?: Record<string, unknown>) {
        const reason = reasonOf(error);
        return new TasklaneRuntimeError(
            StorageErrorCode.READ_FAILED,
            ErrorScope.STORAGE,
            ErrorType.SYSTEM,
            `Storage read failed for ${operation}: ${reason}`,
            { operation, reason, ...details },
            { cause: error }
        );
    }

    static writeFailed(operation: string, error: unknown, details?: Record<string, unknown>) {
        const reason = reasonOf(error);
        return new TasklaneRuntimeError(
            StorageErrorCode.WRITE_FAILED,
            ErrorScope.STORAGE,
            ErrorType.SYSTEM,
            `Storage write failed for ${operation}: ${reason}`,
            { operation, reason, ...details },
            { cause: error }
        );
    }

    static deleteFailed(operation: string, error: unknown, details?: Record<string, unknown>) {
        const reason = reasonOf(error);
        return new TasklaneRuntimeError(
            StorageErrorCode.DELETE_FAILED,
            ErrorScope.STORAGE,
            ErrorType.SYSTEM,
            `Storage delete failed for ${operation}: ${reason}`,
            { operation, reason, ...details },
            { cause: error }
        );
    }

    static migrationFailed(error: unknown, details?: Record<string, unknown>) {
        const reason = reasonOf(error);
        return new TasklaneRuntimeError(
            StorageErrorCode.MIGRATION_FAILED,
            ErrorScope.STORAGE,
            ErrorType.SYSTEM,
            `Database migration failed: ${reason}`,
            { reason, ...details },
            { cause: error }
        );
    }

    static invalidConfig(message: string, context?: Record<string, unknown>) {
        return new TasklaneValidationError([
            {
                code: StorageErrorCode.INVALID_CONFIG,
                message,
                scope: ErrorScope.STORAGE,
                type: ErrorType.USER,
                severity: 'error',
                context,
            },
        ]);
    }
}
