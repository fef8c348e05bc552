import { TasklaneRuntimeError, TasklaneValidationError } from '../errors/index.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import type { Issue } from '../errors/types.js';
import { ConfigErrorCode } from './error-codes.js';

/**
 * Config error factory
 */
export class ConfigError {
    /**
     * Wraps schema issues; each keeps its path and message, the code marks it as a config failure
     */
    static invalid(issues: Issue[]): TasklaneValidationError {
        return new TasklaneValidationError(
            issues.map((issue) => ({
                ...issue,
                code: ConfigErrorCode.INVALID_CONFIG,
                message: issue.path?.length
                    ? `${issue.path.join('.')}: ${issue.message}`
                    : issue.message,
            }))
        );
    }

    static envFileReadError(filePath: string, cause: unknown): TasklaneRuntimeError {
        return new TasklaneRuntimeError(
            ConfigErrorCode.ENV_FILE_READ_ERROR,
            ErrorScope.CONFIG,
            ErrorType.SYSTEM,
            `Failed to read environment file: ${filePath}`,
            { path: filePath },
            { cause }
        );
    }
}
