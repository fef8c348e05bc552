import { TasklaneRuntimeError } from '../errors/index.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { TokenErrorCode } from './error-codes.js';

export type InvalidTokenReason = 'malformed' | 'algorithm_mismatch' | 'verification_failed';

/**
 * Token error factory.
 * Every decode failure carries TokenErrorCode.INVALID_TOKEN; `context.reason` tells them apart.
 */
export class TokenError {
    static malformed(cause: unknown): TasklaneRuntimeError<{ reason: InvalidTokenReason }> {
        return new TasklaneRuntimeError(
            TokenErrorCode.INVALID_TOKEN,
            ErrorScope.TOKEN,
            ErrorType.FORBIDDEN,
            'Invalid token: malformed',
            { reason: 'malformed' },
            { cause }
        );
    }

    static algorithmMismatch(
        received: string,
        expected: string
    ): TasklaneRuntimeError<{ reason: InvalidTokenReason; received: string; expected: string }> {
        return new TasklaneRuntimeError(
            TokenErrorCode.INVALID_TOKEN,
            ErrorScope.TOKEN,
            ErrorType.FORBIDDEN,
            `Invalid token: algorithm ${received} does not match ${expected}`,
            { reason: 'algorithm_mismatch', received, expected }
        );
    }

    static verificationFailed(cause: unknown): TasklaneRuntimeError<{ reason: InvalidTokenReason }> {
        const detail = cause instanceof Error ? cause.message : String(cause);
        return new TasklaneRuntimeError(
            TokenErrorCode.INVALID_TOKEN,
            ErrorScope.TOKEN,
            ErrorType.FORBIDDEN,
            `Invalid token: ${detail}`,
            { reason: 'verification_failed' },
            { cause }
        );
    }

    static invalidClaims(message: string): TasklaneRuntimeError {
        return new TasklaneRuntimeError(
            TokenErrorCode.INVALID_CLAIMS,
            ErrorScope.TOKEN,
            ErrorType.USER,
            `Invalid claims: ${message}`
        );
    }
}
