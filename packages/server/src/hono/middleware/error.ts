import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { ZodError } from 'zod';
import {
    ErrorType,
    TasklaneRuntimeError,
    TasklaneValidationError,
    toRuntimeError,
    type Logger,
} from '@tasklane/core';
import type { ErrorEnvelope } from '../schemas/responses.js';

export const GENERIC_ERROR_MESSAGE = 'An error has occurred. Please try again.';

type ErrorResponse = { message: string; status: 500 };

/**
 * What the client sees for each kind of failure.
 * Every kind collapses to the same envelope and status so callers can't tell
 * a missing record from bad input or a storage fault.
 */
export const ERROR_RESPONSE_TABLE: Record<ErrorType, ErrorResponse> = {
    [ErrorType.USER]: { message: GENERIC_ERROR_MESSAGE, status: 500 },
    [ErrorType.FORBIDDEN]: { message: GENERIC_ERROR_MESSAGE, status: 500 },
    [ErrorType.NOT_FOUND]: { message: GENERIC_ERROR_MESSAGE, status: 500 },
    [ErrorType.SYSTEM]: { message: GENERIC_ERROR_MESSAGE, status: 500 },
    [ErrorType.UNKNOWN]: { message: GENERIC_ERROR_MESSAGE, status: 500 },
};

/**
 * Classify any thrown value. Malformed JSON bodies surface from Hono as
 * HTTPException or SyntaxError and count as user errors.
 */
export function classifyError(err: unknown): ErrorType {
    if (err instanceof TasklaneRuntimeError || err instanceof TasklaneValidationError) {
        return err.type;
    }
    if (err instanceof ZodError || err instanceof HTTPException || err instanceof SyntaxError) {
        return ErrorType.USER;
    }
    return ErrorType.UNKNOWN;
}

export function mapErrorToResponse(err: unknown): ErrorResponse {
    return ERROR_RESPONSE_TABLE[classifyError(err)];
}

function describeError(err: unknown): Record<string, unknown> {
    if (err instanceof TasklaneValidationError) {
        return { issues: err.issues };
    }
    if (err instanceof TasklaneRuntimeError) {
        return err.toJSON();
    }
    return toRuntimeError(err).toJSON();
}

export function handleHonoError(ctx: Context, err: unknown, logger: Logger) {
    const type = classifyError(err);
    const { message, status } = ERROR_RESPONSE_TABLE[type];
    const details = {
        method: ctx.req.method,
        path: ctx.req.path,
        ...describeError(err),
    };

    if (type === ErrorType.SYSTEM || type === ErrorType.UNKNOWN) {
        if (err instanceof Error) {
            logger.trackException(err, details);
        } else {
            logger.error(`Unhandled error: ${String(err)}`, details);
        }
    } else {
        logger.warn(`Request failed (${type})`, details);
    }

    const body: ErrorEnvelope = { error: message };
    return ctx.json(body, status);
}
