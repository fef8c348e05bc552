import { describe, it, expect } from 'vitest';
import { HTTPException } from 'hono/http-exception';
import { z } from 'zod';
import { ErrorType, StorageError, TodoError, TokenError } from '@tasklane/core';
import { ERROR_RESPONSE_TABLE, classifyError, mapErrorToResponse } from './error.js';

describe('classifyError', () => {
    it('uses the type carried by domain errors', () => {
        expect(classifyError(TodoError.notFound(7))).toBe(ErrorType.NOT_FOUND);
        expect(classifyError(StorageError.readFailed('listAll', new Error('x')))).toBe(
            ErrorType.SYSTEM
        );
        expect(classifyError(TokenError.malformed(new Error('bad')))).toBe(ErrorType.FORBIDDEN);
    });

    it('treats validation and malformed-body failures as user errors', () => {
        const zodError = z.object({ text: z.string() }).safeParse({}).error;

        expect(classifyError(zodError)).toBe(ErrorType.USER);
        expect(classifyError(new HTTPException(400, { message: 'Malformed JSON' }))).toBe(
            ErrorType.USER
        );
        expect(classifyError(new SyntaxError('Unexpected end of JSON input'))).toBe(
            ErrorType.USER
        );
    });

    it('falls back to unknown', () => {
        expect(classifyError(new Error('boom'))).toBe(ErrorType.UNKNOWN);
        expect(classifyError('not even an error')).toBe(ErrorType.UNKNOWN);
    });
});

describe('ERROR_RESPONSE_TABLE', () => {
    it('collapses every error type to the generic 500', () => {
        for (const type of Object.values(ErrorType)) {
            expect(ERROR_RESPONSE_TABLE[type]).toEqual({
                message: 'An error has occurred. Please try again.',
                status: 500,
            });
        }
    });

    it('maps not-found to 500', () => {
        expect(mapErrorToResponse(TodoError.notFound(3)).status).toBe(500);
    });
});
