import { describe, test, expect } from 'vitest';
import { z } from 'zod';
import { zodToIssues, ok, fail, hasErrors } from './result.js';
import { ErrorScope, ErrorType } from '../errors/index.js';
import type { Issue } from '../errors/index.js';

// Helper to create test issues with less boilerplate
const makeIssue = (
    code: string,
    severity: 'error' | 'warning',
    message = `Test ${severity}`
): Issue => ({
    code,
    message,
    severity,
    scope: ErrorScope.CONFIG,
    type: ErrorType.USER,
});

describe('zodToIssues', () => {
    test('should convert a basic validation error', () => {
        const result = z.object({ name: z.string(), age: z.number() }).safeParse({
            name: 'Ada',
            age: 'invalid',
        });
        expect(result.success).toBe(false);

        if (!result.success) {
            const issues = zodToIssues(result.error);
            expect(issues).toEqual([
                {
                    code: 'schema_validation',
                    message: 'Expected number, received string',
                    path: ['age'],
                    severity: 'error',
                    scope: ErrorScope.CONFIG,
                    type: ErrorType.USER,
                },
            ]);
        }
    });

    test('should report every failing field', () => {
        const result = z.object({ port: z.number(), host: z.string() }).safeParse({});

        if (!result.success) {
            expect(zodToIssues(result.error).map((issue) => issue.path)).toEqual([
                ['port'],
                ['host'],
            ]);
        }
    });

    test('should flatten union errors', () => {
        const result = z.union([z.string(), z.number()]).safeParse(true);

        if (!result.success) {
            const issues = zodToIssues(result.error);
            expect(issues.map((issue) => issue.message)).toEqual([
                'Expected string, received boolean',
                'Expected number, received boolean',
            ]);
        }
    });

    test('should apply the requested severity and scope', () => {
        const result = z.string().safeParse(1);

        if (!result.success) {
            const [issue] = zodToIssues(result.error, 'warning', ErrorScope.TOKEN);
            expect(issue).toMatchObject({ severity: 'warning', scope: ErrorScope.TOKEN });
        }
    });
});

describe('ok / fail', () => {
    test('ok keeps data and warnings', () => {
        const warning = makeIssue('deprecated', 'warning');
        expect(ok(42, [warning])).toEqual({ ok: true, data: 42, issues: [warning] });
    });

    test('fail carries only issues', () => {
        const error = makeIssue('broken', 'error');
        expect(fail([error])).toEqual({ ok: false, issues: [error] });
    });
});

describe('hasErrors', () => {
    test('should ignore warnings', () => {
        expect(hasErrors([makeIssue('a', 'warning')])).toBe(false);
    });

    test('should detect errors among warnings', () => {
        expect(hasErrors([makeIssue('a', 'warning'), makeIssue('b', 'error')])).toBe(true);
    });

    test('should be false for no issues', () => {
        expect(hasErrors([])).toBe(false);
    });
});
