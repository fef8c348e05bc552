import type { ZodError, ZodIssue } from 'zod';
import { ErrorScope, ErrorType } from '../errors/types.js';
import type { Issue, Severity } from '../errors/types.js';

/**
 * Result of a validation flow. Issues travel with successful results too,
 * so warnings are never lost.
 */
export type Result<T, C = unknown> =
    | { ok: true; data: T; issues: Issue<C>[] }
    | { ok: false; issues: Issue<C>[] };

export const ok = <T, C = unknown>(data: T, issues: Issue<C>[] = []): Result<T, C> => ({
    ok: true,
    data,
    issues,
});

export const fail = <T, C = unknown>(issues: Issue<C>[]): Result<T, C> => ({
    ok: false,
    issues,
});

export function hasErrors<C>(issues: Issue<C>[]): boolean {
    return issues.some((i) => i.severity === 'error');
}

/**
 * Convert a ZodError into issues.
 * Union errors are flattened so every failing branch is reported.
 */
export function zodToIssues<C = unknown>(
    err: ZodError,
    severity: Severity = 'error',
    scope: ErrorScope | string = ErrorScope.CONFIG
): Issue<C>[] {
    const issues: Issue<C>[] = [];

    const collect = (zodIssues: ZodIssue[]) => {
        for (const issue of zodIssues) {
            if (issue.code === 'invalid_union') {
                for (const unionError of issue.unionErrors) {
                    collect(unionError.issues);
                }
                continue;
            }
            issues.push({
                code: 'schema_validation',
                message: issue.message,
                scope,
                type: ErrorType.USER,
                severity,
                path: issue.path,
            });
        }
    };

    collect(err.issues);
    return issues;
}
