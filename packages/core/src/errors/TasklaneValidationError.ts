import type { Issue } from './types.js';
import { ErrorType } from './types.js';

/**
 * Validation error aggregating one or more issues.
 * The first error-severity issue provides the message, code, scope and type.
 */
export class TasklaneValidationError extends Error {
    public readonly issues: Issue[];

    constructor(issues: Issue[]) {
        const primary = issues.find((i) => i.severity === 'error') ?? issues[0];
        super(primary?.message ?? 'Validation failed');
        this.name = 'TasklaneValidationError';
        this.issues = issues;
    }

    get errors(): Issue[] {
        return this.issues.filter((i) => i.severity === 'error');
    }

    get warnings(): Issue[] {
        return this.issues.filter((i) => i.severity === 'warning');
    }

    get type(): ErrorType {
        return this.errors[0]?.type ?? ErrorType.USER;
    }

    toJSON() {
        return {
            message: this.message,
            issues: this.issues,
        };
    }
}
