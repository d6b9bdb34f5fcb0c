/**
 * Raised when a smoke plan cannot be read, fails validation, or is asked for
 * something it does not define
 */
export class PlanError extends Error {
    readonly issues: string[];

    constructor(message: string, issues: string[] = []) {
        super(issues.length > 0 ? `${message}\n  - ${issues.join('\n  - ')}` : message);
        this.name = 'PlanError';
        this.issues = issues;
    }
}

/**
 * Raised for command-line arguments the runner does not accept
 */
export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UsageError';
    }
}
