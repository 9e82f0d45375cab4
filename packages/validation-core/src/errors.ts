/**
 * @description Error types raised by the validation core. Both carry the individual issues so callers can surface them.
 * @groundcheck-scope utility
 * @groundcheck-module ValidationErrors
 * @groundcheck-risk: low - Misclassified errors change HTTP status codes, not scores.
 */

const formatIssues = (message: string, issues: string[]): string =>
    issues.length > 0 ? `${message}: ${issues.join('; ')}` : message;

/**
 * Raised when the answer or context bundle handed to the pipeline is missing
 * or malformed. No partial record is produced.
 */
export class ValidationInputError extends Error {
    readonly issues: string[];

    constructor(message: string, issues: string[] = []) {
        super(formatIssues(message, issues));
        this.name = 'ValidationInputError';
        this.issues = issues;
    }
}

/**
 * Raised when the validation configuration does not satisfy its schema.
 */
export class ConfigurationError extends Error {
    readonly issues: string[];

    constructor(message: string, issues: string[] = []) {
        super(formatIssues(message, issues));
        this.name = 'ConfigurationError';
        this.issues = issues;
    }
}
