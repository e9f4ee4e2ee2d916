/**
 * Run-level failures. Everything local to one document or phrase is recorded
 * in the audit log instead of being thrown.
 */
export class ConfigurationError extends Error {
    readonly issues: string[];

    constructor(message: string, issues: string[] = []) {
        super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
        this.name = 'ConfigurationError';
        this.issues = issues;
    }
}

export class ExtractionTimeoutError extends Error {
    constructor(documentId: string, timeoutMs: number) {
        super(`Extraction for ${documentId} timed out after ${timeoutMs}ms`);
        this.name = 'ExtractionTimeoutError';
    }
}

export class CircuitOpenError extends Error {
    constructor() {
        super('Extraction circuit breaker is open - too many recent failures');
        this.name = 'CircuitOpenError';
    }
}
