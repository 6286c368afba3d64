/**
 * Error taxonomy for pipeline runs.
 *
 * ConfigurationError and StoreAccessError are fatal; ScoringApiError is
 * scoped to a single batch. Bad input rows are not errors: they travel as
 * DataQualityIssue records.
 */

export type PipelineErrorCode =
    | 'CONFIGURATION'
    | 'STORE_ACCESS'
    | 'SCORING_API';

export class PipelineError extends Error {
    readonly code: PipelineErrorCode;

    constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

export class ConfigurationError extends PipelineError {
    readonly issues: string[];

    constructor(issues: string[]) {
        super('CONFIGURATION', `Invalid configuration: ${issues.join('; ')}`);
        this.issues = issues;
    }
}

export class StoreAccessError extends PipelineError {
    constructor(operation: string, cause: unknown) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super('STORE_ACCESS', `Store access failed during ${operation}: ${reason}`, { cause });
    }
}

export type ScoringFailureKind = 'transient' | 'permanent' | 'malformed';

export class ScoringApiError extends PipelineError {
    readonly kind: ScoringFailureKind;
    readonly status?: number;
    /** Seconds requested by a Retry-After header, if any */
    readonly retryAfterSeconds?: number;

    constructor(
        kind: ScoringFailureKind,
        message: string,
        details: { status?: number; retryAfterSeconds?: number; cause?: unknown } = {}
    ) {
        super('SCORING_API', message, { cause: details.cause });
        this.kind = kind;
        this.status = details.status;
        this.retryAfterSeconds = details.retryAfterSeconds;
    }

    get retryable(): boolean {
        return this.kind === 'transient';
    }
}

/**
 * Transient: 429 and 5xx. Everything else in 4xx is permanent.
 */
export const classifyHttpStatus = (status: number): ScoringFailureKind => {
    if (status === 429 || status >= 500) {
        return 'transient';
    }
    return 'permanent';
};

export const errorMessage = (error: unknown): string =>
    error instanceof Error ? error.message : String(error);
