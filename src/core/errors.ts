export type ErrorDetails = Record<string, unknown>;

const RESPONSE_DETAIL_LIMIT = 500;

export function formatCliError(cmd: string, reason: string, hint?: string) {
    return [
        `[scrapinator ${cmd}]`,
        reason.trim(),
        hint ? `Hint: ${hint.trim()}` : ""
    ].filter(Boolean).join(" ");
}

/** Base class for everything that can go wrong while turning a request into a Task. */
export class TaskAnalysisError extends Error {
    readonly details: ErrorDetails;

    constructor(message: string, details: ErrorDetails = {}, options?: ErrorOptions) {
        super(message, options);
        this.name = "TaskAnalysisError";
        this.details = details;
    }
}

export class InvalidResponseFormatError extends TaskAnalysisError {
    readonly response: string | undefined;
    readonly expectedFormat: string | undefined;

    constructor(message: string, opts: { response?: string; expectedFormat?: string } = {}) {
        const details: ErrorDetails = {};
        if (opts.response !== undefined) {
            details.response = opts.response.slice(0, RESPONSE_DETAIL_LIMIT);
            details.responseLength = opts.response.length;
        }
        if (opts.expectedFormat !== undefined) {
            details.expectedFormat = opts.expectedFormat;
        }
        super(message, details);
        this.name = "InvalidResponseFormatError";
        this.response = opts.response;
        this.expectedFormat = opts.expectedFormat;
    }
}

function renderValue(value: unknown): string {
    if (typeof value === "string") return value;
    try {
        return JSON.stringify(value) ?? String(value);
    } catch {
        return String(value);
    }
}

export class ValidationError extends TaskAnalysisError {
    readonly field: string | undefined;
    readonly value: unknown;
    readonly expectedType: string | undefined;

    constructor(message: string, opts: { field?: string; value?: unknown; expectedType?: string } = {}) {
        const details: ErrorDetails = {};
        if (opts.field !== undefined) details.field = opts.field;
        if (opts.value !== undefined) details.value = renderValue(opts.value);
        if (opts.expectedType !== undefined) details.expectedType = opts.expectedType;
        super(message, details);
        this.name = "ValidationError";
        this.field = opts.field;
        this.value = opts.value;
        this.expectedType = opts.expectedType;
    }
}

export class LLMCommunicationError extends TaskAnalysisError {
    readonly originalError: unknown;
    readonly retryCount: number;

    constructor(message: string, opts: { originalError?: unknown; retryCount?: number } = {}) {
        const retryCount = opts.retryCount ?? 0;
        const details: ErrorDetails = { retryCount };
        if (opts.originalError !== undefined) {
            const original = opts.originalError;
            details.originalError = original instanceof Error ? original.message : String(original);
            details.errorType = original instanceof Error ? original.name : typeof original;
        }
        super(message, details, opts.originalError instanceof Error ? { cause: opts.originalError } : undefined);
        this.name = "LLMCommunicationError";
        this.originalError = opts.originalError;
        this.retryCount = retryCount;
    }
}

export class RateLimitError extends LLMCommunicationError {
    readonly retryAfter: number | undefined;

    constructor(message: string, opts: { retryAfter?: number; retryCount?: number; originalError?: unknown } = {}) {
        super(message, opts);
        this.name = "RateLimitError";
        if (opts.retryAfter !== undefined) {
            this.details.retryAfter = opts.retryAfter;
        }
        this.retryAfter = opts.retryAfter;
    }
}

export class ContextLengthExceededError extends TaskAnalysisError {
    readonly promptLength: number | undefined;
    readonly maxLength: number | undefined;

    constructor(message: string, opts: { promptLength?: number; maxLength?: number } = {}) {
        const details: ErrorDetails = {};
        if (opts.promptLength !== undefined) details.promptLength = opts.promptLength;
        if (opts.maxLength !== undefined) details.maxLength = opts.maxLength;
        if (opts.promptLength && opts.maxLength) {
            details.excessLength = opts.promptLength - opts.maxLength;
        }
        super(message, details);
        this.name = "ContextLengthExceededError";
        this.promptLength = opts.promptLength;
        this.maxLength = opts.maxLength;
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
