import {
    ContextLengthExceededError,
    InvalidResponseFormatError,
    LLMCommunicationError,
    RateLimitError,
    TaskAnalysisError,
    ValidationError,
    errorMessage,
} from "./errors.js";
import { extractJsonFromText, isJsonObject, normalizeOptionalFields, type JsonObject } from "./json.js";
import { DEFAULT_PROVIDER, isLLMProvider, type LLMClient, type LLMProvider } from "./llm.js";
import { analyzerLogger } from "./logger.js";
import { getPromptConfig, renderTaskPrompt, type PromptConfig } from "./prompts.js";
import { withRetry } from "./retry.js";
import { createTask, type Task } from "../schemas/task.js";

export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_RETRY_DELAY_MS = 1_000;

const RESPONSE_PREVIEW_LENGTH = 200;
const REQUIRED_FIELDS = ["description", "objectives", "successCriteria"] as const;
const NON_EMPTY_LIST_FIELDS = ["objectives", "successCriteria"] as const;
const OPTIONAL_LIST_FIELDS = ["dataToExtract", "actionsToPerform"] as const;
const NULLABLE_FIELDS: ReadonlySet<string> = new Set(OPTIONAL_LIST_FIELDS);
const EXPECTED_FORMAT =
    "JSON object with description, objectives, successCriteria and optional dataToExtract, actionsToPerform, constraints, context";

const CONTEXT_LIMIT_PATTERN = /context.{0,20}length|token limit|too many tokens|prompt is too long|maximum context/i;
const RATE_LIMIT_PATTERN = /rate.?limit|too many requests/i;

export type AnalyzerOptions = {
    /** anthropic | openai | codex; anything else falls back to anthropic */
    provider?: string;
    /** "compact" swaps in the shorter prompt regardless of provider */
    preset?: "full" | "compact";
    /** 0 or null disables the timeout */
    timeoutMs?: number | null;
    maxAttempts?: number;
    retryDelayMs?: number;
};

export type AnalysisResult = {
    task: Task;
    prompt: string;
    response: string;
    attempts: number;
    elapsedMs: number;
    provider: LLMProvider;
};

class RequestTimeoutError extends Error {
    constructor(readonly timeoutMs: number) {
        super(`LLM request timed out after ${timeoutMs}ms`);
        this.name = "RequestTimeoutError";
    }
}

function isContextLimitMessage(message: string): boolean {
    return CONTEXT_LIMIT_PATTERN.test(message);
}

function statusOf(err: unknown): number | undefined {
    if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
        return err.status;
    }
    return undefined;
}

function retryAfterOf(err: unknown): number | undefined {
    if (typeof err !== "object" || err === null || !("headers" in err)) return undefined;
    const headers = err.headers;
    let raw: unknown;
    if (headers instanceof Headers) {
        raw = headers.get("retry-after");
    } else if (typeof headers === "object" && headers !== null && "retry-after" in headers) {
        raw = headers["retry-after"];
    }
    const seconds = typeof raw === "string" && raw.trim() !== "" ? Number(raw) : NaN;
    return Number.isFinite(seconds) ? seconds : undefined;
}

function isRateLimit(err: unknown): boolean {
    return statusOf(err) === 429 || RATE_LIMIT_PATTERN.test(errorMessage(err));
}

function preview(response: string): string {
    const head = response.slice(0, RESPONSE_PREVIEW_LENGTH);
    return response.length > RESPONSE_PREVIEW_LENGTH ? `${head}...` : head;
}

function describeType(value: unknown): string {
    if (value === null) return "null";
    if (Array.isArray(value)) return "list";
    return typeof value;
}

/**
 * Turns natural-language web automation requests into validated Tasks by
 * asking an LLM for a structured analysis.
 */
export class WebTaskAnalyzer {
    readonly provider: LLMProvider;
    readonly promptConfig: PromptConfig;
    readonly timeoutMs: number | null;
    readonly maxAttempts: number;
    readonly retryDelayMs: number;

    constructor(private readonly llm: LLMClient, options: AnalyzerOptions = {}) {
        const requested = options.provider ?? DEFAULT_PROVIDER;
        if (isLLMProvider(requested)) {
            this.provider = requested;
        } else {
            analyzerLogger.warn({ provider: requested }, `unknown provider, falling back to ${DEFAULT_PROVIDER}`);
            this.provider = DEFAULT_PROVIDER;
        }
        this.promptConfig = getPromptConfig(options.preset === "compact" ? "compact" : this.provider);
        const timeout = options.timeoutMs === undefined ? DEFAULT_TIMEOUT_MS : options.timeoutMs;
        this.timeoutMs = timeout && timeout > 0 ? timeout : null;
        this.maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
        this.retryDelayMs = Math.max(0, options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS);
    }

    async analyzeTask(taskDescription: string, url: string): Promise<Task> {
        const { task } = await this.analyzeTaskDetailed(taskDescription, url);
        return task;
    }

    async analyzeTaskDetailed(taskDescription: string, url: string): Promise<AnalysisResult> {
        const prompt = this.buildAnalysisPrompt(taskDescription, url);
        analyzerLogger.debug({ prompt }, "sending prompt to LLM");
        const started = Date.now();

        let attempts = 0;
        let response: string;
        try {
            response = await withRetry(
                (attempt) => {
                    attempts = attempt;
                    return this.completeOnce(prompt);
                },
                {
                    maxAttempts: this.maxAttempts,
                    initialDelayMs: this.retryDelayMs,
                    shouldRetry: (err) => this.isRetryableError(err),
                    onRetry: ({ error, attempt, delayMs }) =>
                        analyzerLogger.warn({ attempt, delayMs, err: errorMessage(error) }, "LLM call failed, retrying"),
                }
            );
        } catch (err) {
            const mapped = this.toAnalysisError(err, attempts, prompt.length);
            analyzerLogger.error({ err: mapped.message, attempts }, "failed to analyze task");
            throw mapped;
        }
        analyzerLogger.debug({ response }, "received LLM response");

        let task: Task;
        try {
            task = this.parseLLMResponse(response);
        } catch (err) {
            if (err instanceof TaskAnalysisError) {
                analyzerLogger.error({ err: err.message }, "LLM response rejected");
                throw err;
            }
            const message = errorMessage(err);
            if (isContextLimitMessage(message)) {
                throw new ContextLengthExceededError("Prompt exceeds LLM context length limit", {
                    promptLength: prompt.length,
                });
            }
            throw new InvalidResponseFormatError(`Could not parse LLM response: ${message}`, {
                response,
                expectedFormat: EXPECTED_FORMAT,
            });
        }

        return {
            task,
            prompt,
            response,
            attempts,
            elapsedMs: Date.now() - started,
            provider: this.provider,
        };
    }

    buildAnalysisPrompt(taskDescription: string, url: string): string {
        return renderTaskPrompt(this.promptConfig.prompt, { url, taskDescription });
    }

    /** Validation and format problems, and context overflows, never succeed on retry. */
    isRetryableError(err: unknown): boolean {
        if (
            err instanceof InvalidResponseFormatError ||
            err instanceof ValidationError ||
            err instanceof ContextLengthExceededError ||
            err instanceof SyntaxError
        ) {
            return false;
        }
        return !isContextLimitMessage(errorMessage(err));
    }

    /** Extracts, checks and normalizes the JSON payload of an LLM response. */
    parseLLMResponse(response: string): Task {
        const data = extractJsonFromText(response);
        if (!data) {
            throw new InvalidResponseFormatError(
                "No valid JSON object found in LLM response. " +
                    `Expected a JSON object with task analysis, but received: ${preview(response)}`,
                { response, expectedFormat: EXPECTED_FORMAT }
            );
        }

        const missing = REQUIRED_FIELDS.filter((field) => !(field in data));
        if (missing.length > 0) {
            throw new ValidationError(
                `Missing required fields: ${missing.join(", ")}. ` +
                    `Expected all of: ${REQUIRED_FIELDS.join(", ")}. ` +
                    `Received fields: ${Object.keys(data).join(", ")}`,
                { field: missing[0], expectedType: "present" }
            );
        }

        if (typeof data.description !== "string") {
            throw new ValidationError("Field 'description' must be a string", {
                field: "description",
                value: data.description,
                expectedType: "string",
            });
        }

        normalizeOptionalFields(data, OPTIONAL_LIST_FIELDS);
        if (data.constraints === undefined || data.constraints === null) data.constraints = [];
        if (data.context === undefined || data.context === null) data.context = {};

        for (const field of ["objectives", "successCriteria", "constraints", ...OPTIONAL_LIST_FIELDS]) {
            this.checkStringList(data, field);
        }

        for (const field of NON_EMPTY_LIST_FIELDS) {
            const value = data[field];
            if (Array.isArray(value) && value.length === 0) {
                throw new ValidationError(`Field '${field}' must contain at least one item. Received: []`, {
                    field,
                    value,
                    expectedType: "non-empty list",
                });
            }
        }

        if (!isJsonObject(data.context)) {
            throw new ValidationError(`Field 'context' must be an object, received ${describeType(data.context)}`, {
                field: "context",
                value: data.context,
                expectedType: "object",
            });
        }

        return createTask(data);
    }

    private checkStringList(data: JsonObject, field: string): void {
        const value = data[field];
        if (value === null && NULLABLE_FIELDS.has(field)) return;
        if (!Array.isArray(value)) {
            throw new ValidationError(`Field '${field}' must be a list, received ${describeType(value)}`, {
                field,
                value,
                expectedType: "list of strings",
            });
        }
        const bad = value.findIndex((item) => typeof item !== "string");
        if (bad !== -1) {
            throw new ValidationError(`Item ${bad} in field '${field}' must be a string`, {
                field: `${field}[${bad}]`,
                value: value[bad],
                expectedType: "string",
            });
        }
    }

    private async completeOnce(prompt: string): Promise<string> {
        const config = this.promptConfig;
        const base = {
            systemMessage: config.systemMessage,
            temperature: config.temperature,
            maxTokens: config.maxTokens,
        };
        const timeoutMs = this.timeoutMs;
        if (timeoutMs === null) {
            return this.llm.complete(prompt, base);
        }

        const controller = new AbortController();
        let timer: NodeJS.Timeout | undefined;
        const timeout = new Promise<never>((_, reject) => {
            timer = setTimeout(() => {
                // reject before aborting so the race settles with the timeout
                reject(new RequestTimeoutError(timeoutMs));
                controller.abort();
            }, timeoutMs);
        });
        try {
            return await Promise.race([this.llm.complete(prompt, { ...base, signal: controller.signal }), timeout]);
        } finally {
            clearTimeout(timer);
        }
    }

    private toAnalysisError(err: unknown, attempts: number, promptLength: number): TaskAnalysisError {
        if (err instanceof TaskAnalysisError) return err;
        if (err instanceof RequestTimeoutError) {
            return new LLMCommunicationError(err.message, { originalError: err, retryCount: attempts });
        }
        const message = errorMessage(err);
        if (isContextLimitMessage(message)) {
            return new ContextLengthExceededError("Prompt exceeds LLM context length limit", { promptLength });
        }
        if (isRateLimit(err)) {
            return new RateLimitError(`Rate limit exceeded: ${message}`, {
                retryAfter: retryAfterOf(err),
                retryCount: attempts,
                originalError: err,
            });
        }
        return new LLMCommunicationError(`Failed to analyze task: ${message}`, {
            originalError: err,
            retryCount: attempts,
        });
    }
}
