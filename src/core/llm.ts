import Anthropic from "@anthropic-ai/sdk";
import OpenAI from "openai";
import { CodexClient } from "./codex.js";
import { llmLogger } from "./logger.js";

export const LLM_PROVIDERS = ["anthropic", "openai", "codex"] as const;
export type LLMProvider = (typeof LLM_PROVIDERS)[number];

export const DEFAULT_PROVIDER: LLMProvider = "anthropic";
export const DEFAULT_ANTHROPIC_MODEL = "claude-3-7-sonnet-20250219";
export const DEFAULT_OPENAI_MODEL = "gpt-4o-mini";
export const DEFAULT_TEMPERATURE = 0;
export const DEFAULT_MAX_TOKENS = 4096;

export function isLLMProvider(v: unknown): v is LLMProvider {
    return LLM_PROVIDERS.some((p) => p === v);
}

export type CompletionOptions = {
    systemMessage?: string;
    temperature?: number;
    maxTokens?: number;
    /** Aborts the in-flight request (used for timeouts). */
    signal?: AbortSignal;
};

/** Anything that can turn a prompt into a text completion. */
export interface LLMClient {
    complete(prompt: string, options?: CompletionOptions): Promise<string>;
}

type ClientDefaults = {
    model: string;
    temperature: number;
    maxTokens: number;
};

export class AnthropicClient implements LLMClient {
    private readonly client: Anthropic;

    constructor(apiKey: string, private readonly defaults: ClientDefaults, baseURL?: string) {
        // WebTaskAnalyzer owns retries; maxAttempts counts every request
        this.client = new Anthropic({ apiKey, baseURL, maxRetries: 0 });
    }

    async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
        const message = await this.client.messages.create(
            {
                model: this.defaults.model,
                max_tokens: options.maxTokens ?? this.defaults.maxTokens,
                temperature: options.temperature ?? this.defaults.temperature,
                ...(options.systemMessage ? { system: options.systemMessage } : {}),
                messages: [{ role: "user", content: prompt }],
            },
            { signal: options.signal }
        );
        return message.content.map((block) => (block.type === "text" ? block.text : "")).join("");
    }
}

export class OpenAIClient implements LLMClient {
    private readonly client: OpenAI;

    constructor(apiKey: string, private readonly defaults: ClientDefaults, baseURL?: string) {
        this.client = new OpenAI({ apiKey, baseURL, maxRetries: 0 });
    }

    async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
        const completion = await this.client.chat.completions.create(
            {
                model: this.defaults.model,
                temperature: options.temperature ?? this.defaults.temperature,
                max_completion_tokens: options.maxTokens ?? this.defaults.maxTokens,
                messages: [
                    ...(options.systemMessage ? [{ role: "system" as const, content: options.systemMessage }] : []),
                    { role: "user" as const, content: prompt },
                ],
            },
            { signal: options.signal }
        );
        return completion.choices[0]?.message.content ?? "";
    }
}

export type CreateLLMClientOptions = {
    provider: LLMProvider;
    model?: string;
    apiKey?: string;
    baseURL?: string;
    temperature?: number;
    maxTokens?: number;
    codexBin?: string;
    codexHome?: string;
    env?: NodeJS.ProcessEnv;
};

export function createLLMClient(opts: CreateLLMClientOptions): LLMClient {
    const env = opts.env ?? process.env;
    const temperature = opts.temperature ?? DEFAULT_TEMPERATURE;
    const maxTokens = opts.maxTokens ?? DEFAULT_MAX_TOKENS;
    llmLogger.debug({ provider: opts.provider, model: opts.model }, "creating LLM client");

    switch (opts.provider) {
        case "anthropic": {
            const apiKey = opts.apiKey ?? env.ANTHROPIC_API_KEY;
            if (!apiKey) throw new Error("ANTHROPIC_API_KEY not provided");
            return new AnthropicClient(
                apiKey,
                { model: opts.model ?? DEFAULT_ANTHROPIC_MODEL, temperature, maxTokens },
                opts.baseURL ?? env.ANTHROPIC_BASE_URL
            );
        }
        case "openai": {
            const apiKey = opts.apiKey ?? env.OPENAI_API_KEY;
            if (!apiKey) throw new Error("OPENAI_API_KEY not provided");
            return new OpenAIClient(
                apiKey,
                { model: opts.model ?? DEFAULT_OPENAI_MODEL, temperature, maxTokens },
                opts.baseURL ?? env.OPENAI_BASE_URL
            );
        }
        case "codex":
            return new CodexClient({
                bin: opts.codexBin ?? env.CODEX_BIN ?? "codex",
                model: opts.model,
                codexHome: opts.codexHome ?? env.CODEX_HOME,
                env,
            });
    }
}
