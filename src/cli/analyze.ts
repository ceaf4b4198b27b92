import { Command } from "commander";
import path from "node:path";
import { WebTaskAnalyzer, type AnalysisResult } from "../core/analyzer.js";
import { loadConfig } from "../core/config.js";
import {
    ContextLengthExceededError,
    InvalidResponseFormatError,
    LLMCommunicationError,
    RateLimitError,
    TaskAnalysisError,
    ValidationError,
    errorMessage,
    formatCliError,
} from "../core/errors.js";
import { findExampleTask, type ExampleTask } from "../core/examples.js";
import { createLLMClient, isLLMProvider, type LLMClient, type LLMProvider } from "../core/llm.js";
import { cliLogger } from "../core/logger.js";
import { readMaybeFile } from "../core/paths.js";
import { saveAnalysisRun } from "../core/runs.js";
import { formatTaskSummary } from "../core/task.js";
import { parseNonNegativeInt, parsePositiveInt, printJson } from "./options.js";

type AnalyzeOpts = {
    task?: string;
    example?: string;
    url?: string;
    provider?: string;
    model?: string;
    timeout?: number;
    maxAttempts?: number;
    retryDelay?: number;
    preset: string;
    codexBin?: string;
    format: string;
    save: boolean;
    out?: string;
};

function hintFor(err: TaskAnalysisError): string | undefined {
    if (err instanceof RateLimitError) {
        return err.retryAfter !== undefined
            ? `the provider asked to retry after ${err.retryAfter}s`
            : "wait a moment and retry, or raise --retry-delay";
    }
    if (err instanceof ContextLengthExceededError) {
        return "shorten the task description or use --preset compact";
    }
    if (err instanceof LLMCommunicationError) {
        return "check the API key and network, or raise --timeout";
    }
    if (err instanceof InvalidResponseFormatError || err instanceof ValidationError) {
        return "rerun with LOG_LEVEL=debug to see the raw model response";
    }
    return undefined;
}

function resolveProvider(value: string): LLMProvider {
    if (!isLLMProvider(value)) {
        throw new Error(formatCliError("analyze", `unknown provider: ${value}`, "use anthropic, openai or codex"));
    }
    return value;
}

export function cmdAnalyze(): Command {
    const cmd = new Command("analyze");
    cmd.description("Analyze a natural-language web automation request into a structured task")
        .option("--task <fileOrText>", "Task description file path or raw text")
        .option("--example <name>", "Use a bundled example request (see `examples`)")
        .option("--url <url>", "Target page URL (defaults to the example's URL)")
        .option("--provider <name>", "anthropic|openai|codex (default: SCRAPINATOR_PROVIDER)")
        .option("--model <name>", "Model name override")
        .option("--timeout <ms>", "Per-attempt timeout in ms, 0 disables", parseNonNegativeInt)
        .option("--max-attempts <n>", "Total LLM calls before giving up", parsePositiveInt)
        .option("--retry-delay <ms>", "Initial backoff delay in ms", parseNonNegativeInt)
        .option("--preset <name>", "full|compact prompt", "full")
        .option("--codex-bin <path>", "codex binary path (default: CODEX_BIN)")
        .option("--format <fmt>", "json|text", "json")
        .option("--save", "Persist prompt, raw response and task under --out", false)
        .option("--out <dir>", "Run base directory (implies --save; default: SCRAPINATOR_OUT_DIR)")
        .action(async (opts: AnalyzeOpts) => {
            const config = loadConfig();

            const example: ExampleTask | undefined = opts.example ? findExampleTask(opts.example) : undefined;
            const taskDescription = (readMaybeFile(opts.task) ?? example?.description ?? "").trim();
            if (!taskDescription) {
                throw new Error(
                    formatCliError("analyze", "task is required", "pass --task <fileOrText> or --example <name>")
                );
            }
            const url = opts.url ?? example?.url;
            if (!url) {
                throw new Error(formatCliError("analyze", "url is required", "pass --url <url>"));
            }
            if (opts.format !== "json" && opts.format !== "text") {
                throw new Error(formatCliError("analyze", `unknown format: ${opts.format}`, "use json or text"));
            }
            if (opts.preset !== "full" && opts.preset !== "compact") {
                throw new Error(formatCliError("analyze", `unknown preset: ${opts.preset}`, "use full or compact"));
            }

            const provider = resolveProvider(opts.provider ?? config.SCRAPINATOR_PROVIDER);
            let llm: LLMClient;
            try {
                llm = createLLMClient({
                    provider,
                    model: opts.model ?? config.SCRAPINATOR_MODEL,
                    apiKey: provider === "openai" ? config.OPENAI_API_KEY : config.ANTHROPIC_API_KEY,
                    baseURL: provider === "openai" ? config.OPENAI_BASE_URL : config.ANTHROPIC_BASE_URL,
                    codexBin: opts.codexBin ?? config.CODEX_BIN,
                    codexHome: config.CODEX_HOME,
                });
            } catch (err) {
                throw new Error(
                    formatCliError("analyze", errorMessage(err), "set it in the environment or in .env"),
                    { cause: err }
                );
            }

            const analyzer = new WebTaskAnalyzer(llm, {
                provider,
                preset: opts.preset,
                timeoutMs: opts.timeout ?? config.SCRAPINATOR_TIMEOUT_MS,
                maxAttempts: opts.maxAttempts ?? config.SCRAPINATOR_MAX_ATTEMPTS,
                retryDelayMs: opts.retryDelay ?? config.SCRAPINATOR_RETRY_DELAY_MS,
            });

            cliLogger.info({ provider, url }, "analyzing task");
            let result: AnalysisResult;
            try {
                result = await analyzer.analyzeTaskDetailed(taskDescription, url);
            } catch (err) {
                if (err instanceof TaskAnalysisError) {
                    throw new Error(formatCliError("analyze", err.message, hintFor(err)), { cause: err });
                }
                throw err;
            }
            cliLogger.info({ attempts: result.attempts, elapsedMs: result.elapsedMs }, "analysis complete");

            if (opts.save || opts.out) {
                const outBase = path.resolve(opts.out ?? config.SCRAPINATOR_OUT_DIR);
                const runDir = saveAnalysisRun(outBase, { url, taskDescription }, result);
                cliLogger.info({ runDir }, "saved analysis run");
            }

            if (opts.format === "text") {
                console.log(formatTaskSummary(result.task));
            } else {
                printJson(result.task);
            }
        });
    return cmd;
}
