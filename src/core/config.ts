import { z } from "zod";
import { logger } from "./logger.js";

const envSchema = z.object({
    // LLM provider
    SCRAPINATOR_PROVIDER: z.enum(["anthropic", "openai", "codex"]).default("anthropic"),
    SCRAPINATOR_MODEL: z.string().min(1).optional(),
    ANTHROPIC_API_KEY: z.string().min(1).optional(),
    ANTHROPIC_BASE_URL: z.string().url().optional(),
    OPENAI_API_KEY: z.string().min(1).optional(),
    OPENAI_BASE_URL: z.string().url().optional(),

    // Analyzer
    SCRAPINATOR_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(30_000),
    SCRAPINATOR_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
    SCRAPINATOR_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(1_000),

    // Output
    SCRAPINATOR_OUT_DIR: z.string().min(1).default(".scrapinator"),

    // Codex CLI
    CODEX_BIN: z.string().min(1).default("codex"),
    CODEX_HOME: z.string().min(1).optional(),
});

export type Config = z.infer<typeof envSchema>;

function blankToUndefined(env: NodeJS.ProcessEnv): Record<string, string> {
    const out: Record<string, string> = {};
    for (const [key, value] of Object.entries(env)) {
        if (value !== undefined && value.trim() !== "") out[key] = value;
    }
    return out;
}

/** Reads configuration from the environment; invalid values fall back to defaults. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
    const parsed = envSchema.safeParse(blankToUndefined(env));
    if (!parsed.success) {
        logger.warn({ issues: parsed.error.flatten().fieldErrors }, "invalid environment configuration, using defaults");
        return envSchema.parse({});
    }
    return parsed.data;
}
