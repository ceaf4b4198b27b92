import fs from "node:fs";
import path from "node:path";
import { projectRoot } from "./paths.js";

const templatesRoot = path.join(projectRoot, "src/templates/prompts");

function readTemplate(file: string): string {
    const p = path.join(templatesRoot, file);
    if (!fs.existsSync(p) || !fs.statSync(p).isFile()) {
        throw new Error(`Prompt template not found: ${p}`);
    }
    return fs.readFileSync(p, "utf8");
}

export const TASK_ANALYSIS_PROMPT = readTemplate("task-analysis.md");
export const TASK_ANALYSIS_PROMPT_COMPACT = readTemplate("task-analysis.compact.md");

export const SYSTEM_MESSAGE = "You are a web automation expert. Always respond with valid JSON only.";

export interface PromptConfig {
    prompt: string;
    systemMessage: string;
    temperature: number;
    maxTokens: number;
}

export const PROMPT_PRESETS = ["anthropic", "openai", "codex", "compact"] as const;
export type PromptPreset = (typeof PROMPT_PRESETS)[number];

const full: PromptConfig = {
    prompt: TASK_ANALYSIS_PROMPT,
    systemMessage: SYSTEM_MESSAGE,
    temperature: 0,
    maxTokens: 1000,
};

export const PROVIDER_CONFIGS: Readonly<Record<PromptPreset, PromptConfig>> = {
    anthropic: full,
    openai: full,
    codex: full,
    compact: {
        prompt: TASK_ANALYSIS_PROMPT_COMPACT,
        systemMessage: SYSTEM_MESSAGE,
        temperature: 0,
        maxTokens: 500,
    },
};

function isPromptPreset(v: string): v is PromptPreset {
    return PROMPT_PRESETS.some((p) => p === v);
}

/** Unknown or missing names resolve to the anthropic config. */
export function getPromptConfig(name?: string): PromptConfig {
    if (name && isPromptPreset(name)) return PROVIDER_CONFIGS[name];
    return PROVIDER_CONFIGS.anthropic;
}

/**
 * Fills `$URL` and `$TASK_DESCRIPTION`; `$$` renders a literal `$`.
 * Substituted values are inserted as-is and never re-expanded.
 */
export function renderTaskPrompt(template: string, vars: { url: string; taskDescription: string }): string {
    return template.replace(/\$\$|\$(URL|TASK_DESCRIPTION)\b/g, (match, name: string | undefined) => {
        if (match === "$$") return "$";
        return name === "URL" ? vars.url : vars.taskDescription;
    });
}
