import { describe, it, expect } from "vitest";
import {
    PROVIDER_CONFIGS,
    SYSTEM_MESSAGE,
    TASK_ANALYSIS_PROMPT,
    TASK_ANALYSIS_PROMPT_COMPACT,
    getPromptConfig,
    renderTaskPrompt,
} from "../src/core/prompts.js";

describe("prompt templates", () => {
    it("loads the full prompt with examples and guidelines", () => {
        expect(TASK_ANALYSIS_PROMPT).toContain("$URL");
        expect(TASK_ANALYSIS_PROMPT).toContain("$TASK_DESCRIPTION");
        expect(TASK_ANALYSIS_PROMPT).toContain("Example 3:");
        expect(TASK_ANALYSIS_PROMPT).toContain("Important guidelines:");
    });

    it("keeps the compact prompt under half the full length", () => {
        expect(TASK_ANALYSIS_PROMPT_COMPACT).toContain("Required JSON structure:");
        expect(TASK_ANALYSIS_PROMPT_COMPACT.length * 2).toBeLessThan(TASK_ANALYSIS_PROMPT.length);
    });
});

describe("getPromptConfig", () => {
    it("returns the provider configs and falls back to anthropic", () => {
        expect(getPromptConfig("openai")).toBe(PROVIDER_CONFIGS.openai);
        expect(getPromptConfig("compact").maxTokens).toBe(500);
        expect(getPromptConfig("unknown")).toBe(PROVIDER_CONFIGS.anthropic);
        expect(getPromptConfig()).toEqual({
            prompt: TASK_ANALYSIS_PROMPT,
            systemMessage: SYSTEM_MESSAGE,
            temperature: 0,
            maxTokens: 1000,
        });
    });
});

describe("renderTaskPrompt", () => {
    it("fills placeholders and renders $$ as a literal dollar", () => {
        const out = renderTaskPrompt("URL: $URL Task: $TASK_DESCRIPTION Price: $$50", {
            url: "https://example.com",
            taskDescription: "find deals",
        });
        expect(out).toBe("URL: https://example.com Task: find deals Price: $50");
    });

    it("inserts values verbatim without expanding them again", () => {
        const out = renderTaskPrompt("[$TASK_DESCRIPTION] [$URL]", {
            url: "https://example.com/?q=$URL",
            taskDescription: "pay $$5 and $& more",
        });
        expect(out).toBe("[pay $$5 and $& more] [https://example.com/?q=$URL]");
    });

    it("renders the full template with the examples' prices intact", () => {
        const out = renderTaskPrompt(TASK_ANALYSIS_PROMPT, { url: "https://a.example", taskDescription: "do it" });
        expect(out).toContain("URL: https://a.example\nTask: do it");
        expect(out).toContain("Find all products under $50 in the kitchen category");
        expect(out).not.toContain("$TASK_DESCRIPTION");
    });
});
