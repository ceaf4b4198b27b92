import { describe, it, expect } from "vitest";
import fs from "node:fs";
import http from "node:http";
import { once } from "node:events";
import path from "node:path";
import { withTmp } from "./helpers/tmp.js";
import { WebTaskAnalyzer } from "../src/core/analyzer.js";
import { buildSpawnArgs, CodexClient } from "../src/core/codex.js";
import { LLMCommunicationError } from "../src/core/errors.js";
import { AnthropicClient, OpenAIClient, createLLMClient, isLLMProvider } from "../src/core/llm.js";

const fakeCodex = path.resolve("tests/fixtures/fake-codex.mjs");

describe("createLLMClient", () => {
    it("requires an API key for hosted providers", () => {
        expect(() => createLLMClient({ provider: "anthropic", env: {} })).toThrow("ANTHROPIC_API_KEY not provided");
        expect(() => createLLMClient({ provider: "openai", env: {} })).toThrow("OPENAI_API_KEY not provided");
    });

    it("builds the client for each provider", () => {
        expect(createLLMClient({ provider: "anthropic", env: { ANTHROPIC_API_KEY: "test-secret" } })).toBeInstanceOf(
            AnthropicClient
        );
        expect(createLLMClient({ provider: "openai", apiKey: "test-secret", env: {} })).toBeInstanceOf(OpenAIClient);
        expect(createLLMClient({ provider: "codex", env: {} })).toBeInstanceOf(CodexClient);
    });

    it("recognizes provider names", () => {
        expect(isLLMProvider("codex")).toBe(true);
        expect(isLLMProvider("gemini")).toBe(false);
        expect(isLLMProvider(undefined)).toBe(false);
    });
});

/** Serves 500s on a local port and counts every request that reaches it. */
async function withFailingServer(fn: (baseURL: string, requests: () => number) => Promise<void>) {
    let count = 0;
    const server = http.createServer((req, res) => {
        count++;
        req.resume();
        res.writeHead(500, { "content-type": "application/json" });
        res.end(JSON.stringify({ error: { type: "api_error", message: "upstream failure" } }));
    });
    server.listen(0, "127.0.0.1");
    await once(server, "listening");
    const address = server.address();
    if (address === null || typeof address === "string") throw new Error("server has no port");
    try {
        await fn(`http://127.0.0.1:${address.port}`, () => count);
    } finally {
        server.closeAllConnections();
        await new Promise<void>((resolve) => server.close(() => resolve()));
    }
}

describe("hosted clients", () => {
    const defaults = { model: "test-model", temperature: 0, maxTokens: 10 };
    const analyzerOpts = { maxAttempts: 2, retryDelayMs: 0, timeoutMs: 0 };

    it("sends one OpenAI request per analyzer attempt", async () => {
        await withFailingServer(async (baseURL, requests) => {
            const llm = new OpenAIClient("test-secret", defaults, `${baseURL}/v1`);
            const analyzer = new WebTaskAnalyzer(llm, { provider: "openai", ...analyzerOpts });
            const err = await analyzer.analyzeTask("Check the weather", "https://weather.example.com").catch((e: unknown) => e);
            expect(err).toBeInstanceOf(LLMCommunicationError);
            expect(err).toMatchObject({ retryCount: 2 });
            expect(requests()).toBe(2);
        });
    });

    it("sends one Anthropic request per analyzer attempt", async () => {
        await withFailingServer(async (baseURL, requests) => {
            const llm = createLLMClient({ provider: "anthropic", apiKey: "test-secret", baseURL, env: {} });
            const analyzer = new WebTaskAnalyzer(llm, { provider: "anthropic", ...analyzerOpts, maxAttempts: 1 });
            await expect(analyzer.analyzeTask("Check the weather", "https://weather.example.com")).rejects.toBeInstanceOf(
                LLMCommunicationError
            );
            expect(requests()).toBe(1);
        });
    });
});

describe("CodexClient", () => {
    it("runs script bins under the current node binary", () => {
        expect(buildSpawnArgs("/opt/stub.mjs", ["exec"])).toEqual({
            command: process.execPath,
            args: ["/opt/stub.mjs", "exec"],
        });
        expect(buildSpawnArgs("codex", ["exec"])).toEqual({ command: "codex", args: ["exec"] });
    });

    it("passes the prompt after the system message and returns trimmed stdout", async () => {
        await withTmp(async ({ path: resolvePath }) => {
            const argsFile = resolvePath("args.json");
            const client = new CodexClient({
                bin: fakeCodex,
                model: "test-model",
                codexHome: resolvePath("codex-home"),
                env: { FAKE_CODEX_RESPONSE: '  {"ok": true}\n', FAKE_CODEX_ARGS_FILE: argsFile },
            });
            const out = await client.complete("analyze this", { systemMessage: "be precise" });
            expect(out).toBe('{"ok": true}');
            const recorded: unknown = JSON.parse(fs.readFileSync(argsFile, "utf8"));
            expect(recorded).toEqual({
                args: ["exec", "--color", "never", "--model", "test-model", "--", "be precise\n\nanalyze this"],
                codexHome: resolvePath("codex-home"),
            });
        });
    });

    it("fails on empty output and on a non-zero exit", async () => {
        const empty = new CodexClient({ bin: fakeCodex, env: { FAKE_CODEX_RESPONSE: "   " } });
        await expect(empty.complete("x")).rejects.toThrow("Codex returned empty output");
        const failing = new CodexClient({ bin: fakeCodex, env: { FAKE_CODEX_EXIT: "3" } });
        await expect(failing.complete("x")).rejects.toThrow(/exit code 3/);
    });
});
