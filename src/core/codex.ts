import { execa } from "execa";
import path from "node:path";
import type { CompletionOptions, LLMClient } from "./llm.js";

export type CodexClientOptions = {
    bin?: string;
    model?: string;
    /** CODEX_HOME for the child process */
    codexHome?: string;
    env?: NodeJS.ProcessEnv;
};

export function buildSpawnArgs(bin: string, args: string[]) {
    // script stubs (tests, wrappers) run under the current node binary
    if (bin.endsWith(".js") || bin.endsWith(".mjs")) {
        return { command: process.execPath, args: [bin, ...args] };
    }
    return { command: bin, args };
}

/**
 * Runs `codex exec` once per completion and returns its trimmed stdout.
 * Codex has no separate system channel, so a system message is prepended to
 * the prompt.
 */
export class CodexClient implements LLMClient {
    private readonly bin: string;

    constructor(private readonly opts: CodexClientOptions = {}) {
        this.bin = opts.bin ?? "codex";
    }

    async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
        const env: NodeJS.ProcessEnv = { ...process.env, ...this.opts.env };
        if (this.opts.codexHome) env.CODEX_HOME = path.resolve(this.opts.codexHome);

        const text = options.systemMessage ? `${options.systemMessage}\n\n${prompt}` : prompt;
        const args = ["exec", "--color", "never"];
        if (this.opts.model) args.push("--model", this.opts.model);
        args.push("--", text);

        const { command, args: spawnArgs } = buildSpawnArgs(this.bin, args);
        const { stdout } = await execa(command, spawnArgs, {
            env,
            cancelSignal: options.signal,
        });
        const out = stdout.trim();
        if (!out) {
            throw new Error("Codex returned empty output");
        }
        return out;
    }
}
