import fs from "node:fs";
import path from "node:path";
import type { AnalysisResult } from "./analyzer.js";
import { createRunDir, ensureDir, findLatestRunDir, writeFileUtf8 } from "./paths.js";
import { parseTaskFromText, type Task } from "../schemas/task.js";

export const RUN_FILES = {
    prompt: "prompt.txt",
    response: "response.raw.txt",
    task: "task.json",
    meta: "meta.json",
} as const;

export type RunMeta = {
    provider: string;
    url: string;
    taskDescription: string;
    attempts: number;
    elapsedMs: number;
    createdAt: string;
};

/** Writes one analysis into a fresh `analysis-<ms>` directory under `outBase`. */
export function saveAnalysisRun(
    outBase: string,
    input: { url: string; taskDescription: string },
    result: AnalysisResult,
    now = new Date()
): string {
    ensureDir(outBase);
    const runDir = createRunDir(outBase, now.getTime());
    const meta: RunMeta = {
        provider: result.provider,
        url: input.url,
        taskDescription: input.taskDescription,
        attempts: result.attempts,
        elapsedMs: result.elapsedMs,
        createdAt: now.toISOString(),
    };
    writeFileUtf8(path.join(runDir, RUN_FILES.prompt), result.prompt);
    writeFileUtf8(path.join(runDir, RUN_FILES.response), result.response);
    writeFileUtf8(path.join(runDir, RUN_FILES.task), JSON.stringify(result.task, null, 2) + "\n");
    writeFileUtf8(path.join(runDir, RUN_FILES.meta), JSON.stringify(meta, null, 2) + "\n");
    return runDir;
}

export function readRunTask(runDir: string): Task {
    const file = path.join(runDir, RUN_FILES.task);
    if (!fs.existsSync(file)) {
        throw new Error(`task.json not found at ${file}`);
    }
    return parseTaskFromText(fs.readFileSync(file, "utf8"));
}

/** Resolves `run` if given, otherwise the newest run under `outBase`. */
export function resolveRunDir(outBase: string, run?: string): string {
    if (run) return path.resolve(run);
    const latest = findLatestRunDir(path.resolve(outBase));
    if (!latest) {
        throw new Error(`no analysis runs found under ${path.resolve(outBase)}`);
    }
    return latest;
}
