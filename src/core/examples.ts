import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { projectRoot } from "./paths.js";

export const ExampleTaskSchema = z
    .object({
        name: z.string().min(1),
        category: z.string(),
        url: z.string().min(1),
        description: z.string().min(1),
    })
    .strict();

export type ExampleTask = z.infer<typeof ExampleTaskSchema>;

const examplesFile = path.join(projectRoot, "src/data/example-tasks.json");

let cached: ExampleTask[] | undefined;

export function loadExampleTasks(): ExampleTask[] {
    if (!cached) {
        const raw: unknown = JSON.parse(fs.readFileSync(examplesFile, "utf8"));
        cached = z.array(ExampleTaskSchema).parse(raw);
    }
    return cached;
}

export function findExampleTask(name: string): ExampleTask {
    const examples = loadExampleTasks();
    const found = examples.find((e) => e.name === name);
    if (!found) {
        throw new Error(`unknown example: ${name} (available: ${examples.map((e) => e.name).join(", ")})`);
    }
    return found;
}
