// src/schemas/task.ts
import { z, ZodError } from "zod";
import { ValidationError } from "../core/errors.js";
import { isJsonObject } from "../core/json.js";

const stringList = z.array(z.string());

export const TaskSchema = z
    .object({
        description: z.string(),
        objectives: stringList.min(1, "objectives must contain at least 1 item"),
        constraints: stringList.default([]),
        successCriteria: stringList.min(1, "successCriteria must contain at least 1 item"),
        dataToExtract: stringList.nullable().default(null),
        actionsToPerform: stringList.nullable().default(null),
        context: z.record(z.unknown()).default({}),
    })
    .strict();

export type Task = z.output<typeof TaskSchema>;
export type TaskInput = z.input<typeof TaskSchema>;

function issueField(issue: z.ZodIssue): string | undefined {
    if (issue.path.length > 0) {
        return issue.path.map(String).join(".");
    }
    if (issue.code === "unrecognized_keys") {
        return issue.keys.join(",");
    }
    return undefined;
}

export function toValidationError(err: ZodError, label: string, input: unknown): ValidationError {
    const first = err.issues[0];
    const field = first ? issueField(first) : undefined;
    const summary = err.issues
        .map((i) => `${i.path.map(String).join(".") || "/"} ${i.message}`)
        .join("; ");
    let value: unknown;
    if (first && first.path.length > 0 && typeof input === "object" && input !== null) {
        value = first.path.reduce<unknown>((acc, key) => {
            if (Array.isArray(acc) && typeof key === "number") return acc[key];
            if (isJsonObject(acc)) return acc[String(key)];
            return undefined;
        }, input);
    }
    return new ValidationError(`${label} validation failed: ${summary}`, {
        field,
        value,
        expectedType: first?.code === "too_small" ? "non-empty list" : undefined,
    });
}

/** Validates arbitrary input as a Task, applying defaults for optional fields. */
export function createTask(input: unknown): Task {
    try {
        return TaskSchema.parse(input);
    } catch (err) {
        if (err instanceof ZodError) {
            throw toValidationError(err, "Task", input);
        }
        throw err;
    }
}

/** Returns a new Task with `patch` applied; the merged record is validated again. */
export function updateTask(task: Task, patch: Partial<TaskInput>): Task {
    return createTask({ ...task, ...patch });
}

export function parseTaskFromText(text: string): Task {
    return createTask(JSON.parse(text));
}
