// src/schemas/plan.ts
import fs from "node:fs";
import path from "node:path";
import { z, ZodError } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";
import { TaskSchema } from "./task.js";

export const ACTION_TYPES = [
    "navigate",
    "click",
    "fill",
    "select",
    "submit",
    "extract",
    "download",
    "scroll",
    "wait",
    "screenshot",
] as const;

export const ActionTypeSchema = z.enum(ACTION_TYPES);
export type ActionType = z.infer<typeof ActionTypeSchema>;

const SELECTOR_ACTIONS: ReadonlySet<ActionType> = new Set(["click", "fill", "select", "extract", "download"]);
const VALUE_ACTIONS: ReadonlySet<ActionType> = new Set(["fill", "select"]);

const confidence = z.number().min(0).max(1);

export const StepSchema = z
    .object({
        id: z.string().min(1),
        action: ActionTypeSchema,
        description: z.string(),
        selector: z.string().min(1).optional(),
        value: z.string().optional(),
        url: z.string().min(1).optional(),
        timeoutMs: z.number().int().positive().optional(),
        optional: z.boolean().optional(),
        dependsOn: z.array(z.string()).optional(),
    })
    .strict()
    .superRefine((step, ctx) => {
        if (step.action === "navigate" && !step.url) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["url"], message: "url is required for navigate" });
        }
        if (SELECTOR_ACTIONS.has(step.action) && !step.selector) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ["selector"],
                message: `selector is required for ${step.action}`,
            });
        }
        if (VALUE_ACTIONS.has(step.action) && step.value === undefined) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ["value"],
                message: `value is required for ${step.action}`,
            });
        }
    });

export type Step = z.infer<typeof StepSchema>;

export const PageElementSchema = z
    .object({
        selector: z.string().min(1),
        kind: z.enum(["link", "button", "input", "select", "form", "text", "image", "other"]),
        text: z.string().optional(),
        attributes: z.record(z.string()).optional(),
    })
    .strict();

export type PageElement = z.infer<typeof PageElementSchema>;

export const PageAnalysisSchema = z
    .object({
        url: z.string().min(1),
        title: z.string().optional(),
        summary: z.string(),
        elements: z.array(PageElementSchema),
        confidence,
        notes: z.array(z.string()).default([]),
    })
    .strict();

export type PageAnalysis = z.infer<typeof PageAnalysisSchema>;

export const ExecutionPlanSchema = z
    .object({
        taskDescription: z.string(),
        url: z.string().min(1),
        steps: z.array(StepSchema).min(1),
        confidence,
        estimatedDurationMs: z.number().int().nonnegative().optional(),
    })
    .strict()
    .superRefine((plan, ctx) => {
        const seen = new Set<string>();
        plan.steps.forEach((step, idx) => {
            if (seen.has(step.id)) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: ["steps", idx, "id"],
                    message: `duplicate step id: ${step.id}`,
                });
            }
            seen.add(step.id);
        });
        plan.steps.forEach((step, idx) => {
            for (const dep of step.dependsOn ?? []) {
                if (!seen.has(dep)) {
                    ctx.addIssue({
                        code: z.ZodIssueCode.custom,
                        path: ["steps", idx, "dependsOn"],
                        message: `unknown step id: ${dep}`,
                    });
                }
            }
        });
    });

export type ExecutionPlan = z.infer<typeof ExecutionPlanSchema>;

export const MODEL_SCHEMA_FILES = {
    "task.schema.json": { schema: TaskSchema, name: "Task" },
    "page-analysis.schema.json": { schema: PageAnalysisSchema, name: "PageAnalysis" },
    "execution-plan.schema.json": { schema: ExecutionPlanSchema, name: "ExecutionPlan" },
} as const;

/** Zod → JSON Schema for every model, one file each. Returns the written paths. */
export function writeModelJsonSchemas(destDir: string): string[] {
    fs.mkdirSync(destDir, { recursive: true });
    return Object.entries(MODEL_SCHEMA_FILES).map(([file, { schema, name }]) => {
        const dest = path.join(destDir, file);
        const jsonSchema = zodToJsonSchema(schema, { name });
        fs.writeFileSync(dest, JSON.stringify(jsonSchema, null, 2) + "\n", "utf8");
        return dest;
    });
}

function parseWithSchema<S extends z.ZodTypeAny>(schema: S, text: string): z.output<S> {
    try {
        const data: unknown = JSON.parse(text);
        return schema.parse(data);
    } catch (e) {
        if (e instanceof ZodError) {
            const msg = e.issues
                .map((i) => `${i.path.map(String).join(".") || "/"} ${i.message}`)
                .join("; ");
            throw new Error(`Schema validation failed: ${msg}`);
        }
        throw e;
    }
}

export function parsePlanFromText(text: string): ExecutionPlan {
    return parseWithSchema(ExecutionPlanSchema, text);
}

export function parsePageAnalysisFromText(text: string): PageAnalysis {
    return parseWithSchema(PageAnalysisSchema, text);
}
