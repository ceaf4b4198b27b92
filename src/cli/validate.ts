import { Command } from "commander";
import fs from "node:fs";
import path from "node:path";
import { errorMessage, formatCliError } from "../core/errors.js";
import { buildStepBatches } from "../core/scheduler.js";
import { parsePageAnalysisFromText, parsePlanFromText } from "../schemas/plan.js";
import { parseTaskFromText } from "../schemas/task.js";

const KINDS = ["task", "plan", "page"] as const;
type Kind = (typeof KINDS)[number];

function isKind(v: string): v is Kind {
    return KINDS.some((k) => k === v);
}

/** Validates `text` as `kind` and returns the lines to print. */
export function validateDocument(kind: Kind, text: string, label: string): string[] {
    switch (kind) {
        case "task": {
            const task = parseTaskFromText(text);
            return [`OK ${label} (task, ${task.objectives.length} objectives)`];
        }
        case "page": {
            const page = parsePageAnalysisFromText(text);
            return [`OK ${label} (page analysis, ${page.elements.length} elements)`];
        }
        case "plan": {
            const plan = parsePlanFromText(text);
            const batches = buildStepBatches(plan.steps);
            return [
                `OK ${label} (execution plan, ${plan.steps.length} steps)`,
                ...batches.map((batch, i) => `batch ${i + 1}: ${batch.map((s) => s.id).join(", ")}`),
            ];
        }
    }
}

export function cmdValidate(): Command {
    const cmd = new Command("validate");
    cmd.description("Validate a task, execution plan or page analysis JSON file")
        .argument("<file>", "JSON file to validate")
        .option("--kind <kind>", "task|plan|page", "task")
        .action((file: string, opts: { kind: string }) => {
            if (!isKind(opts.kind)) {
                throw new Error(formatCliError("validate", `unknown kind: ${opts.kind}`, "use task, plan or page"));
            }
            const abs = path.resolve(file);
            if (!fs.existsSync(abs) || !fs.statSync(abs).isFile()) {
                throw new Error(formatCliError("validate", `file not found: ${abs}`));
            }
            let lines: string[];
            try {
                lines = validateDocument(opts.kind, fs.readFileSync(abs, "utf8"), file);
            } catch (err) {
                throw new Error(formatCliError("validate", `${file}: ${errorMessage(err)}`), { cause: err });
            }
            for (const line of lines) console.log(line);
        });
    return cmd;
}
