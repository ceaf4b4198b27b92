import type { Task } from "../schemas/task.js";

const COMPLEX_OBJECTIVES_THRESHOLD = 2;
const COMPLEX_ACTIONS_THRESHOLD = 3;

export function hasDataExtraction(task: Task): boolean {
    return task.dataToExtract !== null && task.dataToExtract.length > 0;
}

export function hasActions(task: Task): boolean {
    return task.actionsToPerform !== null && task.actionsToPerform.length > 0;
}

/** More than two objectives, or more than three explicit actions. */
export function isComplex(task: Task): boolean {
    return (
        task.objectives.length > COMPLEX_OBJECTIVES_THRESHOLD ||
        (task.actionsToPerform?.length ?? 0) > COMPLEX_ACTIONS_THRESHOLD
    );
}

function numbered(title: string, items: string[]): string[] {
    return [`${title} (${items.length}):`, ...items.map((item, i) => `  ${i + 1}. ${item}`)];
}

export function formatTaskSummary(task: Task): string {
    const lines: string[] = [`Description: ${task.description || "-"}`, ""];
    lines.push(...numbered("Objectives", task.objectives), "");
    lines.push(...numbered("Success criteria", task.successCriteria));
    if (task.constraints.length > 0) {
        lines.push("", ...numbered("Constraints", task.constraints));
    }
    if (task.dataToExtract && task.dataToExtract.length > 0) {
        lines.push("", ...numbered("Data to extract", task.dataToExtract));
    }
    if (task.actionsToPerform && task.actionsToPerform.length > 0) {
        lines.push("", ...numbered("Actions to perform", task.actionsToPerform));
    }
    const contextKeys = Object.keys(task.context);
    if (contextKeys.length > 0) {
        lines.push("", "Context:");
        for (const key of contextKeys) {
            lines.push(`  ${key}: ${JSON.stringify(task.context[key])}`);
        }
    }
    lines.push("", `Complexity: ${isComplex(task) ? "complex" : "simple"}`);
    return lines.join("\n");
}
