import { Command } from "commander";
import { loadConfig } from "../core/config.js";
import { errorMessage, formatCliError } from "../core/errors.js";
import { readRunTask, resolveRunDir } from "../core/runs.js";
import { formatTaskSummary } from "../core/task.js";
import type { Task } from "../schemas/task.js";
import { printJson } from "./options.js";

export function cmdShow(): Command {
    const cmd = new Command("show");
    cmd.description("Print the task of a saved analysis run (latest by default)")
        .option("--run <dir>", "Run directory")
        .option("--out <dir>", "Run base directory (default: SCRAPINATOR_OUT_DIR)")
        .option("--format <fmt>", "json|text", "json")
        .action((opts: { run?: string; out?: string; format: string }) => {
            if (opts.format !== "json" && opts.format !== "text") {
                throw new Error(formatCliError("show", `unknown format: ${opts.format}`, "use json or text"));
            }
            let task: Task;
            try {
                const runDir = resolveRunDir(opts.out ?? loadConfig().SCRAPINATOR_OUT_DIR, opts.run);
                task = readRunTask(runDir);
            } catch (err) {
                throw new Error(formatCliError("show", errorMessage(err), "run `analyze --save` first or pass --run <dir>"), {
                    cause: err,
                });
            }
            if (opts.format === "text") {
                console.log(formatTaskSummary(task));
            } else {
                printJson(task);
            }
        });
    return cmd;
}
