import { Command } from "commander";
import path from "node:path";
import { loadConfig } from "../core/config.js";
import { writeModelJsonSchemas } from "../schemas/plan.js";

export function cmdSchema(): Command {
    const cmd = new Command("schema");
    cmd.description("Write JSON Schemas for Task, PageAnalysis and ExecutionPlan")
        .option("--out <dir>", "Destination directory (default: <SCRAPINATOR_OUT_DIR>/schemas)")
        .action((opts: { out?: string }) => {
            const dest = path.resolve(opts.out ?? path.join(loadConfig().SCRAPINATOR_OUT_DIR, "schemas"));
            for (const file of writeModelJsonSchemas(dest)) {
                console.log(file);
            }
        });
    return cmd;
}
