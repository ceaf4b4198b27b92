import { Command } from "commander";
import { loadExampleTasks } from "../core/examples.js";
import { printJson } from "./options.js";

export function cmdExamples(): Command {
    const cmd = new Command("examples");
    cmd.description("List bundled example requests usable with `analyze --example <name>`")
        .option("--json", "Print as JSON", false)
        .action((opts: { json: boolean }) => {
            const examples = loadExampleTasks();
            if (opts.json) {
                printJson(examples);
                return;
            }
            for (const ex of examples) {
                console.log(`${ex.name} [${ex.category}] ${ex.url}`);
                console.log(`  ${ex.description}`);
            }
        });
    return cmd;
}
