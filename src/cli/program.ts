import { Command } from "commander";
import fs from "node:fs";
import path from "node:path";
import { isJsonObject } from "../core/json.js";
import { projectRoot } from "../core/paths.js";
import { cmdAnalyze } from "./analyze.js";
import { cmdExamples } from "./examples.js";
import { cmdSchema } from "./schema.js";
import { cmdValidate } from "./validate.js";
import { cmdShow } from "./show.js";

type PackageInfo = { name?: string; version?: string; description?: string };

function readPackageInfo(): PackageInfo {
    const raw: unknown = JSON.parse(fs.readFileSync(path.join(projectRoot, "package.json"), "utf8"));
    if (!isJsonObject(raw)) return {};
    const pick = (key: string) => {
        const v = raw[key];
        return typeof v === "string" ? v : undefined;
    };
    return { name: pick("name"), version: pick("version"), description: pick("description") };
}

export function createProgram(): Command {
    const { name, version, description } = readPackageInfo();
    const program = new Command();
    program
        .name(name || "scrapinator")
        .description(description || "Scrapinator CLI: analyze, examples, schema, validate, show")
        .version(version ?? "0.0.0");

    program.addCommand(cmdAnalyze());
    program.addCommand(cmdExamples());
    program.addCommand(cmdSchema());
    program.addCommand(cmdValidate());
    program.addCommand(cmdShow());

    return program;
}
