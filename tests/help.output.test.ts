import { describe, it, expect } from "vitest";
import { createProgram } from "../src/cli/program.js";

function findSubcommand(cmdName: string) {
    const program = createProgram();
    const command = program.commands.find((cmd) => cmd.name() === cmdName || cmd.aliases().includes(cmdName));
    if (!command) {
        throw new Error(`Command ${cmdName} not found`);
    }
    return command;
}

describe("help output", () => {
    it("lists every command in the top-level help", () => {
        const program = createProgram();
        expect(program.name()).toBe("scrapinator");
        const help = program.helpInformation();
        for (const name of ["analyze", "examples", "schema", "validate", "show"]) {
            const pattern = new RegExp(String.raw`\n\s*${name}\b`);
            expect(help).toMatch(pattern);
        }
    });

    it("shows analyze options", () => {
        const help = findSubcommand("analyze").helpInformation();
        expect(help).toContain("--task <fileOrText>");
        expect(help).toContain("--example <name>");
        expect(help).toContain("--max-attempts <n>");
        expect(help).toContain("--preset <name>");
        expect(help).toContain("--out <dir>");
    });

    it("shows validate arguments", () => {
        const help = findSubcommand("validate").helpInformation();
        expect(help).toContain("<file>");
        expect(help).toContain("--kind <kind>");
    });
});
