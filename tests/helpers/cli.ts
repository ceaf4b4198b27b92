import { vi } from "vitest";
import type { Command } from "commander";

/** Runs a command in-process and returns what it printed to stdout. */
export async function runCommand(cmd: Command, args: string[]): Promise<string> {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    try {
        cmd.exitOverride();
        await cmd.parseAsync(args, { from: "user" });
        return log.mock.calls.map((call) => call.map(String).join(" ")).join("\n");
    } finally {
        log.mockRestore();
    }
}
