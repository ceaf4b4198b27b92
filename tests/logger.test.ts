import { afterEach, describe, it, expect, vi } from "vitest";
import { resolveLogLevel } from "../src/core/logger.js";

describe("resolveLogLevel", () => {
    it("accepts pino level names and silent", () => {
        expect(resolveLogLevel("debug")).toEqual({ level: "debug" });
        expect(resolveLogLevel("silent")).toEqual({ level: "silent" });
        expect(resolveLogLevel(undefined)).toEqual({ level: "info" });
        expect(resolveLogLevel("  ")).toEqual({ level: "info" });
    });

    it("falls back to info for unknown names", () => {
        expect(resolveLogLevel("verbose")).toEqual({ level: "info", rejected: "verbose" });
        expect(resolveLogLevel("DEBUG")).toEqual({ level: "info", rejected: "DEBUG" });
        expect(resolveLogLevel("toString")).toEqual({ level: "info", rejected: "toString" });
    });
});

describe("logger module", () => {
    afterEach(() => {
        vi.unstubAllEnvs();
        vi.resetModules();
    });

    it("loads with an unknown LOG_LEVEL", async () => {
        vi.stubEnv("LOG_LEVEL", "verbose");
        vi.resetModules();
        const { logger } = await import("../src/core/logger.js");
        expect(logger.level).toBe("info");
        const { loadConfig } = await import("../src/core/config.js");
        expect(loadConfig({}).SCRAPINATOR_PROVIDER).toBe("anthropic");
    });
});
