import { describe, it, expect } from "vitest";
import { extractJsonFromText, normalizeOptionalFields } from "../src/core/json.js";

describe("extractJsonFromText", () => {
    it("parses text that is already a JSON object", () => {
        expect(extractJsonFromText('  {"key": "value"}  ')).toEqual({ key: "value" });
    });

    it("extracts from a fenced code block", () => {
        const text = 'Here is the analysis:\n```json\n{"description": "x", "objectives": ["a"]}\n```\nThanks';
        expect(extractJsonFromText(text)).toEqual({ description: "x", objectives: ["a"] });
    });

    it("extracts an object embedded in prose", () => {
        expect(extractJsonFromText('Here you go: {"key": "value"} done')).toEqual({ key: "value" });
    });

    it("handles nested objects and braces inside strings", () => {
        const text = 'Result: {"a": {"b": "} tricky {"}, "c": [1, 2]} trailing';
        expect(extractJsonFromText(text)).toEqual({ a: { b: "} tricky {" }, c: [1, 2] });
    });

    it("skips a broken candidate and takes the next valid one", () => {
        const text = '{not json} then {"ok": true}';
        expect(extractJsonFromText(text)).toEqual({ ok: true });
    });

    it("finds an object after an unclosed brace", () => {
        expect(extractJsonFromText('Fill in { name and then {"a": 1}')).toEqual({ a: 1 });
    });

    it("scans long runs of unclosed braces in linear time", () => {
        const started = Date.now();
        expect(extractJsonFromText("note: " + "{".repeat(60_000))).toBeNull();
        expect(Date.now() - started).toBeLessThan(1_000);
    });

    it("returns null when there is no object", () => {
        expect(extractJsonFromText("No JSON here")).toBeNull();
        expect(extractJsonFromText("")).toBeNull();
        expect(extractJsonFromText("[1, 2, 3]")).toBeNull();
        expect(extractJsonFromText('"just a string"')).toBeNull();
    });
});

describe("normalizeOptionalFields", () => {
    it("turns null-like values into null in place", () => {
        const data: Record<string, unknown> = {
            a: "null",
            b: "None",
            c: [],
            d: ["keep"],
            e: null,
        };
        const out = normalizeOptionalFields(data, ["a", "b", "c", "d", "e", "missing"]);
        expect(out).toBe(data);
        expect(data).toEqual({ a: null, b: null, c: null, d: ["keep"], e: null });
        expect("missing" in data).toBe(false);
    });
});
