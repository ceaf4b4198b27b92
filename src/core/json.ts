import { analyzerLogger } from "./logger.js";

export type JsonObject = Record<string, unknown>;

export function isJsonObject(v: unknown): v is JsonObject {
    return typeof v === "object" && v !== null && !Array.isArray(v);
}

function tryParseObject(text: string): JsonObject | null {
    try {
        const parsed: unknown = JSON.parse(text);
        return isJsonObject(parsed) ? parsed : null;
    } catch {
        return null;
    }
}

/**
 * Pairs every balanced brace group in one pass; quotes only count inside a
 * group. Returns `[start, end]` (inclusive) pairs ordered by start.
 */
function braceGroups(text: string): Array<[number, number]> {
    const groups: Array<[number, number]> = [];
    const open: number[] = [];
    let inString = false;
    let escaped = false;
    for (let i = 0; i < text.length; i++) {
        const ch = text[i];
        if (inString) {
            if (escaped) escaped = false;
            else if (ch === "\\") escaped = true;
            else if (ch === "\"") inString = false;
            continue;
        }
        if (ch === "\"" && open.length > 0) inString = true;
        else if (ch === "{") open.push(i);
        else if (ch === "}") {
            const start = open.pop();
            if (start !== undefined) groups.push([start, i]);
        }
    }
    return groups.sort((a, b) => a[0] - b[0]);
}

/**
 * Finds the first JSON object in free-form LLM output.
 *
 * Tries, in order: the whole text, fenced code blocks, balanced brace groups
 * scanned left to right, and finally the span between the first `{` and the
 * last `}`. Arrays and scalars never count as a match.
 *
 * @example
 * extractJsonFromText('Here you go: {"key": "value"} done') // { key: "value" }
 * extractJsonFromText("No JSON here") // null
 */
export function extractJsonFromText(text: string): JsonObject | null {
    if (!text) return null;
    const trimmed = text.trim();
    if (!trimmed) return null;

    const whole = tryParseObject(trimmed);
    if (whole) {
        analyzerLogger.debug("parsed entire text as JSON");
        return whole;
    }

    const fence = /```(?:json)?\s*\n?([\s\S]*?)```/g;
    for (const match of trimmed.matchAll(fence)) {
        const fenced = tryParseObject(match[1].trim());
        if (fenced) {
            analyzerLogger.debug("extracted JSON from code fence");
            return fenced;
        }
    }

    for (const [start, end] of braceGroups(trimmed)) {
        const candidate = tryParseObject(trimmed.slice(start, end + 1));
        if (candidate) {
            analyzerLogger.debug("extracted JSON using brace matching");
            return candidate;
        }
    }

    const start = trimmed.indexOf("{");
    const last = trimmed.lastIndexOf("}");
    if (start !== -1 && last > start) {
        const spanned = tryParseObject(trimmed.slice(start, last + 1));
        if (spanned) {
            analyzerLogger.debug("extracted JSON using outer brace span");
            return spanned;
        }
    }

    analyzerLogger.debug("no JSON object found in text");
    return null;
}

const NULL_LIKE = new Set<unknown>([null, "null", "None"]);

/**
 * Rewrites null-ish spellings (`null`, `"null"`, `"None"`, `[]`) of the given
 * fields to `null`. Mutates and returns `data`; absent fields stay absent.
 */
export function normalizeOptionalFields<T extends JsonObject>(data: T, fields: readonly string[]): T {
    const record: JsonObject = data;
    for (const field of fields) {
        if (!(field in record)) continue;
        const value = record[field];
        if (NULL_LIKE.has(value) || (Array.isArray(value) && value.length === 0)) {
            record[field] = null;
        }
    }
    return data;
}
