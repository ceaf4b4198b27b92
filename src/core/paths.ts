import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

const moduleDir = path.dirname(fileURLToPath(import.meta.url));
// src/core or dist/core: two levels below the package root either way
export const projectRoot = path.resolve(moduleDir, "..", "..");

export const RUN_DIR_PREFIX = "analysis-";

export function ensureDir(p: string) {
    fs.mkdirSync(p, { recursive: true });
}

export function writeFileUtf8(p: string, text: string) {
    ensureDir(path.dirname(p));
    fs.writeFileSync(p, text, "utf8");
}

export function createRunDir(base: string, now = Date.now()) {
    let ts = now;
    let dir = path.join(base, `${RUN_DIR_PREFIX}${ts}`);
    // two runs within the same millisecond
    while (fs.existsSync(dir)) {
        ts += 1;
        dir = path.join(base, `${RUN_DIR_PREFIX}${ts}`);
    }
    ensureDir(dir);
    return dir;
}

export function findLatestRunDir(base: string): string | null {
    if (!fs.existsSync(base)) return null;
    const names = fs
        .readdirSync(base)
        .filter((n) => n.startsWith(RUN_DIR_PREFIX))
        .map((n) => ({ n, t: Number(n.slice(RUN_DIR_PREFIX.length)) }))
        .filter((x) => !Number.isNaN(x.t))
        .sort((a, b) => b.t - a.t);
    if (names.length === 0) return null;
    return path.join(base, names[0].n);
}

/** Treats `v` as a file path when such a file exists, otherwise as literal text. */
export function readMaybeFile(v?: string): string | undefined {
    if (!v) return;
    const p = path.resolve(String(v));
    if (fs.existsSync(p) && fs.statSync(p).isFile()) return fs.readFileSync(p, "utf8");
    return v;
}
