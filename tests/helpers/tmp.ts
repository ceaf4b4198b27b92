import fs from "node:fs";
import os from "node:os";
import path from "node:path";

export type TmpCtx = {
    dir: string;
    path: (...segs: string[]) => string;
    cleanup: () => void;
};

/** Creates a prefixed temp work directory (caller cleans up). */
export function mkTmpWork(prefix = "scrapinator-"): TmpCtx {
    const base = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
    const cleanup = () => {
        fs.rmSync(base, { recursive: true, force: true });
    };
    return { dir: base, path: (...segs) => path.join(base, ...segs), cleanup };
}

/** Runs `fn` inside a temp work directory and always removes it afterwards. */
export async function withTmp<T>(
    fn: (ctx: Pick<TmpCtx, "dir" | "path">) => Promise<T> | T,
    prefix = "scrapinator-"
): Promise<T> {
    const ctx = mkTmpWork(prefix);
    try { return await fn({ dir: ctx.dir, path: ctx.path }); }
    finally { ctx.cleanup(); }
}
