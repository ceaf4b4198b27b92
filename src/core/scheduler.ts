import type { Step } from "../schemas/plan.js";

/**
 * Splits plan steps into layers that can run once every earlier layer is done.
 * Topological order, stable with respect to the input order. Throws on a
 * dependency that does not exist or on a cycle.
 */
export function buildStepBatches(steps: Step[]): Step[][] {
    const byId = new Map<string, Step>(steps.map((s) => [s.id, s]));
    const indeg = new Map<string, number>();
    const adj = new Map<string, string[]>();

    for (const s of steps) {
        indeg.set(s.id, 0);
        adj.set(s.id, []);
    }
    for (const s of steps) {
        for (const d of s.dependsOn ?? []) {
            const dependents = adj.get(d);
            if (!byId.has(d) || !dependents) throw new Error(`dependsOn not found: ${s.id} -> ${d}`);
            indeg.set(s.id, (indeg.get(s.id) ?? 0) + 1);
            dependents.push(s.id);
        }
    }

    const order = new Map<string, number>(steps.map((s, i) => [s.id, i]));
    const layers: Step[][] = [];
    let ready = steps.filter((s) => (indeg.get(s.id) ?? 0) === 0);

    let visited = 0;
    while (ready.length > 0) {
        layers.push(ready);
        const next: Step[] = [];
        for (const u of ready) {
            visited++;
            for (const v of adj.get(u.id) ?? []) {
                const deg = (indeg.get(v) ?? 0) - 1;
                indeg.set(v, deg);
                const step = byId.get(v);
                if (deg === 0 && step) next.push(step);
            }
        }
        ready = next.sort((a, b) => (order.get(a.id) ?? 0) - (order.get(b.id) ?? 0));
    }

    if (visited !== steps.length) {
        throw new Error("cycle detected in dependsOn");
    }
    return layers;
}
