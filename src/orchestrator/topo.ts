import type { Edge, StepId } from "../types/contracts.js";
import { GraphError } from "../errors.js";

/** Kahn's algorithm over `nodes`; throws when the edges contain a cycle. */
export function topoSort(nodes: StepId[], edges: Edge[]): StepId[] {
  const indeg: Record<string, number> = {};
  const adj: Record<string, string[]> = {};
  for (const id of nodes) {
    indeg[id] = 0; adj[id] = [];
  }
  for (const e of edges) {
    indeg[e.to] += 1;
    adj[e.from].push(e.to);
  }
  const q: string[] = nodes.filter(k => indeg[k] === 0);
  const out: string[] = [];
  for (let u = q.shift(); u !== undefined; u = q.shift()) {
    out.push(u);
    for (const v of adj[u]) {
      indeg[v] -= 1;
      if (indeg[v] === 0) q.push(v);
    }
  }
  if (out.length !== nodes.length) {
    const stuck = nodes.filter(n => !out.includes(n));
    throw new GraphError(`Graph has a cycle through: ${stuck.join(", ")}`, stuck[0]);
  }
  return out;
}
