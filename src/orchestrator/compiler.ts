import type { AnyStep, Branch, Edge, PipelineGraph, StepId } from "../types/contracts.js";
import { END } from "../types/contracts.js";
import { GraphError } from "../errors.js";
import { topoSort } from "./topo.js";

export type Transition<S> =
  | { kind: "edge"; to: StepId }
  | { kind: "branch"; branch: Branch<S> };

export interface CompiledGraph<S> {
  entry: StepId;
  finish: StepId;
  steps: Readonly<Record<StepId, AnyStep<S>>>;
  next: ReadonlyMap<StepId, Transition<S>>;
  /** Topological order over every node, branch targets included. */
  order: StepId[];
}

/**
 * Check the wiring of a linear pipeline with conditional edges and build the
 * transition table the runner walks.
 */
export function compileGraph<S>(draft: PipelineGraph<S>): CompiledGraph<S> {
  const ids = Object.keys(draft.steps);
  const known = new Set(ids);
  const need = (id: StepId, what: string) => {
    if (!known.has(id)) throw new GraphError(`${what} refers to unknown step "${id}"`, id);
  };

  const writers = new Map<keyof S, StepId>();
  for (const [id, step] of Object.entries(draft.steps)) {
    if (id !== step.step_id) throw new GraphError(`step_id mismatch for ${id}`, id);
    const owner = writers.get(step.writes);
    if (owner) throw new GraphError(`"${String(step.writes)}" is written by both "${owner}" and "${id}"`, id);
    writers.set(step.writes, id);
  }
  need(draft.entry, "entry");
  need(draft.finish, "finish");

  const next = new Map<StepId, Transition<S>>();
  const claim = (from: StepId, t: Transition<S>) => {
    need(from, "transition source");
    if (next.has(from)) throw new GraphError(`step "${from}" has more than one outgoing transition`, from);
    next.set(from, t);
  };
  for (const e of draft.edges) {
    need(e.to, `edge ${e.from} -> ${e.to}`);
    claim(e.from, { kind: "edge", to: e.to });
  }
  for (const b of draft.branches ?? []) {
    const distinct = new Set(b.targets);
    if (distinct.size < 2) throw new GraphError(`branch at "${b.from}" needs at least two targets`, b.from);
    for (const t of distinct) if (t !== END) need(t, `branch at ${b.from}`);
    claim(b.from, { kind: "branch", branch: b });
  }

  if (next.has(draft.finish)) throw new GraphError(`finish step "${draft.finish}" must not have outgoing transitions`, draft.finish);
  for (const id of ids) {
    if (id !== draft.finish && !next.has(id)) throw new GraphError(`step "${id}" has no outgoing transition`, id);
  }

  const links: Edge[] = [];
  for (const [from, t] of next) {
    if (t.kind === "edge") links.push({ from, to: t.to });
    else for (const to of new Set(t.branch.targets)) if (to !== END) links.push({ from, to });
  }
  if (links.some(l => l.to === draft.entry)) throw new GraphError(`entry step "${draft.entry}" has incoming transitions`, draft.entry);
  const order = topoSort(ids, links);

  const reached = new Set([draft.entry]);
  for (const id of order) {
    if (!reached.has(id)) continue;
    for (const l of links) if (l.from === id) reached.add(l.to);
  }
  const unreachable = ids.filter(id => !reached.has(id));
  if (unreachable.length) throw new GraphError(`unreachable from entry: ${unreachable.join(", ")}`, unreachable[0]);

  return { entry: draft.entry, finish: draft.finish, steps: draft.steps, next, order };
}
