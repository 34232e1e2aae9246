// src/orchestrator/run.ts
// Walks a compiled graph one step at a time: project the step's reads, run it, write its key,
// then follow the edge or ask the branch. The first failure stops the run and names the step.

import type { AnyStep, Branch, End, StepContext, StepId, StepOutcome } from "../types/contracts.js";
import { END } from "../types/contracts.js";
import { createBlackboard, pick, write, type Blackboard } from "../blackboard/index.js";
import { GraphError, PipelineError } from "../errors.js";
import { COLOR, LOG_STEPS, fmtMs } from "../log.js";
import type { CompiledGraph } from "./compiler.js";

export interface RunOptions<S> {
  graph: CompiledGraph<S>;
  initial: Partial<S>;
  ctx: StepContext;
}

export interface StepTrace {
  step_id: StepId;
  wrote: string;
  retries: number;
  duration_ms: number;
}

export interface RunReport<S> {
  state: Readonly<Partial<S>>;
  blackboard: Blackboard<S>;
  trace: StepTrace[];
  terminatedBy: "finish" | "branch";
}

/** Run one step against `bb` and return the grown blackboard. `bb` itself is left untouched. */
export async function runStep<S>(
  step: AnyStep<S>,
  bb: Blackboard<S>,
  ctx: StepContext,
): Promise<{ blackboard: Blackboard<S>; outcome: StepOutcome<S[keyof S]> }> {
  const input = pick(bb, step.reads, step.step_id);
  const outcome = await step.run(input, ctx);
  return { blackboard: write(bb, step.writes, outcome.output, step.step_id), outcome };
}

function route<S>(branch: Branch<S>, bb: Blackboard<S>): StepId | End {
  const target = branch.route(pick(bb, branch.reads, branch.from));
  if (!branch.targets.includes(target)) {
    throw new GraphError(`branch at "${branch.from}" chose undeclared target "${target}"`, branch.from);
  }
  return target;
}

export async function runGraph<S>(opts: RunOptions<S>): Promise<RunReport<S>> {
  const { graph, ctx } = opts;
  let bb = createBlackboard<S>(opts.initial);
  const trace: StepTrace[] = [];
  let current: StepId | End = graph.entry;

  while (current !== END) {
    const step = graph.steps[current];
    const stepStart = Date.now();
    if (LOG_STEPS) {
      const goal = step.goal.slice(0, 96);
      console.log(`\n${COLOR.cyan("▶ step")} ${trace.length + 1} ${current} ${goal ? COLOR.gray("— " + goal) : ""}`);
    }

    let retries: number;
    try {
      const res = await runStep(step, bb, ctx);
      bb = res.blackboard;
      retries = res.outcome.retries;
    } catch (e) {
      if (LOG_STEPS) console.log(`${COLOR.red("✗ failed")} ${current} ${COLOR.gray(e instanceof Error ? e.name : "error")}`);
      throw new PipelineError(current, e);
    }

    const stepMs = Date.now() - stepStart;
    trace.push({ step_id: current, wrote: String(step.writes), retries, duration_ms: stepMs });
    if (LOG_STEPS) {
      const note = retries ? COLOR.yellow(` ${retries} retr${retries === 1 ? "y" : "ies"}`) : "";
      console.log(`${COLOR.green("✓ done")} ${current} ${COLOR.gray("(" + fmtMs(stepMs) + ")")}${note}`);
    }

    if (current === graph.finish) {
      return { state: bb.values, blackboard: bb, trace, terminatedBy: "finish" };
    }
    const t = graph.next.get(current);
    if (!t) throw new GraphError(`step "${current}" has no outgoing transition`, current);
    if (t.kind === "edge") {
      current = t.to;
      continue;
    }
    try {
      current = route(t.branch, bb);
    } catch (e) {
      throw new PipelineError(t.branch.from, e);
    }
    if (LOG_STEPS && current === END) console.log(COLOR.gray(`  branch at ${t.branch.from} → end`));
  }

  return { state: bb.values, blackboard: bb, trace, terminatedBy: "branch" };
}
