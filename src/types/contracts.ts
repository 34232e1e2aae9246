import type { StepInput } from "../blackboard/index.js";
import type { StructuredCaller } from "../llm/structured.js";

export type StepId = string;

export const END = "__end__";
export type End = typeof END;

export interface StepContext {
  call: StructuredCaller;
}

export interface StepOutcome<V> {
  output: V;
  /** Correction retries consumed by the step's structured call; 0 for tool steps. */
  retries: number;
}

/**
 * A unit of pipeline work. `reads` and `writes` are its capability contract:
 * the engine hands `run` only the `reads` keys and stores the result under `writes`.
 */
export interface StepContract<S, R extends keyof S = keyof S, W extends keyof S = keyof S> {
  step_id: StepId;
  goal: string;
  reads: readonly R[];
  writes: W;
  run(input: StepInput<S, R>, ctx: StepContext): Promise<StepOutcome<S[W]>>;
}

export type AnyStep<S> = StepContract<S, keyof S, keyof S>;

export interface Edge {
  from: StepId;
  to: StepId;
}

/** Conditional edge: `route` sees only `reads` and must answer one of `targets`. */
export interface Branch<S, R extends keyof S = keyof S> {
  from: StepId;
  reads: readonly R[];
  targets: ReadonlyArray<StepId | End>;
  route(view: StepInput<S, R>): StepId | End;
}

export interface PipelineGraph<S> {
  entry: StepId;
  finish: StepId;
  steps: Record<StepId, AnyStep<S>>;
  edges: Edge[];
  branches?: Array<Branch<S>>;
}
