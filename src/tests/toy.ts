import type { StepInput } from '../blackboard/index.js';
import type { StructuredCaller } from '../llm/structured.js';
import type { StepContext, StepContract } from '../types/contracts.js';

/** Small state used to exercise the engine without any model calls. */
export interface Toy {
  seed: number;
  doubled: number;
  label: string;
  go: boolean;
  shipped: string[];
}

export const noModel: StructuredCaller = () => Promise.reject(new Error('no model in this test'));
export const ctx: StepContext = { call: noModel };

export function toyStep<R extends keyof Toy, W extends keyof Toy>(
  step_id: string,
  reads: R[],
  writes: W,
  fn: (input: StepInput<Toy, R>) => Toy[W],
): StepContract<Toy, R, W> {
  return {
    step_id,
    goal: `toy ${step_id}`,
    reads,
    writes,
    async run(input) {
      return { output: fn(input), retries: 0 };
    }
  };
}

export const double = toyStep('double', ['seed'], 'doubled', ({ seed }) => seed * 2);
export const describeIt = toyStep('describe', ['doubled'], 'label', ({ doubled }) => `n=${doubled}`);
export const ship = toyStep('ship', ['label', 'go'], 'shipped', ({ label, go }) => (go ? [label] : []));
