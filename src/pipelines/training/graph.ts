import type { Branch, PipelineGraph } from "../../types/contracts.js";
import { END } from "../../types/contracts.js";
import type { StructuredCaller } from "../../llm/structured.js";
import { compileGraph } from "../../orchestrator/compiler.js";
import { runGraph, type RunReport } from "../../orchestrator/run.js";
import { validate } from "../../schema/validator.js";
import { buildToolRegistry, type ToolRegistry } from "../../tools/registry.js";
import { ProfileInput, type TrainingState, type Verdict } from "./schemas.js";
import {
  calendarIntegrationStep,
  evaluationStep,
  medicalSafetyStep,
  schedulingStep,
  workoutPlanningStep
} from "./steps.js";

export const confirmationGate: Branch<TrainingState, "user_confirmation"> = {
  from: "evaluation",
  reads: ["user_confirmation"],
  targets: ["calendar_integration", END],
  route: ({ user_confirmation }) => (user_confirmation ? "calendar_integration" : END)
};

// medical_safety → workout_planning → scheduling → evaluation ─┬→ calendar_integration
//                                                              └→ end (no confirmation)
export function buildTrainingGraph(tools: ToolRegistry = buildToolRegistry()): PipelineGraph<TrainingState> {
  return {
    entry: "medical_safety",
    finish: "calendar_integration",
    steps: {
      medical_safety: medicalSafetyStep,
      workout_planning: workoutPlanningStep,
      scheduling: schedulingStep,
      evaluation: evaluationStep,
      calendar_integration: calendarIntegrationStep(tools.create_calendar_event)
    },
    edges: [
      { from: "medical_safety", to: "workout_planning" },
      { from: "workout_planning", to: "scheduling" },
      { from: "scheduling", to: "evaluation" }
    ],
    branches: [confirmationGate]
  };
}

export interface TrainingRunInput {
  /** Checked against ProfileInput before any step runs. */
  user_profile: unknown;
  user_confirmation: boolean;
}

export interface TrainingRunOptions {
  call: StructuredCaller;
  tools?: ToolRegistry;
}

export interface TrainingRunResult extends RunReport<TrainingState> {
  verdict?: Verdict;
}

export async function runTrainingPipeline(input: TrainingRunInput, opts: TrainingRunOptions): Promise<TrainingRunResult> {
  const user_profile = validate(ProfileInput, input.user_profile);
  const graph = compileGraph(buildTrainingGraph(opts.tools));
  const report = await runGraph<TrainingState>({
    graph,
    initial: { user_profile, user_confirmation: input.user_confirmation },
    ctx: { call: opts.call }
  });
  return { ...report, verdict: report.state.evaluation?.verdict };
}
