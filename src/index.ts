export * from "./errors.js";
export { loadConfig, type AppConfig } from "./config.js";
export { validate, describeSchema } from "./schema/validator.js";
export { extractJsonPayload } from "./prompt/extract.js";
export { renderStructuredRequest, renderCorrection } from "./prompt/renderer.js";
export {
  advance,
  callStructured,
  createStructuredCaller,
  initialCallState,
  type CallEvent,
  type CallPhase,
  type CallState,
  type CallerOptions,
  type StructuredCaller,
  type StructuredRequest,
  type StructuredResult
} from "./llm/structured.js";
export type { LLMProvider } from "./llm/provider.js";
export { OpenAIChatCompletions } from "./llm/openai.js";
export { OpenAIResponses } from "./llm/openai_responses.js";
export { withRetry } from "./llm/retry.js";
export { createBlackboard, read, write, exists, keys, ownerOf, pick, type Blackboard, type StepInput } from "./blackboard/index.js";
export { compileGraph, type CompiledGraph, type Transition } from "./orchestrator/compiler.js";
export { runGraph, runStep, type RunOptions, type RunReport, type StepTrace } from "./orchestrator/run.js";
export { END } from "./types/contracts.js";
export type { AnyStep, Branch, Edge, End, PipelineGraph, StepContext, StepContract, StepId, StepOutcome } from "./types/contracts.js";
export type { CompletionArgs, CompletionOut, Message } from "./types/llm.js";
export type { ToolSpec } from "./types/tools.js";
export { buildToolRegistry, type ToolRegistry } from "./tools/registry.js";
export { createCalendarEvent, type CalendarEvent, type CalendarEventRequest, type CalendarTool } from "./tools/calendar/create_event.js";
export * from "./pipelines/training/schemas.js";
export {
  buildTrainingGraph,
  confirmationGate,
  runTrainingPipeline,
  type TrainingRunInput,
  type TrainingRunOptions,
  type TrainingRunResult
} from "./pipelines/training/graph.js";
export {
  availabilityProblems,
  calendarIntegrationStep,
  evaluationStep,
  medicalSafetyStep,
  schedulingStep,
  workoutPlanningStep
} from "./pipelines/training/steps.js";
