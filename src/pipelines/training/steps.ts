import type { StepContract } from "../../types/contracts.js";
import type { CalendarEvent, CalendarTool } from "../../tools/calendar/create_event.js";
import { AdapterFailure } from "../../errors.js";
import {
  EVALUATION_PROMPT,
  MEDICAL_SAFETY_PROMPT,
  SCHEDULING_PROMPT,
  WORKOUT_PLANNING_PROMPT
} from "./prompts.js";
import {
  EvaluationOutput,
  MedicalSafetyOutput,
  SchedulingOutput,
  WorkoutPlanOutput,
  type AvailabilityWindow,
  type TrainingState
} from "./schemas.js";

type S = TrainingState;

export const medicalSafetyStep: StepContract<S, "user_profile", "medical_safety"> = {
  step_id: "medical_safety",
  goal: "Derive conservative exercise constraints from the medical history.",
  reads: ["user_profile"],
  writes: "medical_safety",
  async run({ user_profile }, { call }) {
    const res = await call({
      name: "medical_safety",
      instruction: MEDICAL_SAFETY_PROMPT,
      schema: MedicalSafetyOutput,
      context: { medical_history: user_profile.medical_history }
    });
    return { output: res.data, retries: res.retries };
  }
};

export const workoutPlanningStep: StepContract<S, "user_profile" | "medical_safety", "workout_plan"> = {
  step_id: "workout_planning",
  goal: "Draft a plan that serves the goals within the safety constraints.",
  reads: ["user_profile", "medical_safety"],
  writes: "workout_plan",
  async run({ user_profile, medical_safety }, { call }) {
    const res = await call({
      name: "workout_planning",
      instruction: WORKOUT_PLANNING_PROMPT,
      schema: WorkoutPlanOutput,
      context: {
        medical_safety,
        short_term_goals: user_profile.short_term_goals,
        long_term_goals: user_profile.long_term_goals
      }
    });
    return { output: res.data, retries: res.retries };
  }
};

const toMinutes = (clock: string) => {
  const [h, m] = clock.split(":").map(Number);
  return h * 60 + m;
};

/** One message per session that does not start and end inside a single availability window. */
export function availabilityProblems(schedule: SchedulingOutput, windows: readonly AvailabilityWindow[]): string[] {
  return schedule.scheduled_sessions.flatMap((s, i) => {
    const start = toMinutes(s.start_time);
    const end = start + s.duration_minutes;
    const fits = windows.some(w => w.date === s.date && start >= toMinutes(w.start_time) && end <= toMinutes(w.end_time));
    return fits ? [] : [`scheduled_sessions[${i}] (${s.date} ${s.start_time}, ${s.duration_minutes} min) is outside every availability window`];
  });
}

export const schedulingStep: StepContract<S, "user_profile" | "workout_plan", "schedule"> = {
  step_id: "scheduling",
  goal: "Place plan sessions inside the user's availability windows.",
  reads: ["user_profile", "workout_plan"],
  writes: "schedule",
  async run({ user_profile, workout_plan }, { call }) {
    const res = await call({
      name: "scheduling",
      instruction: SCHEDULING_PROMPT,
      schema: SchedulingOutput,
      context: { workout_plan, availability: user_profile.availability },
      check: schedule => availabilityProblems(schedule, user_profile.availability)
    });
    return { output: res.data, retries: res.retries };
  }
};

// Advisory: the verdict is reported to the caller, nothing downstream gates on it.
export const evaluationStep: StepContract<S, "medical_safety" | "workout_plan" | "schedule", "evaluation"> = {
  step_id: "evaluation",
  goal: "Score the plan and schedule for safety, fit and clarity.",
  reads: ["medical_safety", "workout_plan", "schedule"],
  writes: "evaluation",
  async run({ medical_safety, workout_plan, schedule }, { call }) {
    const res = await call({
      name: "evaluation",
      instruction: EVALUATION_PROMPT,
      schema: EvaluationOutput,
      context: { medical_safety, workout_plan, schedule }
    });
    return { output: res.data, retries: res.retries };
  }
};

/**
 * Creates one calendar event per scheduled session, in order, once the user has confirmed.
 * Stops at the first adapter failure; events created before it are reported, not undone.
 */
export function calendarIntegrationStep(tool: CalendarTool): StepContract<S, "schedule" | "user_confirmation", "calendar_events"> {
  return {
    step_id: "calendar_integration",
    goal: "Create calendar events for the schedule after explicit confirmation.",
    reads: ["schedule", "user_confirmation"],
    writes: "calendar_events",
    async run({ schedule, user_confirmation }) {
      if (!user_confirmation) return { output: [], retries: 0 };
      const created: CalendarEvent[] = [];
      for (const [i, session] of schedule.scheduled_sessions.entries()) {
        try {
          created.push(tool.invoke(session));
        } catch (e) {
          throw new AdapterFailure(tool.name, i, [...created], { cause: e });
        }
      }
      return { output: created, retries: 0 };
    }
  };
}
