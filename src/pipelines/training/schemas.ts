import { z } from "zod";
import type { CalendarEvent } from "../../tools/calendar/create_event.js";

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD");
const clock = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, "expected HH:MM");
const minutes = z.int().positive();

export const AvailabilityWindow = z.strictObject({
  date: isoDate,
  start_time: clock,
  end_time: clock
});
export type AvailabilityWindow = z.infer<typeof AvailabilityWindow>;

export const ProfileInput = z.strictObject({
  medical_history: z.array(z.string()),
  short_term_goals: z.array(z.string()),
  long_term_goals: z.array(z.string()),
  availability: z.array(AvailabilityWindow)
});
export type ProfileInput = z.infer<typeof ProfileInput>;

export const Level = z.enum(["low", "medium", "high"]);
export type Level = z.infer<typeof Level>;

export const PlanType = z.enum(["strength", "cardio", "hybrid", "rehab"]);
export type PlanType = z.infer<typeof PlanType>;

export const Verdict = z.enum(["pass", "review", "fail"]);
export type Verdict = z.infer<typeof Verdict>;

export const MedicalSafetyOutput = z.strictObject({
  risk_level: Level,
  contraindicated_exercises: z.array(z.string()),
  recommended_focus_areas: z.array(z.string()),
  warnings: z.array(z.string())
});
export type MedicalSafetyOutput = z.infer<typeof MedicalSafetyOutput>;

export const SessionTemplate = z.strictObject({
  name: z.string().min(1),
  duration_minutes: minutes,
  exercise_categories: z.array(z.string()),
  intensity: Level
});

export const WorkoutPlanOutput = z.strictObject({
  plan_type: PlanType,
  weekly_sessions: z.int().nonnegative(),
  session_templates: z.array(SessionTemplate)
});
export type WorkoutPlanOutput = z.infer<typeof WorkoutPlanOutput>;

export const ScheduledSession = z.strictObject({
  date: isoDate,
  start_time: clock,
  duration_minutes: minutes,
  session_name: z.string().min(1)
});
export type ScheduledSession = z.infer<typeof ScheduledSession>;

export const SchedulingOutput = z.strictObject({
  scheduled_sessions: z.array(ScheduledSession)
});
export type SchedulingOutput = z.infer<typeof SchedulingOutput>;

const score = z.int().min(1).max(5);

export const EvaluationOutput = z.strictObject({
  scores: z.strictObject({
    safety: score,
    goal_alignment: score,
    realism: score,
    schedule_fit: score,
    clarity: score
  }),
  issues: z.array(z.string()),
  verdict: Verdict
});
export type EvaluationOutput = z.infer<typeof EvaluationOutput>;

/** Everything a training run accumulates, keyed the way the steps write it. */
export interface TrainingState {
  user_profile: ProfileInput;
  user_confirmation: boolean;
  medical_safety?: MedicalSafetyOutput;
  workout_plan?: WorkoutPlanOutput;
  schedule?: SchedulingOutput;
  evaluation?: EvaluationOutput;
  calendar_events?: CalendarEvent[];
}
