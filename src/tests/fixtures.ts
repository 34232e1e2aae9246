import type {
  EvaluationOutput,
  MedicalSafetyOutput,
  ProfileInput,
  SchedulingOutput,
  WorkoutPlanOutput
} from '../pipelines/training/schemas.js';
import {
  EVALUATION_PROMPT,
  MEDICAL_SAFETY_PROMPT,
  SCHEDULING_PROMPT,
  WORKOUT_PLANNING_PROMPT
} from '../pipelines/training/prompts.js';
import type { Reply } from './fakes.js';

export const profile: ProfileInput = {
  medical_history: ['Mild lower back pain', 'No recent surgeries'],
  short_term_goals: ['Improve mobility', 'Lose 5 lbs'],
  long_term_goals: ['Build core strength', 'Run a 5K'],
  availability: [
    { date: '2026-02-10', start_time: '07:00', end_time: '08:00' },
    { date: '2026-02-12', start_time: '07:00', end_time: '08:00' },
    { date: '2026-02-14', start_time: '09:00', end_time: '10:00' }
  ]
};

export const medical: MedicalSafetyOutput = {
  risk_level: 'medium',
  contraindicated_exercises: ['deep squats'],
  recommended_focus_areas: ['core stability'],
  warnings: []
};

export const plan: WorkoutPlanOutput = {
  plan_type: 'hybrid',
  weekly_sessions: 3,
  session_templates: [
    { name: 'Core & Mobility', duration_minutes: 45, exercise_categories: ['core', 'mobility'], intensity: 'low' },
    { name: 'Easy Run', duration_minutes: 40, exercise_categories: ['cardio'], intensity: 'medium' }
  ]
};

export const schedule: SchedulingOutput = {
  scheduled_sessions: [
    { date: '2026-02-10', start_time: '07:00', duration_minutes: 45, session_name: 'Core & Mobility' },
    { date: '2026-02-12', start_time: '07:10', duration_minutes: 40, session_name: 'Easy Run' },
    { date: '2026-02-14', start_time: '09:00', duration_minutes: 60, session_name: 'Core & Mobility' }
  ]
};

export const evaluation: EvaluationOutput = {
  scores: { safety: 5, goal_alignment: 4, realism: 4, schedule_fit: 5, clarity: 4 },
  issues: [],
  verdict: 'pass'
};

export interface RouteOverrides {
  medical?: Reply[];
  plan?: Reply[];
  schedule?: Reply[];
  evaluation?: Reply[];
}

/** Conformant replies for every training step unless overridden. */
export function trainingRoutes(o: RouteOverrides = {}): Array<[string, Reply[]]> {
  return [
    [MEDICAL_SAFETY_PROMPT, o.medical ?? [JSON.stringify(medical)]],
    [WORKOUT_PLANNING_PROMPT, o.plan ?? [JSON.stringify(plan)]],
    [SCHEDULING_PROMPT, o.schedule ?? [JSON.stringify(schedule)]],
    [EVALUATION_PROMPT, o.evaluation ?? [JSON.stringify(evaluation)]]
  ];
}
