import { describe, it, expect } from 'vitest';
import { describeSchema, validate } from '../schema/validator.js';
import { SchemaViolation, type Violation } from '../errors.js';
import { EvaluationOutput, MedicalSafetyOutput, WorkoutPlanOutput } from '../pipelines/training/schemas.js';
import { evaluation, medical, plan } from './fixtures.js';

function violationsOf(fn: () => unknown): readonly Violation[] {
  try {
    fn();
  } catch (e) {
    if (e instanceof SchemaViolation) return e.violations;
    throw e;
  }
  throw new Error('expected a SchemaViolation');
}

describe('schema validator', () => {
  it('returns the parsed payload when it conforms', () => {
    expect(validate(MedicalSafetyOutput, medical)).toEqual(medical);
    expect(validate(EvaluationOutput, evaluation)).toEqual(evaluation);
  });

  it('rejects a missing required field', () => {
    const { warnings: _dropped, ...rest } = medical;
    expect(violationsOf(() => validate(MedicalSafetyOutput, rest))).toEqual([
      { path: 'warnings', kind: 'missing', message: 'required field is missing' }
    ]);
  });

  it('rejects an enum value outside the closed set', () => {
    const v = violationsOf(() => validate(MedicalSafetyOutput, { ...medical, risk_level: 'extreme' }));
    expect(v.map(x => [x.path, x.kind])).toEqual([['risk_level', 'not_allowed']]);
  });

  it('rejects an undeclared extra field', () => {
    expect(violationsOf(() => validate(MedicalSafetyOutput, { ...medical, notes: 'hi' }))).toEqual([
      { path: 'notes', kind: 'unexpected', message: 'unexpected field' }
    ]);
  });

  it('reports every violation in nested lists in one pass', () => {
    const bad = {
      ...plan,
      weekly_sessions: '3',
      session_templates: [
        { ...plan.session_templates[0], rest: 'long' },
        { ...plan.session_templates[1], intensity: 'extreme' }
      ]
    };
    const v = violationsOf(() => validate(WorkoutPlanOutput, bad));
    expect(v).toHaveLength(3);
    expect(v.map(x => `${x.path}:${x.kind}`)).toEqual(expect.arrayContaining([
      'weekly_sessions:wrong_type',
      'session_templates[0].rest:unexpected',
      'session_templates[1].intensity:not_allowed'
    ]));
  });

  it('flags integer scores outside 1..5', () => {
    const bad = { ...evaluation, scores: { ...evaluation.scores, safety: 6 } };
    const v = violationsOf(() => validate(EvaluationOutput, bad));
    expect(v.map(x => [x.path, x.kind])).toEqual([['scores.safety', 'out_of_range']]);
  });

  it('treats a non-object payload as a type error at the root', () => {
    const v = violationsOf(() => validate(MedicalSafetyOutput, null));
    expect(v.map(x => [x.path, x.kind])).toEqual([['', 'wrong_type']]);
  });

  it('renders a closed JSON schema for prompts', () => {
    const shape = JSON.stringify(describeSchema(MedicalSafetyOutput));
    expect(shape).toContain('"additionalProperties":false');
    expect(shape).toContain('"enum":["low","medium","high"]');
  });
});
