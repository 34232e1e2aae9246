import { MissingDependency, StateConflict } from "../errors.js";

export const INPUT_OWNER = "input";

export interface ArtifactRecord {
  owner: string;
  at: string; // ISO timestamp
}

/**
 * Write-once, grow-only state shared by the steps of one run.
 * Every write returns a new blackboard; stored values are deep-frozen.
 */
export interface Blackboard<S> {
  readonly values: Readonly<Partial<S>>;
  readonly records: ReadonlyMap<keyof S, ArtifactRecord>;
}

/** Read-only view holding exactly the declared keys, all present. */
export type StepInput<S, R extends keyof S> = Readonly<Required<Pick<S, R>>>;

// Recurses into already-frozen objects as well.
export function deepFreeze<T>(value: T, seen: WeakSet<object> = new WeakSet()): T {
  if (typeof value === "object" && value !== null && !seen.has(value)) {
    seen.add(value);
    for (const inner of Object.values(value)) deepFreeze(inner, seen);
    Object.freeze(value);
  }
  return value;
}

export function createBlackboard<S>(seed: Partial<S> = {}): Blackboard<S> {
  const values: Partial<S> = {};
  const records = new Map<keyof S, ArtifactRecord>();
  const at = new Date().toISOString();
  for (const key in seed) {
    if (seed[key] === undefined) continue;
    values[key] = deepFreeze(seed[key]);
    records.set(key, { owner: INPUT_OWNER, at });
  }
  return { values: Object.freeze(values), records };
}

export function read<S, K extends keyof S>(bb: Blackboard<S>, key: K): S[K] | undefined {
  const values: Partial<S> = bb.values;
  return values[key];
}

export function write<S, K extends keyof S>(bb: Blackboard<S>, key: K, value: S[K], owner: string): Blackboard<S> {
  const prior = bb.records.get(key);
  if (prior) throw new StateConflict(String(key), prior.owner, owner);
  const values: Partial<S> = { ...bb.values };
  values[key] = deepFreeze(value);
  const records = new Map(bb.records);
  records.set(key, { owner, at: new Date().toISOString() });
  return { values: Object.freeze(values), records };
}

export function exists<S>(bb: Blackboard<S>, key: keyof S): boolean {
  return bb.records.has(key);
}

export function keys<S>(bb: Blackboard<S>): Array<keyof S> {
  return Array.from(bb.records.keys());
}

export function ownerOf<S>(bb: Blackboard<S>, key: keyof S): string | undefined {
  return bb.records.get(key)?.owner;
}

function hasAll<S, R extends keyof S>(view: Partial<S>, required: readonly R[]): view is Partial<S> & Required<Pick<S, R>> {
  return required.every(k => view[k] !== undefined);
}

/** Project the declared keys for `stepId`; throws MissingDependency on the first absent one. */
export function pick<S, R extends keyof S>(bb: Blackboard<S>, required: readonly R[], stepId: string): StepInput<S, R> {
  const values: Partial<S> = bb.values;
  const view: Partial<S> = {};
  for (const key of required) {
    if (values[key] === undefined) throw new MissingDependency(stepId, String(key));
    view[key] = values[key];
  }
  if (!hasAll(view, required)) throw new MissingDependency(stepId, required.map(String).join(", "));
  return Object.freeze(view);
}
