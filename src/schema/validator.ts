import { z } from "zod";
import { SchemaViolation, type Violation, type ViolationKind } from "../errors.js";

type Issue = z.ZodError["issues"][number];

export function formatPath(path: readonly PropertyKey[]): string {
  let out = "";
  for (const seg of path) {
    if (typeof seg === "number") out += `[${seg}]`;
    else out += out ? `.${String(seg)}` : String(seg);
  }
  return out;
}

function valueAt(payload: unknown, path: readonly PropertyKey[]): { found: boolean; value: unknown } {
  let cur: unknown = payload;
  for (const seg of path) {
    if (typeof cur !== "object" || cur === null || !(seg in cur)) return { found: false, value: undefined };
    cur = Reflect.get(cur, seg);
  }
  return { found: true, value: cur };
}

function kindOf(issue: Issue, payload: unknown): ViolationKind {
  switch (issue.code) {
    case "invalid_type": {
      const at = valueAt(payload, issue.path);
      return !at.found || at.value === undefined ? "missing" : "wrong_type";
    }
    case "invalid_value":
      return "not_allowed";
    case "too_small":
    case "too_big":
      return "out_of_range";
    default:
      return "invalid";
  }
}

export function toViolations(issues: readonly Issue[], payload: unknown): Violation[] {
  const out: Violation[] = [];
  for (const issue of issues) {
    if (issue.code === "unrecognized_keys") {
      // one entry per undeclared field so callers can point at each of them
      for (const key of issue.keys) {
        out.push({ path: formatPath([...issue.path, key]), kind: "unexpected", message: "unexpected field" });
      }
      continue;
    }
    const kind = kindOf(issue, payload);
    out.push({
      path: formatPath(issue.path),
      kind,
      message: kind === "missing" ? "required field is missing" : issue.message,
    });
  }
  return out;
}

/**
 * Validate a candidate payload against a closed schema.
 * Returns the parsed payload, or throws {@link SchemaViolation} listing every
 * violation zod found in the pass.
 */
export function validate<T extends z.ZodType>(schema: T, payload: unknown): z.output<T> {
  const res = schema.safeParse(payload);
  if (res.success) return res.data;
  throw new SchemaViolation(toViolations(res.error.issues, payload));
}

/** JSON Schema rendering of a zod schema, embedded in prompts as the required output shape. */
export function describeSchema(schema: z.ZodType): z.core.JSONSchema.BaseSchema {
  return z.toJSONSchema(schema);
}
