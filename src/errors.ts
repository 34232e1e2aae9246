export type ViolationKind =
  | "missing"
  | "wrong_type"
  | "not_allowed"
  | "unexpected"
  | "out_of_range"
  | "invalid";

export interface Violation {
  path: string;
  kind: ViolationKind;
  message: string;
}

export class SchemaViolation extends Error {
  constructor(public readonly violations: readonly Violation[]) {
    super(violations.map(v => `${v.path || "<root>"}: ${v.message}`).join("; "));
    this.name = "SchemaViolation";
  }
}

/** The model reply carried no parseable JSON payload. */
export class PayloadParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PayloadParseError";
  }
}

export class AgentOutputInvalid extends Error {
  constructor(
    public readonly callName: string,
    public readonly attempts: number,
    public readonly lastError: string,
  ) {
    super(`Agent output validation failed for ${callName} after ${attempts} attempt(s): ${lastError}`);
    this.name = "AgentOutputInvalid";
  }
}

export class TransportError extends Error {
  constructor(
    message: string,
    public readonly retryable: boolean,
    public readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "TransportError";
  }

  get isRateLimit(): boolean {
    return this.status === 429;
  }

  get isServerError(): boolean {
    return this.status !== undefined && this.status >= 500;
  }
}

export class MissingDependency extends Error {
  constructor(
    public readonly stepId: string,
    public readonly key: string,
  ) {
    super(`Step "${stepId}" requires "${key}" but it is not in the state`);
    this.name = "MissingDependency";
  }
}

export class MissingField extends Error {
  constructor(public readonly field: string) {
    super(`${field} is required`);
    this.name = "MissingField";
  }
}

export class AdapterFailure extends Error {
  constructor(
    public readonly tool: string,
    public readonly itemIndex: number,
    public readonly completed: readonly unknown[],
    options?: { cause?: unknown },
  ) {
    const reason = options?.cause instanceof Error ? options.cause.message : String(options?.cause);
    super(`${tool} failed on item ${itemIndex} (${completed.length} already applied): ${reason}`, options);
    this.name = "AdapterFailure";
  }
}

export class StateConflict extends Error {
  constructor(
    public readonly key: string,
    public readonly owner: string,
    public readonly attemptedBy: string,
  ) {
    super(`"${attemptedBy}" cannot write "${key}": already written by "${owner}"`);
    this.name = "StateConflict";
  }
}

export class GraphError extends Error {
  constructor(
    message: string,
    public readonly stepId?: string,
  ) {
    super(message);
    this.name = "GraphError";
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export class PipelineError extends Error {
  constructor(
    public readonly stepId: string,
    cause: unknown,
  ) {
    super(`Step "${stepId}" failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = "PipelineError";
  }
}
