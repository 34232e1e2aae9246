// src/llm/structured.ts
// Schema-enforced call protocol: request → validate → correct → resend, with a visible attempt
// counter. Transitions live in `advance` so the retry budget can be tested without a provider.

import type { z } from "zod";
import { AgentOutputInvalid, PayloadParseError, SchemaViolation } from "../errors.js";
import { COLOR, LOG_CALLS, clip, fmtMs } from "../log.js";
import { extractJsonPayload } from "../prompt/extract.js";
import { renderCorrection, renderStructuredRequest } from "../prompt/renderer.js";
import { validate } from "../schema/validator.js";
import type { Message } from "../types/llm.js";
import type { LLMProvider } from "./provider.js";
import { isRetryableTransport, sleep, withRetry } from "./retry.js";

export const DEFAULT_MAX_RETRIES = 2;

interface CallBase {
  attempt: number;
  maxAttempts: number;
  messages: readonly Message[];
}

export type CallState<T> =
  | (CallBase & { phase: "sent" })
  | (CallBase & { phase: "validating"; raw: string })
  | (CallBase & { phase: "correcting"; raw: string; lastError: string })
  | (CallBase & { phase: "succeeded"; data: T })
  | (CallBase & { phase: "exhausted"; lastError: string });

export type CallPhase = CallState<unknown>["phase"];

export type CallEvent<T> =
  | { type: "received"; raw: string }
  | { type: "accepted"; data: T }
  | { type: "rejected"; error: string }
  | { type: "resent" };

export function initialCallState<T>(messages: readonly Message[], maxRetries: number): CallState<T> {
  if (!Number.isInteger(maxRetries) || maxRetries < 0) {
    throw new RangeError(`maxRetries must be a non-negative integer, got ${maxRetries}`);
  }
  return { phase: "sent", attempt: 1, maxAttempts: maxRetries + 1, messages };
}

export function advance<T>(state: CallState<T>, event: CallEvent<T>): CallState<T> {
  const { attempt, maxAttempts, messages } = state;
  const base = { attempt, maxAttempts, messages };
  if (state.phase === "sent" && event.type === "received") {
    return { ...base, phase: "validating", raw: event.raw };
  }
  if (state.phase === "validating" && event.type === "accepted") {
    return { ...base, phase: "succeeded", data: event.data };
  }
  if (state.phase === "validating" && event.type === "rejected") {
    return attempt < maxAttempts
      ? { ...base, phase: "correcting", raw: state.raw, lastError: event.error }
      : { ...base, phase: "exhausted", lastError: event.error };
  }
  if (state.phase === "correcting" && event.type === "resent") {
    return {
      phase: "sent",
      attempt: attempt + 1,
      maxAttempts,
      messages: [...messages, { role: "assistant", content: state.raw }, renderCorrection(state.lastError)]
    };
  }
  throw new Error(`structured call: illegal transition ${state.phase} + ${event.type}`);
}

export interface StructuredRequest<S extends z.ZodType> {
  /** Label used in logs and errors, usually the step id. */
  name: string;
  instruction: string;
  schema: S;
  context: unknown;
  maxRetries?: number;
  /** Rules beyond the schema; each returned string is reported back to the model like a violation. */
  check?: (data: z.output<S>) => readonly string[];
}

export interface StructuredResult<T> {
  data: T;
  retries: number;
  attempts: number;
  messages: readonly Message[];
}

export type StructuredCaller = <S extends z.ZodType>(req: StructuredRequest<S>) => Promise<StructuredResult<z.output<S>>>;

export interface CallerOptions {
  provider: LLMProvider;
  model: string;
  temperature?: number;
  maxTokens?: number;
  maxRetries?: number;
  transportRetries?: number;
  retryDelayMs?: number;
  timeoutMs?: number;
}

type Judgement<T> = { ok: true; data: T } | { ok: false; error: string };

function judge<S extends z.ZodType>(req: StructuredRequest<S>, raw: string): Judgement<z.output<S>> {
  try {
    const data = validate(req.schema, extractJsonPayload(raw));
    const problems = req.check?.(data) ?? [];
    if (problems.length) return { ok: false, error: problems.join("; ") };
    return { ok: true, data };
  } catch (e) {
    if (e instanceof SchemaViolation || e instanceof PayloadParseError) return { ok: false, error: e.message };
    throw e;
  }
}

export async function callStructured<S extends z.ZodType>(
  req: StructuredRequest<S>,
  opts: CallerOptions,
): Promise<StructuredResult<z.output<S>>> {
  const delayMs = opts.retryDelayMs ?? 100;
  let state = initialCallState<z.output<S>>(
    renderStructuredRequest(req.instruction, req.schema, req.context),
    req.maxRetries ?? opts.maxRetries ?? DEFAULT_MAX_RETRIES
  );

  for (;;) {
    switch (state.phase) {
      case "sent": {
        const t0 = Date.now();
        const messages = [...state.messages];
        const out = await withRetry(
          () => opts.provider.complete({
            model: opts.model,
            messages,
            temperature: opts.temperature ?? 0,
            max_tokens: opts.maxTokens,
            response_format: { type: "json_object" },
            timeout_ms: opts.timeoutMs
          }),
          {
            attempts: (opts.transportRetries ?? 2) + 1,
            backoff: delayMs,
            retryOn: isRetryableTransport,
            onRetry: (error, n) => {
              if (LOG_CALLS) console.log(COLOR.yellow(`    ↻ ${req.name} transport retry ${n}: ${error instanceof Error ? error.message : String(error)}`));
            }
          }
        );
        if (LOG_CALLS) console.log(COLOR.gray(`    ↳ ${req.name} attempt ${state.attempt}/${state.maxAttempts} (${fmtMs(Date.now() - t0)})`));
        state = advance<z.output<S>>(state, { type: "received", raw: out.content });
        break;
      }
      case "validating": {
        const verdict = judge(req, state.raw);
        state = verdict.ok
          ? advance<z.output<S>>(state, { type: "accepted", data: verdict.data })
          : advance<z.output<S>>(state, { type: "rejected", error: verdict.error });
        break;
      }
      case "correcting":
        if (LOG_CALLS) console.log(COLOR.magenta(`    ✗ ${req.name} invalid output: ${clip(state.lastError)}`));
        await sleep(delayMs);
        state = advance<z.output<S>>(state, { type: "resent" });
        break;
      case "succeeded":
        return { data: state.data, retries: state.attempt - 1, attempts: state.attempt, messages: state.messages };
      case "exhausted":
        throw new AgentOutputInvalid(req.name, state.attempt, state.lastError);
    }
  }
}

export function createStructuredCaller(opts: CallerOptions): StructuredCaller {
  return req => callStructured(req, opts);
}
