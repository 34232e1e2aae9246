import { PayloadParseError } from "../errors.js";

const FENCE = /```(?:json)?\s*([\s\S]*?)```/i;

/** Index just past the `}` closing the object that opens at `start`, or -1. */
function balancedEnd(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (ch === "\\") i++;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "{") depth++;
    else if (ch === "}") {
      depth--;
      if (depth === 0) return i + 1;
    }
  }
  return -1;
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false; error: string } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (e) {
    return { ok: false, error: e instanceof Error ? e.message : String(e) };
  }
}

/**
 * Pull the JSON object out of a model reply. Accepts bare JSON, a fenced
 * ```json block, or an object embedded in prose (first balanced `{...}` that parses).
 */
export function extractJsonPayload(raw: string): unknown {
  const text = raw.trim();
  if (!text) throw new PayloadParseError("empty response");

  const direct = tryParse(text);
  if (direct.ok) return direct.value;

  const fenced = FENCE.exec(text);
  if (fenced) {
    const inner = tryParse(fenced[1].trim());
    if (inner.ok) return inner.value;
  }

  let lastError = direct.error;
  for (let start = text.indexOf("{"); start !== -1; start = text.indexOf("{", start + 1)) {
    const end = balancedEnd(text, start);
    if (end === -1) continue;
    const candidate = tryParse(text.slice(start, end));
    if (candidate.ok) return candidate.value;
    lastError = candidate.error;
  }
  throw new PayloadParseError(`no JSON object found in response (${lastError})`);
}
