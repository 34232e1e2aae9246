import { TransportError } from "../errors.js";

const isRetryableStatus = (status: number) => status === 429 || status >= 500;

function networkFailure(e: unknown, timeoutMs?: number, status?: number): TransportError {
  const timedOut = e instanceof Error && e.name === "TimeoutError";
  const message = timedOut
    ? `LLM request timed out after ${timeoutMs}ms`
    : `LLM request failed: ${e instanceof Error ? e.message : String(e)}`;
  return new TransportError(message, true, status, { cause: e });
}

/**
 * POST a JSON body and return the decoded JSON reply.
 * Network failures and timeouts are retryable, while sending or while reading the body.
 * HTTP 429 and 5xx are retryable; other statuses and non-JSON bodies are not.
 */
export async function postJson(
  url: string,
  apiKey: string,
  body: unknown,
  timeoutMs?: number,
): Promise<unknown> {
  let res: Response;
  try {
    res = await fetch(url, {
      method: "POST",
      headers: {
        "content-type": "application/json",
        "authorization": `Bearer ${apiKey}`
      },
      body: JSON.stringify(body),
      signal: timeoutMs ? AbortSignal.timeout(timeoutMs) : undefined
    });
  } catch (e) {
    throw networkFailure(e, timeoutMs);
  }

  if (!res.ok) {
    let text: string;
    try {
      text = await res.text();
    } catch (e) {
      throw networkFailure(e, timeoutMs, res.status);
    }
    throw new TransportError(`LLM HTTP ${res.status}: ${text}`, isRetryableStatus(res.status), res.status);
  }
  try {
    return await res.json();
  } catch (e) {
    if (e instanceof SyntaxError) throw new TransportError("LLM reply was not JSON", false, res.status, { cause: e });
    throw networkFailure(e, timeoutMs, res.status);
  }
}
