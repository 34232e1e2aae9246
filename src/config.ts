import { z } from "zod";
import { ConfigError } from "./errors.js";

const count = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

const configSchema = z.object({
  MODEL: z.string().min(1).default("gpt-4o-mini"),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.url().default("https://api.openai.com/v1"),
  OPENAI_API_STYLE: z.enum(["chat", "responses"]).default("chat"),
  TEMPERATURE: z.coerce.number().min(0).max(2).default(0),
  MAX_TOKENS: z.coerce.number().int().positive().default(800),
  MAX_SCHEMA_RETRIES: count(2),
  TRANSPORT_RETRIES: count(2),
  RETRY_DELAY_MS: count(100),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
});

export interface AppConfig {
  model: string;
  apiKey?: string;
  baseUrl: string;
  apiStyle: "chat" | "responses";
  temperature: number;
  maxTokens: number;
  maxRetries: number;
  transportRetries: number;
  retryDelayMs: number;
  timeoutMs: number;
}

/** Read configuration from environment variables (after dotenv has populated them). */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // blank values fall back to defaults
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== ""));
  const parsed = configSchema.safeParse(present);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path.map(String).join(".");
    throw new ConfigError(`Invalid configuration for ${field}: ${issue.message}`, field);
  }
  const c = parsed.data;
  return {
    model: c.MODEL,
    apiKey: c.OPENAI_API_KEY,
    baseUrl: c.OPENAI_BASE_URL.replace(/\/+$/, ""),
    apiStyle: c.OPENAI_API_STYLE,
    temperature: c.TEMPERATURE,
    maxTokens: c.MAX_TOKENS,
    maxRetries: c.MAX_SCHEMA_RETRIES,
    transportRetries: c.TRANSPORT_RETRIES,
    retryDelayMs: c.RETRY_DELAY_MS,
    timeoutMs: c.REQUEST_TIMEOUT_MS,
  };
}
