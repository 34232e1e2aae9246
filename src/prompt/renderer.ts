import type { z } from "zod";
import type { Message } from "../types/llm.js";
import { describeSchema } from "../schema/validator.js";

export const CORRECTION_PREFIX = "Your last response failed schema validation";

export function formatInstructions(schema: z.ZodType): string {
  return [
    "The output must be a single JSON object that conforms to the JSON schema below.",
    "Every required property must be present, enumerated values must be used verbatim,",
    "and no properties other than the declared ones are allowed.",
    "",
    "```json",
    JSON.stringify(describeSchema(schema), null, 2),
    "```"
  ].join("\n");
}

/** System turn: instruction plus output shape. User turn: the serialized context. */
export function renderStructuredRequest(instruction: string, schema: z.ZodType, context: unknown): Message[] {
  return [
    { role: "system", content: `${instruction}\n\n${formatInstructions(schema)}` },
    { role: "user", content: JSON.stringify(context) }
  ];
}

export function renderCorrection(error: string): Message {
  return {
    role: "user",
    content: `${CORRECTION_PREFIX}: ${error}. Return ONLY valid JSON matching the schema.`
  };
}
