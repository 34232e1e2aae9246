import { z } from "zod";
import { TransportError } from "../errors.js";
import type { CompletionArgs, CompletionOut } from "../types/llm.js";
import { postJson } from "./http.js";
import type { LLMProvider } from "./provider.js";

const Segment = z.object({ type: z.string().optional(), text: z.string().optional() });

const ResponsesReply = z.object({
  status: z.string().optional(),
  output_text: z.string().optional(),
  output: z.array(z.object({
    role: z.string().optional(),
    content: z.union([z.string(), z.array(Segment)]).optional()
  })).optional(),
  usage: z.object({ input_tokens: z.number(), output_tokens: z.number() }).nullish()
});

type Reply = z.infer<typeof ResponsesReply>;

function assistantText(data: Reply): string {
  if (data.output_text !== undefined) return data.output_text;
  const items = data.output ?? [];
  const msg = items.find(x => x.role === "assistant") ?? items[items.length - 1];
  if (!msg?.content) return "";
  if (typeof msg.content === "string") return msg.content;
  const textSeg = msg.content.find(c => c.type === "output_text" || c.type === "text");
  return textSeg?.text ?? msg.content.map(c => c.text ?? "").join("\n");
}

/**
 * OpenAI "Responses" API adapter. Chat-style messages are sent as the `input`
 * array and the JSON response format becomes `text.format`.
 */
export class OpenAIResponses implements LLMProvider {
  constructor(private apiKey: string, private baseUrl = "https://api.openai.com/v1") {}

  async complete(args: CompletionArgs): Promise<CompletionOut> {
    const payload = {
      model: args.model,
      input: args.messages.map(m => ({ role: m.role, content: m.content })),
      temperature: args.temperature ?? 0,
      max_output_tokens: args.max_tokens ?? 800,
      text: args.response_format ? { format: args.response_format } : undefined
    };

    const data = await postJson(`${this.baseUrl}/responses`, this.apiKey, payload, args.timeout_ms);
    const parsed = ResponsesReply.safeParse(data);
    if (!parsed.success) {
      throw new TransportError(`Unexpected responses payload: ${parsed.error.message}`, false);
    }

    const usage = parsed.data.usage;
    return {
      content: assistantText(parsed.data),
      finish_reason: parsed.data.status === "completed" ? "stop" : parsed.data.status,
      usage: usage
        ? {
            prompt_tokens: usage.input_tokens,
            completion_tokens: usage.output_tokens,
            total_tokens: usage.input_tokens + usage.output_tokens
          }
        : undefined
    };
  }
}
