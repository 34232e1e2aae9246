import { z } from "zod";
import { TransportError } from "../errors.js";
import type { CompletionArgs, CompletionOut } from "../types/llm.js";
import { postJson } from "./http.js";
import type { LLMProvider } from "./provider.js";

const Usage = z.object({
  prompt_tokens: z.number(),
  completion_tokens: z.number(),
  total_tokens: z.number()
});

const ChatCompletion = z.object({
  choices: z.array(z.object({
    message: z.object({ content: z.string().nullish() }),
    finish_reason: z.string().nullish()
  })).min(1),
  usage: Usage.nullish()
});

export class OpenAIChatCompletions implements LLMProvider {
  constructor(
    private apiKey: string,
    private baseUrl: string = "https://api.openai.com/v1"
  ) {}

  async complete(args: CompletionArgs): Promise<CompletionOut> {
    const body = {
      model: args.model,
      messages: args.messages.map(m => ({ role: m.role, content: m.content })),
      temperature: args.temperature ?? 0,
      max_tokens: args.max_tokens ?? 800,
      response_format: args.response_format
    };

    const data = await postJson(`${this.baseUrl}/chat/completions`, this.apiKey, body, args.timeout_ms);
    const parsed = ChatCompletion.safeParse(data);
    if (!parsed.success) {
      throw new TransportError(`Unexpected chat completion payload: ${parsed.error.message}`, false);
    }

    const [choice] = parsed.data.choices;
    return {
      content: choice.message.content ?? "",
      finish_reason: choice.finish_reason ?? undefined,
      usage: parsed.data.usage ?? undefined
    };
  }
}
