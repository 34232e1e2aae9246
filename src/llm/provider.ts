import type { CompletionArgs, CompletionOut } from "../types/llm.js";

/** Opaque text-completion service. Implementations throw TransportError on transport failure. */
export interface LLMProvider {
  complete(args: CompletionArgs): Promise<CompletionOut>;
}
