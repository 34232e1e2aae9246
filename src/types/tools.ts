/**
 * A side effect outside the generative service. `invoke` is synchronous and
 * carries no idempotency guarantee: repeated calls may repeat the effect.
 */
export interface ToolSpec<I, O> {
  name: string;
  description: string;
  invoke(args: I): O;
}
