import type { CompletionArgs, CompletionOut, LLMProvider } from "../types/llm.js";

const DEFAULT_RESPONSE = '{"result":"mock"}';

export type MockReply = string | ((args: CompletionArgs, call: number) => string | Promise<string>);

/**
 * Mock provider for tests and dry runs. A list of strings is replayed in order,
 * falling back to a default reply; a function computes each reply.
 */
export function createMockProvider(replies: readonly string[] | MockReply = []): LLMProvider & { calls: CompletionArgs[] } {
  const calls: CompletionArgs[] = [];
  return {
    calls,
    async complete(args): Promise<CompletionOut> {
      const call = calls.length;
      calls.push(args);
      let content: string;
      if (typeof replies === "string") content = replies;
      else if (typeof replies === "function") content = await replies(args, call);
      else content = replies[call] ?? DEFAULT_RESPONSE;
      return { content, finish_reason: "stop" };
    },
  };
}
