export type Role = "system" | "user" | "assistant";

export interface Message {
  role: Role;
  content: string;
}

export interface CompletionArgs {
  model: string;
  messages: Message[];
  temperature?: number;
  max_tokens?: number;
}

export interface CompletionOut {
  content: string;
  finish_reason?: "stop" | "length" | "content_filter";
  usage?: { prompt_tokens: number; completion_tokens: number; total_tokens: number };
}

/** Token counts reported by a backend for one call. */
export interface StepUsage {
  promptTokens: number;
  completionTokens: number;
}

export interface BackendReply {
  text: string;
  usage: StepUsage | null;
}

/**
 * A text-generation backend as the orchestrator sees it. Transport failures
 * must be thrown, never encoded in `text`, so retries can tell them apart from
 * a well-formed but unusable reply.
 */
export interface Backend {
  id: string;
  invoke(request: string): Promise<BackendReply>;
}

/** Anything that can answer a chat completion; transport and auth live behind it. */
export interface LLMProvider {
  complete(args: CompletionArgs): Promise<CompletionOut>;
}
