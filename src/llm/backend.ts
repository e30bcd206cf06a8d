import type { Backend, CompletionArgs, LLMProvider, Message } from "../types/llm.js";

export interface ProviderBackendConfig {
  provider: LLMProvider;
  model: string;
  /** Defaults to the model name. */
  id?: string;
  temperature?: number;
  maxTokens?: number;
  system?: string;
}

/** Wrap a chat provider as a chain backend: one user message per request. */
export function createProviderBackend(config: ProviderBackendConfig): Backend {
  return {
    id: config.id ?? config.model,
    async invoke(request) {
      const messages: Message[] = config.system
        ? [{ role: "system", content: config.system }, { role: "user", content: request }]
        : [{ role: "user", content: request }];
      const args: CompletionArgs = {
        model: config.model,
        messages,
        temperature: config.temperature ?? 0.2,
        max_tokens: config.maxTokens ?? 800,
      };
      const out = await config.provider.complete(args);
      return {
        text: out.content,
        usage: out.usage
          ? { promptTokens: out.usage.prompt_tokens, completionTokens: out.usage.completion_tokens }
          : null,
      };
    },
  };
}

/** One backend per model name, all sharing `provider`. */
export function createProviderBackends(
  provider: LLMProvider,
  models: readonly string[],
  options: Omit<ProviderBackendConfig, "provider" | "model" | "id"> = {},
): Backend[] {
  return models.map(model => createProviderBackend({ ...options, provider, model }));
}
