import type { StepUsage } from "../types/llm.js";

export interface UsageTally {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface Pricing {
  inputPerToken: number;
  outputPerToken: number;
}

// gpt-4o-mini list price, USD
export const DEFAULT_PRICING: Pricing = { inputPerToken: 0.15 / 1_000_000, outputPerToken: 0.6 / 1_000_000 };

/** Sum per-step usage; steps whose backend reported nothing count as zero. */
export function tallyUsage(usage: ReadonlyArray<StepUsage | null>): UsageTally {
  let promptTokens = 0;
  let completionTokens = 0;
  for (const u of usage) {
    if (!u) continue;
    promptTokens += u.promptTokens;
    completionTokens += u.completionTokens;
  }
  return { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens };
}

export function estimateCost(tally: UsageTally, pricing: Pricing = DEFAULT_PRICING): number {
  return tally.promptTokens * pricing.inputPerToken + tally.completionTokens * pricing.outputPerToken;
}
