// src/orchestrator/run.ts
// Sequential chain execution: resolve → invoke (with retry) → coerce → persist → trace.
// Step i+1 never starts before step i's result is in history.

import type {
  ChainOutput,
  ChainOutputWithTrace,
  ChainOutputWithUsage,
  ChainResult,
  ChainStep,
  ReturnMode,
  TraceEntry,
  VariableContext,
} from "../types/contracts.js";
import type { Backend, BackendReply, StepUsage } from "../types/llm.js";
import type { ArtifactStore } from "../types/artifacts.js";
import { resolveReferences } from "../prompt/resolver.js";
import { coerceResponse, isTextResult, resultToJson } from "../prompt/coerce.js";
import { stepName } from "../prompt/role.js";
import { artifactLookup, artifactKey, namespaceOf, saveArtifact } from "../blackboard/index.js";
import { PersistFailedError, StepFailedError } from "../errors.js";
import * as log from "../utils/log.js";
import { compileChain } from "./compiler.js";
import { DEFAULT_RETRY_POLICY, RetriesExhaustedError, withRetry, type RetryPolicy } from "./retry.js";

export interface RunChainOptions {
  context: VariableContext;
  backend: Backend;
  steps: readonly ChainStep[];
  /** Persist every step result when given together with a topic. */
  store?: ArtifactStore;
  /** Defaults to `context.topic`, `context.subject_A` or `context.subject_a` when a store is given. */
  topic?: string;
  retry?: Partial<RetryPolicy>;
  returns?: ReturnMode;
}

const TEMPLATE_PREVIEW = 100;

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** First non-empty of `topic`, `subject_A`, `subject_a` in the context. */
export function defaultTopic(context: VariableContext): string | undefined {
  for (const key of ["topic", "subject_A", "subject_a"]) {
    const value = context[key];
    if (value !== undefined && String(value) !== "") return String(value);
  }
  return undefined;
}

function preview(template: string): string {
  return template.length > TEMPLATE_PREVIEW ? template.slice(0, TEMPLATE_PREVIEW) + "..." : template;
}

export async function runChain(opts: RunChainOptions & { returns: "trace" }): Promise<ChainOutputWithTrace>;
export async function runChain(opts: RunChainOptions & { returns: "usage" }): Promise<ChainOutputWithUsage>;
export async function runChain(opts: RunChainOptions): Promise<ChainOutput>;
export async function runChain(opts: RunChainOptions): Promise<ChainOutput | ChainOutputWithUsage | ChainOutputWithTrace> {
  const { backend, context, store } = opts;
  const steps = compileChain(opts.steps);
  const policy: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...opts.retry };
  const topic = opts.topic ?? (store ? defaultTopic(context) : undefined);
  // Reject an unusable topic before any backend call is spent.
  if (store && topic !== undefined) namespaceOf(topic);
  const lookup = store ? artifactLookup(store) : undefined;

  const results: ChainResult[] = [];
  const requests: string[] = [];
  const usage: Array<StepUsage | null> = [];
  const traceSteps: TraceEntry[] = [];
  let totalTokens = 0;

  for (const step of steps) {
    const role = step.label ?? `Step ${step.index + 1}`;
    const started = Date.now();
    log.step(backend.id, step.index, steps.length, role);

    const { request, artifactKeys } = resolveReferences(step.template, context, results, lookup);
    requests.push(request);

    let outcome: { reply: BackendReply; result: ChainResult };
    try {
      outcome = await withRetry(
        async () => {
          const reply = await backend.invoke(request);
          return { reply, result: coerceResponse(reply.text) };
        },
        policy,
        {
          accept: ({ result }) => !(step.expectsStructured && isTextResult(result)),
          onRetry: (attempt, reason) =>
            log.retry(
              backend.id,
              step.index,
              attempt,
              policy.maxAttempts,
              reason.kind === "error" ? errorMessage(reason.error) : "reply did not contain JSON",
            ),
        },
      );
    } catch (err) {
      const cause = err instanceof RetriesExhaustedError ? err.cause : err;
      const attempts = err instanceof RetriesExhaustedError ? err.attempts : 1;
      log.fail(backend.id, step.index, attempts, errorMessage(cause));
      throw new StepFailedError(step.index, attempts, cause, {
        results: [...results],
        requests: [...requests],
        usage: [...usage],
      });
    }

    const { reply, result } = outcome;
    results.push(result);
    usage.push(reply.usage);

    if (store && topic) {
      const name = stepName(step.label, step.index);
      try {
        saveArtifact(store, topic, name, resultToJson(result), {
          step_index: step.index,
          template: preview(step.template),
          artifacts_used: artifactKeys,
        });
      } catch (err) {
        log.unsaved(backend.id, step.index, errorMessage(err));
        throw new PersistFailedError(step.index, err, {
          results: [...results],
          requests: [...requests],
          usage: [...usage],
        });
      }
      log.artifact(artifactKey(topic, name));
    }

    const tokens = reply.usage ? reply.usage.promptTokens + reply.usage.completionTokens : null;
    totalTokens += tokens ?? 0;
    traceSteps.push({ stepIndex: step.index, role, request, result, tokens });
    log.done(backend.id, step.index, result.kind, Date.now() - started);
  }

  switch (opts.returns ?? "requests") {
    case "trace":
      return {
        results,
        requests,
        usage,
        trace: { steps: traceSteps, finalResult: results[results.length - 1] ?? null, totalTokens },
      };
    case "usage":
      return { results, requests, usage };
    case "requests":
      return { results, requests };
  }
}
