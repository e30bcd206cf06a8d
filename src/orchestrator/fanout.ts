import type { ChainResult, ChainStep, VariableContext } from "../types/contracts.js";
import type { Backend, StepUsage } from "../types/llm.js";
import type { ArtifactStore } from "../types/artifacts.js";
import { resultToString } from "../prompt/coerce.js";
import { ChainStoppedError } from "../errors.js";
import { namespaceOf } from "../blackboard/index.js";
import * as log from "../utils/log.js";
import { defaultTopic, runChain } from "./run.js";
import { settleWithLimit } from "./pool.js";
import type { RetryPolicy } from "./retry.js";

export interface Evaluation {
  top: ChainResult | null;
  /** One score per backend, in backend order. */
  scores: number[];
}

/** Receives each backend's final result, or `null` where its chain failed or was empty. */
export type Evaluator = (finals: Array<ChainResult | null>) => Evaluation | Promise<Evaluation>;

export interface FanOutOptions {
  context: VariableContext;
  backends: readonly Backend[];
  steps: readonly ChainStep[];
  evaluator: Evaluator;
  nameOf?: (backend: Backend) => string;
  maxWorkers?: number;
  store?: ArtifactStore;
  topic?: string;
  retry?: Partial<RetryPolicy>;
}

export interface FanOutResult {
  topResult: ChainResult | null;
  names: string[];
  results: ChainResult[][];
  requests: string[][];
  usage: Array<Array<StepUsage | null>>;
  scores: number[];
  errors: Array<Error | null>;
}

const DEFAULT_MAX_WORKERS = 4;

/** Longest answer wins; scores are lengths normalized to the longest. */
export const lengthEvaluator: Evaluator = finals => {
  const lengths = finals.map(r => (r ? resultToString(r).length : 0));
  const max = Math.max(0, ...lengths);
  const scores = lengths.map(n => (max > 0 ? n / max : 0));
  const best = max > 0 ? lengths.indexOf(max) : finals.findIndex(r => r !== null);
  return { top: best === -1 ? null : finals[best], scores };
};

/**
 * Run the same chain against every backend, at most `maxWorkers` at a time.
 * Slot k of every output array always describes `backends[k]`. A failed chain
 * only fills its own slot (with its partial results and the error). An
 * unusable store topic is rejected before any backend runs.
 */
export async function runFanOut(opts: FanOutOptions): Promise<FanOutResult> {
  const { backends } = opts;
  const nameOf = opts.nameOf ?? ((b: Backend) => b.id);
  if (opts.store) {
    const topic = opts.topic ?? defaultTopic(opts.context);
    if (topic !== undefined) namespaceOf(topic);
  }
  let settled = 0;

  const outcomes = await settleWithLimit(
    backends,
    opts.maxWorkers ?? DEFAULT_MAX_WORKERS,
    backend =>
      runChain({
        context: opts.context,
        backend,
        steps: opts.steps,
        store: opts.store,
        topic: opts.topic,
        retry: opts.retry,
        returns: "usage",
      }),
    (index, outcome) => log.fanout(++settled, backends.length, nameOf(backends[index]), outcome.ok),
  );

  const out: FanOutResult = {
    topResult: null,
    names: backends.map(b => nameOf(b)),
    results: [],
    requests: [],
    usage: [],
    scores: [],
    errors: [],
  };

  for (const outcome of outcomes) {
    if (outcome.ok) {
      out.results.push(outcome.value.results);
      out.requests.push(outcome.value.requests);
      out.usage.push(outcome.value.usage);
      out.errors.push(null);
    } else if (outcome.error instanceof ChainStoppedError) {
      out.results.push(outcome.error.partial.results);
      out.requests.push(outcome.error.partial.requests);
      out.usage.push(outcome.error.partial.usage);
      out.errors.push(outcome.error);
    } else {
      out.results.push([]);
      out.requests.push([]);
      out.usage.push([]);
      out.errors.push(outcome.error instanceof Error ? outcome.error : new Error(String(outcome.error)));
    }
  }

  const finals = outcomes.map((outcome, k) =>
    outcome.ok && out.results[k].length > 0 ? out.results[k][out.results[k].length - 1] : null,
  );
  const evaluation = await opts.evaluator(finals);
  out.topResult = evaluation.top;
  out.scores = evaluation.scores;
  return out;
}
