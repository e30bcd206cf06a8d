import type { ChainResult } from "./types/contracts.js";
import type { StepUsage } from "./types/llm.js";

export interface PartialChain {
  results: ChainResult[];
  requests: string[];
  usage: Array<StepUsage | null>;
}

/** A chain stopped at `stepIndex`; `partial` holds everything produced up to that point. */
export class ChainStoppedError extends Error {
  readonly stepIndex: number;
  readonly partial: PartialChain;

  constructor(message: string, stepIndex: number, cause: unknown, partial: PartialChain) {
    super(message, { cause });
    this.name = "ChainStoppedError";
    this.stepIndex = stepIndex;
    this.partial = partial;
  }
}

function reasonOf(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/** A step exhausted its attempts on thrown backend errors; the chain stopped there. */
export class StepFailedError extends ChainStoppedError {
  readonly attempts: number;

  constructor(stepIndex: number, attempts: number, cause: unknown, partial: PartialChain) {
    super(`Step ${stepIndex + 1} failed after ${attempts} attempts: ${reasonOf(cause)}`, stepIndex, cause, partial);
    this.name = "StepFailedError";
    this.attempts = attempts;
  }
}

/** A step succeeded but its artifact could not be saved. `partial` includes that step's result. */
export class PersistFailedError extends ChainStoppedError {
  constructor(stepIndex: number, cause: unknown, partial: PartialChain) {
    super(`Step ${stepIndex + 1} result could not be saved: ${reasonOf(cause)}`, stepIndex, cause, partial);
    this.name = "PersistFailedError";
  }
}

export class ArtifactStoreError extends Error {
  readonly key: string;

  constructor(key: string, message: string, cause?: unknown) {
    super(`${key}: ${message}`, cause === undefined ? undefined : { cause });
    this.name = "ArtifactStoreError";
    this.key = key;
  }
}
