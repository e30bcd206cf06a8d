import type { StepUsage } from "./llm.js";

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type VariableContext = Readonly<Record<string, string | number | boolean>>;

/** Outcome of coercing one backend reply. */
export type ChainResult =
  | { kind: "structured"; value: JsonValue }
  | { kind: "text"; text: string };

export interface StepSpec {
  template: string;
  /** Retry replies that do not coerce to JSON. Defaults to `template.includes("JSON")`. */
  expectsStructured?: boolean;
  /** Overrides the role phrase detected in the template. */
  label?: string;
}

export type ChainStep = string | StepSpec;

export interface CompiledStep {
  index: number;
  template: string;
  expectsStructured: boolean;
  label: string | null;
}

export interface TraceEntry {
  stepIndex: number;
  role: string;
  request: string;
  result: ChainResult;
  tokens: number | null;
}

export interface ExecutionTrace {
  steps: TraceEntry[];
  finalResult: ChainResult | null;
  totalTokens: number;
}

export type ReturnMode = "requests" | "usage" | "trace";

export interface ChainOutput {
  results: ChainResult[];
  requests: string[];
}

export interface ChainOutputWithUsage extends ChainOutput {
  usage: Array<StepUsage | null>;
}

export interface ChainOutputWithTrace extends ChainOutputWithUsage {
  trace: ExecutionTrace;
}
