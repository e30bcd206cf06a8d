import type { ChainResult, JsonValue } from "../types/contracts.js";

const FENCE = /```(?:json)?\s*([\s\S]*?)\s*```/;

const CLOSER: Record<string, string> = { "{": "}", "[": "]" };

function tryParse(text: string): JsonValue | undefined {
  try {
    const value: JsonValue = JSON.parse(text);
    return value;
  } catch {
    return undefined;
  }
}

/**
 * Close whatever a truncated JSON document left open: an unterminated string,
 * then every open object/array in nesting order.
 */
export function balanceJson(snippet: string): string {
  const open: string[] = [];
  let inString = false;
  let escaped = false;

  for (const ch of snippet) {
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "{" || ch === "[") open.push(CLOSER[ch]);
    else if ((ch === "}" || ch === "]") && open[open.length - 1] === ch) open.pop();
  }

  let fixed = snippet;
  if (inString) fixed += escaped ? '\\"' : '"';
  return fixed + open.reverse().join("");
}

/**
 * Best-effort extraction of JSON from a model reply. Never throws: anything
 * that cannot be recovered comes back as the raw reply.
 */
export function coerceResponse(raw: string): ChainResult {
  const text: ChainResult = { kind: "text", text: raw };

  const fence = FENCE.exec(raw);
  const candidate = fence ? fence[1] : raw;

  const starts = [candidate.indexOf("{"), candidate.indexOf("[")].filter(p => p !== -1);
  if (starts.length === 0) return text;
  const start = Math.min(...starts);

  const end = Math.max(candidate.lastIndexOf("}"), candidate.lastIndexOf("]"));
  const slice = end > start ? candidate.slice(start, end + 1) : candidate.slice(start);

  const parsed = tryParse(slice);
  if (parsed !== undefined) return { kind: "structured", value: parsed };

  const repaired = tryParse(balanceJson(candidate.slice(start).trimEnd()));
  if (repaired !== undefined) return { kind: "structured", value: repaired };

  return text;
}

export function isTextResult(result: ChainResult): result is { kind: "text"; text: string } {
  return result.kind === "text";
}

/** The value persisted for a result: text stays a string, structured data stays as-is. */
export function resultToJson(result: ChainResult): JsonValue {
  return result.kind === "text" ? result.text : result.value;
}

/** How a result is inlined into a request: text verbatim, anything else as compact JSON. */
export function resultToString(result: ChainResult): string {
  return result.kind === "text" ? result.text : JSON.stringify(result.value);
}
