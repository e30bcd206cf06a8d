import type { ChainResult, JsonObject, JsonValue, VariableContext } from "../types/contracts.js";
import type { ArtifactLookup } from "../types/artifacts.js";
import { normalizeTopic } from "../blackboard/keys.js";
import { resultToString } from "./coerce.js";

export interface ResolvedRequest {
  request: string;
  /** Normalized `topic:name` keys of every artifact inlined into the request. */
  artifactKeys: string[];
}

const ARTIFACT_REF = /\{\{artifact:([^:}]+):([^}]+)\}\}/g;

function isJsonObject(value: JsonValue): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function inline(value: JsonValue): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

/** The object behind a prior result, parsing text results that hold a JSON object. */
function asObject(result: ChainResult): JsonObject | null {
  if (result.kind === "structured") return isJsonObject(result.value) ? result.value : null;
  try {
    const parsed: JsonValue = JSON.parse(result.text);
    return isJsonObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

function resolveArtifacts(template: string, lookup: ArtifactLookup, used: string[]): string {
  return template.replace(ARTIFACT_REF, (_match, topic: string, name: string) => {
    const found = lookup(topic, name);
    if (found === undefined) return `{{artifact:${topic}:${name} [NOT FOUND]}}`;
    used.push(`${normalizeTopic(topic)}:${name}`);
    return inline(found);
  });
}

function resolveVariables(template: string, context: VariableContext): string {
  let out = template;
  for (const [key, value] of Object.entries(context)) {
    out = out.replaceAll(`{{${key}}}`, () => String(value));
  }
  return out;
}

function resolveOutput(template: string, back: number, prior: ChainResult): string {
  const whole = `{{output[-${back}]}}`;
  const fieldRef = new RegExp(`\\{\\{output\\[-${back}\\]\\.([^}]+)\\}\\}`, "g");
  const obj = asObject(prior);

  if (obj) {
    const json = JSON.stringify(obj);
    return template
      .replaceAll(whole, () => json)
      .replace(fieldRef, (match, field: string) =>
        Object.hasOwn(obj, field) ? inline(obj[field]) : match,
      );
  }

  const text = resultToString(prior);
  return template.replaceAll(whole, () => text).replace(fieldRef, () => text);
}

/**
 * Turn a step template into a concrete request.
 *
 * Passes run artifacts → variables → history. History references are resolved
 * from the farthest back (`-currentIndex`) to `-1`. Missing references never
 * throw: an unknown artifact gets a visible `[NOT FOUND]` marker and a field
 * lookup on a non-object falls back to the whole prior result.
 */
export function resolveReferences(
  template: string,
  context: VariableContext,
  history: readonly ChainResult[],
  lookup?: ArtifactLookup,
): ResolvedRequest {
  const artifactKeys: string[] = [];
  let request = lookup ? resolveArtifacts(template, lookup, artifactKeys) : template;
  request = resolveVariables(request, context);

  const current = history.length;
  for (let back = current; back >= 1; back--) {
    request = resolveOutput(request, back, history[current - back]);
  }
  return { request, artifactKeys };
}
