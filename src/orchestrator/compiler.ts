import { z } from "zod";
import type { ChainStep, CompiledStep } from "../types/contracts.js";
import { extractRole } from "../prompt/role.js";

const stepSchema = z.union([
  z.string(),
  z.object({
    template: z.string(),
    expectsStructured: z.boolean().optional(),
    label: z.string().min(1).optional(),
  }),
]);

const chainSchema = z.array(stepSchema);

/** Legacy heuristic: a template mentioning "JSON" expects a structured reply. */
export function mentionsJson(template: string): boolean {
  return template.includes("JSON");
}

/**
 * Validate a step list and fill in per-step defaults. Throws a ZodError when a
 * step is neither a string nor a `{ template }` object.
 */
export function compileChain(steps: readonly ChainStep[]): CompiledStep[] {
  return chainSchema.parse(steps).map((step, index) => {
    if (typeof step === "string") {
      return { index, template: step, expectsStructured: mentionsJson(step), label: extractRole(step) };
    }
    return {
      index,
      template: step.template,
      expectsStructured: step.expectsStructured ?? mentionsJson(step.template),
      label: step.label ?? extractRole(step.template),
    };
  });
}
