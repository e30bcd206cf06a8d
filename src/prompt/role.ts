// Heuristic persona detection over a step's unresolved template. Callers who
// want a fixed label pass `StepSpec.label` instead.

const ROLE_PATTERNS = [
  /You are an? ([^.,\n]+(?:specializing in [^.,\n]+)?)/i,
  /As an? ([^.,\n]+),/i,
];

export function extractRole(template: string): string | null {
  for (const pattern of ROLE_PATTERNS) {
    const match = pattern.exec(template);
    if (match) return match[1].trim().replace(/ {2,}/g, " ");
  }
  return null;
}

export function snakeCase(label: string): string {
  return label.toLowerCase().replace(/[^a-z0-9]+/g, "_").replace(/^_+|_+$/g, "");
}

/** Artifact name for step `index`: the snake-cased label, else `step_<n>`. */
export function stepName(label: string | null, index: number): string {
  const name = label ? snakeCase(label) : "";
  return name || `step_${index + 1}`;
}
