/**
 * "Machine Learning" -> "machine_learning", "Quantum Physics!" -> "quantum_physics".
 * Topics that normalize identically share a namespace.
 */
export function normalizeTopic(topic: string): string {
  return topic.toLowerCase().replace(/[^a-z0-9]+/g, "_").replace(/^_+|_+$/g, "");
}

export function artifactKey(topic: string, name: string): string {
  return `${normalizeTopic(topic)}:${name}`;
}

export function splitKey(key: string): { topic: string; name: string } {
  const ix = key.indexOf(":");
  return ix === -1 ? { topic: key, name: "" } : { topic: key.slice(0, ix), name: key.slice(ix + 1) };
}

/** `*` matches any run of characters; everything else is literal and the match is anchored. */
export function patternToRegExp(pattern: string): RegExp {
  const body = pattern
    .split("*")
    .map(part => part.replace(/[.+?^${}()|[\]\\]/g, "\\$&"))
    .join(".*");
  return new RegExp(`^${body}$`);
}
