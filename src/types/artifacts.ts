import type { JsonValue } from "./contracts.js";

export interface ArtifactMetadata {
  created_at: string;
  topic: string;
  name: string;
  [field: string]: JsonValue;
}

export interface Artifact {
  data: JsonValue;
  metadata: ArtifactMetadata;
}

export interface ArtifactStore {
  root: string;
  artifacts: Map<string, Artifact>;
}

/** Returns `undefined` when nothing is stored under `topic:name`. */
export type ArtifactLookup = (topic: string, name: string) => JsonValue | undefined;
