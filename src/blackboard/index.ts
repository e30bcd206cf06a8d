import { z } from "zod";
import type { JsonValue } from "../types/contracts.js";
import type { Artifact, ArtifactLookup, ArtifactMetadata, ArtifactStore } from "../types/artifacts.js";
import { ArtifactStoreError } from "../errors.js";
import { loadArtifactFiles, removeArtifactFiles, writeArtifactFiles } from "./fsStore.js";
import { artifactKey, normalizeTopic, patternToRegExp, splitKey } from "./keys.js";

export { artifactKey, normalizeTopic, patternToRegExp, splitKey } from "./keys.js";

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)]),
);

// Stamped fields may be missing from older records; the loader fills them in.
const metadataSchema = z
  .object({ created_at: z.string().optional(), topic: z.string().optional(), name: z.string().optional() })
  .catchall(jsonValueSchema);

type StoredMetadata = z.infer<typeof metadataSchema>;

/** Open (or create) a store rooted at `root`, loading every persisted artifact into memory. */
export function openArtifactStore(root: string): ArtifactStore {
  const artifacts = new Map<string, Artifact>();
  for (const file of loadArtifactFiles(root)) {
    const parsed = metadataSchema.safeParse(file.metadata);
    const stored: StoredMetadata = parsed.success ? parsed.data : {};
    const metadata: ArtifactMetadata = {
      ...stored,
      created_at: stored.created_at ?? file.mtime.toISOString(),
      topic: stored.topic ?? file.topic,
      name: stored.name ?? file.name,
    };
    artifacts.set(`${file.topic}:${file.name}`, { data: file.data, metadata });
  }
  return { root, artifacts };
}

/** The namespace `topic` maps to; throws when nothing of it survives normalization. */
export function namespaceOf(topic: string): string {
  const ns = normalizeTopic(topic);
  if (!ns) throw new ArtifactStoreError(topic, `topic "${topic}" normalizes to an empty namespace`);
  return ns;
}

function checkName(key: string, name: string): void {
  if (!name) throw new ArtifactStoreError(key, "artifact name is empty");
  if (/[\\/]/.test(name)) throw new ArtifactStoreError(key, "artifact name must not contain path separators");
  if (name.endsWith(".meta")) throw new ArtifactStoreError(key, "artifact name must not end in .meta");
}

/**
 * Persist a copy of `data` under `topic:name`, replacing any previous artifact.
 * The files are written before the in-memory index changes, so a failed write
 * leaves the store as it was.
 */
export function saveArtifact(
  store: ArtifactStore,
  topic: string,
  name: string,
  data: JsonValue,
  metadata: Record<string, JsonValue> = {},
): Artifact {
  const ns = namespaceOf(topic);
  const key = `${ns}:${name}`;
  checkName(key, name);

  const artifact: Artifact = structuredClone({
    data,
    metadata: { ...metadata, created_at: new Date().toISOString(), topic, name },
  });
  try {
    writeArtifactFiles(store.root, ns, name, data, artifact.metadata);
  } catch (e) {
    throw new ArtifactStoreError(key, "failed to write artifact", e);
  }
  store.artifacts.set(key, artifact);
  return structuredClone(artifact);
}

export function getArtifact(store: ArtifactStore, topic: string, name: string): JsonValue | undefined {
  return store.artifacts.get(artifactKey(topic, name))?.data;
}

export function getArtifactByKey(store: ArtifactStore, key: string): JsonValue | undefined {
  return store.artifacts.get(key)?.data;
}

export function getArtifactMetadata(store: ArtifactStore, topic: string, name: string): ArtifactMetadata | undefined {
  return store.artifacts.get(artifactKey(topic, name))?.metadata;
}

/** `query(store, "ml:*")`, `query(store, "*:components")`, `query(store, "*:*")`. */
export function queryArtifacts(store: ArtifactStore, pattern: string): Map<string, JsonValue> {
  const re = patternToRegExp(pattern);
  const out = new Map<string, JsonValue>();
  for (const [key, artifact] of store.artifacts) {
    if (re.test(key)) out.set(key, artifact.data);
  }
  return out;
}

export function listTopics(store: ArtifactStore): string[] {
  const topics = new Set<string>();
  for (const key of store.artifacts.keys()) topics.add(splitKey(key).topic);
  return [...topics].sort();
}

export function listNames(store: ArtifactStore, topic: string): string[] {
  const ns = normalizeTopic(topic);
  const names: string[] = [];
  for (const key of store.artifacts.keys()) {
    const parts = splitKey(key);
    if (parts.topic === ns) names.push(parts.name);
  }
  return names.sort();
}

export function deleteArtifact(store: ArtifactStore, topic: string, name: string): boolean {
  const ns = normalizeTopic(topic);
  const key = `${ns}:${name}`;
  if (!store.artifacts.has(key)) return false;
  try {
    removeArtifactFiles(store.root, ns, name);
  } catch (e) {
    throw new ArtifactStoreError(key, "failed to delete artifact", e);
  }
  store.artifacts.delete(key);
  return true;
}

export function artifactLookup(store: ArtifactStore): ArtifactLookup {
  return (topic, name) => getArtifact(store, topic, name);
}

/** Text tree of topics and artifact names with their creation time. */
export function describeStore(store: ArtifactStore): string {
  const topics = listTopics(store);
  let out = "📚 Artifact Store\n\n";
  if (topics.length === 0) return out + "  (empty)\n";

  for (const topic of topics) {
    out += `📖 ${topic}\n`;
    for (const name of listNames(store, topic)) {
      const created = store.artifacts.get(`${topic}:${name}`)?.metadata.created_at ?? "unknown";
      out += `  └─ ${name} (created: ${created.slice(0, 19)})\n`;
    }
    out += "\n";
  }
  return out;
}

export interface StoreExport {
  topics: string[];
  artifacts: Record<string, Artifact>;
}

export function exportStore(store: ArtifactStore): StoreExport {
  return {
    topics: listTopics(store),
    artifacts: Object.fromEntries(store.artifacts),
  };
}
