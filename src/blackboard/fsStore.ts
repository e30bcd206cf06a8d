import {
  existsSync,
  mkdirSync,
  readdirSync,
  readFileSync,
  renameSync,
  rmSync,
  rmdirSync,
  statSync,
  writeFileSync,
} from "node:fs";
import { join } from "node:path";
import type { JsonValue } from "../types/contracts.js";
import { ArtifactStoreError } from "../errors.js";

// Layout:
//   <root>/<topic>/<name>.json       data
//   <root>/<topic>/<name>.meta.json  metadata

const DATA_EXT = ".json";
const META_EXT = ".meta.json";

export interface StoredFiles {
  topic: string;
  name: string;
  data: JsonValue;
  /** Raw parsed metadata, or `undefined` when the file is missing or unreadable. */
  metadata: unknown;
  mtime: Date;
}

function toJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

/**
 * Write data and metadata for one artifact. Both land in temp files first and
 * are renamed into place only after both writes succeeded.
 */
export function writeArtifactFiles(root: string, topic: string, name: string, data: JsonValue, metadata: unknown): void {
  const dir = join(root, topic);
  mkdirSync(dir, { recursive: true });
  const dataPath = join(dir, name + DATA_EXT);
  const metaPath = join(dir, name + META_EXT);
  const dataTmp = dataPath + ".tmp";
  const metaTmp = metaPath + ".tmp";
  try {
    writeFileSync(dataTmp, toJson(data), "utf-8");
    writeFileSync(metaTmp, toJson(metadata), "utf-8");
  } catch (e) {
    rmSync(dataTmp, { force: true });
    rmSync(metaTmp, { force: true });
    throw e;
  }
  renameSync(dataTmp, dataPath);
  renameSync(metaTmp, metaPath);
}

/** Remove both files; drops the topic directory once it is empty. */
export function removeArtifactFiles(root: string, topic: string, name: string): void {
  const dir = join(root, topic);
  rmSync(join(dir, name + DATA_EXT), { force: true });
  rmSync(join(dir, name + META_EXT), { force: true });
  if (existsSync(dir) && readdirSync(dir).length === 0) rmdirSync(dir);
}

function readMetadata(path: string): unknown {
  if (!existsSync(path)) return undefined;
  try {
    const parsed: unknown = JSON.parse(readFileSync(path, "utf-8"));
    return parsed;
  } catch {
    return undefined;
  }
}

/** Walk every topic directory under `root` once. */
export function loadArtifactFiles(root: string): StoredFiles[] {
  mkdirSync(root, { recursive: true });
  const out: StoredFiles[] = [];

  for (const topic of readdirSync(root)) {
    const topicDir = join(root, topic);
    if (!statSync(topicDir).isDirectory()) continue;

    for (const file of readdirSync(topicDir)) {
      if (file.endsWith(META_EXT) || !file.endsWith(DATA_EXT)) continue;
      const name = file.slice(0, -DATA_EXT.length);
      const dataPath = join(topicDir, file);
      let data: JsonValue;
      try {
        data = JSON.parse(readFileSync(dataPath, "utf-8"));
      } catch (e) {
        throw new ArtifactStoreError(`${topic}:${name}`, "unreadable artifact", e);
      }
      out.push({
        topic,
        name,
        data,
        metadata: readMetadata(join(topicDir, name + META_EXT)),
        mtime: statSync(dataPath).mtime,
      });
    }
  }
  return out;
}
