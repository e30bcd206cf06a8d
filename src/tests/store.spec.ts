import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  deleteArtifact,
  describeStore,
  exportStore,
  getArtifact,
  getArtifactByKey,
  getArtifactMetadata,
  listNames,
  listTopics,
  openArtifactStore,
  queryArtifacts,
  saveArtifact,
} from '../blackboard/index.js';
import { ArtifactStoreError } from '../errors.js';
import type { ArtifactStore } from '../types/artifacts.js';

let root: string;
let store: ArtifactStore;

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), 'promptlink-store-'));
  store = openArtifactStore(root);
});

afterEach(() => {
  rmSync(root, { recursive: true, force: true });
});

describe('artifact store', () => {
  it('saves under a normalized namespace and survives reopening', () => {
    saveArtifact(store, 'Machine Learning', 'components', { parts: [1, 2] }, { tool: 'x' });

    expect(getArtifact(store, 'machine learning!', 'components')).toEqual({ parts: [1, 2] });
    expect(getArtifactByKey(store, 'machine_learning:components')).toEqual({ parts: [1, 2] });

    const reopened = openArtifactStore(root);
    expect(getArtifact(reopened, 'Machine Learning', 'components')).toEqual({ parts: [1, 2] });
    const meta = getArtifactMetadata(reopened, 'Machine Learning', 'components');
    expect(meta?.topic).toBe('Machine Learning');
    expect(meta?.name).toBe('components');
    expect(meta?.tool).toBe('x');
    expect(typeof meta?.created_at).toBe('string');
  });

  it('writes pretty-printed data and metadata files', () => {
    saveArtifact(store, 'ml', 'summary', 'short text');
    const dir = join(root, 'ml');
    expect(readFileSync(join(dir, 'summary.json'), 'utf-8')).toBe('"short text"');
    expect(existsSync(join(dir, 'summary.meta.json'))).toBe(true);
    expect(existsSync(join(dir, 'summary.json.tmp'))).toBe(false);
  });

  it('replaces an artifact instead of merging', () => {
    saveArtifact(store, 'ml', 'doc', { a: 1 });
    saveArtifact(store, 'ml', 'doc', { b: 2 });
    expect(getArtifact(store, 'ml', 'doc')).toEqual({ b: 2 });
    expect(getArtifact(openArtifactStore(root), 'ml', 'doc')).toEqual({ b: 2 });
  });

  it('keeps its own copy of saved data', () => {
    const input = { a: 1, list: [1] };
    const saved = saveArtifact(store, 'ml', 'doc', input);
    input.a = 999;
    input.list.push(2);
    saved.metadata.name = 'changed';

    expect(getArtifact(store, 'ml', 'doc')).toEqual({ a: 1, list: [1] });
    expect(getArtifactMetadata(store, 'ml', 'doc')?.name).toBe('doc');
  });

  it('lets stamped metadata win over caller fields', () => {
    saveArtifact(store, 'ml', 'doc', 1, { name: 'other', step_index: 0 });
    const meta = getArtifactMetadata(store, 'ml', 'doc');
    expect(meta?.name).toBe('doc');
    expect(meta?.step_index).toBe(0);
  });

  it('matches anchored wildcard patterns', () => {
    saveArtifact(store, 'a', 'x', 1);
    saveArtifact(store, 'a', 'y', 2);
    saveArtifact(store, 'abc', 'z', 3);
    saveArtifact(store, 'b', 'x', 4);
    saveArtifact(store, 'a', 'v1x0', 5);

    expect([...queryArtifacts(store, 'a:*').keys()]).toEqual(['a:x', 'a:y', 'a:v1x0']);
    expect(queryArtifacts(store, '*:*').size).toBe(5);
    expect(queryArtifacts(store, 'ab:*').size).toBe(0);
    expect([...queryArtifacts(store, '*:x').entries()]).toEqual([['a:x', 1], ['b:x', 4]]);
    expect(queryArtifacts(store, 'a:v1.0').size).toBe(0);
  });

  it('lists topics and names sorted', () => {
    saveArtifact(store, 'Zeta', 'b', 1);
    saveArtifact(store, 'alpha', 'z', 1);
    saveArtifact(store, 'alpha', 'a', 1);
    expect(listTopics(store)).toEqual(['alpha', 'zeta']);
    expect(listNames(store, 'Alpha')).toEqual(['a', 'z']);
    expect(listNames(store, 'missing')).toEqual([]);
  });

  it('deletes files and drops an emptied topic directory', () => {
    saveArtifact(store, 'ml', 'one', 1);
    saveArtifact(store, 'ml', 'two', 2);

    expect(deleteArtifact(store, 'ml', 'one')).toBe(true);
    expect(existsSync(join(root, 'ml', 'one.json'))).toBe(false);
    expect(existsSync(join(root, 'ml'))).toBe(true);

    expect(deleteArtifact(store, 'ml', 'two')).toBe(true);
    expect(existsSync(join(root, 'ml'))).toBe(false);
    expect(deleteArtifact(store, 'ml', 'two')).toBe(false);
    expect(getArtifact(store, 'ml', 'two')).toBeUndefined();
  });

  it('loads data files without metadata using fallback metadata', () => {
    mkdirSync(join(root, 'manual'));
    writeFileSync(join(root, 'manual', 'note.json'), '"hello"');
    const reopened = openArtifactStore(root);
    expect(getArtifact(reopened, 'manual', 'note')).toBe('hello');
    const meta = getArtifactMetadata(reopened, 'manual', 'note');
    expect(meta?.topic).toBe('manual');
    expect(meta?.name).toBe('note');
  });

  it('keeps caller fields of records without stamped name or time', () => {
    mkdirSync(join(root, 'legacy'));
    writeFileSync(join(root, 'legacy', 'notes.json'), '"old"');
    writeFileSync(
      join(root, 'legacy', 'notes.meta.json'),
      JSON.stringify({ created_at: '2024-01-01T00:00:00', topic: 'Legacy', step_name: 'notes', artifacts_used: ['a:b'] }),
    );
    const meta = getArtifactMetadata(openArtifactStore(root), 'legacy', 'notes');
    expect(meta).toEqual({
      created_at: '2024-01-01T00:00:00',
      topic: 'Legacy',
      name: 'notes',
      step_name: 'notes',
      artifacts_used: ['a:b'],
    });
  });

  it('names the artifact when a data file is unreadable', () => {
    mkdirSync(join(root, 'bad'));
    writeFileSync(join(root, 'bad', 'x.json'), '{oops');
    const err = (() => {
      try {
        openArtifactStore(root);
      } catch (e) {
        return e;
      }
      return undefined;
    })();
    expect(err).toBeInstanceOf(ArtifactStoreError);
    if (!(err instanceof ArtifactStoreError)) return;
    expect(err.key).toBe('bad:x');
    expect(err.message).toBe('bad:x: unreadable artifact');
    expect(err.cause).toBeInstanceOf(SyntaxError);
  });

  it('rejects unusable names and namespaces', () => {
    expect(() => saveArtifact(store, 'ml', 'a/b', 1)).toThrow(ArtifactStoreError);
    expect(() => saveArtifact(store, 'ml', '', 1)).toThrow(ArtifactStoreError);
    expect(() => saveArtifact(store, 'ml', 'x.meta', 1)).toThrow(ArtifactStoreError);
    expect(() => saveArtifact(store, '!!!', 'x', 1)).toThrow(ArtifactStoreError);
    expect(() => saveArtifact(store, '日本', 'x', 1)).toThrow('topic "日本" normalizes to an empty namespace');
  });

  it('leaves memory untouched when the write fails', () => {
    writeFileSync(join(root, 'blocked'), 'x');
    expect(() => saveArtifact(store, 'blocked', 'n', 1)).toThrow(ArtifactStoreError);
    expect(getArtifact(store, 'blocked', 'n')).toBeUndefined();
  });

  it('describes an empty store', () => {
    expect(describeStore(store)).toBe('📚 Artifact Store\n\n  (empty)\n');
  });

  it('describes topics and names with creation times', () => {
    saveArtifact(store, 'ml', 'b', 1);
    saveArtifact(store, 'ml', 'a', 2);
    const created = (name: string) => getArtifactMetadata(store, 'ml', name)?.created_at.slice(0, 19);
    expect(describeStore(store)).toBe(
      `📚 Artifact Store\n\n📖 ml\n  └─ a (created: ${created('a')})\n  └─ b (created: ${created('b')})\n\n`,
    );
  });

  it('exports topics and artifacts as plain objects', () => {
    saveArtifact(store, 'ml', 'a', { v: 1 });
    const out = exportStore(store);
    expect(out.topics).toEqual(['ml']);
    expect(Object.keys(out.artifacts)).toEqual(['ml:a']);
    expect(out.artifacts['ml:a'].data).toEqual({ v: 1 });
  });
});
