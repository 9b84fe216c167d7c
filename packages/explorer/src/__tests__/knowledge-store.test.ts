/**
 * Knowledge store tests
 *
 * Merge semantics, serialized submission and the JSON-lines log.
 */

import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import { ValidationError } from '@roamer/shared';
import { KnowledgeMergeConflict } from '../errors.js';
import { KnowledgeStore, mergePaths, mergeRecords } from '../knowledge-store.js';
import type { KnowledgeDelta, KnowledgeRecord } from '../types.js';
import { silentLogger } from './fixtures.js';

function record(fingerprint: string, extra: Partial<KnowledgeRecord> = {}): KnowledgeRecord {
  return {
    fingerprint,
    screenName: 'com.example.shop.HomeActivity',
    visits: 1,
    triedActions: [],
    crashTriggers: [],
    notes: [],
    deadEnd: false,
    lastSeenAt: 100,
    paths: [],
    ...extra,
  };
}

function delta(source: string, ...records: KnowledgeRecord[]): KnowledgeDelta {
  return { source, records };
}

describe('mergeRecords', () => {
  const a = record('f1', { visits: 2, triedActions: ['tap:b', 'tap:a'], notes: ['Login form'], lastSeenAt: 100 });
  const b = record('f1', { visits: 3, triedActions: ['tap:c', 'tap:a'], crashTriggers: ['tap:x'], deadEnd: true, lastSeenAt: 50 });

  it('adds counters, unions sets and ORs flags', () => {
    expect(mergeRecords(a, b)).toEqual({
      fingerprint: 'f1',
      screenName: 'com.example.shop.HomeActivity',
      visits: 5,
      triedActions: ['tap:a', 'tap:b', 'tap:c'],
      crashTriggers: ['tap:x'],
      notes: ['Login form'],
      deadEnd: true,
      lastSeenAt: 100,
      paths: [],
    });
  });

  it('does not depend on argument order', () => {
    expect(mergeRecords(b, a)).toEqual(mergeRecords(a, b));
  });

  it('reports a screen name conflict and keeps the incoming name', () => {
    const onConflict = jest.fn();
    const merged = mergeRecords(a, record('f1', { screenName: 'com.example.shop.StartActivity' }), onConflict);

    expect(merged.screenName).toBe('com.example.shop.StartActivity');
    expect(onConflict).toHaveBeenCalledTimes(1);
    const conflict: unknown = onConflict.mock.calls[0][0];
    expect(conflict).toBeInstanceOf(KnowledgeMergeConflict);
    expect(conflict).toMatchObject({ field: 'screenName', fingerprint: 'f1' });
  });
});

describe('mergePaths', () => {
  it('keeps the shortest distinct paths in a stable order', () => {
    const merged = mergePaths([['tap:a', 'tap:b'], ['tap:c']], [['tap:c'], ['tap:d', 'tap:e', 'back'], ['tap:a', 'tap:a']]);

    expect(merged).toEqual([['tap:c'], ['tap:a', 'tap:a'], ['tap:a', 'tap:b']]);
    expect(mergePaths([['tap:d', 'tap:e', 'back'], ['tap:a', 'tap:a']], [['tap:a', 'tap:b'], ['tap:c']])).toEqual(merged);
  });

  it('is applied when records merge', () => {
    const merged = mergeRecords(record('f1', { paths: [['tap:x', 'tap:y']] }), record('f1', { paths: [['tap:z']] }));

    expect(merged.paths).toEqual([['tap:z'], ['tap:x', 'tap:y']]);
  });
});

describe('KnowledgeStore', () => {
  describe('in memory', () => {
    it('gives the same result whatever order deltas arrive in', async () => {
      const d1 = delta('job-1@a', record('f1', { triedActions: ['tap:x'] }), record('f2'));
      const d2 = delta('job-2@b', record('f1', { visits: 4, notes: ['Cart'] }));

      const forward = KnowledgeStore.inMemory(silentLogger);
      await forward.submit(d1);
      await forward.submit(d2);

      const reverse = KnowledgeStore.inMemory(silentLogger);
      await reverse.submit(d2);
      await reverse.submit(d1);

      expect(reverse.snapshot()).toEqual(forward.snapshot());
      expect(forward.get('f1')).toMatchObject({ visits: 5, triedActions: ['tap:x'], notes: ['Cart'] });
      expect(forward.size).toBe(2);
    });

    it('loses no update under concurrent submissions', async () => {
      const store = KnowledgeStore.inMemory(silentLogger);
      await Promise.all(
        Array.from({ length: 10 }, (_, index) =>
          store.submit(delta(`job-${index}`, record('f1', { triedActions: [`tap:${index}`] })))
        )
      );

      expect(store.get('f1')?.visits).toBe(10);
      expect(store.get('f1')?.triedActions).toHaveLength(10);
    });

    it('rejects an invalid delta without applying any of it', async () => {
      const store = KnowledgeStore.inMemory(silentLogger);
      const bad = delta('job-1', record('ok'), record('f1', { visits: -1 }));

      await expect(store.submit(bad)).rejects.toBeInstanceOf(ValidationError);
      expect(store.size).toBe(0);
    });

    it('hands out snapshots that later submissions do not touch', async () => {
      const store = KnowledgeStore.inMemory(silentLogger);
      await store.submit(delta('job-1', record('f1')));

      const snapshot = store.snapshot();
      await store.submit(delta('job-2', record('f1', { visits: 2 }), record('f2')));

      expect(snapshot.get('f1')?.visits).toBe(1);
      expect(snapshot.has('f2')).toBe(false);
      expect(Object.isFrozen(snapshot.get('f1'))).toBe(true);
      expect(store.get('f1')?.visits).toBe(3);
    });

    it('returns copies from get', async () => {
      const store = KnowledgeStore.inMemory(silentLogger);
      await store.submit(delta('job-1', record('f1', { triedActions: ['tap:x'] })));

      store.get('f1')?.triedActions.push('tap:y');
      expect(store.get('f1')?.triedActions).toEqual(['tap:x']);
    });

    it('keeps nothing pending without a log file', async () => {
      const store = KnowledgeStore.inMemory(silentLogger);
      await store.submit(delta('job-1', record('f1')));
      await store.flush();

      expect(store.pendingCount).toBe(0);
    });
  });

  describe('on disk', () => {
    let dir: string;
    let file: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'roamer-knowledge-'));
      file = path.join(dir, 'nested', 'knowledge.jsonl');
    });

    afterEach(async () => {
      await fs.remove(dir);
    });

    async function lines(): Promise<string[]> {
      const content = await fs.readFile(file, 'utf-8');
      return content.split('\n').filter((line) => line.trim());
    }

    it('appends deltas on flush and folds them on open', async () => {
      const store = await KnowledgeStore.open({ path: file, logger: silentLogger });
      await store.submit(delta('job-1@a', record('f1', { triedActions: ['tap:x'] })));
      await store.submit(delta('job-2@b', record('f1', { crashTriggers: ['tap:y'] })));
      expect(store.pendingCount).toBe(2);

      await store.flush();
      expect(store.pendingCount).toBe(0);
      expect(await lines()).toHaveLength(2);

      const reopened = await KnowledgeStore.open({ path: file, logger: silentLogger });
      expect(reopened.get('f1')).toEqual(store.get('f1'));
      expect(reopened.get('f1')).toMatchObject({ visits: 2, triedActions: ['tap:x'], crashTriggers: ['tap:y'] });
    });

    it('skips unreadable and invalid lines', async () => {
      await fs.outputFile(
        file,
        [JSON.stringify(delta('job-1', record('f1'))), 'not json', JSON.stringify({ source: 1 }), ''].join('\n')
      );

      const store = await KnowledgeStore.open({ path: file, logger: silentLogger });
      expect(store.size).toBe(1);
      expect(store.get('f1')?.visits).toBe(1);
    });

    it('starts empty and truncates the log when wiping', async () => {
      await fs.outputFile(file, JSON.stringify(delta('old', record('old'))) + '\n');

      const store = await KnowledgeStore.open({ path: file, wipe: true, logger: silentLogger });
      expect(store.size).toBe(0);

      await store.submit(delta('new', record('f1')));
      await store.flush();
      await store.submit(delta('newer', record('f2')));
      await store.flush();

      const written = await lines();
      expect(written).toHaveLength(2);
      expect(written.map((line) => JSON.parse(line).source)).toEqual(['new', 'newer']);
    });

    it('empties the log on flush after a wipe even when nothing was learned', async () => {
      await fs.outputFile(file, JSON.stringify(delta('old', record('old', { visits: 7 }))) + '\n');

      const store = await KnowledgeStore.open({ path: file, wipe: true, logger: silentLogger });
      await store.flush();

      expect(await fs.readFile(file, 'utf-8')).toBe('');
      const reopened = await KnowledgeStore.open({ path: file, logger: silentLogger });
      expect(reopened.size).toBe(0);
    });

    it('compacts the log into one merged delta', async () => {
      const store = await KnowledgeStore.open({ path: file, logger: silentLogger });
      await store.submit(delta('job-1', record('f2'), record('f1')));
      await store.submit(delta('job-2', record('f1', { visits: 2 })));
      await store.flush();

      await store.compact();

      const written = await lines();
      expect(written).toHaveLength(1);
      const compacted = JSON.parse(written[0]);
      expect(compacted.source).toBe('compaction');
      expect(compacted.records.map((entry: KnowledgeRecord) => [entry.fingerprint, entry.visits])).toEqual([
        ['f1', 3],
        ['f2', 1],
      ]);

      const reopened = await KnowledgeStore.open({ path: file, logger: silentLogger });
      expect(reopened.get('f1')?.visits).toBe(3);
    });
  });
});
