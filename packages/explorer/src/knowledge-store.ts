/**
 * Knowledge Store
 *
 * Durable cross-session memory keyed by fingerprint. Sessions read an
 * immutable snapshot and submit deltas; every write goes through one
 * serialized queue so concurrent completions never lose an update.
 *
 * On disk the store is a JSON-lines log of deltas. Loading folds every line
 * through the same commutative merge used at runtime, so appending is always
 * safe and no session's contribution is overwritten.
 */

import path from 'path';
import fs from 'fs-extra';
import { z } from 'zod';
import { Logger, ValidationError } from '@roamer/shared';
import { KnowledgeMergeConflict } from './errors.js';
import type { KnowledgeDelta, KnowledgeRecord, KnowledgeSnapshot, StateFingerprint } from './types.js';

const KnowledgeRecordSchema = z.object({
  fingerprint: z.string().min(1),
  screenName: z.string(),
  visits: z.number().int().nonnegative(),
  triedActions: z.array(z.string()).default([]),
  crashTriggers: z.array(z.string()).default([]),
  notes: z.array(z.string()).default([]),
  paths: z.array(z.array(z.string())).default([]),
  deadEnd: z.boolean().default(false),
  lastSeenAt: z.number().nonnegative().default(0),
});

export const KnowledgeDeltaSchema = z.object({
  source: z.string(),
  records: z.array(KnowledgeRecordSchema),
});

/** Known paths kept per state */
export const MAX_PATHS_PER_STATE = 3;

function union(a: string[], b: string[]): string[] {
  return Array.from(new Set([...a, ...b])).sort();
}

function comparePaths(a: string[], b: string[]): number {
  if (a.length !== b.length) return a.length - b.length;
  const left = JSON.stringify(a);
  const right = JSON.stringify(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

/**
 * Union of two path lists, shortest first, cut to `MAX_PATHS_PER_STATE`.
 * Taking the first N of a total order keeps the merge commutative.
 */
export function mergePaths(a: string[][], b: string[][]): string[][] {
  const unique = new Map<string, string[]>();
  for (const candidate of [...a, ...b]) unique.set(JSON.stringify(candidate), [...candidate]);
  return Array.from(unique.values()).sort(comparePaths).slice(0, MAX_PATHS_PER_STATE);
}

/**
 * Merge two records for the same fingerprint. Counters add, sets union,
 * flags OR and timestamps take the max, so the result does not depend on
 * argument order. The screen name is the one field that can disagree; the
 * incoming record wins and the caller is told through `onConflict`.
 */
export function mergeRecords(
  existing: KnowledgeRecord,
  incoming: KnowledgeRecord,
  onConflict?: (conflict: KnowledgeMergeConflict) => void
): KnowledgeRecord {
  if (existing.screenName !== incoming.screenName) {
    onConflict?.(
      new KnowledgeMergeConflict(
        `Screen name for ${existing.fingerprint.slice(0, 12)} changed from "${existing.screenName}" to "${incoming.screenName}"`,
        existing.fingerprint,
        'screenName'
      )
    );
  }

  return {
    fingerprint: existing.fingerprint,
    screenName: incoming.screenName,
    visits: existing.visits + incoming.visits,
    triedActions: union(existing.triedActions, incoming.triedActions),
    crashTriggers: union(existing.crashTriggers, incoming.crashTriggers),
    notes: union(existing.notes, incoming.notes),
    paths: mergePaths(existing.paths, incoming.paths),
    deadEnd: existing.deadEnd || incoming.deadEnd,
    lastSeenAt: Math.max(existing.lastSeenAt, incoming.lastSeenAt),
  };
}

function normalize(record: KnowledgeRecord): KnowledgeRecord {
  return {
    ...record,
    triedActions: union([], record.triedActions),
    crashTriggers: union([], record.crashTriggers),
    notes: union([], record.notes),
    paths: mergePaths([], record.paths),
  };
}

function cloneRecord(record: KnowledgeRecord): KnowledgeRecord {
  return {
    ...record,
    triedActions: [...record.triedActions],
    crashTriggers: [...record.crashTriggers],
    notes: [...record.notes],
    paths: record.paths.map((steps) => [...steps]),
  };
}

export interface KnowledgeStoreOptions {
  /** JSON-lines file; null keeps the store in memory only */
  path: string | null;
  /** Start from an empty store, truncating the file on the first flush */
  wipe?: boolean;
  logger?: Logger;
}

export class KnowledgeStore {
  private records: Map<StateFingerprint, KnowledgeRecord> = new Map();
  private pending: KnowledgeDelta[] = [];
  private queue: Array<() => Promise<void>> = [];
  private processing = false;
  private truncateOnFlush: boolean;
  private filePath: string | null;
  private logger: Logger;

  private constructor(options: KnowledgeStoreOptions) {
    this.filePath = options.path;
    this.truncateOnFlush = options.wipe ?? false;
    this.logger = options.logger ?? new Logger({ prefix: '[knowledge]' });
  }

  /**
   * Open a store, folding every delta already in its log.
   * Lines that fail to parse are logged and skipped.
   */
  static async open(options: KnowledgeStoreOptions): Promise<KnowledgeStore> {
    const store = new KnowledgeStore(options);
    if (!options.path || options.wipe) return store;
    if (!(await fs.pathExists(options.path))) return store;

    const content = await fs.readFile(options.path, 'utf-8');
    const lines = content.split('\n');
    let loaded = 0;

    lines.forEach((line, index) => {
      if (!line.trim()) return;
      let json: unknown;
      try {
        json = JSON.parse(line);
      } catch (error) {
        store.logger.warn(`Skipping unreadable knowledge line ${index + 1}: ${String(error)}`);
        return;
      }
      const parsed = KnowledgeDeltaSchema.safeParse(json);
      if (!parsed.success) {
        store.logger.warn(`Skipping invalid knowledge line ${index + 1}: ${parsed.error.issues[0]?.message}`);
        return;
      }
      store.apply(parsed.data);
      loaded++;
    });

    store.logger.debug(`Loaded ${loaded} deltas, ${store.records.size} fingerprints from ${options.path}`);
    return store;
  }

  static inMemory(logger?: Logger): KnowledgeStore {
    return new KnowledgeStore({ path: null, logger });
  }

  get size(): number {
    return this.records.size;
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  get(fingerprint: StateFingerprint): KnowledgeRecord | undefined {
    const record = this.records.get(fingerprint);
    return record ? cloneRecord(record) : undefined;
  }

  /**
   * Immutable point-in-time copy for one session to read from.
   */
  snapshot(): KnowledgeSnapshot {
    const copy = new Map<StateFingerprint, Readonly<KnowledgeRecord>>();
    for (const [fingerprint, record] of this.records) {
      copy.set(fingerprint, Object.freeze(cloneRecord(record)));
    }
    return copy;
  }

  /**
   * Merge a session's delta. Deltas are validated up front and applied as a
   * whole; an invalid delta changes nothing.
   */
  submit(delta: KnowledgeDelta): Promise<void> {
    const parsed = KnowledgeDeltaSchema.safeParse(delta);
    if (!parsed.success) {
      return Promise.reject(
        new ValidationError(`Invalid knowledge delta from ${delta.source}`, {
          issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        })
      );
    }

    return this.enqueue(async () => {
      this.apply(parsed.data);
      if (this.filePath) this.pending.push(parsed.data);
    });
  }

  /**
   * Append pending deltas to the log. Safe to call at checkpoints; deltas
   * stay pending if the write fails. After a wipe the first flush replaces
   * the log even when nothing was learned.
   */
  flush(): Promise<void> {
    return this.enqueue(async () => {
      const filePath = this.filePath;
      if (!filePath) return;
      if (this.pending.length === 0 && !this.truncateOnFlush) return;

      const lines = this.pending.map((delta) => JSON.stringify(delta) + '\n').join('');
      await fs.ensureDir(path.dirname(filePath));
      if (this.truncateOnFlush) {
        await fs.writeFile(filePath, lines, 'utf-8');
        this.truncateOnFlush = false;
      } else {
        await fs.appendFile(filePath, lines, 'utf-8');
      }

      this.logger.debug(`Flushed ${this.pending.length} deltas to ${filePath}`);
      this.pending = [];
    });
  }

  /**
   * Rewrite the log as a single merged delta. Writes to a temporary file and
   * renames it over the log.
   */
  compact(): Promise<void> {
    return this.enqueue(async () => {
      const filePath = this.filePath;
      if (!filePath) return;

      const merged: KnowledgeDelta = {
        source: 'compaction',
        records: Array.from(this.records.values()).sort((a, b) => a.fingerprint.localeCompare(b.fingerprint)),
      };
      const tmpPath = `${filePath}.${process.pid}.tmp`;
      await fs.ensureDir(path.dirname(filePath));
      await fs.writeFile(tmpPath, JSON.stringify(merged) + '\n', 'utf-8');
      await fs.rename(tmpPath, filePath);
      this.pending = [];
      this.truncateOnFlush = false;
    });
  }

  private apply(delta: KnowledgeDelta): void {
    const staged = new Map(this.records);
    for (const record of delta.records) {
      const existing = staged.get(record.fingerprint);
      staged.set(
        record.fingerprint,
        existing
          ? mergeRecords(existing, record, (conflict) => this.logger.warn(`${conflict.name}: ${conflict.message}`))
          : normalize(record)
      );
    }
    this.records = staged;
  }

  private enqueue(task: () => Promise<void>): Promise<void> {
    return new Promise((resolve, reject) => {
      this.queue.push(async () => {
        try {
          await task();
          resolve();
        } catch (error) {
          reject(error);
        }
      });
      void this.processQueue();
    });
  }

  private async processQueue(): Promise<void> {
    if (this.processing) return;
    this.processing = true;

    while (this.queue.length > 0) {
      const task = this.queue.shift();
      if (task) await task();
    }

    this.processing = false;
  }
}
