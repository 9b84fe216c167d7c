/**
 * Session Scheduler
 *
 * Runs jobs across the device pool, one session per device at a time. As
 * sessions finish, their knowledge deltas are merged and periodically
 * flushed, and the freed device goes to the next waiting job.
 *
 * A global wall-clock ceiling (or an external abort) asks running sessions to
 * stop at their next step boundary; jobs that never got a device are
 * reported as not started.
 */

import { Logger, formatDuration, toError } from '@roamer/shared';
import type { EngineConfig } from './config.js';
import type { DecisionOracle } from './decision-oracle.js';
import { describeSelector, type DeviceHandle, type DevicePool } from './device-pool.js';
import type { KnowledgeStore } from './knowledge-store.js';
import { ExplorationSession, type SessionOutcome, type SessionOptions } from './session.js';
import type { JobDescriptor, RunSummary, RunTotals, SessionResult, UnassignedJob } from './types.js';

export interface SchedulerOptions {
  pool: DevicePool;
  knowledge: KnowledgeStore;
  oracle: DecisionOracle;
  config: EngineConfig;
  logger?: Logger;
  clock?: () => number;
  /** Build the session for a job; tests swap this to observe sessions */
  createSession?: (options: SessionOptions) => { run(): Promise<SessionOutcome> };
}

export interface RunOptions {
  signal?: AbortSignal;
}

export function summarizeResults(results: SessionResult[]): RunTotals {
  return results.reduce<RunTotals>(
    (totals, result) => ({
      sessions: totals.sessions + 1,
      done: totals.done + (result.status === 'done' ? 1 : 0),
      failed: totals.failed + (result.status === 'failed' ? 1 : 0),
      nodes: totals.nodes + result.visitedNodes,
      edges: totals.edges + result.edges.length,
      steps: totals.steps + result.stepsTaken,
      crashes: totals.crashes + result.edges.filter((edge) => edge.outcome === 'crash').length,
    }),
    { sessions: 0, done: 0, failed: 0, nodes: 0, edges: 0, steps: 0, crashes: 0 }
  );
}

export class SessionScheduler {
  private logger: Logger;
  private clock: () => number;
  private createSession: (options: SessionOptions) => { run(): Promise<SessionOutcome> };

  constructor(private options: SchedulerOptions) {
    this.logger = options.logger ?? new Logger({ level: options.config.logging.level, prefix: '[scheduler]' });
    this.clock = options.clock ?? Date.now;
    this.createSession = options.createSession ?? ((sessionOptions) => new ExplorationSession(sessionOptions));
  }

  async run(jobs: JobDescriptor[], runOptions: RunOptions = {}): Promise<RunSummary> {
    const { pool, knowledge, config } = this.options;
    const startedAt = this.clock();
    const stop = new AbortController();
    const results: SessionResult[] = [];
    const unassigned: UnassignedJob[] = [];
    const notStarted: string[] = [];
    let ceilingHit = false;
    let completed = 0;

    const requestStop = (reason: string): void => {
      if (stop.signal.aborted) return;
      this.logger.warn(`${reason}, stopping sessions at their next step`);
      stop.abort();
      pool.cancelWaiters(reason);
    };

    const ceiling = setTimeout(() => {
      ceilingHit = true;
      requestStop(`Wall-clock ceiling of ${formatDuration(config.scheduler.wallClockMs)} reached`);
    }, config.scheduler.wallClockMs);

    const onExternalAbort = (): void => requestStop('Stop requested');
    if (runOptions.signal?.aborted) onExternalAbort();
    runOptions.signal?.addEventListener('abort', onExternalAbort, { once: true });

    const runnable = jobs.filter((job) => {
      if (pool.canSatisfy(job.selector)) return true;
      const reason = `No device in the pool matches ${describeSelector(job.selector)}`;
      this.logger.error(`${job.id}: ${reason}`);
      unassigned.push({ jobId: job.id, reason });
      return false;
    });

    this.logger.info(`Running ${runnable.length} job(s) on ${pool.size} device(s)`);

    const runJob = async (job: JobDescriptor): Promise<void> => {
      if (stop.signal.aborted) {
        notStarted.push(job.id);
        return;
      }

      let device: DeviceHandle;
      try {
        device = await pool.acquire(job.id, job.selector);
      } catch (error) {
        if (stop.signal.aborted) {
          notStarted.push(job.id);
        } else {
          unassigned.push({ jobId: job.id, reason: toError(error).message });
        }
        return;
      }

      try {
        if (stop.signal.aborted) {
          notStarted.push(job.id);
          return;
        }

        const session = this.createSession({
          job,
          driver: device.driver,
          oracle: this.options.oracle,
          knowledge: knowledge.snapshot(),
          config,
          logger: this.logger.child(`[${device.serial}]`),
          signal: stop.signal,
          clock: this.clock,
        });

        const { result, delta } = await session.run();
        results.push(result);

        try {
          await knowledge.submit(delta);
        } catch (error) {
          this.logger.error(`Knowledge from ${job.id} rejected: ${toError(error).message}`);
        }

        completed++;
        if (completed % config.scheduler.checkpointEvery === 0) {
          await this.checkpoint();
        }
      } finally {
        pool.release(device.serial);
      }
    };

    try {
      await Promise.all(runnable.map((job) => runJob(job)));
    } finally {
      clearTimeout(ceiling);
      runOptions.signal?.removeEventListener('abort', onExternalAbort);
    }

    await knowledge.flush();

    const summary: RunSummary = {
      results,
      unassigned,
      notStarted,
      ceilingHit,
      elapsedMs: this.clock() - startedAt,
      totals: summarizeResults(results),
    };

    this.logger.info(
      `Finished ${summary.totals.sessions} session(s): ${summary.totals.done} done, ${summary.totals.failed} failed, ` +
        `${summary.totals.nodes} screens, ${summary.totals.crashes} crash(es) in ${formatDuration(summary.elapsedMs)}`
    );
    if (notStarted.length > 0) this.logger.warn(`${notStarted.length} job(s) not started`);
    if (unassigned.length > 0) this.logger.warn(`${unassigned.length} job(s) could not be assigned a device`);

    return summary;
  }

  private async checkpoint(): Promise<void> {
    try {
      await this.options.knowledge.flush();
      this.logger.debug('Knowledge checkpoint written');
    } catch (error) {
      this.logger.warn(`Knowledge checkpoint failed, will retry at the end of the run: ${toError(error).message}`);
    }
  }
}
