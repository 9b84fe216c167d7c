/**
 * Exploration Session
 *
 * Owns one device for one job and runs the step loop as an explicit state
 * machine:
 *
 *   observing -> recording -> deciding -> acting -> (recovering ->) observing
 *
 * The first observation goes straight to deciding. `recording` appends the
 * edge for the step that just finished, so every completed step produces
 * exactly one edge and `edges.length === stepsTaken` holds in every terminal
 * state. A step that ends the session, because the app could not be
 * restarted or the screen could not be captured afterwards, still gets an
 * edge back to its source. `done` and `failed` can be entered from any
 * non-terminal phase.
 *
 * When the job names a start screen, the session first replays the shortest
 * recorded path to it; those steps are tagged `replay`.
 */

import { Logger, formatDuration, sleep, toError, withTimeout } from '@roamer/shared';
import { ActionExecutor, toEdgeOutcome } from './action-executor.js';
import { ActivityGraph } from './activity-graph.js';
import type { EngineConfig } from './config.js';
import type { DecisionOracle } from './decision-oracle.js';
import type { AutomationDriver } from './driver.js';
import { CaptureError, OracleUnavailableError } from './errors.js';
import { Fingerprinter, actionKeyFor } from './fingerprint.js';
import type {
  ActionDescriptor,
  Decision,
  DecisionSource,
  DoneReason,
  FailReason,
  GraphNode,
  JobDescriptor,
  KnowledgeDelta,
  KnowledgeRecord,
  KnowledgeSnapshot,
  ObservedState,
  SessionResult,
} from './types.js';

// =============================================================================
// State machine
// =============================================================================

export type SessionPhase =
  | { name: 'observing' }
  | { name: 'deciding' }
  | { name: 'acting' }
  | { name: 'recovering' }
  | { name: 'recording' }
  | { name: 'done'; reason: DoneReason }
  | { name: 'failed'; reason: FailReason };

export type PhaseName = SessionPhase['name'];

type ActivePhaseName = Exclude<PhaseName, 'done' | 'failed'>;

const TRANSITIONS: Record<ActivePhaseName, ActivePhaseName[]> = {
  observing: ['recording', 'deciding'],
  recording: ['deciding'],
  deciding: ['acting'],
  acting: ['recovering', 'observing'],
  recovering: ['observing'],
};

function isTerminal(phase: SessionPhase): phase is Extract<SessionPhase, { name: 'done' | 'failed' }> {
  return phase.name === 'done' || phase.name === 'failed';
}

type StepChoice =
  | { kind: 'act'; action: ActionDescriptor; decidedBy: DecisionSource }
  | { kind: 'terminal' };

export interface SessionOptions {
  job: JobDescriptor;
  driver: AutomationDriver;
  oracle: DecisionOracle;
  /** Knowledge as of session start; never mutated */
  knowledge: KnowledgeSnapshot;
  config: EngineConfig;
  logger?: Logger;
  /** Cooperative stop, honored at step boundaries */
  signal?: AbortSignal;
  clock?: () => number;
}

export interface SessionOutcome {
  result: SessionResult;
  delta: KnowledgeDelta;
}

function shortScreen(screenName: string): string {
  return screenName.split('.').pop() || screenName;
}

function matchesScreen(screenName: string, target: string): boolean {
  return screenName === target || screenName.endsWith(`.${target}`);
}

export class ExplorationSession {
  private phase: SessionPhase = { name: 'observing' };
  private history: PhaseName[] = ['observing'];
  private message = '';
  private graph: ActivityGraph;
  private fingerprinter: Fingerprinter;
  private executor: ActionExecutor;
  private logger: Logger;
  private clock: () => number;
  private startedAt = 0;
  private fallbackSteps = 0;
  /** Fingerprints seen since the last new screen, capped at the loop window */
  private recentFingerprints: string[] = [];
  private warnedSteps = 0;
  /** Shortest known action-key route from a fresh launch to each state */
  private routes: Map<string, string[]> = new Map();
  private replayQueue: string[] = [];
  private notes: Map<string, Set<string>> = new Map();
  private screenNames: Map<string, string> = new Map();
  private readonly stepBudget: number;
  private readonly timeBudgetMs: number;

  constructor(private options: SessionOptions) {
    const { config, driver, job } = options;
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? new Logger({ level: config.logging.level, prefix: `[${driver.serial}]` });
    this.graph = new ActivityGraph({ deadEndRetryBudget: config.graph.deadEndRetryBudget, clock: this.clock });
    this.fingerprinter = new Fingerprinter({ level: config.fingerprint.level });
    this.executor = new ActionExecutor(driver, this.fingerprinter, { ...config.executor, logger: this.logger });
    this.stepBudget = job.stepBudget ?? config.session.stepBudget;
    this.timeBudgetMs = job.timeBudgetMs ?? config.session.timeBudgetMs;
  }

  get currentPhase(): SessionPhase {
    return this.phase;
  }

  get phaseHistory(): PhaseName[] {
    return [...this.history];
  }

  get stepsTaken(): number {
    return this.graph.edgeCount;
  }

  /**
   * Run until a terminal state. Never rejects: unexpected errors end the
   * session in `failed(internal)` with the partial graph intact.
   */
  async run(): Promise<SessionOutcome> {
    this.startedAt = this.clock();
    this.logger.info(`Exploring ${this.options.job.app.packageName} for job ${this.options.job.id}`);

    try {
      await this.explore();
    } catch (error) {
      const cause = toError(error);
      this.logger.error(`Session crashed: ${cause.stack ?? cause.message}`);
      this.finish({ name: 'failed', reason: 'internal' }, `Unexpected error: ${cause.message}`);
    }

    const delta = this.buildDelta();
    const result = this.buildResult();
    const log = result.status === 'done' ? this.logger.success.bind(this.logger) : this.logger.error.bind(this.logger);
    log(
      `${result.reason}: ${result.message} (${result.stepsTaken} steps, ${result.visitedNodes} screens, ${formatDuration(result.elapsedMs)})`
    );
    return { result, delta };
  }

  // ===========================================================================
  // Loop
  // ===========================================================================

  private async explore(): Promise<void> {
    const { config, job } = this.options;

    if (config.session.launchOnStart) {
      try {
        await this.executor.recover(job.app, 'launch');
      } catch (error) {
        this.finish({ name: 'failed', reason: 'recovery' }, `Could not launch ${job.app.packageName}: ${toError(error).message}`);
        return;
      }
    }

    let current = await this.observe();
    if (!current) return;
    let node = this.graph.lookupOrCreate(current).node;
    this.noteObservation(current, true);
    if (config.session.launchOnStart) this.routes.set(current.fingerprint, []);

    if (this.reachedGoal(current, node)) return;
    this.planReplay(current);

    for (;;) {
      if (this.atStepBoundaryStop()) return;

      this.transition({ name: 'deciding' });
      const choice = await this.decide(current, node);
      if (choice.kind === 'terminal') return;

      this.transition({ name: 'acting' });
      const execution = await this.executor.execute(choice.action, current);

      const crashed = execution.outcome === 'app-crashed';
      if (choice.decidedBy === 'replay' && execution.outcome !== 'success' && this.replayQueue.length > 0) {
        this.logger.warn(`Replay step ${execution.action.label} ended in ${execution.outcome}, exploring from here`);
        this.replayQueue = [];
      }

      if (crashed) {
        this.transition({ name: 'recovering' });
        try {
          await this.executor.recover(job.app);
        } catch (error) {
          const message = toError(error).message;
          this.finish({ name: 'failed', reason: 'recovery' }, `App crashed and could not be restarted: ${message}`);
          this.graph.recordEdge({
            source: node.fingerprint,
            action: execution.action,
            destination: node.fingerprint,
            outcome: 'crash',
            decidedBy: choice.decidedBy,
            detail: `App could not be restarted: ${message}`,
          });
          return;
        }
      }

      await sleep(config.session.waitBetweenStepsMs);

      this.transition({ name: 'observing' });
      const next = await this.observe();
      if (!next) {
        this.graph.recordEdge({
          source: node.fingerprint,
          action: execution.action,
          destination: node.fingerprint,
          outcome: crashed ? 'crash' : 'failure',
          decidedBy: choice.decidedBy,
          detail: 'Screen could not be captured after the action',
        });
        return;
      }

      this.transition({ name: 'recording' });
      const lookup = this.graph.lookupOrCreate(next, current.fingerprint);
      const edge = this.graph.recordEdge({
        source: node.fingerprint,
        action: execution.action,
        destination: next.fingerprint,
        outcome: toEdgeOutcome(execution.outcome),
        decidedBy: choice.decidedBy,
        discovered: lookup.created,
        detail: execution.detail,
      });
      this.noteObservation(next, lookup.created);
      if (crashed) this.routes.set(next.fingerprint, []);
      else if (edge.outcome === 'success') this.extendRoute(node.fingerprint, next.fingerprint, edge.action.key);

      this.logger.step(
        edge.step,
        this.stepBudget,
        `${shortScreen(current.screenName)} -> ${edge.action.label} -> ${execution.outcome}` +
          (lookup.created ? ` (new: ${shortScreen(next.screenName)})` : '')
      );

      current = next;
      node = lookup.node;

      if (this.reachedGoal(current, node)) return;
      if (this.stepsTaken >= this.stepBudget) {
        this.finish({ name: 'done', reason: 'budget-exhausted' }, `Step budget of ${this.stepBudget} used up`);
        return;
      }
    }
  }

  /**
   * Capture and fingerprint the current screen, retrying transient capture
   * failures. Returns null after moving to `failed(capture)`.
   */
  private async observe(): Promise<ObservedState | null> {
    const { config, driver } = this.options;
    const cap = config.session.captureRetryCap;
    let lastError: Error = new CaptureError('No capture attempted');

    for (let attempt = 1; attempt <= cap; attempt++) {
      try {
        const snapshot = await withTimeout(
          (signal) => driver.capture(signal),
          config.executor.driverTimeoutMs,
          'capture'
        );
        return await this.fingerprinter.observe(snapshot);
      } catch (error) {
        lastError = error instanceof CaptureError ? error : new CaptureError(toError(error).message);
        this.logger.warn(`Capture failed (attempt ${attempt}/${cap}): ${lastError.message}`);
        if (attempt < cap) await sleep(config.session.captureRetryDelayMs);
      }
    }

    this.finish({ name: 'failed', reason: 'capture' }, `Could not capture the screen after ${cap} attempts: ${lastError.message}`);
    return null;
  }

  private async decide(state: ObservedState, node: GraphNode): Promise<StepChoice> {
    const { config, oracle, knowledge, job } = this.options;

    const replayKey = this.replayQueue.shift();
    if (replayKey !== undefined) {
      const action = this.descriptorForKey(state, replayKey);
      if (action) return { kind: 'act', action, decidedBy: 'replay' };
      this.logger.warn(`Replay step ${replayKey} is not offered on ${shortScreen(state.screenName)}, exploring from here`);
      this.replayQueue = [];
    }

    const occurrences = this.recentFingerprints.filter((fingerprint) => fingerprint === state.fingerprint).length;
    const looping = occurrences >= config.loop.warnAt;

    if (!looping) {
      this.warnedSteps = 0;
    } else if (this.warnedSteps >= config.loop.forceAfterWarnings) {
      this.logger.warn(
        `Still looping on ${shortScreen(state.screenName)} after ${this.warnedSteps} warnings (${occurrences} visits), bypassing oracle`
      );
      this.warnedSteps = 0;
      return { kind: 'act', action: this.fallbackAction(state, node), decidedBy: 'fallback' };
    } else {
      this.warnedSteps++;
    }

    const banned = this.bannedKeys(state.fingerprint);

    let decision: Decision;
    try {
      decision = await oracle.decide(
        {
          app: job.app.packageName,
          state,
          node,
          history: this.graph.recentEdges(config.session.historyLength),
          screenNames: this.screenNames,
          knowledge: knowledge.get(state.fingerprint),
          triedThisSession: this.graph.triedActions(node),
          banned: banned.size > 0 ? Array.from(banned).sort() : undefined,
          loopWarning: looping ? { occurrences } : undefined,
          goal: job.goal,
        },
        this.logger
      );
    } catch (error) {
      if (error instanceof OracleUnavailableError) {
        this.finish({ name: 'failed', reason: 'oracle-unavailable' }, error.message);
        return { kind: 'terminal' };
      }
      throw error;
    }

    if (decision.type !== 'unresolved' && decision.note) {
      const notes = this.notes.get(state.fingerprint) ?? new Set<string>();
      notes.add(decision.note);
      this.notes.set(state.fingerprint, notes);
    }

    switch (decision.type) {
      case 'stop':
        if (decision.reason === 'goal-reached') this.graph.markTerminal(state.fingerprint);
        this.finish({ name: 'done', reason: decision.reason }, decision.message);
        return { kind: 'terminal' };
      case 'unresolved':
        this.logger.warn(`Oracle gave no usable answer after ${decision.attempts} tries, using fallback`);
        return { kind: 'act', action: this.fallbackAction(state, node), decidedBy: 'fallback' };
      case 'action':
        return { kind: 'act', action: decision.action, decidedBy: 'oracle' };
    }
  }

  /**
   * Default policy when the oracle cannot be used. Takes an untried action
   * of the current node, preferring ones no earlier session tried. With none
   * left it heads for the shallowest frontier node: the first hop of a known
   * route when there is one, otherwise `back` if that node is shallower.
   * Banned actions are never chosen.
   */
  private fallbackAction(state: ObservedState, node: GraphNode): ActionDescriptor {
    this.fallbackSteps++;
    const back: ActionDescriptor = { kind: 'back' };
    const banned = this.bannedKeys(node.fingerprint);
    const knownTried = new Set(this.options.knowledge.get(state.fingerprint)?.triedActions ?? []);
    const candidates = this.candidateActions(node, banned);
    const key = candidates.find((candidate) => !knownTried.has(candidate)) ?? candidates[0];
    const here = key ? this.descriptorForKey(state, key) : undefined;
    if (here) return here;

    const frontier = this.graph
      .shortestUnexploredFrontier()
      .filter(
        (candidate) =>
          candidate.fingerprint !== node.fingerprint &&
          this.candidateActions(candidate, this.bannedKeys(candidate.fingerprint)).length > 0
      );

    for (const target of frontier) {
      const hop = this.graph.routeBetween(node.fingerprint, target.fingerprint)?.[0];
      const action = hop ? this.descriptorForKey(state, hop.action.key) : undefined;
      if (hop && action) {
        this.logger.debug(`Heading for ${shortScreen(target.screenName)} via ${hop.action.label}`);
        return action;
      }
    }

    const nearest = frontier[0];
    if (!nearest) {
      this.logger.debug('Frontier is empty, going back');
      return back;
    }
    if (nearest.depth < node.depth) {
      this.logger.debug(`No known route to ${shortScreen(nearest.screenName)} (depth ${nearest.depth}), going back`);
      return back;
    }

    // Frontier is unreachable and no shallower: retry the least-used action here
    const retry = node.actions
      .filter((candidate) => candidate !== actionKeyFor('back') && !banned.has(candidate))
      .sort((a, b) => this.graph.attemptsFor(node.fingerprint, a) - this.graph.attemptsFor(node.fingerprint, b))[0];
    return (retry ? this.descriptorForKey(state, retry) : undefined) ?? back;
  }

  /** Untried element actions of `node` that are not banned */
  private candidateActions(node: GraphNode, banned: ReadonlySet<string>): string[] {
    return this.graph
      .untriedActions(node)
      .filter((key) => key !== actionKeyFor('back') && !banned.has(key));
  }

  /**
   * Element actions that crashed the app from this state, in this session or
   * an earlier one.
   */
  private bannedKeys(fingerprint: string): Set<string> {
    const banned = new Set(this.options.knowledge.get(fingerprint)?.crashTriggers ?? []);
    for (const edge of this.graph.outcomesFrom(fingerprint, 'crash')) banned.add(edge.action.key);
    banned.delete(actionKeyFor('back'));
    return banned;
  }

  /** Resolve an action key against the live elements of `state` */
  private descriptorForKey(state: ObservedState, key: string): ActionDescriptor | undefined {
    if (key === actionKeyFor('back')) return { kind: 'back' };

    for (const element of state.elements) {
      for (const interaction of element.interactions) {
        if (actionKeyFor(interaction, element) !== key) continue;
        if (interaction === 'type-text') {
          return { kind: 'element', elementId: element.id, interaction, text: this.options.config.session.fallbackText };
        }
        if (interaction === 'swipe') {
          return { kind: 'element', elementId: element.id, interaction, direction: 'down' };
        }
        return { kind: 'element', elementId: element.id, interaction };
      }
    }
    return undefined;
  }

  // ===========================================================================
  // Replay
  // ===========================================================================

  /**
   * Queue the shortest recorded path to the job's start screen, if any
   * earlier session found one.
   */
  private planReplay(state: ObservedState): void {
    const target = this.options.job.startScreen;
    if (!target || matchesScreen(state.screenName, target)) return;

    const paths = Array.from(this.options.knowledge.values())
      .filter((record) => matchesScreen(record.screenName, target))
      .flatMap((record) => record.paths)
      .sort((a, b) => a.length - b.length);

    const path = paths[0];
    if (!path) {
      this.logger.warn(`No recorded path to ${target}, exploring from ${shortScreen(state.screenName)}`);
      return;
    }
    this.logger.info(`Replaying ${path.length} step(s) to ${target}`);
    this.replayQueue = [...path];
  }

  private extendRoute(from: string, to: string, key: string): void {
    const base = this.routes.get(from);
    if (!base) return;
    const candidate = [...base, key];
    const known = this.routes.get(to);
    if (!known || candidate.length < known.length) this.routes.set(to, candidate);
  }

  // ===========================================================================
  // Checks
  // ===========================================================================

  private atStepBoundaryStop(): boolean {
    if (this.options.signal?.aborted) {
      this.finish({ name: 'done', reason: 'stopped' }, 'Stop requested');
      return true;
    }
    if (this.clock() - this.startedAt >= this.timeBudgetMs) {
      this.finish({ name: 'done', reason: 'time-exhausted' }, `Time budget of ${formatDuration(this.timeBudgetMs)} used up`);
      return true;
    }
    if (this.stepsTaken >= this.stepBudget) {
      this.finish({ name: 'done', reason: 'budget-exhausted' }, `Step budget of ${this.stepBudget} used up`);
      return true;
    }
    return false;
  }

  private reachedGoal(state: ObservedState, node: GraphNode): boolean {
    const target = this.options.job.goal?.screen;
    if (!target || !matchesScreen(state.screenName, target)) return false;

    node.terminal = true;
    this.finish({ name: 'done', reason: 'goal-reached' }, `Reached goal screen ${target}`);
    return true;
  }

  private noteObservation(state: ObservedState, discovered: boolean): void {
    this.screenNames.set(state.fingerprint, shortScreen(state.screenName));
    if (discovered) {
      this.recentFingerprints = [];
      this.warnedSteps = 0;
    }
    this.recentFingerprints.push(state.fingerprint);
    const window = this.options.config.loop.window;
    if (this.recentFingerprints.length > window) {
      this.recentFingerprints = this.recentFingerprints.slice(-window);
    }
  }

  // ===========================================================================
  // Transitions and results
  // ===========================================================================

  private transition(next: Exclude<SessionPhase, { name: 'done' | 'failed' }>): void {
    if (isTerminal(this.phase)) {
      throw new Error(`Session already ended in ${this.phase.name}`);
    }
    if (!TRANSITIONS[this.phase.name].includes(next.name)) {
      throw new Error(`Illegal session transition ${this.phase.name} -> ${next.name}`);
    }
    this.logger.debug(`${this.phase.name} -> ${next.name}`);
    this.phase = next;
    this.history.push(next.name);
  }

  private finish(phase: Extract<SessionPhase, { name: 'done' | 'failed' }>, message: string): void {
    if (isTerminal(this.phase)) return;
    this.logger.debug(`${this.phase.name} -> ${phase.name}(${phase.reason})`);
    this.phase = phase;
    this.history.push(phase.name);
    this.message = message;
  }

  private buildResult(): SessionResult {
    const { job, driver } = this.options;
    const phase: Extract<SessionPhase, { name: 'done' | 'failed' }> = isTerminal(this.phase)
      ? this.phase
      : { name: 'failed', reason: 'internal' };

    return {
      jobId: job.id,
      app: job.app.packageName,
      deviceSerial: driver.serial,
      status: phase.name,
      reason: phase.reason,
      message: this.message || 'Session ended without a terminal state',
      stepsTaken: this.stepsTaken,
      visitedNodes: this.graph.nodeCount,
      nodes: this.graph.getNodes(),
      edges: this.graph.getEdges(),
      fallbackSteps: this.fallbackSteps,
      startedAt: this.startedAt,
      elapsedMs: this.clock() - this.startedAt,
    };
  }

  /**
   * Everything this session learned, including from failed runs.
   */
  private buildDelta(): KnowledgeDelta {
    const records: KnowledgeRecord[] = this.graph.getNodes().map((node) => {
      const live = this.graph.get(node.fingerprint) ?? node;
      const crashTriggers = new Set(this.graph.outcomesFrom(node.fingerprint, 'crash').map((edge) => edge.action.key));
      const route = this.routes.get(node.fingerprint);
      return {
        fingerprint: node.fingerprint,
        screenName: node.screenName,
        visits: node.visits,
        triedActions: this.graph.triedActions(live),
        crashTriggers: Array.from(crashTriggers).sort(),
        notes: Array.from(this.notes.get(node.fingerprint) ?? []).sort(),
        deadEnd: this.graph.isDeadEnd(live),
        lastSeenAt: node.lastSeenAt,
        paths: route && route.length > 0 ? [route] : [],
      };
    });

    return { source: `${this.options.job.id}@${this.options.driver.serial}`, records };
  }
}
