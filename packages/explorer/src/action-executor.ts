/**
 * Action Executor
 *
 * Turns a validated action into driver commands and reports one outcome tag.
 * Stale targets get one re-observation and re-resolution; driver timeouts are
 * retried a bounded number of times. Crashes are reported, and the session
 * drives recovery through `recover()` from its own recovering state.
 */

import { Logger, TimeoutError, sleep, toError, truncate, withTimeout } from '@roamer/shared';
import type { AutomationDriver, DriverCommand, DriverOutcome } from './driver.js';
import { ActionExecutionError, CaptureError } from './errors.js';
import { Fingerprinter, actionKeyFor } from './fingerprint.js';
import type {
  ActionDescriptor,
  ActionableElement,
  AppTarget,
  EdgeOutcome,
  ObservedState,
  RecordedAction,
} from './types.js';

export type ActionOutcome = 'success' | 'element-stale' | 'app-crashed' | 'driver-timeout';

export interface ExecutionResult {
  outcome: ActionOutcome;
  action: RecordedAction;
  /** Driver commands issued, including retries */
  attempts: number;
  /** The target was found again in a fresh observation after going stale */
  reresolved: boolean;
  detail?: string;
}

export interface ActionExecutorOptions {
  driverTimeoutMs?: number;
  timeoutRetryCap?: number;
  restartSettleMs?: number;
  logger?: Logger;
}

export function toEdgeOutcome(outcome: ActionOutcome): EdgeOutcome {
  if (outcome === 'success') return 'success';
  if (outcome === 'app-crashed') return 'crash';
  return 'failure';
}

export function describeAction(action: ActionDescriptor, element?: ActionableElement): RecordedAction {
  if (action.kind === 'back' || !element) {
    return { key: actionKeyFor('back'), interaction: 'back', elementId: null, label: 'back' };
  }

  const name = element.text ?? element.label ?? element.resourceId?.split('/').pop() ?? element.role;
  let label = `${action.interaction} ${element.id} "${truncate(name, 30)}"`;
  if (action.text !== undefined) label += ` text="${truncate(action.text, 30)}"`;
  if (action.direction) label += ` ${action.direction}`;

  return {
    key: actionKeyFor(action.interaction, element),
    interaction: action.interaction,
    elementId: element.id,
    label,
    ...(action.text !== undefined ? { text: action.text } : {}),
    ...(action.direction ? { direction: action.direction } : {}),
  };
}

/**
 * Find an element from an earlier observation in a fresh one: same
 * signature first, then same class, resource id and text anywhere.
 */
export function reresolveElement(
  element: ActionableElement,
  candidates: ActionableElement[]
): ActionableElement | undefined {
  return (
    candidates.find((candidate) => candidate.signature === element.signature) ??
    candidates.find(
      (candidate) =>
        candidate.className === element.className &&
        candidate.resourceId === element.resourceId &&
        candidate.text === element.text &&
        candidate.label === element.label
    )
  );
}

function toCommand(action: ActionDescriptor, element: ActionableElement | undefined): DriverCommand {
  if (action.kind === 'back' || !element) return { type: 'back' };

  switch (action.interaction) {
    case 'tap':
      return { type: 'tap', target: element };
    case 'long-press':
      return { type: 'long-press', target: element };
    case 'type-text':
      return { type: 'type-text', target: element, text: action.text ?? '' };
    case 'submit':
      return { type: 'submit', target: element };
    case 'swipe':
      return { type: 'swipe', target: element, direction: action.direction ?? 'down' };
  }
}

export class ActionExecutor {
  private driverTimeoutMs: number;
  private timeoutRetryCap: number;
  private restartSettleMs: number;
  private logger: Logger;

  constructor(
    private driver: AutomationDriver,
    private fingerprinter: Fingerprinter,
    options: ActionExecutorOptions = {}
  ) {
    this.driverTimeoutMs = options.driverTimeoutMs ?? 15_000;
    this.timeoutRetryCap = options.timeoutRetryCap ?? 2;
    this.restartSettleMs = options.restartSettleMs ?? 2000;
    this.logger = options.logger ?? new Logger({ prefix: `[${driver.serial}]` });
  }

  async execute(action: ActionDescriptor, state: ObservedState): Promise<ExecutionResult> {
    if (action.kind === 'back') {
      const { outcome, attempts, detail } = await this.perform({ type: 'back' });
      return { outcome: this.toOutcome(outcome), action: describeAction(action), attempts, reresolved: false, detail };
    }

    const element = state.elements.find((candidate) => candidate.id === action.elementId);
    if (!element) {
      return {
        outcome: 'element-stale',
        action: {
          key: `${action.interaction}:${action.elementId}`,
          interaction: action.interaction,
          elementId: action.elementId,
          label: `${action.interaction} ${action.elementId}`,
        },
        attempts: 0,
        reresolved: false,
        detail: `Element ${action.elementId} is not part of the observed state`,
      };
    }

    const recorded = describeAction(action, element);
    const first = await this.perform(toCommand(action, element));

    if (first.outcome !== 'element-stale') {
      return {
        outcome: this.toOutcome(first.outcome),
        action: recorded,
        attempts: first.attempts,
        reresolved: false,
        detail: first.detail,
      };
    }

    this.logger.warn(`${recorded.label} hit a stale element, re-observing`);
    const fresh = await this.reobserve();
    const target = fresh ? reresolveElement(element, fresh.elements) : undefined;

    if (!target || !target.interactions.includes(action.interaction)) {
      return {
        outcome: 'element-stale',
        action: recorded,
        attempts: first.attempts,
        reresolved: false,
        detail: fresh ? 'Element not found after re-observation' : 'Re-observation failed',
      };
    }

    const second = await this.perform(toCommand(action, target));
    return {
      outcome: this.toOutcome(second.outcome),
      action: recorded,
      attempts: first.attempts + second.attempts,
      reresolved: true,
      detail: second.detail,
    };
  }

  /**
   * Restart the app and wait for it to settle on its entry screen.
   *
   * @throws ActionExecutionError if the restart itself fails
   */
  async recover(app: AppTarget, reason: 'crash' | 'launch' = 'crash'): Promise<void> {
    if (reason === 'crash') {
      this.logger.warn(`Restarting ${app.packageName} after crash`);
    } else {
      this.logger.debug(`Launching ${app.packageName}`);
    }
    try {
      await withTimeout((signal) => this.driver.restartApp(app, signal), this.driverTimeoutMs, 'app restart');
    } catch (error) {
      throw new ActionExecutionError(`Could not restart ${app.packageName}: ${toError(error).message}`, 'crash', {
        serial: this.driver.serial,
      });
    }
    await sleep(this.restartSettleMs);
  }

  private toOutcome(outcome: DriverOutcome): ActionOutcome {
    if (outcome === 'ok') return 'success';
    if (outcome === 'timeout') return 'driver-timeout';
    return outcome;
  }

  private async perform(command: DriverCommand): Promise<{ outcome: DriverOutcome; attempts: number; detail?: string }> {
    let detail: string | undefined;

    for (let attempt = 1; attempt <= this.timeoutRetryCap; attempt++) {
      try {
        const outcome = await withTimeout(
          (signal) => this.driver.perform(command, signal),
          this.driverTimeoutMs,
          `${command.type} command`
        );
        if (outcome !== 'timeout') return { outcome, attempts: attempt };
        detail = `Driver reported timeout for ${command.type}`;
      } catch (error) {
        detail = error instanceof TimeoutError ? error.message : `Driver error: ${toError(error).message}`;
      }

      if (attempt < this.timeoutRetryCap) {
        this.logger.warn(`${detail} (attempt ${attempt}/${this.timeoutRetryCap}), retrying`);
      }
    }

    return { outcome: 'timeout', attempts: this.timeoutRetryCap, detail };
  }

  private async reobserve(): Promise<ObservedState | null> {
    try {
      const snapshot = await withTimeout((signal) => this.driver.capture(signal), this.driverTimeoutMs, 'capture');
      return await this.fingerprinter.observe(snapshot);
    } catch (error) {
      const reason = error instanceof CaptureError ? error.message : `driver error: ${toError(error).message}`;
      this.logger.warn(`Re-observation failed: ${reason}`);
      return null;
    }
  }
}
