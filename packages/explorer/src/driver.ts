/**
 * Automation driver boundary
 *
 * The engine talks to devices only through this interface. Wire protocol,
 * transport and device quirks belong to the implementation.
 */

import type { ActionableElement, AppTarget, SwipeDirection, UiSnapshot } from './types.js';

export type DriverCommand =
  | { type: 'tap'; target: ActionableElement }
  | { type: 'long-press'; target: ActionableElement }
  | { type: 'type-text'; target: ActionableElement; text: string }
  | { type: 'submit'; target: ActionableElement }
  | { type: 'swipe'; target: ActionableElement; direction: SwipeDirection }
  | { type: 'back' };

/**
 * - `ok`: the command was delivered
 * - `element-stale`: the target is no longer where it was observed
 * - `app-crashed`: the app under test is no longer in the foreground
 * - `timeout`: the driver did not answer in time
 */
export type DriverOutcome = 'ok' | 'element-stale' | 'app-crashed' | 'timeout';

export interface AutomationDriver {
  readonly serial: string;
  capture(signal?: AbortSignal): Promise<UiSnapshot>;
  perform(command: DriverCommand, signal?: AbortSignal): Promise<DriverOutcome>;
  /** Force-stop the app and bring it back to its entry screen */
  restartApp(app: AppTarget, signal?: AbortSignal): Promise<void>;
}
