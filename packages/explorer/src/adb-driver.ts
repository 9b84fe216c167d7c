/**
 * ADB automation driver
 *
 * Drives a device through the `adb` binary: uiautomator dumps for capture,
 * `input` for gestures, force-stop plus a launcher intent for restarts.
 * Crashes are detected by the app under test losing the foreground.
 */

import execa from 'execa';
import { Logger } from '@roamer/shared';
import type { AutomationDriver, DriverCommand, DriverOutcome } from './driver.js';
import { CaptureError } from './errors.js';
import type { AppTarget, BoundingBox, SwipeDirection, UiSnapshot } from './types.js';

const DUMP_PATH = '/sdcard/window_dump.xml';
const LONG_PRESS_MS = 1000;
const SWIPE_MS = 300;

export interface AdbDevice {
  serial: string;
  state: string;
}

export interface ForegroundActivity {
  packageName: string;
  activity: string;
}

/**
 * Parse `adb devices` output into serial/state pairs.
 */
export function parseDevicesOutput(stdout: string): AdbDevice[] {
  return stdout
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line && !line.startsWith('List of devices attached') && !line.startsWith('*'))
    .map((line) => {
      const [serial, state = 'unknown'] = line.split(/\s+/);
      return { serial, state };
    });
}

/**
 * Extract the resumed activity from `dumpsys activity activities` output.
 * Relative activity names (`.MainActivity`) are expanded with the package.
 */
export function parseResumedActivity(output: string): ForegroundActivity | null {
  const match = output.match(/(?:mResumedActivity|topResumedActivity)[:=]\s*ActivityRecord\{\S+ \S+ ([\w.]+)\/([\w.$]+)/);
  if (!match) return null;

  const packageName = match[1];
  const activity = match[2].startsWith('.') ? `${packageName}${match[2]}` : match[2];
  return { packageName, activity };
}

/**
 * Escape text for `adb shell input text`: spaces become %s and shell
 * metacharacters are backslash-escaped.
 */
export function escapeInputText(text: string): string {
  return text.replace(/([\\"'`$&|;<>()*?~#!{}[\]])/g, '\\$1').replace(/ /g, '%s');
}

/**
 * Start and end points for a swipe in `direction`, kept inside the middle
 * 60% of the element so the gesture does not start on an edge.
 */
export function swipePoints(bounds: BoundingBox, direction: SwipeDirection): [number, number, number, number] {
  const dx = Math.round(bounds.width * 0.3);
  const dy = Math.round(bounds.height * 0.3);
  const cx = Math.round(bounds.centerX);
  const cy = Math.round(bounds.centerY);

  switch (direction) {
    case 'up':
      return [cx, cy + dy, cx, cy - dy];
    case 'down':
      return [cx, cy - dy, cx, cy + dy];
    case 'left':
      return [cx + dx, cy, cx - dx, cy];
    case 'right':
      return [cx - dx, cy, cx + dx, cy];
  }
}

/** `adb shell` arguments that carry out one driver command */
export function inputArgs(command: DriverCommand): string[] {
  if (command.type === 'back') return ['input', 'keyevent', '4'];

  const { bounds } = command.target;
  const x = String(Math.round(bounds.centerX));
  const y = String(Math.round(bounds.centerY));

  switch (command.type) {
    case 'tap':
      return ['input', 'tap', x, y];
    case 'long-press':
      return ['input', 'swipe', x, y, x, y, String(LONG_PRESS_MS)];
    case 'type-text':
      // Focus the field first so the text lands in it
      return ['input', 'tap', x, y, '&&', 'input', 'text', escapeInputText(command.text)];
    case 'submit':
      // KEYCODE_ENTER fires the field's editor action
      return ['input', 'tap', x, y, '&&', 'input', 'keyevent', '66'];
    case 'swipe':
      return ['input', 'swipe', ...swipePoints(bounds, command.direction).map(String), String(SWIPE_MS)];
  }
}

export async function listAdbDevices(adbPath = 'adb'): Promise<AdbDevice[]> {
  const { stdout } = await execa(adbPath, ['devices']);
  return parseDevicesOutput(stdout).filter((device) => device.state === 'device');
}

export interface AdbDriverOptions {
  adbPath?: string;
  logger?: Logger;
}

export class AdbDriver implements AutomationDriver {
  private adbPath: string;
  private logger: Logger;
  private app: AppTarget | null = null;

  constructor(
    readonly serial: string,
    options: AdbDriverOptions = {}
  ) {
    this.adbPath = options.adbPath ?? 'adb';
    this.logger = options.logger ?? new Logger({ prefix: `[${serial}]` });
  }

  async capture(signal?: AbortSignal): Promise<UiSnapshot> {
    await this.adb(['shell', 'uiautomator', 'dump', DUMP_PATH], signal);
    const hierarchy = await this.adb(['exec-out', 'cat', DUMP_PATH], signal);
    if (!hierarchy.includes('<hierarchy')) {
      throw new CaptureError('uiautomator returned no hierarchy', { serial: this.serial });
    }

    const foreground = await this.foreground(signal);
    return {
      screenName: foreground?.activity ?? 'unknown',
      packageName: foreground?.packageName,
      hierarchy,
    };
  }

  async perform(command: DriverCommand, signal?: AbortSignal): Promise<DriverOutcome> {
    await this.adb(['shell', ...inputArgs(command)], signal);

    if (this.app) {
      const foreground = await this.foreground(signal);
      if (foreground && foreground.packageName !== this.app.packageName) {
        this.logger.debug(`Foreground moved to ${foreground.packageName} after ${command.type}`);
        // pidof exits non-zero when the process is gone
        const pidof = await this.adbResult(['shell', 'pidof', this.app.packageName], signal);
        if (pidof.exitCode !== 0 || !pidof.stdout.trim()) return 'app-crashed';
      }
    }
    return 'ok';
  }

  async restartApp(app: AppTarget, signal?: AbortSignal): Promise<void> {
    this.app = app;
    await this.adb(['shell', 'am', 'force-stop', app.packageName], signal);

    if (app.entryActivity) {
      const component = app.entryActivity.includes('/') ? app.entryActivity : `${app.packageName}/${app.entryActivity}`;
      await this.adb(['shell', 'am', 'start', '-W', '-n', component], signal);
    } else {
      await this.adb(
        ['shell', 'monkey', '-p', app.packageName, '-c', 'android.intent.category.LAUNCHER', '1'],
        signal
      );
    }
  }

  private async foreground(signal?: AbortSignal): Promise<ForegroundActivity | null> {
    const output = await this.adb(['shell', 'dumpsys', 'activity', 'activities'], signal);
    return parseResumedActivity(output);
  }

  private async adb(args: string[], signal?: AbortSignal): Promise<string> {
    const { stdout } = await this.adbResult(args, signal, true);
    return stdout;
  }

  private async adbResult(
    args: string[],
    signal?: AbortSignal,
    reject = false
  ): Promise<{ stdout: string; exitCode: number }> {
    const child = execa(this.adbPath, ['-s', this.serial, ...args], { reject });
    const abort = (): void => {
      child.kill();
    };
    signal?.addEventListener('abort', abort, { once: true });

    try {
      const { stdout, exitCode } = await child;
      return { stdout, exitCode };
    } finally {
      signal?.removeEventListener('abort', abort);
    }
  }
}
