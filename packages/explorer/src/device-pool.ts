/**
 * Device Pool
 *
 * Hands out devices to jobs with at most one holder per device. Jobs that
 * cannot run yet wait in a FIFO queue and are served by the first released
 * device that matches their selector.
 */

import { Logger } from '@roamer/shared';
import type { AutomationDriver } from './driver.js';
import { NoDeviceAvailableError } from './errors.js';
import type { DeviceSelector } from './types.js';

export interface DeviceHandle {
  serial: string;
  tags: string[];
  driver: AutomationDriver;
}

type DeviceState = 'idle' | 'in-use';

interface PoolDevice {
  handle: DeviceHandle;
  state: DeviceState;
}

/**
 * Queue entry for jobs waiting for a matching device
 */
interface WaitQueueEntry {
  jobId: string;
  selector: DeviceSelector;
  resolve: (handle: DeviceHandle) => void;
  reject: (error: Error) => void;
}

export interface DevicePoolOptions {
  /** Give up waiting after this long; 0 waits indefinitely */
  acquireTimeout?: number;
  logger?: Logger;
}

export interface PoolStats {
  total: number;
  idle: number;
  inUse: number;
  waiting: number;
}

export function matchesSelector(handle: DeviceHandle, selector: DeviceSelector): boolean {
  if (selector.serial && selector.serial !== handle.serial) return false;
  return selector.tags.every((tag) => handle.tags.includes(tag));
}

export function describeSelector(selector: DeviceSelector): string {
  const parts: string[] = [];
  if (selector.serial) parts.push(`serial=${selector.serial}`);
  if (selector.tags.length > 0) parts.push(`tags=${selector.tags.join(',')}`);
  return parts.length > 0 ? parts.join(' ') : 'any device';
}

/**
 * @example
 * ```typescript
 * const pool = new DevicePool([{ serial: 'emulator-5554', tags: ['api34'], driver }]);
 * const device = await pool.acquire('job-1', { tags: ['api34'] });
 * // ... run a session ...
 * pool.release(device.serial);
 * ```
 */
export class DevicePool {
  private devices: Map<string, PoolDevice> = new Map();
  private waitQueue: WaitQueueEntry[] = [];
  private acquireTimeout: number;
  private logger: Logger;

  constructor(handles: DeviceHandle[], options: DevicePoolOptions = {}) {
    for (const handle of handles) {
      if (this.devices.has(handle.serial)) {
        throw new Error(`Device ${handle.serial} registered twice`);
      }
      this.devices.set(handle.serial, { handle, state: 'idle' });
    }
    this.acquireTimeout = options.acquireTimeout ?? 0;
    this.logger = options.logger ?? new Logger({ prefix: '[pool]' });
  }

  get size(): number {
    return this.devices.size;
  }

  /** Whether any device in the pool could ever serve `selector` */
  canSatisfy(selector: DeviceSelector): boolean {
    return Array.from(this.devices.values()).some((device) => matchesSelector(device.handle, selector));
  }

  /**
   * Acquire a matching device for a job.
   *
   * Returns immediately when a matching device is idle, otherwise waits in
   * the queue until one is released.
   *
   * @throws NoDeviceAvailableError when no device in the pool matches at all
   */
  acquire(jobId: string, selector: DeviceSelector): Promise<DeviceHandle> {
    if (!this.canSatisfy(selector)) {
      return Promise.reject(
        new NoDeviceAvailableError(`No device in the pool matches ${describeSelector(selector)}`, {
          jobId,
          pool: Array.from(this.devices.keys()),
        })
      );
    }

    const idleDevice = Array.from(this.devices.values()).find(
      (device) => device.state === 'idle' && matchesSelector(device.handle, selector)
    );

    if (idleDevice) {
      this.claim(idleDevice, jobId);
      return Promise.resolve(idleDevice.handle);
    }

    return new Promise((resolve, reject) => {
      let timeout: NodeJS.Timeout | undefined;

      const entry: WaitQueueEntry = {
        jobId,
        selector,
        resolve: (handle) => {
          clearTimeout(timeout);
          resolve(handle);
        },
        reject: (error) => {
          clearTimeout(timeout);
          reject(error);
        },
      };

      if (this.acquireTimeout > 0) {
        timeout = setTimeout(() => {
          this.removeWaiter(entry);
          reject(new NoDeviceAvailableError(`Timed out waiting for ${describeSelector(selector)}`, { jobId }));
        }, this.acquireTimeout);
      }

      this.waitQueue.push(entry);
      this.logger.debug(`${jobId} waiting for ${describeSelector(selector)} (${this.waitQueue.length} queued)`);
    });
  }

  /**
   * Return a device to the pool and hand it to the first waiter it matches.
   */
  release(serial: string): void {
    const device = this.devices.get(serial);
    if (!device) throw new Error(`Device ${serial} not in pool`);

    device.state = 'idle';

    const waiter = this.waitQueue.find((entry) => matchesSelector(device.handle, entry.selector));
    if (waiter) {
      this.removeWaiter(waiter);
      this.claim(device, waiter.jobId);
      waiter.resolve(device.handle);
    }
  }

  /**
   * Reject every queued acquisition, e.g. when the run hits its deadline.
   */
  cancelWaiters(reason: string): string[] {
    const cancelled = this.waitQueue.map((entry) => entry.jobId);
    const waiters = this.waitQueue;
    this.waitQueue = [];
    for (const waiter of waiters) {
      waiter.reject(new NoDeviceAvailableError(reason, { jobId: waiter.jobId }));
    }
    return cancelled;
  }

  getStats(): PoolStats {
    const devices = Array.from(this.devices.values());
    return {
      total: devices.length,
      idle: devices.filter((d) => d.state === 'idle').length,
      inUse: devices.filter((d) => d.state === 'in-use').length,
      waiting: this.waitQueue.length,
    };
  }

  private claim(device: PoolDevice, jobId: string): void {
    device.state = 'in-use';
    this.logger.debug(`${device.handle.serial} assigned to ${jobId}`);
  }

  private removeWaiter(entry: WaitQueueEntry): void {
    const index = this.waitQueue.indexOf(entry);
    if (index !== -1) this.waitQueue.splice(index, 1);
  }
}
