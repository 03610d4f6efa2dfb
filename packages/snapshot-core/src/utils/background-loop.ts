/**
 * Periodic background task driven by an AbortController.
 *
 * The signal is observed at tick boundaries only: an iteration that is
 * already running finishes, then the loop exits.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { LOOP_DEFAULTS, toError } from '@snaptrail/snapshot-contracts';
import type { ILogger } from '@snaptrail/snapshot-contracts';

export interface BackgroundLoopOptions {
  name: string;
  intervalMs: number;
  logger: ILogger;
  /** Max time stop() waits for the loop to exit */
  joinTimeoutMs?: number;
}

export class BackgroundLoop {
  private controller?: AbortController;
  private loop?: Promise<void>;
  private readonly options: BackgroundLoopOptions;

  constructor(options: BackgroundLoopOptions) {
    this.options = options;
  }

  get running(): boolean {
    return this.controller !== undefined && !this.controller.signal.aborted;
  }

  /**
   * Start calling `tick` every intervalMs. No-op when already running.
   */
  start(tick: () => Promise<void>): void {
    if (this.running) {
      return;
    }
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.runLoop(tick, controller.signal);
  }

  /**
   * Abort and wait (bounded) for the current iteration to finish.
   * Returns false when the join timed out.
   */
  async stop(): Promise<boolean> {
    const controller = this.controller;
    const loop = this.loop;
    this.controller = undefined;
    this.loop = undefined;

    if (!controller || !loop) {
      return true;
    }
    controller.abort();

    const timeoutMs = this.options.joinTimeoutMs ?? LOOP_DEFAULTS.joinTimeoutMs;
    const timer = new AbortController();
    const joined = await Promise.race([
      loop.then(() => true),
      sleep(timeoutMs, false, { signal: timer.signal }).catch(() => false),
    ]);
    timer.abort();

    if (!joined) {
      this.options.logger.warn(`${this.options.name} loop did not stop within ${timeoutMs}ms`);
    }
    return joined;
  }

  private async runLoop(tick: () => Promise<void>, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await tick();
      } catch (error) {
        this.options.logger.error(`${this.options.name} iteration failed`, toError(error));
      }

      try {
        await sleep(this.options.intervalMs, undefined, { signal });
      } catch {
        // aborted while sleeping
        return;
      }
    }
  }
}
