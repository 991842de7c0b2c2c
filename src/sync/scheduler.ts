/**
 * corpus-sync - Scheduler
 *
 * Runs a Delta cycle every `intervalMs`. A tick that lands while a cycle is
 * still running is skipped; a failed cycle is logged and the schedule keeps
 * going. stop() clears the timer and aborts the in-flight cycle.
 */

import { errorMessage } from '../core/errors.js';
import type { SyncLogger } from '../core/logger.js';
import type { SyncCycleResult } from '../core/types.js';
import type { SyncOrchestrator } from './orchestrator.js';

export interface SyncSchedulerOptions {
  /** Run a cycle as soon as start() is called (default true). */
  runImmediately?: boolean;
  logger?: SyncLogger;
  onCycle?: (result: SyncCycleResult) => void;
  onError?: (error: unknown) => void;
}

export function hoursToMs(hours: number): number {
  return Math.round(hours * 60 * 60 * 1000);
}

export class SyncScheduler {
  private timer: ReturnType<typeof setInterval> | null = null;
  private controller: AbortController | null = null;
  private inFlight: Promise<void> | null = null;

  constructor(
    private readonly orchestrator: SyncOrchestrator,
    private readonly intervalMs: number,
    private readonly options: SyncSchedulerOptions = {}
  ) {
    if (!(intervalMs > 0)) {
      throw new Error(`Sync interval must be positive, got ${intervalMs}`);
    }
  }

  isStarted(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;

    this.timer = setInterval(() => this.tick(), this.intervalMs);
    this.options.logger?.('INFO', `Scheduled sync every ${Math.round(this.intervalMs / 60000)} minute(s)`);

    if (this.options.runImmediately ?? true) {
      this.tick();
    }
  }

  /** Resolves once any in-flight cycle has wound down. */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.controller?.abort();
    await this.inFlight;
  }

  /** Start a cycle unless one is already running. */
  tick(): void {
    const log = this.options.logger;
    if (this.inFlight || this.orchestrator.isRunning()) {
      log?.('INFO', 'Previous sync still running, skipping this tick');
      return;
    }

    const controller = new AbortController();
    this.controller = controller;
    this.inFlight = this.runOnce(controller.signal).finally(() => {
      this.inFlight = null;
      if (this.controller === controller) this.controller = null;
    });
  }

  private async runOnce(signal: AbortSignal): Promise<void> {
    const log = this.options.logger;
    try {
      const result = await this.orchestrator.runCycle('delta', { signal });
      if (result) this.options.onCycle?.(result);
    } catch (error) {
      log?.('ERROR', `Scheduled sync failed: ${errorMessage(error)}`);
      this.options.onError?.(error);
    }
  }
}
