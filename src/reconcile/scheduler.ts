/**
 * WhosOn — Reconcile Scheduler
 *
 * Drives the reconciler over every tracked target on a fixed cadence.
 * State machine: stopped → running → (cycle fault) stopped → (cooldown)
 * running. A stop request takes effect between targets; the reconciliation
 * in flight is allowed to finish.
 */

import { formatErrorMessage, isFatalProbeError } from "../errors.js";
import type { TrackerLogger } from "../logging/logger.js";
import type { TargetRegistry } from "../registry/registry.js";
import type { Reconciler } from "./reconciler.js";

/** The part of the reconciler the scheduler drives. */
export type TargetReconciler = Pick<Reconciler, "reconcile">;

export type SchedulerSettings = {
  updateIntervalMs: number;
  targetDelayMs: number;
  restartCooldownMs: number;
};

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export type CycleResult = {
  attempted: number;
  succeeded: number;
  failed: number;
  /** Targets removed between the snapshot and their turn. */
  skipped: number;
  /** True when a stop request cut the cycle short. */
  interrupted: boolean;
  durationMs: number;
};

export type SchedulerStatus = {
  running: boolean;
  cycleCount: number;
  nextRunEstimate: Date | null;
};

/** Resolves after `ms`, or as soon as `signal` aborts. Never rejects. */
export const interruptibleSleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const done = (): void => {
      clearTimeout(timer);
      signal.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener("abort", done, { once: true });
  });

export class ReconcileScheduler {
  private readonly registry: TargetRegistry;
  private readonly reconciler: TargetReconciler;
  private readonly settings: SchedulerSettings;
  private readonly logger: TrackerLogger;
  private readonly sleep: Sleep;
  private readonly now: () => number;

  private running = false;
  private cycles = 0;
  private nextRunAt: number | null = null;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(options: {
    registry: TargetRegistry;
    reconciler: TargetReconciler;
    settings: SchedulerSettings;
    logger: TrackerLogger;
    sleep?: Sleep;
    now?: () => number;
  }) {
    this.registry = options.registry;
    this.reconciler = options.reconciler;
    this.settings = options.settings;
    this.logger = options.logger;
    this.sleep = options.sleep ?? interruptibleSleep;
    this.now = options.now ?? Date.now;
  }

  /** Start the update loop; the first cycle begins immediately. */
  start(): void {
    if (this.loop) return;
    const controller = new AbortController();
    this.controller = controller;
    this.running = true;
    this.logger.info("Update loop started", { intervalMs: this.settings.updateIntervalMs });
    this.loop = this.runLoop(controller.signal);
  }

  /** Request a stop and wait for the in-flight reconciliation to finish. */
  async stop(): Promise<void> {
    const loop = this.loop;
    if (!loop) return;
    this.controller?.abort();
    await loop;
    this.loop = null;
    this.controller = null;
    this.running = false;
    this.nextRunAt = null;
    this.logger.info("Update loop stopped");
  }

  isRunning(): boolean {
    return this.running;
  }

  /** Completed cycles since construction. */
  currentCycleCount(): number {
    return this.cycles;
  }

  estimatedNextRunTime(): Date | null {
    return this.nextRunAt === null ? null : new Date(this.nextRunAt);
  }

  getStatus(): SchedulerStatus {
    return {
      running: this.running,
      cycleCount: this.cycles,
      nextRunEstimate: this.estimatedNextRunTime(),
    };
  }

  /**
   * One pass over a snapshot of every (scope, key) pair. Per-target faults
   * are logged and counted; fatal probe errors and registry read failures
   * escape.
   */
  async runCycle(signal: AbortSignal = new AbortController().signal): Promise<CycleResult> {
    const started = this.now();
    const pairs: Array<[string, string]> = [];
    for (const [scopeId, targets] of await this.registry.listAll()) {
      for (const targetKey of targets.keys()) pairs.push([scopeId, targetKey]);
    }

    const result: CycleResult = { attempted: 0, succeeded: 0, failed: 0, skipped: 0, interrupted: false, durationMs: 0 };
    for (const [index, [scopeId, targetKey]] of pairs.entries()) {
      if (index > 0) await this.sleep(this.settings.targetDelayMs, signal);
      if (signal.aborted) {
        result.interrupted = true;
        break;
      }

      result.attempted++;
      try {
        const outcome = await this.reconciler.reconcile(scopeId, targetKey);
        if (outcome.status === "absent") result.skipped++;
        else result.succeeded++;
      } catch (err) {
        if (isFatalProbeError(err)) throw err;
        result.failed++;
        this.logger.error(`Error updating ${targetKey} in scope ${scopeId}`, { error: formatErrorMessage(err) });
      }
    }

    this.cycles++;
    result.durationMs = this.now() - started;
    this.logger.debug("Cycle complete", { cycle: this.cycles, ...result });
    return result;
  }

  private async runLoop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const cycleStart = this.now();
      this.nextRunAt = null;

      try {
        await this.runCycle(signal);
      } catch (err) {
        this.running = false;
        this.nextRunAt = this.now() + this.settings.restartCooldownMs;
        this.logger.error("Update loop failed; restarting after cooldown", {
          error: formatErrorMessage(err),
          cooldownMs: this.settings.restartCooldownMs,
        });
        await this.sleep(this.settings.restartCooldownMs, signal);
        if (signal.aborted) break;
        this.running = true;
        this.logger.info("Update loop restarted");
        continue;
      }

      const remaining = Math.max(0, this.settings.updateIntervalMs - (this.now() - cycleStart));
      this.nextRunAt = this.now() + remaining;
      await this.sleep(remaining, signal);
    }
  }
}
