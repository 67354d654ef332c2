/**
 * WhosOn Scheduler — Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { ReconcileScheduler, interruptibleSleep, type Sleep, type TargetReconciler } from "./scheduler.js";
import type { ReconcileOutcome } from "./reconciler.js";
import { TargetRegistry } from "../registry/registry.js";
import { InMemoryTargetStorage } from "../registry/memory-store.js";
import { createCapturingLogger, type MemoryTransport, type TrackerLogger } from "../logging/logger.js";
import type { TrackedTargetInput } from "../types.js";

const input: TrackedTargetInput = {
  address: "mc.test",
  protocolKind: "java",
  statusResourceRef: "s",
  detailResourceRef: "d",
  detailMessageRef: "m",
};

const reconciled: ReconcileOutcome = {
  status: "reconciled",
  snapshot: { online: false, protocolKind: "java", errorMessage: "down" },
  label: "unchanged",
  detail: "edited",
};

/** Records every call; the behaviour per call can be swapped in by tests. */
class FakeReconciler implements TargetReconciler {
  readonly visited: string[] = [];
  onReconcile: (scopeId: string, targetKey: string) => Promise<ReconcileOutcome> = async () => reconciled;

  async reconcile(scopeId: string, targetKey: string): Promise<ReconcileOutcome> {
    this.visited.push(`${scopeId}/${targetKey}`);
    return this.onReconcile(scopeId, targetKey);
  }
}

const settings = { updateIntervalMs: 20, targetDelayMs: 1, restartCooldownMs: 10 };

describe("ReconcileScheduler", () => {
  let registry: TargetRegistry;
  let reconciler: FakeReconciler;
  let logger: TrackerLogger;
  let transport: MemoryTransport;
  let scheduler: ReconcileScheduler;

  beforeEach(async () => {
    registry = new TargetRegistry(new InMemoryTargetStorage(), { cacheTtlMs: 0 });
    await registry.initialize();
    await registry.add("g1", "a", input);
    await registry.add("g1", "b", input);
    await registry.add("g2", "c", input);

    reconciler = new FakeReconciler();
    ({ logger, transport } = createCapturingLogger());
  });

  afterEach(async () => {
    await scheduler?.stop();
  });

  // ─── Single cycle ──────────────────────────────────────────────────────

  it("visits every target in snapshot order with a delay between targets", async () => {
    const sleeps: number[] = [];
    const sleep: Sleep = async (ms) => {
      sleeps.push(ms);
    };
    scheduler = new ReconcileScheduler({ registry, reconciler, settings: { ...settings, targetDelayMs: 2000 }, logger, sleep });

    const result = await scheduler.runCycle();
    expect(reconciler.visited).toEqual(["g1/a", "g1/b", "g2/c"]);
    expect(sleeps).toEqual([2000, 2000]);
    expect(result).toMatchObject({ attempted: 3, succeeded: 3, failed: 0, skipped: 0, interrupted: false });
    expect(scheduler.currentCycleCount()).toBe(1);
  });

  it("isolates a failing target from its siblings", async () => {
    reconciler.onReconcile = async (_scope, key) => {
      if (key === "b") throw new Error("Unknown failure");
      return reconciled;
    };
    scheduler = new ReconcileScheduler({ registry, reconciler, settings, logger });

    const result = await scheduler.runCycle();
    expect(result).toMatchObject({ attempted: 3, succeeded: 2, failed: 1 });
    expect(transport.messages("error")).toEqual(["Error updating b in scope g1"]);
  });

  it("iterates the snapshot taken at the start of the cycle", async () => {
    reconciler.onReconcile = async (scopeId, key) => {
      if (key === "a") {
        await registry.remove("g1", "b");
        await registry.add("g3", "late", input);
      }
      return (await registry.get(scopeId, key)) ? reconciled : { status: "absent" };
    };
    scheduler = new ReconcileScheduler({ registry, reconciler, settings, logger });

    const result = await scheduler.runCycle();
    expect(reconciler.visited).toEqual(["g1/a", "g1/b", "g2/c"]);
    expect(result).toMatchObject({ attempted: 3, succeeded: 2, skipped: 1 });
  });

  it("stops between targets, never mid-reconciliation", async () => {
    const controller = new AbortController();
    let finished = 0;
    reconciler.onReconcile = async () => {
      controller.abort();
      await new Promise((resolve) => setTimeout(resolve, 5));
      finished++;
      return reconciled;
    };
    scheduler = new ReconcileScheduler({ registry, reconciler, settings, logger });

    const result = await scheduler.runCycle(controller.signal);
    expect(finished).toBe(1);
    expect(result).toMatchObject({ attempted: 1, interrupted: true });
  });

  it("lets fatal probe errors escape the cycle", async () => {
    reconciler.onReconcile = async () => {
      throw Object.assign(new Error("too many open files"), { code: "EMFILE" });
    };
    scheduler = new ReconcileScheduler({ registry, reconciler, settings, logger });

    await expect(scheduler.runCycle()).rejects.toThrow("too many open files");
  });

  // ─── Loop ──────────────────────────────────────────────────────────────

  it("repeats cycles until stopped", async () => {
    scheduler = new ReconcileScheduler({ registry, reconciler, settings, logger });
    expect(scheduler.isRunning()).toBe(false);

    scheduler.start();
    expect(scheduler.isRunning()).toBe(true);
    await vi.waitFor(() => expect(scheduler.currentCycleCount()).toBeGreaterThanOrEqual(2));

    await scheduler.stop();
    expect(scheduler.getStatus()).toMatchObject({ running: false, nextRunEstimate: null });
    expect(transport.messages("info")).toEqual(["Update loop started", "Update loop stopped"]);
  });

  it("estimates the next run from the cycle interval", async () => {
    scheduler = new ReconcileScheduler({
      registry,
      reconciler,
      settings: { ...settings, updateIntervalMs: 60_000 },
      logger,
      now: () => 1_000,
    });

    scheduler.start();
    await vi.waitFor(() => expect(scheduler.currentCycleCount()).toBe(1));
    expect(scheduler.estimatedNextRunTime()?.getTime()).toBe(61_000);
  });

  it("restarts itself after a cycle fault", async () => {
    vi.spyOn(registry, "listAll").mockRejectedValueOnce(new Error("database is locked"));
    scheduler = new ReconcileScheduler({ registry, reconciler, settings, logger });

    scheduler.start();
    await vi.waitFor(() => expect(scheduler.currentCycleCount()).toBeGreaterThanOrEqual(1));

    expect(scheduler.isRunning()).toBe(true);
    expect(transport.messages("error")).toEqual(["Update loop failed; restarting after cooldown"]);
    expect(transport.messages("info")).toContain("Update loop restarted");
  });

  it("ignores a second start", async () => {
    scheduler = new ReconcileScheduler({ registry, reconciler, settings, logger });
    scheduler.start();
    scheduler.start();
    expect(transport.messages("info")).toEqual(["Update loop started"]);
  });
});

describe("interruptibleSleep", () => {
  it("wakes early on abort", async () => {
    const controller = new AbortController();
    const started = Date.now();
    const pending = interruptibleSleep(10_000, controller.signal);
    controller.abort();
    await pending;
    expect(Date.now() - started).toBeLessThan(1000);
  });
});
