/**
 * WhosOn — Reconciler
 *
 * Brings one target's status and detail resources in line with a fresh
 * probe. The two resources are updated independently; a failure on one
 * never rolls back the other.
 */

import { classifyFault, formatErrorMessage, type FaultKind } from "../errors.js";
import type { TrackerLogger } from "../logging/logger.js";
import type { StatusProber } from "../probe/prober.js";
import { KeyedSerialQueue, type TargetRegistry } from "../registry/registry.js";
import { fallbackLabelForSnapshot, labelForSnapshot } from "../render/label.js";
import { renderReport } from "../render/report.js";
import type { ResourcePlatform, StatusSnapshot, TrackedTarget } from "../types.js";

/**
 * - `unchanged`: current name already matches, no write made
 * - `renamed`: decorated label applied
 * - `fallback`: glyph-free label applied (or already showing) after a permission fault
 * - `repaired`: decorated label applied after re-granting the engine's capability
 * - `stale`: every fallback failed; left for the next cycle
 * - `deferred`: rate limited; left for the next cycle
 * - `missing`: status resource no longer exists
 * - `failed`: any other fault
 */
export type LabelState = "unchanged" | "renamed" | "fallback" | "repaired" | "stale" | "deferred" | "missing" | "failed";

/**
 * - `edited`: existing detail message overwritten
 * - `replaced`: message was gone; a new one was sent and its ref persisted
 * - `missing`: detail resource no longer exists
 * - `failed`: any other fault
 */
export type DetailState = "edited" | "replaced" | "missing" | "failed";

export type ReconcileOutcome =
  | { status: "absent" }
  | { status: "reconciled"; snapshot: StatusSnapshot; label: LabelState; detail: DetailState };

export type ReconcilerDeps = {
  registry: TargetRegistry;
  prober: StatusProber;
  platform: ResourcePlatform;
  logger: TrackerLogger;
};

export class Reconciler {
  private readonly registry: TargetRegistry;
  private readonly prober: StatusProber;
  private readonly platform: ResourcePlatform;
  private readonly logger: TrackerLogger;
  private readonly lanes = new KeyedSerialQueue();

  constructor(deps: ReconcilerDeps) {
    this.registry = deps.registry;
    this.prober = deps.prober;
    this.platform = deps.platform;
    this.logger = deps.logger;
  }

  /**
   * Idempotent. Calls for the same target run one after another, so an
   * overlapping call sees the detail message ref the previous one stored.
   * Rejects only for registry read failures and fatal probe errors; every
   * platform fault is handled here.
   */
  reconcile(scopeId: string, targetKey: string): Promise<ReconcileOutcome> {
    return this.lanes.enqueue(`${scopeId}/${targetKey}`, () => this.reconcileNow(scopeId, targetKey));
  }

  private async reconcileNow(scopeId: string, targetKey: string): Promise<ReconcileOutcome> {
    const target = await this.registry.get(scopeId, targetKey);
    if (!target) return { status: "absent" };

    const log = this.logger.withContext({ scopeId, targetKey, operation: "reconcile" });
    const snapshot = await this.prober.probe(target.address, target.protocolKind);

    const label = await this.syncLabel(target, snapshot, log);
    const detail = await this.syncDetail(target, snapshot, log);
    log.debug("Reconciled", { online: snapshot.online, label, detail });

    return { status: "reconciled", snapshot, label, detail };
  }

  // ─── Status resource ─────────────────────────────────────────────────────

  private async syncLabel(target: TrackedTarget, snapshot: StatusSnapshot, log: TrackerLogger): Promise<LabelState> {
    const { scopeId, statusResourceRef: ref } = target;
    const label = labelForSnapshot(snapshot, target.displayName, target.address);

    let current: string | undefined;
    try {
      current = await this.platform.getResourceName(scopeId, ref);
    } catch (err) {
      return this.unhandled(classifyFault(err), err, "read status resource", log);
    }

    if (current === undefined) {
      log.warn("Status resource missing; skipping rename", { resourceRef: ref });
      return "missing";
    }
    if (current === label) {
      log.debug("Status name unchanged", { name: label });
      return "unchanged";
    }

    try {
      await this.platform.renameResource(scopeId, ref, label);
      log.info(`Updated status name from '${current}' to '${label}'`);
      return "renamed";
    } catch (err) {
      const kind = classifyFault(err);
      if (kind !== "permission_denied") return this.unhandled(kind, err, "rename status resource", log);
      log.warn("Permission denied renaming status resource; trying fallbacks", { error: formatErrorMessage(err) });
    }

    const fallback = fallbackLabelForSnapshot(snapshot, target.displayName, target.address);
    try {
      if (current !== fallback) await this.platform.renameResource(scopeId, ref, fallback);
      log.info(`Updated status name using fallback '${fallback}'`);
      return "fallback";
    } catch (err) {
      const kind = classifyFault(err);
      if (kind === "rate_limited") return this.unhandled(kind, err, "rename status resource", log);
      log.debug("Fallback rename failed", { error: formatErrorMessage(err) });
    }

    try {
      await this.platform.grantCapabilities(scopeId, ref, this.platform.principalId, ["manage_resources"]);
      await this.platform.renameResource(scopeId, ref, label);
      log.info(`Updated status name after re-granting permissions: '${label}'`);
      return "repaired";
    } catch (err) {
      log.error("All fallback attempts failed for status resource; leaving it for the next cycle", {
        resourceRef: ref,
        kind: classifyFault(err),
        error: formatErrorMessage(err),
      });
      return "stale";
    }
  }

  // ─── Detail resource ─────────────────────────────────────────────────────

  private async syncDetail(target: TrackedTarget, snapshot: StatusSnapshot, log: TrackerLogger): Promise<DetailState> {
    const { scopeId, targetKey, detailResourceRef: ref } = target;
    const report = renderReport(snapshot, target.address, target.displayName);

    try {
      await this.platform.editMessage(scopeId, ref, target.detailMessageRef, report);
      return "edited";
    } catch (err) {
      const kind = classifyFault(err);
      if (kind !== "not_found") {
        this.unhandled(kind, err, "edit detail message", log);
        return "failed";
      }
    }

    log.info("Detail message not found, sending a new one");
    try {
      const messageRef = await this.platform.sendMessage(scopeId, ref, report);
      await this.registry.updateDetailMessageRef(scopeId, targetKey, messageRef);
      return "replaced";
    } catch (err) {
      const kind = classifyFault(err);
      if (kind === "not_found") {
        log.warn("Detail resource missing; skipping report", { resourceRef: ref });
        return "missing";
      }
      this.unhandled(kind, err, "replace detail message", log);
      return "failed";
    }
  }

  private unhandled(kind: FaultKind, err: unknown, action: string, log: TrackerLogger): LabelState {
    const error = formatErrorMessage(err);
    switch (kind) {
      case "rate_limited":
        log.warn(`Rate limited (${action}); will retry next cycle`, { error });
        return "deferred";
      case "not_found":
        log.warn(`Resource missing (${action})`, { error });
        return "missing";
      default:
        log.error(`Failed to ${action}`, { kind, error });
        return "failed";
    }
  }
}
