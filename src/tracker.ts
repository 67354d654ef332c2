/**
 * WhosOn — Tracker Service
 *
 * The operations the command layer calls: add, remove and list targets,
 * force updates, permission checks, confirmed scope cleanup, and the
 * lifecycle of the update loop.
 */

import { createTargetKey, detailResourceName, parseAddress } from "./address.js";
import { DEFAULT_TRACKER_SETTINGS, type TrackerSettings } from "./config.js";
import { ConfirmationGate, type ConfirmationDecision, type ConfirmationResolution } from "./confirmation.js";
import {
  DEFAULT_REMEDIATION,
  classifyFault,
  fail,
  formatErrorMessage,
  ok,
  toFault,
  TrackerFault,
  type Result,
} from "./errors.js";
import type { TrackerLogger } from "./logging/logger.js";
import { PermissionVerifier } from "./permissions/verifier.js";
import { StatusProber, type AdapterSet } from "./probe/prober.js";
import { ProtocolResolver } from "./probe/resolver.js";
import { Reconciler, type ReconcileOutcome } from "./reconcile/reconciler.js";
import { ReconcileScheduler, type SchedulerStatus, type Sleep } from "./reconcile/scheduler.js";
import type { TargetRegistry } from "./registry/registry.js";
import { renderReport } from "./render/report.js";
import type { Capability, ProtocolSelection, ResourcePlatform, StatusSnapshot, TrackedTarget } from "./types.js";

// =============================================================================
// Result Types
// =============================================================================

export type AddTargetOptions = {
  displayName?: string;
  /** Defaults to `auto`, which detects the protocol. */
  protocol?: ProtocolSelection;
};

export type AddedTarget = {
  target: TrackedTarget;
  snapshot: StatusSnapshot;
  /** Non-fatal problems, e.g. the server was offline when added. */
  warnings: string[];
};

export type RemovalSummary = {
  target: TrackedTarget;
  deletedResources: Array<"status" | "detail">;
  containerDeleted: boolean;
  remainingTargets: number;
  errors: string[];
};

export type ForceReconcileSummary = {
  succeeded: number;
  failed: number;
};

export type PermissionReport = {
  scopeId: string;
  missingScopeCapabilities: Capability[];
  checked: number;
  repaired: number;
  failed: number;
  issues: string[];
  remediation: string[];
};

export type CleanupSummary = {
  removedTargets: number;
  resourcesDeleted: number;
  containerDeleted: boolean;
  errors: string[];
};

export type CleanupRequest = {
  token: string;
  scopeId: string;
  targetCount: number;
  expiresAt: Date;
  resolution: Promise<ConfirmationResolution>;
};

export type CleanupResolution =
  | { resolution: "confirmed"; scopeId: string; summary: CleanupSummary }
  | { resolution: "cancelled" | "expired"; scopeId: string };

export type TrackerServiceOptions = {
  registry: TargetRegistry;
  platform: ResourcePlatform;
  adapters: AdapterSet;
  logger: TrackerLogger;
  settings?: Partial<TrackerSettings>;
  /** Overrides for tests. */
  sleep?: Sleep;
  now?: () => number;
};

// =============================================================================
// Tracker Service
// =============================================================================

export class TrackerService {
  readonly registry: TargetRegistry;
  readonly settings: TrackerSettings;

  private readonly platform: ResourcePlatform;
  private readonly logger: TrackerLogger;
  private readonly prober: StatusProber;
  private readonly resolver: ProtocolResolver;
  private readonly verifier: PermissionVerifier;
  private readonly reconciler: Reconciler;
  private readonly scheduler: ReconcileScheduler;
  private readonly cleanupGate: ConfirmationGate<string>;

  constructor(options: TrackerServiceOptions) {
    this.registry = options.registry;
    this.platform = options.platform;
    this.logger = options.logger;
    this.settings = { ...DEFAULT_TRACKER_SETTINGS, ...options.settings };

    const timeoutMs = this.settings.probeTimeoutMs;
    this.prober = new StatusProber(options.adapters, { timeoutMs, logger: this.logger.child("prober") });
    this.resolver = new ProtocolResolver(options.adapters, { timeoutMs, logger: this.logger.child("resolver") });
    this.verifier = new PermissionVerifier(this.platform, { logger: this.logger.child("permissions") });
    this.reconciler = new Reconciler({
      registry: this.registry,
      prober: this.prober,
      platform: this.platform,
      logger: this.logger.child("reconciler"),
    });
    this.scheduler = new ReconcileScheduler({
      registry: this.registry,
      reconciler: this.reconciler,
      settings: this.settings,
      logger: this.logger.child("scheduler"),
      sleep: options.sleep,
      now: options.now,
    });
    this.cleanupGate = new ConfirmationGate({ timeoutMs: this.settings.confirmationTimeoutMs, now: options.now });
  }

  // ─── Lifecycle ───────────────────────────────────────────────────────────

  /** Prune orphaned scopes, report missing capabilities, then start the update loop. */
  async start(): Promise<void> {
    const scopes = await this.platform.listScopes();
    this.logger.info(`Connected to ${scopes.length} scopes`);
    await this.registry.pruneOrphanedScopes(scopes);

    for (const scopeId of scopes) {
      try {
        const missing = await this.verifier.missingScopeCapabilities(scopeId);
        if (missing.length > 0) this.logger.warn(`Missing permissions in scope ${scopeId}: ${missing.join(", ")}`);
      } catch (err) {
        this.logger.warn(`Could not read permissions in scope ${scopeId}`, { error: formatErrorMessage(err) });
      }
    }

    this.scheduler.start();
  }

  async stop(): Promise<void> {
    this.cleanupGate.dispose();
    await this.scheduler.stop();
  }

  schedulerStatus(): SchedulerStatus {
    return this.scheduler.getStatus();
  }

  // ─── Targets ─────────────────────────────────────────────────────────────

  async addTarget(scopeId: string, address: string, options: AddTargetOptions = {}): Promise<Result<AddedTarget>> {
    const trimmed = address.trim();
    const { displayName } = options;
    const log = this.logger.withContext({ scopeId, operation: "addTarget" });

    if (!parseAddress(trimmed)) {
      return fail(new TrackerFault("unreachable", `\`${address}\` is not a valid server address.`));
    }
    const targetKey = createTargetKey(trimmed);
    let missing: Capability[];
    try {
      if (await this.registry.get(scopeId, targetKey)) {
        return fail(new TrackerFault("duplicate_key", `\`${trimmed}\` is already being tracked.`));
      }
      missing = await this.verifier.missingScopeCapabilities(scopeId);
    } catch (err) {
      const fault = toFault(err, "Could not check the bot's permissions");
      log.error(fault.message, { kind: fault.kind });
      return fail(fault);
    }
    if (missing.length > 0) {
      log.warn(`Missing permissions: ${missing.join(", ")}`);
      return fail(
        new TrackerFault("permission_denied", `The bot is missing required permissions: ${missing.join(", ")}`, {
          missingCapabilities: missing,
        }),
      );
    }

    const selection = options.protocol ?? "auto";
    const protocolKind = selection === "auto" ? await this.resolver.resolve(trimmed) : selection;
    if (protocolKind === "undetermined") {
      return fail(
        new TrackerFault("unreachable", `Could not connect to \`${trimmed}\`. Please check the address and try again.`),
      );
    }

    const snapshot = await this.prober.probe(trimmed, protocolKind);
    const warnings: string[] = [];
    if (!snapshot.online) {
      warnings.push(`The server at \`${trimmed}\` appears to be offline. Adding it anyway...`);
    }

    const created: string[] = [];
    let createdContainer: string | undefined;
    try {
      const name = displayName || trimmed;
      let containerRef = await this.platform.findContainer(scopeId, this.settings.categoryName);
      if (!containerRef) {
        log.info(`Creating ${this.settings.categoryName} container`);
        containerRef = await this.platform.createContainer(scopeId, this.settings.categoryName);
        createdContainer = containerRef;
      }

      const statusResourceRef = await this.platform.createStatusResource(scopeId, {
        name: `📊 ${name}`,
        containerRef,
        occupancyCap: 0,
      });
      created.push(statusResourceRef);

      if (!(await this.verifier.verify(scopeId, statusResourceRef))) {
        warnings.push("Could not ensure the bot can manage the status channel. Status updates may fail.");
      }

      const detailResourceRef = await this.platform.createDetailResource(scopeId, {
        name: detailResourceName(displayName, trimmed),
        containerRef,
        topic: `Tracking ${trimmed}`,
      });
      created.push(detailResourceRef);

      const detailMessageRef = await this.platform.sendMessage(
        scopeId,
        detailResourceRef,
        renderReport(snapshot, trimmed, displayName),
      );

      const inserted = await this.registry.add(scopeId, targetKey, {
        address: trimmed,
        displayName: displayName || undefined,
        protocolKind,
        statusResourceRef,
        detailResourceRef,
        detailMessageRef,
      });
      if (!inserted) {
        await this.rollback(scopeId, created, createdContainer, log);
        return fail(new TrackerFault("duplicate_key", `\`${trimmed}\` is already being tracked.`));
      }

      const target = await this.registry.get(scopeId, targetKey);
      if (!target) throw new TrackerFault("unexpected", "Target vanished right after it was added");
      log.info(`Added server ${trimmed}`, { targetKey, protocolKind });
      return ok({ target, snapshot, warnings });
    } catch (err) {
      const fault = toFault(err, "Could not add server");
      log.error(fault.message, { kind: fault.kind });
      await this.rollback(scopeId, created, createdContainer, log);
      return fail(fault);
    }
  }

  async removeTarget(scopeId: string, targetKey: string): Promise<Result<RemovalSummary>> {
    const log = this.logger.withContext({ scopeId, targetKey, operation: "removeTarget" });
    const target = await this.registry.get(scopeId, targetKey);
    if (!target) return fail(new TrackerFault("not_found", "That server is not being tracked."));

    const containerRef =
      (await this.lookupContainer(scopeId, target.statusResourceRef)) ??
      (await this.lookupContainer(scopeId, target.detailResourceRef));

    const deletedResources: RemovalSummary["deletedResources"] = [];
    const errors: string[] = [];
    for (const [label, ref] of [
      ["status", target.statusResourceRef],
      ["detail", target.detailResourceRef],
    ] as const) {
      const error = await this.deleteQuietly(scopeId, ref);
      if (error === null) deletedResources.push(label);
      else if (error !== "gone") errors.push(`${label} channel: ${error}`);
    }

    try {
      await this.registry.remove(scopeId, targetKey);
    } catch (err) {
      return fail(toFault(err, "Could not remove server"));
    }

    const remainingTargets = (await this.registry.listByScope(scopeId)).size;
    let containerDeleted = false;
    if (remainingTargets === 0 && containerRef) {
      const result = await this.deleteContainerIfEmpty(scopeId, containerRef, log);
      containerDeleted = result.deleted;
      if (result.error) errors.push(`container: ${result.error}`);
    }

    log.info(`Removed server ${target.address}`);
    return ok({ target, deletedResources, containerDeleted, remainingTargets, errors });
  }

  async listTargets(scopeId: string): Promise<TrackedTarget[]> {
    return [...(await this.registry.listByScope(scopeId)).values()];
  }

  async forceReconcileAll(scopeId: string): Promise<ForceReconcileSummary> {
    const summary: ForceReconcileSummary = { succeeded: 0, failed: 0 };
    for (const targetKey of (await this.registry.listByScope(scopeId)).keys()) {
      let outcome: ReconcileOutcome;
      try {
        outcome = await this.reconciler.reconcile(scopeId, targetKey);
      } catch (err) {
        summary.failed++;
        this.logger.error(`Error updating ${targetKey}`, { scopeId, error: formatErrorMessage(err) });
        continue;
      }
      if (outcome.status === "reconciled") summary.succeeded++;
    }
    return summary;
  }

  async checkAndRepairPermissions(scopeId: string): Promise<PermissionReport> {
    const report: PermissionReport = {
      scopeId,
      missingScopeCapabilities: [],
      checked: 0,
      repaired: 0,
      failed: 0,
      issues: [],
      remediation: [],
    };
    try {
      report.missingScopeCapabilities = await this.verifier.missingScopeCapabilities(scopeId);
    } catch (err) {
      report.issues.push(`Could not read the bot's server permissions: ${formatErrorMessage(err)}`);
    }

    for (const target of await this.listTargets(scopeId)) {
      report.checked++;
      const name = target.displayName || target.address;
      try {
        const result = await this.verifier.verifyDetailed(scopeId, target.statusResourceRef);
        if (result.repaired) report.repaired++;
        if (!result.satisfied) {
          report.failed++;
          report.issues.push(`${name}: ${result.error ?? `missing ${result.missing.join(", ")}`}`);
        }
      } catch (err) {
        report.failed++;
        report.issues.push(
          classifyFault(err) === "not_found"
            ? `Channel not found for ${target.address}`
            : `${name}: ${formatErrorMessage(err)}`,
        );
      }
    }

    if (report.issues.length > 0 || report.missingScopeCapabilities.length > 0) {
      report.remediation = DEFAULT_REMEDIATION.permission_denied;
    }
    return report;
  }

  // ─── Scope lifecycle ─────────────────────────────────────────────────────

  /** Issue a confirmation token for wiping a scope. */
  async requestScopeCleanup(scopeId: string): Promise<Result<CleanupRequest>> {
    const targetCount = (await this.registry.listByScope(scopeId)).size;
    if (targetCount === 0) {
      return fail(new TrackerFault("not_found", "No servers are currently being tracked."));
    }
    const ticket = this.cleanupGate.request(scopeId);
    return ok({ token: ticket.token, scopeId, targetCount, expiresAt: ticket.expiresAt, resolution: ticket.resolution });
  }

  /** Deliver the decision for a cleanup token; only `confirmed` runs the cleanup. */
  async resolveScopeCleanup(token: string, decision: ConfirmationDecision): Promise<Result<CleanupResolution>> {
    const resolved = this.cleanupGate.resolve(token, decision);
    if (!resolved.ok) {
      return fail(new TrackerFault("not_found", "This cleanup request has expired or was already answered."));
    }
    const scopeId = resolved.subject;
    if (resolved.resolution !== "confirmed") {
      this.logger.info(`Cleanup ${resolved.resolution}`, { scopeId });
      return ok({ resolution: resolved.resolution, scopeId });
    }
    return ok({ resolution: "confirmed", scopeId, summary: await this.cleanupScope(scopeId) });
  }

  /** Delete every tracked resource in the scope and forget its targets. Safe to repeat. */
  async cleanupScope(scopeId: string): Promise<CleanupSummary> {
    const log = this.logger.withContext({ scopeId, operation: "cleanupScope" });
    const targets = await this.listTargets(scopeId);
    const summary: CleanupSummary = { removedTargets: 0, resourcesDeleted: 0, containerDeleted: false, errors: [] };

    for (const target of targets) {
      for (const ref of [target.statusResourceRef, target.detailResourceRef]) {
        const error = await this.deleteQuietly(scopeId, ref);
        if (error === null) summary.resourcesDeleted++;
        else if (error !== "gone") summary.errors.push(`${target.address}: ${error}`);
      }
    }
    summary.removedTargets = await this.registry.removeScope(scopeId);

    try {
      const containerRef = await this.platform.findContainer(scopeId, this.settings.categoryName);
      if (containerRef) {
        const result = await this.deleteContainerIfEmpty(scopeId, containerRef, log);
        summary.containerDeleted = result.deleted;
        if (result.error) summary.errors.push(`container: ${result.error}`);
      }
    } catch (err) {
      summary.errors.push(`container: ${formatErrorMessage(err)}`);
    }

    log.info(`Cleanup removed ${summary.removedTargets} servers`, { ...summary });
    return summary;
  }

  /** The engine left the scope; its resources are gone with it. */
  async handleScopeRemoved(scopeId: string): Promise<number> {
    const removed = await this.registry.removeScope(scopeId);
    this.logger.info(`Removed ${removed} servers for departed scope`, { scopeId });
    return removed;
  }

  async pruneOrphanedScopes(): Promise<number> {
    const removed = await this.registry.pruneOrphanedScopes(await this.platform.listScopes());
    if (removed > 0) this.logger.info(`Pruned ${removed} servers from scopes the bot has left`);
    return removed;
  }

  // ─── Internals ───────────────────────────────────────────────────────────

  /** Null on success, "gone" when it no longer existed, else the error text. */
  private async deleteQuietly(scopeId: string, ref: string): Promise<string | null> {
    try {
      await this.platform.deleteResource(scopeId, ref);
      return null;
    } catch (err) {
      if (classifyFault(err) === "not_found") return "gone";
      const error = formatErrorMessage(err);
      this.logger.error("Could not delete resource", { scopeId, resourceRef: ref, error });
      return error;
    }
  }

  private async lookupContainer(scopeId: string, ref: string): Promise<string | undefined> {
    try {
      return await this.platform.getResourceContainer(scopeId, ref);
    } catch (err) {
      this.logger.debug("Could not look up container", { scopeId, resourceRef: ref, error: formatErrorMessage(err) });
      return undefined;
    }
  }

  /** Delete the container only when it is ours by name and holds nothing else. */
  private async deleteContainerIfEmpty(
    scopeId: string,
    containerRef: string,
    log: TrackerLogger,
  ): Promise<{ deleted: boolean; error?: string }> {
    try {
      const name = await this.platform.getResourceName(scopeId, containerRef);
      if (name !== this.settings.categoryName) return { deleted: false };
      const children = await this.platform.countContainerChildren(scopeId, containerRef);
      if (children > 0) {
        log.info(`Container not deleted; it holds ${children} other channels`);
        return { deleted: false };
      }
      await this.platform.deleteContainer(scopeId, containerRef);
      log.info(`Deleted empty ${this.settings.categoryName} container`);
      return { deleted: true };
    } catch (err) {
      if (classifyFault(err) === "not_found") return { deleted: false };
      const error = formatErrorMessage(err);
      log.error("Could not delete container", { error });
      return { deleted: false, error };
    }
  }

  private async rollback(
    scopeId: string,
    created: readonly string[],
    createdContainer: string | undefined,
    log: TrackerLogger,
  ): Promise<void> {
    for (const ref of [...created].reverse()) {
      const error = await this.deleteQuietly(scopeId, ref);
      if (error !== null && error !== "gone") log.warn("Rollback left a resource behind", { resourceRef: ref, error });
    }
    if (createdContainer) await this.deleteContainerIfEmpty(scopeId, createdContainer, log);
  }
}
