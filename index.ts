/**
 * WhosOn — keeps Discord channels in sync with live Minecraft server status.
 */

// Engine
export { TrackerService } from "./src/tracker.js";
export type {
  AddTargetOptions,
  AddedTarget,
  CleanupRequest,
  CleanupResolution,
  CleanupSummary,
  ForceReconcileSummary,
  PermissionReport,
  RemovalSummary,
  TrackerServiceOptions,
} from "./src/tracker.js";
export { Reconciler } from "./src/reconcile/reconciler.js";
export type { DetailState, LabelState, ReconcileOutcome } from "./src/reconcile/reconciler.js";
export { ReconcileScheduler, interruptibleSleep } from "./src/reconcile/scheduler.js";
export type { CycleResult, SchedulerSettings, SchedulerStatus } from "./src/reconcile/scheduler.js";
export { ConfirmationGate } from "./src/confirmation.js";
export type { ConfirmationDecision, ConfirmationResolution, ConfirmationTicket } from "./src/confirmation.js";
export { PermissionVerifier, REQUIRED_RESOURCE_CAPABILITIES, REQUIRED_SCOPE_CAPABILITIES } from "./src/permissions/verifier.js";

// Registry
export { KeyedSerialQueue, TargetRegistry, SerializedWriteQueue } from "./src/registry/registry.js";
export { SQLiteTargetStorage, SCHEMA_VERSION } from "./src/registry/sqlite-store.js";
export { InMemoryTargetStorage } from "./src/registry/memory-store.js";
export { migrateLegacyData } from "./src/migration.js";
export type { MigrationReport } from "./src/migration.js";

// Probing
export { StatusProber } from "./src/probe/prober.js";
export type { AdapterSet } from "./src/probe/prober.js";
export { ProtocolResolver } from "./src/probe/resolver.js";
export { BedrockQueryAdapter, JavaQueryAdapter, createMinecraftAdapters } from "./src/probe/minecraft.js";

// Rendering
export { LABEL_MAX_LENGTH, renderFallbackLabel, renderLabel } from "./src/render/label.js";
export { FIELD_VALUE_MAX_LENGTH, renderReport } from "./src/render/report.js";

// Platform
export { DiscordPlatform, discordClientOptions } from "./src/platform/discord.js";

// Ambient
export { loadConfig, ConfigError, DEFAULT_TRACKER_SETTINGS } from "./src/config.js";
export type { AppConfig, TrackerSettings } from "./src/config.js";
export { TrackerFault, classifyFault, describeFault } from "./src/errors.js";
export type { FaultKind, Result } from "./src/errors.js";
export { createTrackerLogger } from "./src/logging/logger.js";
export type { TrackerLogger, LogTransport } from "./src/logging/logger.js";
export { createTargetKey, parseAddress } from "./src/address.js";
export * from "./src/types.js";
