/**
 * WhosOn — Core Types
 *
 * Tracked targets, status snapshots, rendered output and the capability
 * interfaces the engine consumes from the hosting platform and the game
 * server query layer.
 */

// ─── Protocols ─────────────────────────────────────────────────────────────────

/** `java` is the primary protocol, `bedrock` the alternate one. */
export type ProtocolKind = "java" | "bedrock";

/** Order in which protocols are tried when the kind is not given. */
export const PROTOCOL_ORDER: readonly ProtocolKind[] = ["java", "bedrock"];

export const DEFAULT_PORTS: Record<ProtocolKind, number> = {
  java: 25565,
  bedrock: 19132,
};

export type ProtocolSelection = ProtocolKind | "auto";

// ─── Tracked Targets ───────────────────────────────────────────────────────────

export type TrackedTarget = {
  scopeId: string;
  targetKey: string;
  /** host[:port] as supplied by the user. */
  address: string;
  displayName?: string;
  protocolKind: ProtocolKind;
  statusResourceRef: string;
  detailResourceRef: string;
  detailMessageRef: string;
  createdAt: string; // ISO-8601
  updatedAt: string; // ISO-8601
};

/** Fields supplied on insert; identity and timestamps are assigned by the registry. */
export type TrackedTargetInput = Omit<TrackedTarget, "scopeId" | "targetKey" | "createdAt" | "updatedAt">;

export type RegistryStats = {
  totalCount: number;
  countByProtocolKind: Record<ProtocolKind, number>;
  scopeCount: number;
};

// ─── Status Snapshots ──────────────────────────────────────────────────────────

export type ExtendedInfo = {
  software?: string;
  mapName?: string;
  pluginNames: string[];
};

export type OnlineSnapshot = {
  online: true;
  protocolKind: ProtocolKind;
  playersOnline: number;
  playersMax: number;
  latencyMs: number;
  versionLabel: string;
  motd: string;
  sampledPlayerNames: string[];
  /** Reported by bedrock servers only. */
  gameMode?: string;
  /** Reported by bedrock servers only. */
  mapName?: string;
  extendedInfo?: ExtendedInfo;
};

export type OfflineSnapshot = {
  online: false;
  protocolKind: ProtocolKind;
  errorMessage: string;
};

export type StatusSnapshot = OnlineSnapshot | OfflineSnapshot;

// ─── Rendered Output ───────────────────────────────────────────────────────────

export type ReportField = {
  name: string;
  value: string;
  inline: boolean;
};

export type StructuredReport = {
  title: string;
  description?: string;
  color: number;
  fields: ReportField[];
  footer: string;
};

// ─── Capabilities ──────────────────────────────────────────────────────────────

/** Every capability the engine may check or grant. */
export const CAPABILITIES = [
  "manage_resources",
  "manage_grants",
  "view",
  "connect",
  "send_messages",
  "embed_links",
  "read_history",
  "manage_messages",
] as const;

export type Capability = (typeof CAPABILITIES)[number];

// ─── Game-Server Query Capability ──────────────────────────────────────────────

/** Outcome of one query; ordinary network failure is a value, never a throw. */
export type QueryOutcome<T> = { ok: true; value: T } | { ok: false; error: string };

export type PrimaryStatus = {
  playersOnline: number;
  playersMax: number;
  versionLabel: string;
  motd: string;
  sampledPlayerNames: string[];
  gameMode?: string;
  mapName?: string;
};

export interface StatusQueryAdapter {
  readonly kind: ProtocolKind;
  readonly defaultPort: number;
  /** Full status round trip. */
  queryStatus(address: string, timeoutMs: number): Promise<QueryOutcome<PrimaryStatus>>;
  /** Optional secondary metadata query (software, map, plugins). */
  queryExtended?(address: string, timeoutMs: number): Promise<QueryOutcome<ExtendedInfo>>;
  /** Liveness check used for protocol detection. */
  checkLiveness(address: string, timeoutMs: number): Promise<QueryOutcome<void>>;
}

// ─── Resource-Management Capability ────────────────────────────────────────────

export type CreateStatusResourceOptions = {
  name: string;
  containerRef: string;
  occupancyCap: number;
};

export type CreateDetailResourceOptions = {
  name: string;
  containerRef: string;
  topic: string;
};

/**
 * Hosting-platform operations. Implementations throw errors that
 * `classifyFault` understands (or `TrackerFault`s directly).
 */
export interface ResourcePlatform {
  /** The engine's own principal. */
  readonly principalId: string;

  listScopes(): Promise<string[]>;
  findContainer(scopeId: string, name: string): Promise<string | undefined>;
  createContainer(scopeId: string, name: string): Promise<string>;
  deleteContainer(scopeId: string, containerRef: string): Promise<void>;
  countContainerChildren(scopeId: string, containerRef: string): Promise<number>;

  createStatusResource(scopeId: string, options: CreateStatusResourceOptions): Promise<string>;
  createDetailResource(scopeId: string, options: CreateDetailResourceOptions): Promise<string>;
  /** Current display name, or undefined when the resource no longer exists. */
  getResourceName(scopeId: string, resourceRef: string): Promise<string | undefined>;
  getResourceContainer(scopeId: string, resourceRef: string): Promise<string | undefined>;
  renameResource(scopeId: string, resourceRef: string, name: string): Promise<void>;
  deleteResource(scopeId: string, resourceRef: string): Promise<void>;

  sendMessage(scopeId: string, resourceRef: string, report: StructuredReport): Promise<string>;
  editMessage(scopeId: string, resourceRef: string, messageRef: string, report: StructuredReport): Promise<void>;

  getScopeCapabilities(scopeId: string): Promise<ReadonlySet<Capability>>;
  getGrantedCapabilities(scopeId: string, resourceRef: string, principalId: string): Promise<ReadonlySet<Capability>>;
  grantCapabilities(scopeId: string, resourceRef: string, principalId: string, capabilities: readonly Capability[]): Promise<void>;
}

// ─── Registry Storage ──────────────────────────────────────────────────────────

export interface TargetStorage {
  initialize(): Promise<void>;
  /** Returns false when (scopeId, targetKey) already exists. */
  insert(target: TrackedTarget): boolean;
  delete(scopeId: string, targetKey: string): boolean;
  get(scopeId: string, targetKey: string): TrackedTarget | undefined;
  /** All targets ordered by scope, then creation time. */
  listAll(): TrackedTarget[];
  updateDetailMessageRef(scopeId: string, targetKey: string, messageRef: string, updatedAt: string): boolean;
  deleteScope(scopeId: string): number;
  deleteScopesExcept(validScopeIds: readonly string[]): number;
  getStats(): RegistryStats;
  getSchemaVersion(): number;
  close(): void;
}
