/**
 * WhosOn — Platform Mock Mode
 *
 * In-process stand-in for the resource-management capability, for tests and
 * demos without a Discord connection.
 *
 * Includes:
 * - MockPlatform: scopes, containers, status/detail resources, messages and
 *   per-resource grants held in memory, with call recording
 * - Failure injection (one-shot per method, or a standing rename rule)
 * - Error factories shaped like Discord API errors
 */

import { CAPABILITIES, type Capability, type CreateDetailResourceOptions, type CreateStatusResourceOptions, type ResourcePlatform, type StructuredReport } from "../types.js";

// =============================================================================
// Platform-shaped Errors
// =============================================================================

export class MockPlatformError extends Error {
  readonly status: number;
  readonly code: number;

  constructor(message: string, status: number, code: number) {
    super(message);
    this.name = "MockPlatformError";
    this.status = status;
    this.code = code;
  }
}

export const permissionError = (): MockPlatformError => new MockPlatformError("Missing Permissions", 403, 50013);
export const unknownChannelError = (): MockPlatformError => new MockPlatformError("Unknown Channel", 404, 10003);
export const unknownMessageError = (): MockPlatformError => new MockPlatformError("Unknown Message", 404, 10008);
export const rateLimitError = (): MockPlatformError => new MockPlatformError("You are being rate limited.", 429, 0);

// =============================================================================
// Mock Platform
// =============================================================================

export type MockResourceKind = "container" | "status" | "detail" | "other";

export type MockResource = {
  ref: string;
  kind: MockResourceKind;
  name: string;
  containerRef?: string;
  occupancyCap?: number;
  topic?: string;
  messages: Map<string, StructuredReport>;
  grants: Set<Capability>;
};

export type PlatformMethod = Exclude<keyof ResourcePlatform, "principalId">;

export type MockPlatformCall = {
  method: PlatformMethod;
  scopeId?: string;
  ref?: string;
  value?: string;
};

const STATUS_GRANTS: Capability[] = ["manage_resources", "view", "connect"];
const DETAIL_GRANTS: Capability[] = ["view", "send_messages", "embed_links", "read_history", "manage_messages"];

export class MockPlatform implements ResourcePlatform {
  readonly principalId: string;

  /** Every call, in order. */
  readonly calls: MockPlatformCall[] = [];
  /** When false, grant calls succeed without changing anything. */
  grantsTakeEffect = true;

  private scopes = new Map<string, Map<string, MockResource>>();
  private scopeCapabilities = new Map<string, Set<Capability>>();
  private pendingFailures: Array<{ method: PlatformMethod; error: unknown }> = [];
  private renameRules: Array<{ reject: (name: string) => boolean; error: () => unknown }> = [];
  private nextId = 1;

  constructor(options?: { principalId?: string; scopes?: string[] }) {
    this.principalId = options?.principalId ?? "whoson-bot";
    for (const scope of options?.scopes ?? []) this.addScope(scope);
  }

  // ─── Test controls ─────────────────────────────────────────────────────

  addScope(scopeId: string, capabilities: readonly Capability[] = CAPABILITIES): this {
    this.scopes.set(scopeId, new Map());
    this.scopeCapabilities.set(scopeId, new Set(capabilities));
    return this;
  }

  removeScope(scopeId: string): void {
    this.scopes.delete(scopeId);
    this.scopeCapabilities.delete(scopeId);
  }

  setScopeCapabilities(scopeId: string, capabilities: readonly Capability[]): void {
    this.scopeCapabilities.set(scopeId, new Set(capabilities));
  }

  /** Queue a one-shot failure for the next call to `method`. */
  failNext(method: PlatformMethod, error: unknown, times = 1): this {
    for (let i = 0; i < times; i++) this.pendingFailures.push({ method, error });
    return this;
  }

  /** Refuse every rename whose target name matches. */
  rejectRenames(reject: (name: string) => boolean, error: () => unknown = permissionError): this {
    this.renameRules.push({ reject, error });
    return this;
  }

  /** A resource the engine did not create. */
  addForeignResource(scopeId: string, name: string, containerRef?: string): string {
    return this.insert(scopeId, { kind: "other", name, containerRef, messages: new Map(), grants: new Set() });
  }

  revoke(scopeId: string, ref: string, capabilities: readonly Capability[]): void {
    const resource = this.require(scopeId, ref);
    for (const c of capabilities) resource.grants.delete(c);
  }

  dropResource(scopeId: string, ref: string): void {
    this.scopes.get(scopeId)?.delete(ref);
  }

  dropMessage(scopeId: string, ref: string, messageRef: string): void {
    this.require(scopeId, ref).messages.delete(messageRef);
  }

  resource(scopeId: string, ref: string): MockResource | undefined {
    return this.scopes.get(scopeId)?.get(ref);
  }

  resources(scopeId: string, kind?: MockResourceKind): MockResource[] {
    return [...(this.scopes.get(scopeId)?.values() ?? [])].filter((r) => !kind || r.kind === kind);
  }

  callsTo(method: PlatformMethod): MockPlatformCall[] {
    return this.calls.filter((c) => c.method === method);
  }

  // ─── ResourcePlatform ──────────────────────────────────────────────────

  async listScopes(): Promise<string[]> {
    this.enter({ method: "listScopes" });
    return [...this.scopes.keys()];
  }

  async findContainer(scopeId: string, name: string): Promise<string | undefined> {
    this.enter({ method: "findContainer", scopeId, value: name });
    return this.resources(scopeId, "container").find((r) => r.name === name)?.ref;
  }

  async createContainer(scopeId: string, name: string): Promise<string> {
    this.enter({ method: "createContainer", scopeId, value: name });
    return this.insert(scopeId, { kind: "container", name, messages: new Map(), grants: new Set() });
  }

  async deleteContainer(scopeId: string, containerRef: string): Promise<void> {
    this.enter({ method: "deleteContainer", scopeId, ref: containerRef });
    this.require(scopeId, containerRef);
    this.scopes.get(scopeId)?.delete(containerRef);
  }

  async countContainerChildren(scopeId: string, containerRef: string): Promise<number> {
    this.enter({ method: "countContainerChildren", scopeId, ref: containerRef });
    return this.resources(scopeId).filter((r) => r.containerRef === containerRef).length;
  }

  async createStatusResource(scopeId: string, options: CreateStatusResourceOptions): Promise<string> {
    this.enter({ method: "createStatusResource", scopeId, value: options.name });
    return this.insert(scopeId, {
      kind: "status",
      name: options.name,
      containerRef: options.containerRef,
      occupancyCap: options.occupancyCap,
      messages: new Map(),
      grants: new Set(STATUS_GRANTS),
    });
  }

  async createDetailResource(scopeId: string, options: CreateDetailResourceOptions): Promise<string> {
    this.enter({ method: "createDetailResource", scopeId, value: options.name });
    return this.insert(scopeId, {
      kind: "detail",
      name: options.name,
      containerRef: options.containerRef,
      topic: options.topic,
      messages: new Map(),
      grants: new Set(DETAIL_GRANTS),
    });
  }

  async getResourceName(scopeId: string, resourceRef: string): Promise<string | undefined> {
    this.enter({ method: "getResourceName", scopeId, ref: resourceRef });
    return this.resource(scopeId, resourceRef)?.name;
  }

  async getResourceContainer(scopeId: string, resourceRef: string): Promise<string | undefined> {
    this.enter({ method: "getResourceContainer", scopeId, ref: resourceRef });
    return this.resource(scopeId, resourceRef)?.containerRef;
  }

  async renameResource(scopeId: string, resourceRef: string, name: string): Promise<void> {
    this.enter({ method: "renameResource", scopeId, ref: resourceRef, value: name });
    const resource = this.require(scopeId, resourceRef);
    if (resource.kind === "status" && !resource.grants.has("manage_resources")) throw permissionError();
    const rule = this.renameRules.find((r) => r.reject(name));
    if (rule) throw rule.error();
    resource.name = name;
  }

  async deleteResource(scopeId: string, resourceRef: string): Promise<void> {
    this.enter({ method: "deleteResource", scopeId, ref: resourceRef });
    this.require(scopeId, resourceRef);
    this.scopes.get(scopeId)?.delete(resourceRef);
  }

  async sendMessage(scopeId: string, resourceRef: string, report: StructuredReport): Promise<string> {
    this.enter({ method: "sendMessage", scopeId, ref: resourceRef });
    const resource = this.require(scopeId, resourceRef);
    const messageRef = `msg-${this.nextId++}`;
    resource.messages.set(messageRef, report);
    return messageRef;
  }

  async editMessage(scopeId: string, resourceRef: string, messageRef: string, report: StructuredReport): Promise<void> {
    this.enter({ method: "editMessage", scopeId, ref: resourceRef, value: messageRef });
    const resource = this.require(scopeId, resourceRef);
    if (!resource.messages.has(messageRef)) throw unknownMessageError();
    resource.messages.set(messageRef, report);
  }

  async getScopeCapabilities(scopeId: string): Promise<ReadonlySet<Capability>> {
    this.enter({ method: "getScopeCapabilities", scopeId });
    return new Set(this.scopeCapabilities.get(scopeId) ?? []);
  }

  async getGrantedCapabilities(scopeId: string, resourceRef: string, principalId: string): Promise<ReadonlySet<Capability>> {
    this.enter({ method: "getGrantedCapabilities", scopeId, ref: resourceRef, value: principalId });
    const resource = this.require(scopeId, resourceRef);
    return principalId === this.principalId ? new Set(resource.grants) : new Set();
  }

  async grantCapabilities(
    scopeId: string,
    resourceRef: string,
    principalId: string,
    capabilities: readonly Capability[],
  ): Promise<void> {
    this.enter({ method: "grantCapabilities", scopeId, ref: resourceRef, value: capabilities.join(",") });
    const resource = this.require(scopeId, resourceRef);
    if (!this.grantsTakeEffect || principalId !== this.principalId) return;
    for (const c of capabilities) resource.grants.add(c);
  }

  // ─── Internals ─────────────────────────────────────────────────────────

  private enter(call: MockPlatformCall): void {
    this.calls.push(call);
    const idx = this.pendingFailures.findIndex((f) => f.method === call.method);
    if (idx !== -1) {
      const [failure] = this.pendingFailures.splice(idx, 1);
      throw failure.error;
    }
  }

  private insert(scopeId: string, resource: Omit<MockResource, "ref">): string {
    const scope = this.scopes.get(scopeId);
    if (!scope) throw new MockPlatformError("Unknown Guild", 404, 10004);
    const ref = `res-${this.nextId++}`;
    scope.set(ref, { ...resource, ref });
    return ref;
  }

  private require(scopeId: string, ref: string): MockResource {
    const resource = this.scopes.get(scopeId)?.get(ref);
    if (!resource) throw unknownChannelError();
    return resource;
  }
}
