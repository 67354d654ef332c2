/**
 * WhosOn Registry
 *
 * Single source of truth for tracked targets. Writes are serialized through
 * one promise chain; reads are served from a short-lived snapshot that every
 * write invalidates.
 */

import { toFault } from "../errors.js";
import type { TrackerLogger } from "../logging/logger.js";
import type { RegistryStats, TargetStorage, TrackedTarget, TrackedTargetInput } from "../types.js";

export type RegistryOptions = {
  /** Snapshot lifetime; 0 disables the read cache. */
  cacheTtlMs?: number;
  now?: () => number;
  logger?: TrackerLogger;
};

/** Runs tasks one at a time in submission order; a failing task does not break the chain. */
export class SerializedWriteQueue {
  private chain: Promise<void> = Promise.resolve();

  enqueue<T>(task: () => Promise<T> | T): Promise<T> {
    const run = this.chain.then(task, task);
    this.chain = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}

/** One serial chain per key; a key's chain is dropped once it drains. */
export class KeyedSerialQueue {
  private readonly tails = new Map<string, Promise<void>>();

  enqueue<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const run = previous.then(task);
    const tail: Promise<void> = run.then(
      () => this.release(key, tail),
      () => this.release(key, tail),
    );
    this.tails.set(key, tail);
    return run;
  }

  get size(): number {
    return this.tails.size;
  }

  private release(key: string, tail: Promise<void>): void {
    if (this.tails.get(key) === tail) this.tails.delete(key);
  }
}

type Snapshot = {
  loadedAt: number;
  targets: TrackedTarget[];
};

export class TargetRegistry {
  private readonly storage: TargetStorage;
  private readonly writes = new SerializedWriteQueue();
  private readonly cacheTtlMs: number;
  private readonly now: () => number;
  private readonly logger?: TrackerLogger;
  private snapshot: Snapshot | null = null;

  constructor(storage: TargetStorage, options?: RegistryOptions) {
    this.storage = storage;
    this.cacheTtlMs = options?.cacheTtlMs ?? 30_000;
    this.now = options?.now ?? Date.now;
    this.logger = options?.logger;
  }

  async initialize(): Promise<void> {
    await this.storage.initialize();
    this.logger?.info("Registry ready", { schemaVersion: this.storage.getSchemaVersion() });
  }

  close(): void {
    this.snapshot = null;
    this.storage.close();
  }

  // ─── Writes ──────────────────────────────────────────────────────────────

  /** Insert a record; false (and no mutation) when the key already exists in the scope. */
  add(scopeId: string, targetKey: string, input: TrackedTargetInput): Promise<boolean> {
    return this.write("add", () => {
      const stamp = new Date(this.now()).toISOString();
      const inserted = this.storage.insert({ ...input, scopeId, targetKey, createdAt: stamp, updatedAt: stamp });
      if (!inserted) this.logger?.debug("Duplicate target key", { scopeId, targetKey });
      return inserted;
    });
  }

  remove(scopeId: string, targetKey: string): Promise<boolean> {
    return this.write("remove", () => this.storage.delete(scopeId, targetKey));
  }

  updateDetailMessageRef(scopeId: string, targetKey: string, messageRef: string): Promise<boolean> {
    return this.write("updateDetailMessageRef", () =>
      this.storage.updateDetailMessageRef(scopeId, targetKey, messageRef, new Date(this.now()).toISOString()),
    );
  }

  removeScope(scopeId: string): Promise<number> {
    return this.write("removeScope", () => this.storage.deleteScope(scopeId));
  }

  /** Delete every record whose scope is not in `validScopeIds`. */
  pruneOrphanedScopes(validScopeIds: Iterable<string>): Promise<number> {
    const valid = [...validScopeIds];
    return this.write("pruneOrphanedScopes", () => this.storage.deleteScopesExcept(valid));
  }

  // ─── Reads ───────────────────────────────────────────────────────────────

  async get(scopeId: string, targetKey: string): Promise<TrackedTarget | undefined> {
    const found = this.read().find((t) => t.scopeId === scopeId && t.targetKey === targetKey);
    return found ? { ...found } : undefined;
  }

  async listByScope(scopeId: string): Promise<Map<string, TrackedTarget>> {
    const result = new Map<string, TrackedTarget>();
    for (const t of this.read()) {
      if (t.scopeId === scopeId) result.set(t.targetKey, { ...t });
    }
    return result;
  }

  async listAll(): Promise<Map<string, Map<string, TrackedTarget>>> {
    const result = new Map<string, Map<string, TrackedTarget>>();
    for (const t of this.read()) {
      let scope = result.get(t.scopeId);
      if (!scope) {
        scope = new Map();
        result.set(t.scopeId, scope);
      }
      scope.set(t.targetKey, { ...t });
    }
    return result;
  }

  async stats(): Promise<RegistryStats> {
    return this.storage.getStats();
  }

  schemaVersion(): number {
    return this.storage.getSchemaVersion();
  }

  // ─── Internals ───────────────────────────────────────────────────────────

  private read(): TrackedTarget[] {
    const at = this.now();
    if (this.snapshot && this.cacheTtlMs > 0 && at - this.snapshot.loadedAt < this.cacheTtlMs) {
      return this.snapshot.targets;
    }
    const targets = this.storage.listAll();
    this.snapshot = this.cacheTtlMs > 0 ? { loadedAt: at, targets } : null;
    return targets;
  }

  private write<T>(operation: string, task: () => T): Promise<T> {
    return this.writes.enqueue(() => {
      this.snapshot = null;
      try {
        return task();
      } catch (err) {
        const fault = toFault(err, `Registry ${operation} failed`);
        this.logger?.error(fault.message, { operation, kind: fault.kind });
        throw fault;
      }
    });
  }
}
