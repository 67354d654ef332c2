/**
 * WhosOn Registry — In-Memory Storage
 *
 * Lightweight in-memory implementation for testing and development.
 */

import type { ProtocolKind, RegistryStats, TargetStorage, TrackedTarget } from "../types.js";

export class InMemoryTargetStorage implements TargetStorage {
  private targets: TrackedTarget[] = [];

  async initialize(): Promise<void> {
    // No-op for in-memory
  }

  insert(target: TrackedTarget): boolean {
    if (this.find(target.scopeId, target.targetKey) !== -1) return false;
    this.targets.push({ ...target });
    return true;
  }

  delete(scopeId: string, targetKey: string): boolean {
    const idx = this.find(scopeId, targetKey);
    if (idx === -1) return false;
    this.targets.splice(idx, 1);
    return true;
  }

  get(scopeId: string, targetKey: string): TrackedTarget | undefined {
    const idx = this.find(scopeId, targetKey);
    return idx === -1 ? undefined : { ...this.targets[idx] };
  }

  listAll(): TrackedTarget[] {
    // Array.prototype.sort is stable, so insertion order holds within a scope.
    return this.targets
      .map((t) => ({ ...t }))
      .sort((a, b) => (a.scopeId < b.scopeId ? -1 : a.scopeId > b.scopeId ? 1 : 0));
  }

  updateDetailMessageRef(scopeId: string, targetKey: string, messageRef: string, updatedAt: string): boolean {
    const idx = this.find(scopeId, targetKey);
    if (idx === -1) return false;
    this.targets[idx] = { ...this.targets[idx], detailMessageRef: messageRef, updatedAt };
    return true;
  }

  deleteScope(scopeId: string): number {
    const before = this.targets.length;
    this.targets = this.targets.filter((t) => t.scopeId !== scopeId);
    return before - this.targets.length;
  }

  deleteScopesExcept(validScopeIds: readonly string[]): number {
    const valid = new Set(validScopeIds);
    const before = this.targets.length;
    this.targets = this.targets.filter((t) => valid.has(t.scopeId));
    return before - this.targets.length;
  }

  getStats(): RegistryStats {
    const countByProtocolKind: Record<ProtocolKind, number> = { java: 0, bedrock: 0 };
    const scopes = new Set<string>();
    for (const t of this.targets) {
      countByProtocolKind[t.protocolKind]++;
      scopes.add(t.scopeId);
    }
    return { totalCount: this.targets.length, countByProtocolKind, scopeCount: scopes.size };
  }

  getSchemaVersion(): number {
    return 1;
  }

  close(): void {
    this.targets = [];
  }

  private find(scopeId: string, targetKey: string): number {
    return this.targets.findIndex((t) => t.scopeId === scopeId && t.targetKey === targetKey);
  }
}
