/**
 * WhosOn Registry — SQLite Storage
 *
 * WAL-mode SQLite database holding one row per tracked target, unique on
 * (scope_id, target_key), with a schema version marker table.
 */

import Database from "better-sqlite3";
import { z } from "zod";
import type { ProtocolKind, RegistryStats, TargetStorage, TrackedTarget } from "../types.js";

export const SCHEMA_VERSION = 1;

const SCHEMA_DDL = `
CREATE TABLE IF NOT EXISTS schema_version (
  version INTEGER PRIMARY KEY,
  updated_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS tracked_targets (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  scope_id TEXT NOT NULL,
  target_key TEXT NOT NULL,
  address TEXT NOT NULL,
  display_name TEXT,
  protocol_kind TEXT NOT NULL CHECK(protocol_kind IN ('java', 'bedrock')),
  status_resource_ref TEXT NOT NULL,
  detail_resource_ref TEXT NOT NULL,
  detail_message_ref TEXT NOT NULL,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  UNIQUE(scope_id, target_key)
);

CREATE INDEX IF NOT EXISTS idx_targets_scope_id ON tracked_targets(scope_id);
CREATE INDEX IF NOT EXISTS idx_targets_target_key ON tracked_targets(target_key);
`;

const targetRowSchema = z.object({
  scope_id: z.string(),
  target_key: z.string(),
  address: z.string(),
  display_name: z.string().nullable(),
  protocol_kind: z.enum(["java", "bedrock"]),
  status_resource_ref: z.string(),
  detail_resource_ref: z.string(),
  detail_message_ref: z.string(),
  created_at: z.string(),
  updated_at: z.string(),
});

const countRowSchema = z.object({ cnt: z.number() });
const kindCountRowSchema = z.object({ protocol_kind: z.enum(["java", "bedrock"]), cnt: z.number() });
const versionRowSchema = z.object({ version: z.number().nullable() });

function targetToRow(t: TrackedTarget): Record<string, string | null> {
  return {
    scope_id: t.scopeId,
    target_key: t.targetKey,
    address: t.address,
    display_name: t.displayName ?? null,
    protocol_kind: t.protocolKind,
    status_resource_ref: t.statusResourceRef,
    detail_resource_ref: t.detailResourceRef,
    detail_message_ref: t.detailMessageRef,
    created_at: t.createdAt,
    updated_at: t.updatedAt,
  };
}

function rowToTarget(raw: unknown): TrackedTarget {
  const row = targetRowSchema.parse(raw);
  return {
    scopeId: row.scope_id,
    targetKey: row.target_key,
    address: row.address,
    displayName: row.display_name ?? undefined,
    protocolKind: row.protocol_kind,
    statusResourceRef: row.status_resource_ref,
    detailResourceRef: row.detail_resource_ref,
    detailMessageRef: row.detail_message_ref,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

const TARGET_COLUMNS = `scope_id, target_key, address, display_name, protocol_kind,
  status_resource_ref, detail_resource_ref, detail_message_ref, created_at, updated_at`;

export class SQLiteTargetStorage implements TargetStorage {
  private db: Database.Database | null = null;
  private readonly dbPath: string;

  constructor(dbPath: string) {
    this.dbPath = dbPath;
  }

  async initialize(): Promise<void> {
    const db = new Database(this.dbPath);
    db.pragma("journal_mode = WAL");
    db.pragma("synchronous = NORMAL");
    db.exec(SCHEMA_DDL);

    const current = versionRowSchema.parse(db.prepare("SELECT MAX(version) as version FROM schema_version").get());
    if (current.version === null || current.version < SCHEMA_VERSION) {
      db.prepare("INSERT INTO schema_version (version, updated_at) VALUES (?, ?)").run(
        SCHEMA_VERSION,
        new Date().toISOString(),
      );
    }
    this.db = db;
  }

  insert(target: TrackedTarget): boolean {
    const result = this.conn()
      .prepare(
        `INSERT INTO tracked_targets (${TARGET_COLUMNS})
         VALUES (@scope_id, @target_key, @address, @display_name, @protocol_kind,
                 @status_resource_ref, @detail_resource_ref, @detail_message_ref, @created_at, @updated_at)
         ON CONFLICT(scope_id, target_key) DO NOTHING`,
      )
      .run(targetToRow(target));
    return result.changes > 0;
  }

  delete(scopeId: string, targetKey: string): boolean {
    const result = this.conn()
      .prepare("DELETE FROM tracked_targets WHERE scope_id = ? AND target_key = ?")
      .run(scopeId, targetKey);
    return result.changes > 0;
  }

  get(scopeId: string, targetKey: string): TrackedTarget | undefined {
    const row = this.conn()
      .prepare(`SELECT ${TARGET_COLUMNS} FROM tracked_targets WHERE scope_id = ? AND target_key = ?`)
      .get(scopeId, targetKey);
    return row === undefined ? undefined : rowToTarget(row);
  }

  listAll(): TrackedTarget[] {
    return this.conn()
      .prepare(`SELECT ${TARGET_COLUMNS} FROM tracked_targets ORDER BY scope_id, created_at, id`)
      .all()
      .map(rowToTarget);
  }

  updateDetailMessageRef(scopeId: string, targetKey: string, messageRef: string, updatedAt: string): boolean {
    const result = this.conn()
      .prepare(
        "UPDATE tracked_targets SET detail_message_ref = ?, updated_at = ? WHERE scope_id = ? AND target_key = ?",
      )
      .run(messageRef, updatedAt, scopeId, targetKey);
    return result.changes > 0;
  }

  deleteScope(scopeId: string): number {
    return this.conn().prepare("DELETE FROM tracked_targets WHERE scope_id = ?").run(scopeId).changes;
  }

  deleteScopesExcept(validScopeIds: readonly string[]): number {
    return this.conn()
      .prepare("DELETE FROM tracked_targets WHERE scope_id NOT IN (SELECT value FROM json_each(?))")
      .run(JSON.stringify(validScopeIds)).changes;
  }

  getStats(): RegistryStats {
    const db = this.conn();
    const total = countRowSchema.parse(db.prepare("SELECT COUNT(*) as cnt FROM tracked_targets").get());
    const scopes = countRowSchema.parse(db.prepare("SELECT COUNT(DISTINCT scope_id) as cnt FROM tracked_targets").get());
    const byKind = db
      .prepare("SELECT protocol_kind, COUNT(*) as cnt FROM tracked_targets GROUP BY protocol_kind")
      .all()
      .map((row) => kindCountRowSchema.parse(row));

    const countByProtocolKind: Record<ProtocolKind, number> = { java: 0, bedrock: 0 };
    for (const row of byKind) countByProtocolKind[row.protocol_kind] = row.cnt;

    return { totalCount: total.cnt, countByProtocolKind, scopeCount: scopes.cnt };
  }

  getSchemaVersion(): number {
    const row = versionRowSchema.parse(this.conn().prepare("SELECT MAX(version) as version FROM schema_version").get());
    return row.version ?? 0;
  }

  close(): void {
    this.db?.close();
    this.db = null;
  }

  private conn(): Database.Database {
    if (!this.db) throw new Error("SQLiteTargetStorage used before initialize()");
    return this.db;
  }
}
