/**
 * WhosOn Registry — Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { KeyedSerialQueue, TargetRegistry, SerializedWriteQueue } from "./registry.js";
import { InMemoryTargetStorage } from "./memory-store.js";
import { SQLiteTargetStorage, SCHEMA_VERSION } from "./sqlite-store.js";
import type { TargetStorage, TrackedTargetInput } from "../types.js";
import { TrackerFault } from "../errors.js";

// ─── Test Helpers ────────────────────────────────────────────────────────────

function makeInput(overrides?: Partial<TrackedTargetInput>): TrackedTargetInput {
  return {
    address: "play.example.com",
    displayName: "Survival",
    protocolKind: "java",
    statusResourceRef: "voice-1",
    detailResourceRef: "text-1",
    detailMessageRef: "msg-1",
    ...overrides,
  };
}

const backends: Array<[string, () => TargetStorage]> = [
  ["memory", () => new InMemoryTargetStorage()],
  ["sqlite", () => new SQLiteTargetStorage(":memory:")],
];

// ─── Tests ───────────────────────────────────────────────────────────────────

describe.each(backends)("TargetRegistry (%s storage)", (_name, makeStorage) => {
  let registry: TargetRegistry;
  let clock: number;

  beforeEach(async () => {
    clock = Date.UTC(2024, 0, 1);
    registry = new TargetRegistry(makeStorage(), { cacheTtlMs: 0, now: () => clock });
    await registry.initialize();
  });

  afterEach(() => {
    registry.close();
  });

  it("adds and reads back a record with timestamps", async () => {
    expect(await registry.add("g1", "play_example_com", makeInput())).toBe(true);

    const record = await registry.get("g1", "play_example_com");
    expect(record).toEqual({
      ...makeInput(),
      scopeId: "g1",
      targetKey: "play_example_com",
      createdAt: "2024-01-01T00:00:00.000Z",
      updatedAt: "2024-01-01T00:00:00.000Z",
    });
  });

  it("rejects a duplicate key without modifying the existing record", async () => {
    await registry.add("g1", "k", makeInput());
    expect(await registry.add("g1", "k", makeInput({ address: "other.example.com" }))).toBe(false);

    const record = await registry.get("g1", "k");
    expect(record?.address).toBe("play.example.com");
    expect((await registry.stats()).totalCount).toBe(1);
  });

  it("enforces uniqueness per scope, not globally", async () => {
    expect(await registry.add("g1", "k", makeInput())).toBe(true);
    expect(await registry.add("g2", "k", makeInput())).toBe(true);
    expect((await registry.stats()).scopeCount).toBe(2);
  });

  it("keeps a missing display name absent", async () => {
    await registry.add("g1", "k", makeInput({ displayName: undefined }));
    const record = await registry.get("g1", "k");
    expect(record?.displayName).toBeUndefined();
  });

  it("removes a record", async () => {
    await registry.add("g1", "k", makeInput());
    expect(await registry.remove("g1", "k")).toBe(true);
    expect(await registry.remove("g1", "k")).toBe(false);
    expect(await registry.get("g1", "k")).toBeUndefined();
  });

  it("lists by scope and across scopes in creation order", async () => {
    await registry.add("g2", "b", makeInput());
    clock += 1000;
    await registry.add("g1", "z", makeInput());
    clock += 1000;
    await registry.add("g1", "a", makeInput());

    const scope = await registry.listByScope("g1");
    expect([...scope.keys()]).toEqual(["z", "a"]);

    const all = await registry.listAll();
    expect([...all.keys()]).toEqual(["g1", "g2"]);
    expect([...(all.get("g2")?.keys() ?? [])]).toEqual(["b"]);
  });

  it("rewrites the detail message reference and bumps updatedAt", async () => {
    await registry.add("g1", "k", makeInput());
    clock += 5000;
    expect(await registry.updateDetailMessageRef("g1", "k", "msg-2")).toBe(true);

    const record = await registry.get("g1", "k");
    expect(record?.detailMessageRef).toBe("msg-2");
    expect(record?.createdAt).toBe("2024-01-01T00:00:00.000Z");
    expect(record?.updatedAt).toBe("2024-01-01T00:00:05.000Z");
    expect(await registry.updateDetailMessageRef("g1", "missing", "msg-3")).toBe(false);
  });

  it("removes a whole scope", async () => {
    await registry.add("g1", "a", makeInput());
    await registry.add("g1", "b", makeInput());
    await registry.add("g2", "a", makeInput());

    expect(await registry.removeScope("g1")).toBe(2);
    expect((await registry.listByScope("g1")).size).toBe(0);
    expect((await registry.listByScope("g2")).size).toBe(1);
  });

  it("prunes scopes outside the valid set", async () => {
    await registry.add("g1", "a", makeInput());
    await registry.add("g2", "a", makeInput());
    await registry.add("g3", "a", makeInput());

    expect(await registry.pruneOrphanedScopes(["g2"])).toBe(2);
    expect([...(await registry.listAll()).keys()]).toEqual(["g2"]);
  });

  it("counts by protocol kind", async () => {
    await registry.add("g1", "a", makeInput());
    await registry.add("g1", "b", makeInput({ protocolKind: "bedrock" }));
    await registry.add("g2", "c", makeInput({ protocolKind: "bedrock" }));

    expect(await registry.stats()).toEqual({
      totalCount: 3,
      countByProtocolKind: { java: 1, bedrock: 2 },
      scopeCount: 2,
    });
  });

  it("serializes concurrent adds of the same key", async () => {
    const results = await Promise.all([
      registry.add("g1", "k", makeInput({ address: "first" })),
      registry.add("g1", "k", makeInput({ address: "second" })),
    ]);
    expect(results).toEqual([true, false]);
    expect((await registry.get("g1", "k"))?.address).toBe("first");
  });

  it("returns copies that callers cannot mutate", async () => {
    await registry.add("g1", "k", makeInput());
    const record = await registry.get("g1", "k");
    if (record) record.address = "mutated";
    expect((await registry.get("g1", "k"))?.address).toBe("play.example.com");
  });
});

describe("TargetRegistry cache", () => {
  it("serves reads from the snapshot until it expires", async () => {
    const storage = new InMemoryTargetStorage();
    let clock = 0;
    const registry = new TargetRegistry(storage, { cacheTtlMs: 1000, now: () => clock });
    await registry.initialize();
    await registry.add("g1", "a", makeInput());

    expect((await registry.listByScope("g1")).size).toBe(1);

    // Bypass the registry to show the snapshot is still served.
    storage.insert({ ...makeInput(), scopeId: "g1", targetKey: "b", createdAt: "x", updatedAt: "x" });
    expect((await registry.listByScope("g1")).size).toBe(1);

    clock = 1000;
    expect((await registry.listByScope("g1")).size).toBe(2);
  });

  it("invalidates the snapshot on every write", async () => {
    const registry = new TargetRegistry(new InMemoryTargetStorage(), { cacheTtlMs: 60_000, now: () => 0 });
    await registry.initialize();

    await registry.add("g1", "a", makeInput());
    expect((await registry.listByScope("g1")).size).toBe(1);
    await registry.remove("g1", "a");
    expect((await registry.listByScope("g1")).size).toBe(0);
  });
});

describe("TargetRegistry write failures", () => {
  it("surfaces storage errors as faults and keeps accepting writes", async () => {
    const storage = new InMemoryTargetStorage();
    const registry = new TargetRegistry(storage, { cacheTtlMs: 0 });
    await registry.initialize();

    const original = storage.delete.bind(storage);
    storage.delete = () => {
      throw new Error("disk I/O error");
    };
    await expect(registry.remove("g1", "a")).rejects.toBeInstanceOf(TrackerFault);
    await expect(registry.remove("g1", "a")).rejects.toThrow("Registry remove failed: disk I/O error");

    storage.delete = original;
    expect(await registry.add("g1", "a", makeInput())).toBe(true);
  });
});

describe("SQLiteTargetStorage", () => {
  it("records the schema version", async () => {
    const storage = new SQLiteTargetStorage(":memory:");
    await storage.initialize();
    expect(storage.getSchemaVersion()).toBe(SCHEMA_VERSION);
    storage.close();
  });

  it("refuses use before initialize", () => {
    const storage = new SQLiteTargetStorage(":memory:");
    expect(() => storage.listAll()).toThrow("used before initialize");
  });
});

describe("SerializedWriteQueue", () => {
  it("runs tasks in order even when one fails", async () => {
    const queue = new SerializedWriteQueue();
    const order: string[] = [];

    const a = queue.enqueue(async () => {
      await new Promise((r) => setTimeout(r, 10));
      order.push("a");
    });
    const b = queue.enqueue(() => {
      order.push("b");
      throw new Error("boom");
    });
    const c = queue.enqueue(() => {
      order.push("c");
      return 3;
    });

    await a;
    await expect(b).rejects.toThrow("boom");
    expect(await c).toBe(3);
    expect(order).toEqual(["a", "b", "c"]);
  });
});

describe("KeyedSerialQueue", () => {
  it("serializes tasks per key and lets other keys run", async () => {
    const queue = new KeyedSerialQueue();
    const order: string[] = [];

    const a1 = queue.enqueue("a", async () => {
      await new Promise((r) => setTimeout(r, 10));
      order.push("a1");
      throw new Error("boom");
    });
    const a2 = queue.enqueue("a", async () => {
      order.push("a2");
      return 2;
    });
    const b1 = queue.enqueue("b", async () => {
      order.push("b1");
    });

    await expect(a1).rejects.toThrow("boom");
    expect(await a2).toBe(2);
    await b1;
    await Promise.allSettled([a1, a2, b1]);

    expect(order).toEqual(["b1", "a1", "a2"]);
    expect(queue.size).toBe(0);
  });
});
