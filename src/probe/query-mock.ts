/**
 * WhosOn — Query Mock Mode
 *
 * Scriptable game-server query adapters for tests and demos without any
 * network access. Every address is offline until configured otherwise.
 */

import type { ExtendedInfo, PrimaryStatus, ProtocolKind, QueryOutcome, StatusQueryAdapter } from "../types.js";
import { DEFAULT_PORTS } from "../types.js";

export type MockQueryCall = {
  method: "queryStatus" | "queryExtended" | "checkLiveness";
  address: string;
  /** Budget the caller passed, for the queries that take one. */
  timeoutMs?: number;
};

type Scripted<T> = QueryOutcome<T> | { throws: unknown };

/** Baseline status used by `setOnline` when fields are omitted. */
export function makePrimaryStatus(overrides?: Partial<PrimaryStatus>): PrimaryStatus {
  return {
    playersOnline: 5,
    playersMax: 20,
    versionLabel: "1.20.4",
    motd: "A Minecraft Server",
    sampledPlayerNames: [],
    ...overrides,
  };
}

export class MockQueryAdapter implements StatusQueryAdapter {
  readonly kind: ProtocolKind;
  readonly defaultPort: number;

  /** Every call, in order. */
  readonly calls: MockQueryCall[] = [];
  /** Artificial latency applied to every call. */
  delayMs = 0;

  private statuses = new Map<string, Scripted<PrimaryStatus>>();
  private extended = new Map<string, Scripted<ExtendedInfo>>();

  constructor(kind: ProtocolKind, options?: { supportsExtended?: boolean }) {
    this.kind = kind;
    this.defaultPort = DEFAULT_PORTS[kind];
    if (!(options?.supportsExtended ?? kind === "java")) this.queryExtended = undefined;
  }

  setOnline(address: string, overrides?: Partial<PrimaryStatus>): this {
    this.statuses.set(address, { ok: true, value: makePrimaryStatus(overrides) });
    return this;
  }

  setOffline(address: string, error = "Connection refused"): this {
    this.statuses.set(address, { ok: false, error });
    return this;
  }

  /** Make every query for `address` throw `error` instead of returning an outcome. */
  setThrows(address: string, error: unknown): this {
    this.statuses.set(address, { throws: error });
    return this;
  }

  setExtended(address: string, info: ExtendedInfo | { error: string }): this {
    this.extended.set(address, "error" in info ? { ok: false, error: info.error } : { ok: true, value: info });
    return this;
  }

  callsFor(method: MockQueryCall["method"]): string[] {
    return this.calls.filter((c) => c.method === method).map((c) => c.address);
  }

  async queryStatus(address: string, timeoutMs?: number): Promise<QueryOutcome<PrimaryStatus>> {
    this.calls.push({ method: "queryStatus", address, timeoutMs });
    return this.play(this.statuses.get(address) ?? { ok: false, error: "Connection refused" });
  }

  queryExtended?: (address: string, timeoutMs?: number) => Promise<QueryOutcome<ExtendedInfo>> = async (
    address,
    timeoutMs,
  ) => {
    this.calls.push({ method: "queryExtended", address, timeoutMs });
    return this.play(this.extended.get(address) ?? { ok: false, error: "Query not enabled" });
  };

  async checkLiveness(address: string): Promise<QueryOutcome<void>> {
    this.calls.push({ method: "checkLiveness", address });
    const outcome = await this.play(this.statuses.get(address) ?? { ok: false, error: "Connection refused" });
    return outcome.ok ? { ok: true, value: undefined } : outcome;
  }

  private async play<T>(scripted: Scripted<T>): Promise<QueryOutcome<T>> {
    if (this.delayMs > 0) await new Promise((resolve) => setTimeout(resolve, this.delayMs));
    if ("throws" in scripted) throw scripted.throws;
    return scripted;
  }
}

/** One mock adapter per protocol kind. */
export function createMockAdapters(): { java: MockQueryAdapter; bedrock: MockQueryAdapter } {
  return { java: new MockQueryAdapter("java"), bedrock: new MockQueryAdapter("bedrock") };
}
