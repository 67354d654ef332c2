/**
 * WhosOn — Minecraft Query Adapters
 *
 * Game-server query capability backed by minecraft-server-util: Java status
 * (with a best-effort full query for software, map and plugins) and Bedrock
 * status.
 */

import mcu from "minecraft-server-util";
import { parseAddress, type ParsedAddress } from "../address.js";
import { formatErrorMessage, isFatalProbeError } from "../errors.js";
import type { ExtendedInfo, PrimaryStatus, QueryOutcome, StatusQueryAdapter } from "../types.js";
import { DEFAULT_PORTS } from "../types.js";

type Endpoint = { host: string; port: number };

function endpoint(address: string, defaultPort: number): Endpoint | null {
  const parsed: ParsedAddress | null = parseAddress(address);
  if (!parsed) return null;
  return { host: parsed.host, port: parsed.port ?? defaultPort };
}

async function attempt<T>(address: string, defaultPort: number, run: (ep: Endpoint) => Promise<T>): Promise<QueryOutcome<T>> {
  const ep = endpoint(address, defaultPort);
  if (!ep) return { ok: false, error: `Invalid address: ${address}` };
  try {
    return { ok: true, value: await run(ep) };
  } catch (err) {
    if (isFatalProbeError(err)) throw err;
    return { ok: false, error: formatErrorMessage(err) };
  }
}

export class JavaQueryAdapter implements StatusQueryAdapter {
  readonly kind = "java";
  readonly defaultPort = DEFAULT_PORTS.java;

  queryStatus(address: string, timeoutMs: number): Promise<QueryOutcome<PrimaryStatus>> {
    return attempt(address, this.defaultPort, async ({ host, port }) => {
      const res = await mcu.status(host, port, { timeout: timeoutMs, enableSRV: true });
      return {
        playersOnline: res.players.online,
        playersMax: res.players.max,
        versionLabel: res.version.name,
        motd: res.motd.raw,
        sampledPlayerNames: (res.players.sample ?? []).map((p) => p.name),
      };
    });
  }

  queryExtended(address: string, timeoutMs: number): Promise<QueryOutcome<ExtendedInfo>> {
    return attempt(address, this.defaultPort, async ({ host, port }) => {
      const res = await mcu.queryFull(host, port, { timeout: timeoutMs, enableSRV: true });
      return {
        software: res.software || undefined,
        mapName: res.map || undefined,
        pluginNames: res.plugins,
      };
    });
  }

  async checkLiveness(address: string, timeoutMs: number): Promise<QueryOutcome<void>> {
    const outcome = await this.queryStatus(address, timeoutMs);
    return outcome.ok ? { ok: true, value: undefined } : outcome;
  }
}

export class BedrockQueryAdapter implements StatusQueryAdapter {
  readonly kind = "bedrock";
  readonly defaultPort = DEFAULT_PORTS.bedrock;

  queryStatus(address: string, timeoutMs: number): Promise<QueryOutcome<PrimaryStatus>> {
    return attempt(address, this.defaultPort, async ({ host, port }) => {
      const res = await mcu.statusBedrock(host, port, { timeout: timeoutMs, enableSRV: true });
      // The second MOTD line of a Bedrock server is its level name.
      const [motd = "", mapName] = res.motd.raw.split("\n");
      return {
        playersOnline: res.players.online,
        playersMax: res.players.max,
        versionLabel: res.version.name || "Bedrock",
        motd,
        sampledPlayerNames: [],
        gameMode: res.gameMode || undefined,
        mapName: mapName || undefined,
      };
    });
  }

  async checkLiveness(address: string, timeoutMs: number): Promise<QueryOutcome<void>> {
    const outcome = await this.queryStatus(address, timeoutMs);
    return outcome.ok ? { ok: true, value: undefined } : outcome;
  }
}

export function createMinecraftAdapters(): { java: JavaQueryAdapter; bedrock: BedrockQueryAdapter } {
  return { java: new JavaQueryAdapter(), bedrock: new BedrockQueryAdapter() };
}
