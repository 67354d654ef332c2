/**
 * WhosOn — Protocol Resolver
 *
 * Detects which protocol a server speaks by liveness-checking each adapter
 * in `PROTOCOL_ORDER`. The primary protocol sees the address verbatim; the
 * others get their default port appended when none is given.
 */

import { withDefaultPort } from "../address.js";
import { formatErrorMessage } from "../errors.js";
import type { TrackerLogger } from "../logging/logger.js";
import { PROTOCOL_ORDER, type ProtocolKind } from "../types.js";
import { runWithDeadline, type AdapterSet } from "./prober.js";

export type Resolution = ProtocolKind | "undetermined";

export class ProtocolResolver {
  private readonly adapters: AdapterSet;
  private readonly timeoutMs: number;
  private readonly logger?: TrackerLogger;

  constructor(adapters: AdapterSet, options?: { timeoutMs?: number; logger?: TrackerLogger }) {
    this.adapters = adapters;
    this.timeoutMs = options?.timeoutMs ?? 5_000;
    this.logger = options?.logger;
  }

  async resolve(address: string): Promise<Resolution> {
    for (const [index, kind] of PROTOCOL_ORDER.entries()) {
      const adapter = this.adapters[kind];
      const target = index === 0 ? address : withDefaultPort(address, adapter.defaultPort);

      const outcome = await runWithDeadline(
        () => adapter.checkLiveness(target, this.timeoutMs),
        this.timeoutMs,
        (error) => this.logger?.debug("Late liveness failure ignored", { target, error: formatErrorMessage(error) }),
      );
      if (outcome.ok) {
        this.logger?.info(`Detected ${address} as ${kind} server`);
        return kind;
      }
      this.logger?.debug(`${kind} detection failed`, { target, error: outcome.error });
    }

    this.logger?.warn(`Could not detect server type for ${address}`);
    return "undetermined";
  }
}
