/**
 * WhosOn — Status Prober
 *
 * One probe per call against a single protocol adapter. The primary status
 * query is required; the secondary metadata query is optional and its
 * failure only drops `extendedInfo`.
 */

import { formatErrorMessage, isFatalProbeError } from "../errors.js";
import type { TrackerLogger } from "../logging/logger.js";
import type { OnlineSnapshot, ProtocolKind, QueryOutcome, StatusQueryAdapter, StatusSnapshot } from "../types.js";

export type AdapterSet = Record<ProtocolKind, StatusQueryAdapter>;

export type StatusProberOptions = {
  timeoutMs?: number;
  /** Monotonic clock in milliseconds. */
  now?: () => number;
  logger?: TrackerLogger;
};

function roundLatency(ms: number): number {
  return Math.round(ms * 100) / 100;
}

/**
 * Race a query against a hard deadline. A timeout resolves to a failed
 * outcome; a rejection arriving after the deadline is handed to `onLate`.
 * Non-fatal rejections before the deadline also become failed outcomes.
 */
export async function runWithDeadline<T>(
  query: () => Promise<QueryOutcome<T>>,
  timeoutMs: number,
  onLate?: (error: unknown) => void,
): Promise<QueryOutcome<T>> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  let expired = false;

  const deadline = new Promise<QueryOutcome<T>>((resolve) => {
    timer = setTimeout(() => {
      expired = true;
      resolve({ ok: false, error: `Timed out after ${timeoutMs}ms` });
    }, timeoutMs);
  });

  const guarded = Promise.resolve()
    .then(query)
    .then(
      (outcome) => outcome,
      (error: unknown): QueryOutcome<T> => {
        if (expired) {
          onLate?.(error);
          return { ok: false, error: formatErrorMessage(error) };
        }
        if (isFatalProbeError(error)) throw error;
        return { ok: false, error: formatErrorMessage(error) };
      },
    );

  try {
    return await Promise.race([guarded, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

export class StatusProber {
  private readonly adapters: AdapterSet;
  private readonly timeoutMs: number;
  private readonly now: () => number;
  private readonly logger?: TrackerLogger;

  constructor(adapters: AdapterSet, options?: StatusProberOptions) {
    this.adapters = adapters;
    this.timeoutMs = options?.timeoutMs ?? 5_000;
    this.now = options?.now ?? (() => performance.now());
    this.logger = options?.logger;
  }

  /**
   * Never rejects for an unreachable or mismatched target; only cancellation
   * and resource exhaustion escape.
   */
  async probe(address: string, protocolKind: ProtocolKind, timeoutMs = this.timeoutMs): Promise<StatusSnapshot> {
    const adapter = this.adapters[protocolKind];
    const onLate = (error: unknown): void => {
      this.logger?.debug("Late probe failure ignored", { address, error: formatErrorMessage(error) });
    };

    const started = this.now();
    const primary = await runWithDeadline(() => adapter.queryStatus(address, timeoutMs), timeoutMs, onLate);
    if (!primary.ok) {
      this.logger?.debug("Target offline", { address, protocolKind, error: primary.error });
      return { online: false, protocolKind, errorMessage: primary.error };
    }
    const latencyMs = roundLatency(this.now() - started);

    const snapshot: OnlineSnapshot = {
      online: true,
      protocolKind,
      latencyMs,
      ...primary.value,
    };

    // The secondary query shares the probe's deadline.
    const remainingMs = Math.floor(timeoutMs - (this.now() - started));
    const queryExtended = adapter.queryExtended?.bind(adapter);
    if (queryExtended && remainingMs <= 0) {
      this.logger?.debug("No time left for the extended query", { address });
    } else if (queryExtended) {
      const secondary = await runWithDeadline(() => queryExtended(address, remainingMs), remainingMs, onLate);
      if (secondary.ok) {
        snapshot.extendedInfo = secondary.value;
      } else {
        this.logger?.debug("Extended query unavailable", { address, error: secondary.error });
      }
    }

    return snapshot;
  }
}
