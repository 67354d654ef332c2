/**
 * WhosOn — Confirmation Gate
 *
 * Two-step confirmation for destructive operations: `request` issues a token
 * with a bounded lifetime; exactly one resolution (`confirmed`, `cancelled`
 * or `expired`) is ever delivered for it.
 */

import { randomUUID } from "node:crypto";

export type ConfirmationDecision = "confirmed" | "cancelled";
export type ConfirmationResolution = ConfirmationDecision | "expired";

export type ConfirmationTicket<T> = {
  token: string;
  subject: T;
  expiresAt: Date;
  /** Settles once, with whichever resolution arrives first. */
  resolution: Promise<ConfirmationResolution>;
};

export type ResolveResult<T> =
  | { ok: true; subject: T; resolution: ConfirmationResolution }
  | { ok: false; reason: "unknown_token" };

type Pending<T> = {
  subject: T;
  expiresAt: number;
  timer: ReturnType<typeof setTimeout>;
  settle: (resolution: ConfirmationResolution) => void;
};

export class ConfirmationGate<T> {
  private readonly timeoutMs: number;
  private readonly now: () => number;
  private readonly newToken: () => string;
  private readonly pending = new Map<string, Pending<T>>();

  constructor(options: { timeoutMs: number; now?: () => number; newToken?: () => string }) {
    this.timeoutMs = options.timeoutMs;
    this.now = options.now ?? Date.now;
    this.newToken = options.newToken ?? randomUUID;
  }

  request(subject: T): ConfirmationTicket<T> {
    const token = this.newToken();
    const expiresAt = this.now() + this.timeoutMs;

    let settleOuter: (resolution: ConfirmationResolution) => void = () => undefined;
    const resolution = new Promise<ConfirmationResolution>((resolve) => {
      settleOuter = resolve;
    });

    const timer = setTimeout(() => this.settle(token, "expired"), this.timeoutMs);
    timer.unref();
    this.pending.set(token, { subject, expiresAt, timer, settle: settleOuter });

    return { token, subject, expiresAt: new Date(expiresAt), resolution };
  }

  /**
   * Deliver a decision. A decision arriving after the deadline resolves the
   * ticket as `expired`; a token that was already resolved is unknown.
   */
  resolve(token: string, decision: ConfirmationDecision): ResolveResult<T> {
    const entry = this.pending.get(token);
    if (!entry) return { ok: false, reason: "unknown_token" };
    const resolution: ConfirmationResolution = this.now() >= entry.expiresAt ? "expired" : decision;
    this.settle(token, resolution);
    return { ok: true, subject: entry.subject, resolution };
  }

  pendingCount(): number {
    return this.pending.size;
  }

  /** Expire every outstanding ticket. */
  dispose(): void {
    for (const token of [...this.pending.keys()]) this.settle(token, "expired");
  }

  private settle(token: string, resolution: ConfirmationResolution): void {
    const entry = this.pending.get(token);
    if (!entry) return;
    this.pending.delete(token);
    clearTimeout(entry.timer);
    entry.settle(resolution);
  }
}
