/**
 * WhosOn — Fault Taxonomy
 *
 * Every failure the engine reasons about is one of six kinds. Platform and
 * storage errors are classified by status code, platform error code and
 * message pattern, the same way transient cloud errors are detected for retry.
 */

import type { Capability } from "./types.js";

// =============================================================================
// Fault Kinds
// =============================================================================

export type FaultKind =
  | "not_found"
  | "duplicate_key"
  | "unreachable"
  | "permission_denied"
  | "rate_limited"
  | "unexpected";

export type Result<T, E = TrackerFault> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function fail<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

export type TrackerFaultOptions = {
  missingCapabilities?: Capability[];
  remediation?: string[];
  cause?: unknown;
};

export class TrackerFault extends Error {
  readonly kind: FaultKind;
  readonly missingCapabilities: Capability[];
  readonly remediation: string[];

  constructor(kind: FaultKind, message: string, options?: TrackerFaultOptions) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "TrackerFault";
    this.kind = kind;
    this.missingCapabilities = options?.missingCapabilities ?? [];
    this.remediation = options?.remediation ?? DEFAULT_REMEDIATION[kind];
  }
}

export const DEFAULT_REMEDIATION: Record<FaultKind, string[]> = {
  not_found: [],
  duplicate_key: ["Remove the existing entry first or use a different address."],
  unreachable: ["Check the address and port, then try again."],
  permission_denied: [
    "Grant the bot the missing permissions on the server or channel.",
    "Move the bot's role above any role that restricts the tracking channels.",
    "Remove and re-add the affected servers.",
  ],
  rate_limited: ["Wait a minute and retry; Discord is throttling channel edits."],
  unexpected: ["Retry the operation; check the bot logs if it keeps failing."],
};

// =============================================================================
// Classification
// =============================================================================

/** Discord JSON error codes with a fixed meaning for the engine. */
const NOT_FOUND_CODES = new Set([10003, 10004, 10008, 10013]);
const PERMISSION_CODES = new Set([50001, 50013]);

const RATE_LIMIT_PATTERNS = ["rate limit", "ratelimit", "too many requests", "throttl"];
const NOT_FOUND_PATTERNS = ["unknown channel", "unknown message", "unknown guild", "not found"];
const PERMISSION_PATTERNS = ["missing permissions", "missing access", "forbidden"];

function readField(error: object, key: string): unknown {
  return key in error ? Reflect.get(error, key) : undefined;
}

/**
 * Map any thrown value to a fault kind. Already-classified faults keep theirs.
 */
export function classifyFault(error: unknown): FaultKind {
  if (error instanceof TrackerFault) return error.kind;
  if (error === null || typeof error !== "object") return "unexpected";

  const status = readField(error, "status") ?? readField(error, "statusCode") ?? readField(error, "httpStatus");
  if (status === 429) return "rate_limited";
  if (status === 403) return "permission_denied";
  if (status === 404) return "not_found";

  const code = readField(error, "code");
  if (typeof code === "number") {
    if (NOT_FOUND_CODES.has(code)) return "not_found";
    if (PERMISSION_CODES.has(code)) return "permission_denied";
  }
  if (code === "SQLITE_CONSTRAINT_UNIQUE") return "duplicate_key";

  const name = readField(error, "name");
  if (typeof name === "string" && name.startsWith("RateLimitError")) return "rate_limited";

  const rawMessage = readField(error, "message");
  const message = typeof rawMessage === "string" ? rawMessage.toLowerCase() : "";
  if (RATE_LIMIT_PATTERNS.some((p) => message.includes(p))) return "rate_limited";
  if (PERMISSION_PATTERNS.some((p) => message.includes(p))) return "permission_denied";
  if (NOT_FOUND_PATTERNS.some((p) => message.includes(p))) return "not_found";

  return "unexpected";
}

/** Wrap a thrown value as a TrackerFault, keeping the original as `cause`. */
export function toFault(error: unknown, context?: string): TrackerFault {
  if (error instanceof TrackerFault) return error;
  const message = formatErrorMessage(error);
  return new TrackerFault(classifyFault(error), context ? `${context}: ${message}` : message, { cause: error });
}

// =============================================================================
// Probe Errors
// =============================================================================

const FATAL_PROBE_CODES = new Set(["EMFILE", "ENFILE", "ENOMEM", "ENOBUFS"]);

/**
 * Errors that must escape a probe: cancellation and resource exhaustion.
 * Everything else means the target is offline.
 */
export function isFatalProbeError(error: unknown): boolean {
  if (error === null || typeof error !== "object") return false;
  if (readField(error, "name") === "AbortError") return true;
  const code = readField(error, "code");
  return typeof code === "string" && FATAL_PROBE_CODES.has(code);
}

// =============================================================================
// Formatting
// =============================================================================

export function formatErrorMessage(error: unknown): string {
  if (error === null || error === undefined) return "Unknown error";
  if (typeof error === "string") return error;
  if (typeof error !== "object") return String(error);

  const rawMessage = readField(error, "message");
  const message = typeof rawMessage === "string" && rawMessage ? rawMessage : "Unknown error";
  const code = readField(error, "code");
  const status = readField(error, "status") ?? readField(error, "statusCode");

  const parts: string[] = [];
  if (typeof code === "string" || typeof code === "number") parts.push(`[${code}]`);
  if (typeof status === "number") parts.push(`(HTTP ${status})`);
  parts.push(message);
  return parts.join(" ");
}

/** One-line user-facing description with remediation hints. */
export function describeFault(fault: TrackerFault): string {
  const lines = [fault.message];
  if (fault.missingCapabilities.length > 0) {
    lines.push(`Missing: ${fault.missingCapabilities.join(", ")}`);
  }
  for (const hint of fault.remediation) lines.push(`- ${hint}`);
  return lines.join("\n");
}
