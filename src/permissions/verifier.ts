/**
 * WhosOn — Permission Verifier
 *
 * Checks the engine's own grants on a resource against a fixed required set
 * and repairs gaps with a single grant call. Only the engine's principal is
 * ever touched, and only with capabilities from the required set.
 */

import { formatErrorMessage } from "../errors.js";
import type { TrackerLogger } from "../logging/logger.js";
import type { Capability, ResourcePlatform } from "../types.js";

/** What the engine needs on every status resource it renames. */
export const REQUIRED_RESOURCE_CAPABILITIES: readonly Capability[] = ["manage_resources", "view", "connect"];

/** What the engine needs across a scope before it creates anything there. */
export const REQUIRED_SCOPE_CAPABILITIES: readonly Capability[] = [
  "manage_resources",
  "manage_grants",
  "view",
  "send_messages",
  "embed_links",
  "read_history",
];

export type VerificationResult = {
  satisfied: boolean;
  /** True when a grant call closed the gap. */
  repaired: boolean;
  /** Capabilities still missing after any repair attempt. */
  missing: Capability[];
  error?: string;
};

export function missingFrom(required: readonly Capability[], granted: ReadonlySet<Capability>): Capability[] {
  return required.filter((c) => !granted.has(c));
}

export class PermissionVerifier {
  private readonly platform: ResourcePlatform;
  private readonly required: readonly Capability[];
  private readonly logger?: TrackerLogger;

  constructor(
    platform: ResourcePlatform,
    options?: { required?: readonly Capability[]; logger?: TrackerLogger },
  ) {
    this.platform = platform;
    this.required = options?.required ?? REQUIRED_RESOURCE_CAPABILITIES;
    this.logger = options?.logger;
  }

  async verify(scopeId: string, resourceRef: string): Promise<boolean> {
    return (await this.verifyDetailed(scopeId, resourceRef)).satisfied;
  }

  async verifyDetailed(scopeId: string, resourceRef: string): Promise<VerificationResult> {
    const principal = this.platform.principalId;
    const before = missingFrom(this.required, await this.platform.getGrantedCapabilities(scopeId, resourceRef, principal));
    if (before.length === 0) return { satisfied: true, repaired: false, missing: [] };

    this.logger?.warn("Missing capabilities on resource, attempting repair", { scopeId, resourceRef, missing: before });
    try {
      await this.platform.grantCapabilities(scopeId, resourceRef, principal, before);
    } catch (err) {
      const error = formatErrorMessage(err);
      this.logger?.error("Could not repair capabilities", { scopeId, resourceRef, error });
      return { satisfied: false, repaired: false, missing: before, error };
    }

    const after = missingFrom(this.required, await this.platform.getGrantedCapabilities(scopeId, resourceRef, principal));
    if (after.length > 0) {
      this.logger?.error("Capabilities still missing after repair", { scopeId, resourceRef, missing: after });
      return { satisfied: false, repaired: false, missing: after };
    }

    this.logger?.info("Repaired capabilities on resource", { scopeId, resourceRef });
    return { satisfied: true, repaired: true, missing: [] };
  }

  /** Scope-wide capabilities the engine lacks; nothing is granted here. */
  async missingScopeCapabilities(scopeId: string): Promise<Capability[]> {
    return missingFrom(REQUIRED_SCOPE_CAPABILITIES, await this.platform.getScopeCapabilities(scopeId));
  }
}
