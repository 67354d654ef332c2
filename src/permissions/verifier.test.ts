import { describe, it, expect, beforeEach } from "vitest";
import { PermissionVerifier, REQUIRED_SCOPE_CAPABILITIES } from "./verifier.js";
import { MockPlatform, permissionError } from "../platform/platform-mock.js";
import { createCapturingLogger } from "../logging/logger.js";

describe("PermissionVerifier", () => {
  let platform: MockPlatform;
  let statusRef: string;

  beforeEach(async () => {
    platform = new MockPlatform({ scopes: ["g1"] });
    const container = await platform.createContainer("g1", "WhosOn Tracking");
    statusRef = await platform.createStatusResource("g1", { name: "📊 Survival", containerRef: container, occupancyCap: 0 });
  });

  it("is satisfied without granting anything when the set is present", async () => {
    const verifier = new PermissionVerifier(platform);
    expect(await verifier.verifyDetailed("g1", statusRef)).toEqual({ satisfied: true, repaired: false, missing: [] });
    expect(platform.callsTo("grantCapabilities")).toEqual([]);
  });

  it("grants only the missing subset in one call", async () => {
    platform.revoke("g1", statusRef, ["manage_resources", "connect"]);
    const verifier = new PermissionVerifier(platform);

    expect(await verifier.verify("g1", statusRef)).toBe(true);
    expect(platform.callsTo("grantCapabilities")).toEqual([
      { method: "grantCapabilities", scopeId: "g1", ref: statusRef, value: "manage_resources,connect" },
    ]);
  });

  it("reports what is still missing when the grant has no effect", async () => {
    platform.revoke("g1", statusRef, ["manage_resources"]);
    platform.grantsTakeEffect = false;
    const verifier = new PermissionVerifier(platform);

    expect(await verifier.verifyDetailed("g1", statusRef)).toEqual({
      satisfied: false,
      repaired: false,
      missing: ["manage_resources"],
    });
  });

  it("reports a refused grant", async () => {
    platform.revoke("g1", statusRef, ["view"]);
    platform.failNext("grantCapabilities", permissionError());
    const { logger, transport } = createCapturingLogger();
    const verifier = new PermissionVerifier(platform, { logger });

    const result = await verifier.verifyDetailed("g1", statusRef);
    expect(result).toEqual({
      satisfied: false,
      repaired: false,
      missing: ["view"],
      error: "[50013] (HTTP 403) Missing Permissions",
    });
    expect(transport.messages("error")).toEqual(["Could not repair capabilities"]);
  });

  it("lists missing scope capabilities without granting", async () => {
    platform.setScopeCapabilities("g1", ["view", "send_messages"]);
    const verifier = new PermissionVerifier(platform);

    expect(await verifier.missingScopeCapabilities("g1")).toEqual(
      REQUIRED_SCOPE_CAPABILITIES.filter((c) => c !== "view" && c !== "send_messages"),
    );
    expect(platform.callsTo("grantCapabilities")).toEqual([]);
  });
});
