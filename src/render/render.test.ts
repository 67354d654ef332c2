/**
 * WhosOn Rendering — Tests
 */

import { describe, it, expect } from "vitest";
import {
  codePointLength,
  fallbackLabelForSnapshot,
  labelForSnapshot,
  renderFallbackLabel,
  renderLabel,
  truncate,
} from "./label.js";
import { renderListValue, renderReport, stripFormattingCodes } from "./report.js";
import type { OnlineSnapshot, StatusSnapshot } from "../types.js";

function makeOnline(overrides?: Partial<OnlineSnapshot>): OnlineSnapshot {
  return {
    online: true,
    protocolKind: "java",
    playersOnline: 5,
    playersMax: 20,
    latencyMs: 12.5,
    versionLabel: "1.20.4",
    motd: "",
    sampledPlayerNames: [],
    ...overrides,
  };
}

const offline: StatusSnapshot = { online: false, protocolKind: "java", errorMessage: "Connection refused" };

// =============================================================================
// Labels
// =============================================================================

describe("renderLabel", () => {
  it("renders an online label with the player count", () => {
    expect(renderLabel(true, "Survival", "play.example.com", 5, 20)).toBe("🟢 Survival: 5/20");
  });

  it("renders an offline label without player counts", () => {
    expect(renderLabel(false, "Survival", "play.example.com", 5, 20)).toBe("🔴 Survival: Offline");
  });

  it("falls back to the address when there is no display name", () => {
    expect(renderLabel(true, undefined, "play.example.com", 0, 10)).toBe("🟢 play.example.com: 0/10");
    expect(renderLabel(false, "", "play.example.com")).toBe("🔴 play.example.com: Offline");
  });

  it("truncates long labels to exactly 100 code points", () => {
    const label = renderLabel(true, "x".repeat(200), "play.example.com", 5, 20);
    expect(label).toBe(`🟢 ${"x".repeat(95)}...`);
    expect(codePointLength(label)).toBe(100);
  });

  it("leaves a label of exactly 100 code points untouched", () => {
    const name = "y".repeat(89);
    const label = renderLabel(false, name, "play.example.com");
    expect(label).toBe(`🔴 ${name}: Offline`);
    expect(codePointLength(label)).toBe(100);
  });

  it("renders the glyph-free fallback", () => {
    expect(renderFallbackLabel(true, "Survival", "play.example.com", 5, 20)).toBe("Survival: 5/20 (Online)");
    expect(renderFallbackLabel(false, "Survival", "play.example.com")).toBe("Survival: Offline");
  });

  it("derives labels from snapshots", () => {
    expect(labelForSnapshot(makeOnline(), "Survival", "a")).toBe("🟢 Survival: 5/20");
    expect(labelForSnapshot(offline, "Survival", "a")).toBe("🔴 Survival: Offline");
    expect(fallbackLabelForSnapshot(offline, undefined, "a")).toBe("a: Offline");
  });
});

describe("truncate", () => {
  it("never splits a surrogate pair", () => {
    expect(truncate("🟢🟢🟢🟢🟢", 4)).toBe("🟢...");
  });
});

// =============================================================================
// Reports
// =============================================================================

describe("stripFormattingCodes", () => {
  it("removes colour and style codes in either case", () => {
    expect(stripFormattingCodes("§aGreen §LBold§r plain §z")).toBe("Green Bold plain §z");
  });
});

describe("renderListValue", () => {
  it("lists everything under the cap", () => {
    expect(renderListValue(["a", "b", "c"], 5)).toBe("a, b, c");
  });

  it("counts the entries beyond the cap", () => {
    const names = Array.from({ length: 25 }, (_, i) => `p${i + 1}`);
    const expected = `${names.slice(0, 20).join(", ")} (+5 more)`;
    expect(renderListValue(names, 20)).toBe(expected);
  });

  it("drops further entries while the value is too long", () => {
    expect(renderListValue(["alpha", "beta", "gamma"], 5, 15)).toBe("alpha (+2 more)");
  });

  it("keeps long lists within the field limit", () => {
    const names = Array.from({ length: 20 }, () => "a".repeat(100));
    const value = renderListValue(names, 20);
    expect(value.endsWith(" (+11 more)")).toBe(true);
    expect(value.length).toBe(927);
  });
});

describe("renderReport", () => {
  it("renders every section of an online java snapshot", () => {
    const snapshot = makeOnline({
      motd: "§aHello §lWorld",
      sampledPlayerNames: ["Alex", "Steve"],
      extendedInfo: {
        software: "Paper",
        mapName: "world",
        pluginNames: ["p1", "p2", "p3", "p4", "p5", "p6", "p7"],
      },
    });

    expect(renderReport(snapshot, "play.example.com", "Survival")).toEqual({
      title: "📊 Survival",
      color: 0x00ff00,
      footer: "Server: play.example.com",
      fields: [
        { name: "Status", value: "🟢 Online", inline: true },
        { name: "Players", value: "5/20", inline: true },
        { name: "Latency", value: "12.5ms", inline: true },
        { name: "Type", value: "Java", inline: true },
        { name: "Version", value: "1.20.4", inline: true },
        { name: "MOTD", value: "`Hello World`", inline: false },
        { name: "Online Players", value: "Alex, Steve", inline: false },
        { name: "Software", value: "Paper", inline: true },
        { name: "Map", value: "world", inline: true },
        { name: "Plugins", value: "p1, p2, p3, p4, p5 (+2 more)", inline: false },
      ],
    });
  });

  it("renders bedrock game mode and map", () => {
    const report = renderReport(
      makeOnline({ protocolKind: "bedrock", versionLabel: "", gameMode: "Survival", mapName: "Bedrock level" }),
      "be.example.com",
    );

    expect(report.title).toBe("📊 be.example.com");
    expect(report.fields.map((f) => [f.name, f.value])).toEqual([
      ["Status", "🟢 Online"],
      ["Players", "5/20"],
      ["Latency", "12.5ms"],
      ["Type", "Bedrock"],
      ["Version", "Unknown"],
      ["Gamemode", "Survival"],
      ["Map", "Bedrock level"],
    ]);
  });

  it("renders an offline report with the error", () => {
    expect(renderReport(offline, "play.example.com", "Survival")).toEqual({
      title: "📊 Survival",
      description: "🔴 **Server Offline**",
      color: 0xff0000,
      fields: [{ name: "Error", value: "Connection refused", inline: false }],
      footer: "Server: play.example.com",
    });
  });

  it("caps the MOTD including its backticks", () => {
    const report = renderReport(makeOnline({ motd: "m".repeat(2000) }), "a");
    const motd = report.fields.find((f) => f.name === "MOTD");
    expect(motd?.value.length).toBe(1024);
    expect(motd?.value.endsWith("...`")).toBe(true);
  });

  it("never emits a field value over 1024 characters", () => {
    const report = renderReport(
      makeOnline({
        versionLabel: "v".repeat(3000),
        sampledPlayerNames: Array.from({ length: 40 }, (_, i) => `player-${i}-${"z".repeat(60)}`),
      }),
      "a",
    );
    for (const f of report.fields) expect(f.value.length).toBeLessThanOrEqual(1024);
  });

  it("is deterministic", () => {
    const snapshot = makeOnline({ sampledPlayerNames: ["Alex"] });
    expect(renderReport(snapshot, "a", "b")).toEqual(renderReport(snapshot, "a", "b"));
  });
});
