import { describe, it, expect } from "vitest";
import { ConfigError, DEFAULT_TRACKER_SETTINGS, loadConfig, requireDiscordToken } from "./config.js";
import { LOG_LEVELS } from "./logging/logger.js";

describe("loadConfig", () => {
  it("applies defaults to an empty environment", () => {
    const config = loadConfig({});
    expect(config).toEqual({
      databasePath: "whoson.db",
      logLevel: "info",
      settings: DEFAULT_TRACKER_SETTINGS,
    });
    expect(DEFAULT_TRACKER_SETTINGS).toEqual({
      categoryName: "WhosOn Tracking",
      updateIntervalMs: 120_000,
      targetDelayMs: 2_000,
      restartCooldownMs: 30_000,
      probeTimeoutMs: 5_000,
      confirmationTimeoutMs: 30_000,
      registryCacheTtlMs: 30_000,
    });
  });

  it("reads durations in seconds", () => {
    const config = loadConfig({ UPDATE_INTERVAL: "300", UPDATE_DELAY: "0.5", PROBE_TIMEOUT: " 3 " });
    expect(config.settings).toMatchObject({ updateIntervalMs: 300_000, targetDelayMs: 500, probeTimeoutMs: 3_000 });
  });

  it("reads the token, paths and level", () => {
    const config = loadConfig({
      DISCORD_BOT_TOKEN: "test-secret",
      WHOSON_DB_PATH: "/data/whoson.db",
      LOG_LEVEL: "DEBUG",
      LOG_FILE: "/var/log/whoson.log",
      WHOSON_CATEGORY: "Servers",
    });
    expect(config).toMatchObject({
      discordToken: "test-secret",
      databasePath: "/data/whoson.db",
      logLevel: "debug",
      logFile: "/var/log/whoson.log",
      settings: { categoryName: "Servers" },
    });
    expect(requireDiscordToken(config)).toBe("test-secret");
  });

  it("accepts every logger level", () => {
    expect(LOG_LEVELS.map((level) => loadConfig({ LOG_LEVEL: level.toUpperCase() }).logLevel)).toEqual([
      "trace",
      "debug",
      "info",
      "warn",
      "error",
      "fatal",
    ]);
  });

  it("lists every problem at once", () => {
    let caught: unknown;
    try {
      loadConfig({ UPDATE_INTERVAL: "30", PROBE_TIMEOUT: "soon", LOG_LEVEL: "loud" });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    if (!(caught instanceof ConfigError)) return;
    expect(caught.issues).toHaveLength(3);
    expect(caught.issues).toContain("settings.updateIntervalMs: update interval should be at least 60 seconds to avoid rate limits");
  });

  it("requires a token only when asked", () => {
    expect(() => requireDiscordToken(loadConfig({}))).toThrow("DISCORD_BOT_TOKEN environment variable is not set");
  });
});
