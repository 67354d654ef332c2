/**
 * WhosOn — Configuration
 *
 * Schema-based validation of the engine settings using Zod, loaded from
 * environment variables. Durations are given in seconds in the environment
 * and held in milliseconds internally.
 */

import { z } from "zod";

import { LOG_LEVELS } from "./logging/logger.js";

// =============================================================================
// Schemas
// =============================================================================

export const trackerSettingsSchema = z.object({
  categoryName: z.string().min(1).max(100, "category name is too long for Discord").default("WhosOn Tracking"),
  updateIntervalMs: z
    .number()
    .int()
    .min(60_000, "update interval should be at least 60 seconds to avoid rate limits")
    .default(120_000),
  targetDelayMs: z.number().int().nonnegative().default(2_000),
  restartCooldownMs: z.number().int().positive().default(30_000),
  probeTimeoutMs: z.number().int().positive().default(5_000),
  confirmationTimeoutMs: z.number().int().positive().default(30_000),
  registryCacheTtlMs: z.number().int().nonnegative().default(30_000),
});

export type TrackerSettings = z.infer<typeof trackerSettingsSchema>;

export const DEFAULT_TRACKER_SETTINGS: TrackerSettings = trackerSettingsSchema.parse({});

export const appConfigSchema = z.object({
  discordToken: z.string().min(1).optional(),
  databasePath: z.string().min(1).default("whoson.db"),
  logLevel: z.enum(LOG_LEVELS).default("info"),
  logFile: z.string().min(1).optional(),
  settings: trackerSettingsSchema,
});

export type AppConfig = z.infer<typeof appConfigSchema>;

// =============================================================================
// Loading
// =============================================================================

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n${issues.map((i) => `  - ${i}`).join("\n")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

type Env = Record<string, string | undefined>;

function seconds(env: Env, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return undefined;
  const value = Number(raw);
  return Number.isFinite(value) ? Math.round(value * 1000) : Number.NaN;
}

function text(env: Env, key: string): string | undefined {
  const raw = env[key]?.trim();
  return raw ? raw : undefined;
}

/**
 * Read and validate configuration from the environment. Throws a
 * `ConfigError` listing every problem at once.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const candidate = {
    discordToken: text(env, "DISCORD_BOT_TOKEN"),
    databasePath: text(env, "WHOSON_DB_PATH"),
    logLevel: text(env, "LOG_LEVEL")?.toLowerCase(),
    logFile: text(env, "LOG_FILE"),
    settings: {
      categoryName: text(env, "WHOSON_CATEGORY"),
      updateIntervalMs: seconds(env, "UPDATE_INTERVAL"),
      targetDelayMs: seconds(env, "UPDATE_DELAY"),
      restartCooldownMs: seconds(env, "RESTART_COOLDOWN"),
      probeTimeoutMs: seconds(env, "PROBE_TIMEOUT"),
      confirmationTimeoutMs: seconds(env, "CONFIRMATION_TIMEOUT"),
      registryCacheTtlMs: seconds(env, "REGISTRY_CACHE_TTL"),
    },
  };

  const parsed = appConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`));
  }
  return parsed.data;
}

/** The token is only needed to talk to Discord. */
export function requireDiscordToken(config: AppConfig): string {
  if (!config.discordToken) {
    throw new ConfigError(["DISCORD_BOT_TOKEN environment variable is not set"]);
  }
  return config.discordToken;
}
