/**
 * WhosOn — CLI
 *
 * `whoson run` connects to Discord and keeps tracked channels in sync;
 * `targets`, `stats` and `migrate` work on the registry directly.
 */

import { Client, Events } from "discord.js";
import { Command } from "commander";

import { loadConfig, requireDiscordToken, type AppConfig } from "./config.js";
import { describeFault, formatErrorMessage, toFault } from "./errors.js";
import { ConsoleTransport, FileTransport, createTrackerLogger, type LogTransport, type TrackerLogger } from "./logging/logger.js";
import { migrateLegacyData, type MigrationReport } from "./migration.js";
import { DiscordPlatform, discordClientOptions } from "./platform/discord.js";
import { createMinecraftAdapters } from "./probe/minecraft.js";
import { TargetRegistry } from "./registry/registry.js";
import { SQLiteTargetStorage } from "./registry/sqlite-store.js";
import { TrackerService } from "./tracker.js";

export type CliOutput = {
  info: (msg: string) => void;
  error: (msg: string) => void;
};

export type CliContext = {
  env: Record<string, string | undefined>;
  out: CliOutput;
  setExitCode: (code: number) => void;
  /** Overridable so commands can run against any storage. */
  openRegistry: (config: AppConfig, logger: TrackerLogger) => Promise<TargetRegistry>;
};

export async function openSqliteRegistry(config: AppConfig, logger: TrackerLogger): Promise<TargetRegistry> {
  const registry = new TargetRegistry(new SQLiteTargetStorage(config.databasePath), {
    cacheTtlMs: config.settings.registryCacheTtlMs,
    logger: logger.child("registry"),
  });
  await registry.initialize();
  return registry;
}

function defaultContext(): CliContext {
  return {
    env: process.env,
    out: { info: (msg) => console.log(msg), error: (msg) => console.error(msg) },
    setExitCode: (code) => {
      process.exitCode = code;
    },
    openRegistry: openSqliteRegistry,
  };
}

function buildLogger(config: AppConfig): { logger: TrackerLogger; file?: FileTransport } {
  const transports: LogTransport[] = [new ConsoleTransport({ minLevel: config.logLevel })];
  const file = config.logFile ? new FileTransport({ filePath: config.logFile, minLevel: config.logLevel }) : undefined;
  if (file) transports.push(file);
  return { logger: createTrackerLogger("main", { level: config.logLevel, transports }), file };
}

/** Open the registry, run `task`, and always close it again. */
async function withRegistry(ctx: CliContext, task: (registry: TargetRegistry) => Promise<void>): Promise<void> {
  const config = loadConfig(ctx.env);
  const { logger, file } = buildLogger(config);
  const registry = await ctx.openRegistry(config, logger);
  try {
    await task(registry);
  } finally {
    registry.close();
    await file?.close();
  }
}

// ─── targets ─────────────────────────────────────────────────────────────────

export function registerTargetsCommand(program: Command, ctx: CliContext): void {
  program
    .command("targets")
    .description("List tracked servers")
    .option("--scope <id>", "Only list servers of one guild")
    .action(async (opts: { scope?: string }) => {
      await withRegistry(ctx, async (registry) => {
        const all = await registry.listAll();
        const scopes = opts.scope ? [opts.scope] : [...all.keys()];
        let listed = 0;
        for (const scopeId of scopes) {
          for (const target of all.get(scopeId)?.values() ?? []) {
            const name = target.displayName ? ` "${target.displayName}"` : "";
            ctx.out.info(`${scopeId}  ${target.targetKey}  ${target.address}${name} (${target.protocolKind})`);
            listed++;
          }
        }
        if (listed === 0) ctx.out.info("No servers are being tracked.");
      });
    });
}

// ─── stats ───────────────────────────────────────────────────────────────────

export function registerStatsCommand(program: Command, ctx: CliContext): void {
  program
    .command("stats")
    .description("Show registry statistics")
    .action(async () => {
      await withRegistry(ctx, async (registry) => {
        const stats = await registry.stats();
        ctx.out.info(`Total servers:   ${stats.totalCount}`);
        ctx.out.info(`Java servers:    ${stats.countByProtocolKind.java}`);
        ctx.out.info(`Bedrock servers: ${stats.countByProtocolKind.bedrock}`);
        ctx.out.info(`Guilds:          ${stats.scopeCount}`);
        ctx.out.info(`Schema version:  ${registry.schemaVersion()}`);
      });
    });
}

// ─── migrate ─────────────────────────────────────────────────────────────────

export function registerMigrateCommand(program: Command, ctx: CliContext): void {
  program
    .command("migrate")
    .description("Import servers from a legacy JSON data file")
    .argument("<file>", "Legacy JSON data file")
    .action(async (file: string) => {
      await withRegistry(ctx, async (registry) => {
        let report: MigrationReport;
        try {
          report = await migrateLegacyData(file, registry);
        } catch (err) {
          ctx.out.error(describeFault(toFault(err)));
          ctx.setExitCode(1);
          return;
        }

        ctx.out.info(`Total servers found:   ${report.total}`);
        ctx.out.info(`Successfully migrated: ${report.migrated}`);
        ctx.out.info(`Failed to migrate:     ${report.failed}`);
        ctx.out.info(`Backup saved as:       ${report.backupPath}`);
        for (const error of report.errors) ctx.out.error(`  ${error}`);

        if (report.failed > 0 || !report.verified) {
          ctx.out.error("Migration completed with errors. The original file has been preserved.");
          ctx.setExitCode(1);
        } else {
          ctx.out.info("Migration completed successfully.");
        }
      });
    });
}

// ─── run ─────────────────────────────────────────────────────────────────────

export function registerRunCommand(program: Command, ctx: CliContext): void {
  program
    .command("run")
    .description("Connect to Discord and keep tracked channels up to date")
    .action(async () => {
      const config = loadConfig(ctx.env);
      const token = requireDiscordToken(config);
      const { logger, file } = buildLogger(config);
      const registry = await ctx.openRegistry(config, logger);

      const client = new Client(discordClientOptions());
      const ready = new Promise<Client<true>>((resolve) => client.once(Events.ClientReady, resolve));
      await client.login(token);
      const readyClient = await ready;
      logger.info(`Logged in as ${readyClient.user.tag}`);

      const tracker = new TrackerService({
        registry,
        platform: new DiscordPlatform(readyClient),
        adapters: createMinecraftAdapters(),
        settings: config.settings,
        logger: logger.child("tracker"),
      });

      client.on(Events.GuildDelete, (guild) => {
        tracker.handleScopeRemoved(guild.id).catch((err: unknown) => {
          logger.error("Could not forget departed guild", { scopeId: guild.id, error: formatErrorMessage(err) });
        });
      });

      await tracker.start();

      let stopping: Promise<void> | null = null;
      const shutdown = (signal: string): Promise<void> => {
        stopping ??= (async () => {
          logger.info(`Received ${signal}, shutting down`);
          await tracker.stop();
          registry.close();
          await client.destroy();
          logger.info("Shutdown complete");
          await file?.close();
        })();
        return stopping;
      };

      await new Promise<void>((resolve, reject) => {
        for (const signal of ["SIGINT", "SIGTERM"] as const) {
          process.once(signal, () => {
            shutdown(signal).then(resolve, reject);
          });
        }
      });
    });
}

// ─── Program ─────────────────────────────────────────────────────────────────

export function buildProgram(overrides?: Partial<CliContext>): Command {
  const ctx: CliContext = { ...defaultContext(), ...overrides };
  const program = new Command()
    .name("whoson")
    .description("Mirror live Minecraft server status onto Discord channels");

  registerRunCommand(program, ctx);
  registerTargetsCommand(program, ctx);
  registerStatsCommand(program, ctx);
  registerMigrateCommand(program, ctx);
  return program;
}
