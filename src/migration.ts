/**
 * WhosOn — Legacy Import
 *
 * Imports the JSON file written by earlier releases into the registry.
 * The source file is copied to a timestamped backup first and never modified.
 */

import { copyFile, readFile } from "node:fs/promises";
import { basename, dirname, extname, join } from "node:path";
import { z } from "zod";

import { createTargetKey } from "./address.js";
import { TrackerFault, formatErrorMessage } from "./errors.js";
import type { TrackerLogger } from "./logging/logger.js";
import type { TargetRegistry } from "./registry/registry.js";

const snowflake = z.union([z.string().min(1), z.number().int().nonnegative()]).transform(String);

const legacyServerSchema = z.object({
  address: z.string().min(1),
  nickname: z.string().nullish(),
  type: z.enum(["java", "bedrock"]),
  voice_channel_id: snowflake,
  text_channel_id: snowflake,
  message_id: snowflake,
});

const legacyFileSchema = z.record(
  z.object({ servers: z.record(z.unknown()).optional() }).passthrough(),
);

export type MigrationReport = {
  total: number;
  migrated: number;
  failed: number;
  backupPath: string;
  /** Every entry from the file is present in the registry afterwards. */
  verified: boolean;
  errors: string[];
};

/** Discord ids exceed 2^53; quote them before JSON.parse can round them. */
function quoteSnowflakes(raw: string): string {
  return raw.replace(/"(voice_channel_id|text_channel_id|message_id)"(\s*):(\s*)(\d+)/g, '"$1"$2:$3"$4"');
}

function stamp(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, "0");
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}_` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

export function backupPathFor(jsonFile: string, at: Date): string {
  const ext = extname(jsonFile) || ".json";
  return join(dirname(jsonFile), `${basename(jsonFile, extname(jsonFile))}.backup.${stamp(at)}${ext}`);
}

export async function migrateLegacyData(
  jsonFile: string,
  registry: TargetRegistry,
  options?: { logger?: TrackerLogger; now?: () => Date },
): Promise<MigrationReport> {
  const log = options?.logger;
  const backupPath = backupPathFor(jsonFile, options?.now?.() ?? new Date());

  let raw: string;
  try {
    raw = await readFile(jsonFile, "utf8");
  } catch (err) {
    throw new TrackerFault("not_found", `Legacy data file not found: ${jsonFile}`, { cause: err });
  }

  await copyFile(jsonFile, backupPath);
  log?.info(`Created backup: ${backupPath}`);

  let parsed: z.infer<typeof legacyFileSchema>;
  try {
    parsed = legacyFileSchema.parse(JSON.parse(quoteSnowflakes(raw)));
  } catch (err) {
    throw new TrackerFault("unexpected", `Legacy data file is not valid: ${formatErrorMessage(err)}`, { cause: err });
  }

  const report: MigrationReport = { total: 0, migrated: 0, failed: 0, backupPath, verified: false, errors: [] };
  const imported: Array<[string, string]> = [];

  for (const [scopeId, scope] of Object.entries(parsed)) {
    if (!scope.servers) {
      log?.warn(`No servers found for guild ${scopeId}`);
      continue;
    }
    for (const [legacyKey, entry] of Object.entries(scope.servers)) {
      report.total++;

      const server = legacyServerSchema.safeParse(entry);
      if (!server.success) {
        imported.push([scopeId, legacyKey]);
        report.failed++;
        report.errors.push(`${scopeId}/${legacyKey}: ${server.error.issues.map((i) => `${i.path.join(".")} ${i.message}`).join("; ")}`);
        continue;
      }

      const { address, nickname, type, voice_channel_id, text_channel_id, message_id } = server.data;
      // Older files kept the address's case in the key; lookups use the normalized form.
      const targetKey = createTargetKey(address);
      imported.push([scopeId, targetKey]);
      try {
        const added = await registry.add(scopeId, targetKey, {
          address,
          displayName: nickname ?? undefined,
          protocolKind: type,
          statusResourceRef: voice_channel_id,
          detailResourceRef: text_channel_id,
          detailMessageRef: message_id,
        });
        if (added) {
          report.migrated++;
          log?.debug(`Migrated server ${address}`, { scopeId, targetKey });
        } else {
          report.failed++;
          report.errors.push(`${scopeId}/${targetKey}: already in the registry`);
        }
      } catch (err) {
        report.failed++;
        report.errors.push(`${scopeId}/${targetKey}: ${formatErrorMessage(err)}`);
      }
    }
  }

  let present = 0;
  for (const [scopeId, targetKey] of imported) {
    if (await registry.get(scopeId, targetKey)) present++;
  }
  report.verified = present === report.total;

  if (report.failed === 0) log?.info(`Migrated ${report.migrated} servers`, { backupPath });
  else log?.warn(`Migration finished with ${report.failed} failures`, { errors: report.errors });
  if (!report.verified) log?.error(`Verification failed: ${report.total - present} servers missing from the registry`);

  return report;
}
