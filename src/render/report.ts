/**
 * WhosOn — Status Reports
 *
 * Pure rendering of a snapshot into the structured report posted in the
 * detail resource. Every field value stays within the platform's 1024
 * character limit.
 */

import type { OnlineSnapshot, ReportField, StatusSnapshot, StructuredReport } from "../types.js";
import { codePointLength, STATUS_GLYPHS, truncate } from "./label.js";

export const FIELD_VALUE_MAX_LENGTH = 1024;
export const PLAYER_LIST_CAP = 20;
export const PLUGIN_LIST_CAP = 5;

export const REPORT_COLORS = {
  online: 0x00ff00,
  offline: 0xff0000,
} as const;

const FORMATTING_CODE = /§[0-9a-fk-or]/gi;

/** Remove `§`-prefixed colour and formatting codes. */
export function stripFormattingCodes(motd: string): string {
  return motd.replace(FORMATTING_CODE, "");
}

/**
 * Join the first `cap` items, appending ` (+N more)` for the rest. Items are
 * dropped further while the value would exceed the field limit.
 */
export function renderListValue(items: readonly string[], cap: number, max = FIELD_VALUE_MAX_LENGTH): string {
  let shown = Math.min(items.length, cap);
  for (;;) {
    const hidden = items.length - shown;
    const head = items.slice(0, shown).join(", ");
    const suffix = hidden > 0 ? `${head ? " " : ""}(+${hidden} more)` : "";
    const value = head + suffix;
    if (codePointLength(value) <= max || shown === 0) return truncate(value, max);
    shown--;
  }
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

function field(name: string, value: string, inline: boolean): ReportField {
  return { name, value: truncate(value, FIELD_VALUE_MAX_LENGTH), inline };
}

function onlineFields(snapshot: OnlineSnapshot): ReportField[] {
  const fields: ReportField[] = [
    field("Status", `${STATUS_GLYPHS.online} Online`, true),
    field("Players", `${snapshot.playersOnline}/${snapshot.playersMax}`, true),
    field("Latency", `${snapshot.latencyMs}ms`, true),
    field("Type", capitalize(snapshot.protocolKind), true),
    field("Version", snapshot.versionLabel || "Unknown", true),
  ];

  const motd = stripFormattingCodes(snapshot.motd).trim();
  if (motd) {
    // Two characters of the limit go to the backticks.
    fields.push({ name: "MOTD", value: `\`${truncate(motd, FIELD_VALUE_MAX_LENGTH - 2)}\``, inline: false });
  }

  if (snapshot.sampledPlayerNames.length > 0) {
    fields.push({
      name: "Online Players",
      value: renderListValue(snapshot.sampledPlayerNames, PLAYER_LIST_CAP),
      inline: false,
    });
  }

  if (snapshot.gameMode) fields.push(field("Gamemode", snapshot.gameMode, true));
  if (snapshot.mapName) fields.push(field("Map", snapshot.mapName, true));

  const extended = snapshot.extendedInfo;
  if (extended) {
    if (extended.software) fields.push(field("Software", extended.software, true));
    if (extended.mapName) fields.push(field("Map", extended.mapName, true));
    if (extended.pluginNames.length > 0) {
      fields.push({ name: "Plugins", value: renderListValue(extended.pluginNames, PLUGIN_LIST_CAP), inline: false });
    }
  }

  return fields;
}

export function renderReport(
  snapshot: StatusSnapshot,
  address: string,
  displayName?: string,
): StructuredReport {
  const title = `📊 ${displayName || address}`;
  const footer = `Server: ${address}`;

  if (snapshot.online) {
    return { title, color: REPORT_COLORS.online, fields: onlineFields(snapshot), footer };
  }

  return {
    title,
    description: `${STATUS_GLYPHS.offline} **Server Offline**`,
    color: REPORT_COLORS.offline,
    fields: snapshot.errorMessage ? [field("Error", snapshot.errorMessage, false)] : [],
    footer,
  };
}
