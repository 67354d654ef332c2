/**
 * WhosOn — Status Labels
 *
 * Single-line names for the status resource. Lengths are counted in code
 * points so a truncation never splits an emoji.
 */

import type { StatusSnapshot } from "../types.js";

export const LABEL_MAX_LENGTH = 100;
export const TRUNCATION_MARKER = "...";

export const STATUS_GLYPHS = {
  online: "🟢",
  offline: "🔴",
} as const;

/** Cut `text` to `max` code points, ending in the truncation marker when shortened. */
export function truncate(text: string, max: number): string {
  const points = [...text];
  if (points.length <= max) return text;
  return points.slice(0, max - TRUNCATION_MARKER.length).join("") + TRUNCATION_MARKER;
}

export function codePointLength(text: string): number {
  return [...text].length;
}

/** `🟢 {name}: {on}/{max}` or `🔴 {name}: Offline`, capped at 100 code points. */
export function renderLabel(
  online: boolean,
  displayName: string | undefined,
  address: string,
  playersOnline = 0,
  playersMax = 0,
): string {
  const name = displayName || address;
  const raw = online
    ? `${STATUS_GLYPHS.online} ${name}: ${playersOnline}/${playersMax}`
    : `${STATUS_GLYPHS.offline} ${name}: Offline`;
  return truncate(raw, LABEL_MAX_LENGTH);
}

/** Glyph-free variant tried when the decorated rename is refused. */
export function renderFallbackLabel(
  online: boolean,
  displayName: string | undefined,
  address: string,
  playersOnline = 0,
  playersMax = 0,
): string {
  const name = displayName || address;
  const raw = online ? `${name}: ${playersOnline}/${playersMax} (Online)` : `${name}: Offline`;
  return truncate(raw, LABEL_MAX_LENGTH);
}

export function labelForSnapshot(snapshot: StatusSnapshot, displayName: string | undefined, address: string): string {
  return snapshot.online
    ? renderLabel(true, displayName, address, snapshot.playersOnline, snapshot.playersMax)
    : renderLabel(false, displayName, address);
}

export function fallbackLabelForSnapshot(
  snapshot: StatusSnapshot,
  displayName: string | undefined,
  address: string,
): string {
  return snapshot.online
    ? renderFallbackLabel(true, displayName, address, snapshot.playersOnline, snapshot.playersMax)
    : renderFallbackLabel(false, displayName, address);
}
