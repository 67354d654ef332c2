/**
 * WhosOn — Address Helpers
 *
 * Parsing of `host[:port]` addresses, target key derivation and channel
 * naming.
 */

export type ParsedAddress = {
  host: string;
  port?: number;
};

/**
 * Split `host[:port]`. Bracketed IPv6 (`[::1]:19132`) is supported; a bare
 * IPv6 literal is treated as a host without port.
 */
export function parseAddress(address: string): ParsedAddress | null {
  const trimmed = address.trim();
  if (!trimmed || /\s/.test(trimmed)) return null;

  if (trimmed.startsWith("[")) {
    const close = trimmed.indexOf("]");
    if (close <= 1) return null;
    const host = trimmed.slice(1, close);
    const rest = trimmed.slice(close + 1);
    if (!rest) return { host };
    if (!rest.startsWith(":")) return null;
    const port = parsePort(rest.slice(1));
    return port === null ? null : { host, port };
  }

  const colons = trimmed.split(":").length - 1;
  if (colons === 0) return { host: trimmed };
  if (colons > 1) return { host: trimmed };

  const [host, rawPort] = trimmed.split(":");
  if (!host) return null;
  const port = parsePort(rawPort);
  return port === null ? null : { host, port };
}

function parsePort(raw: string): number | null {
  if (!/^\d{1,5}$/.test(raw)) return null;
  const port = Number(raw);
  return port >= 1 && port <= 65535 ? port : null;
}

/** Append `defaultPort` unless the address already names one. */
export function withDefaultPort(address: string, defaultPort: number): string {
  const trimmed = address.trim();
  const parsed = parseAddress(trimmed);
  if (!parsed || parsed.port !== undefined) return trimmed;
  return parsed.host.includes(":") ? `[${parsed.host}]:${defaultPort}` : `${parsed.host}:${defaultPort}`;
}

/**
 * Storage key for an address: lower-cased, with `.` and `:` turned into `_`.
 * `play.example.com:25565` → `play_example_com_25565`.
 */
export function createTargetKey(address: string): string {
  return address.trim().toLowerCase().replace(/[.:]/g, "_");
}

/** Channel-safe name for the detail resource. */
export function detailResourceName(displayName: string | undefined, address: string): string {
  const name = displayName || address;
  return name.toLowerCase().replace(/ /g, "-").replace(/\./g, "-").replace(/:/g, "");
}
