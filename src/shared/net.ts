import { DEFAULT_HOST, DEFAULT_PORT } from "./constants.js";

export interface ListenAddress {
  host: string;
  port: number;
}

function toPort(raw: string): number | null {
  if (!/^\d+$/.test(raw.trim())) return null;
  const port = Number(raw);
  return port > 0 && port <= 65535 ? port : null;
}

/**
 * Parse a --listen value ("127.0.0.1:8000", "8000", ":8000" or "[::1]:8000").
 * A missing host falls back to 127.0.0.1 and a missing or out-of-range port to 8000.
 */
export function parseListen(listen: string): ListenAddress {
  const value = listen.trim();
  if (!value) return { host: DEFAULT_HOST, port: DEFAULT_PORT };

  const bracketed = /^\[([^\]]+)\](?::(.*))?$/.exec(value);
  if (bracketed) {
    return { host: bracketed[1] ?? DEFAULT_HOST, port: toPort(bracketed[2] ?? "") ?? DEFAULT_PORT };
  }

  const colon = value.lastIndexOf(":");
  if (colon === -1) {
    return { host: DEFAULT_HOST, port: toPort(value) ?? DEFAULT_PORT };
  }
  const host = value.slice(0, colon).trim() || DEFAULT_HOST;
  return { host, port: toPort(value.slice(colon + 1)) ?? DEFAULT_PORT };
}

export function bridgeUrl({ host, port }: ListenAddress): string {
  return host.includes(":") ? `http://[${host}]:${port}` : `http://${host}:${port}`;
}
