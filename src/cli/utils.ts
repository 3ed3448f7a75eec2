import { readFileSync } from "node:fs";
import { getConfigPath, loadConfig, resolveServerSpec, type BridgeConfig } from "../config.js";
import { DEFAULT_REQUEST_TIMEOUT_MS } from "../shared/constants.js";
import { getEnv } from "../shared/env.js";
import { ConfigError } from "../shared/errors.js";
import { initLogger, log } from "../shared/logging.js";
import type { ServerSpec } from "../types.js";

/** Options shared by every command. */
export interface CommonOptions {
  config?: string;
  server?: string;
  timeout?: string;
  verbose?: boolean;
  logLevel?: string;
  logFormat?: string;
}

export function initCliLogger(opts: CommonOptions): void {
  initLogger(
    opts.verbose ? "debug" : opts.logLevel || getEnv("LOG_LEVEL") || "info",
    opts.logFormat || "text"
  );
}

/** --timeout, then RPCBRIDGE_TIMEOUT_MS, then the default. Non-numeric values fall back. */
export function parseTimeout(value: string | undefined): number {
  const raw = value ?? getEnv("TIMEOUT_MS");
  if (raw === undefined) return DEFAULT_REQUEST_TIMEOUT_MS;
  const ms = Number(raw);
  return Number.isFinite(ms) && ms >= 0 ? ms : DEFAULT_REQUEST_TIMEOUT_MS;
}

export interface ResolvedTarget {
  config: BridgeConfig;
  spec: ServerSpec | null;
}

/**
 * Load config and pick the server. A config that names no usable server is logged
 * and leaves `spec` null so `serve` can still report it through /health.
 */
export async function resolveTarget(opts: CommonOptions): Promise<ResolvedTarget> {
  const config = await loadConfig(getConfigPath(opts.config || getEnv("CONFIG")));
  try {
    return { config, spec: resolveServerSpec(config, opts.server || getEnv("SERVER")) };
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    log.error(err.message);
    return { config, spec: null };
  }
}

export function getPackageJsonVersion(): string {
  for (const rel of ["../../package.json", "../package.json"]) {
    try {
      const raw = readFileSync(new URL(rel, import.meta.url), "utf8");
      const pkg = JSON.parse(raw) as { name?: string; version?: string };
      if (pkg.name === "rpcbridge" && pkg.version) return pkg.version;
    } catch {
      // try the next candidate
    }
  }
  return "0.1.0";
}
