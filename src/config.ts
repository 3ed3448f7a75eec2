import { readFile } from "node:fs/promises";
import path from "node:path";
import { type } from "arktype";
import { DEFAULT_CONFIG_FILE } from "./shared/constants.js";
import { ConfigError, errorMessage } from "./shared/errors.js";
import { log } from "./shared/logging.js";
import type { ServerSpec } from "./types.js";

export const ServerDefinitionSchema = type({
  command: "string",
  "args?": "string[]",
  "env?": "Record<string, string>",
  "cwd?": "string",
});
export type ServerDefinition = typeof ServerDefinitionSchema.infer;

export const BridgeConfigSchema = type({
  "mcpServers?": "Record<string, unknown>",
});

export interface BridgeConfig {
  /** Absolute path the config was read from. */
  path: string;
  /** False when the file is missing or unreadable. */
  loaded: boolean;
  /** Server definitions in file order. */
  servers: Array<{ name: string; definition: ServerDefinition }>;
}

export function getConfigPath(custom?: string): string {
  return path.resolve(custom ?? DEFAULT_CONFIG_FILE);
}

/** Validate raw config data. Throws ConfigError naming the first bad entry. */
export function parseConfig(data: unknown, configPath: string): BridgeConfig {
  const root = BridgeConfigSchema(data);
  if (root instanceof type.errors) {
    throw new ConfigError(`Invalid config ${configPath}: ${root.summary}`);
  }
  const servers: BridgeConfig["servers"] = [];
  for (const [name, raw] of Object.entries(root.mcpServers ?? {})) {
    const definition = ServerDefinitionSchema(raw);
    if (definition instanceof type.errors) {
      throw new ConfigError(`Invalid server "${name}" in ${configPath}: ${definition.summary}`);
    }
    servers.push({ name, definition });
  }
  return { path: configPath, loaded: true, servers };
}

/**
 * Read the `mcpServers` config. A missing or unreadable file is logged and yields
 * an empty, unloaded config so the bridge can still start and report it via /health.
 */
export async function loadConfig(configPath: string = getConfigPath()): Promise<BridgeConfig> {
  let raw: string;
  try {
    raw = await readFile(configPath, "utf8");
  } catch (err) {
    log.error({ path: configPath, err: errorMessage(err) }, "Failed to load MCP config");
    return { path: configPath, loaded: false, servers: [] };
  }
  let data: unknown;
  try {
    data = JSON.parse(raw) as unknown;
  } catch (err) {
    log.error({ path: configPath, err: errorMessage(err) }, "Failed to load MCP config");
    return { path: configPath, loaded: false, servers: [] };
  }
  return parseConfig(data, configPath);
}

/**
 * Pick the server to launch: `name` when given, otherwise the first entry.
 *
 * "First" is JavaScript property order, which is file order except that names that
 * look like array indices ("0", "10") sort ahead of all others, in numeric order.
 * Pass `name` to choose among such servers.
 */
export function resolveServerSpec(config: BridgeConfig, name?: string): ServerSpec {
  if (config.servers.length === 0) {
    throw new ConfigError(`No MCP server configuration found in ${config.path}`);
  }
  const entry = name ? config.servers.find((s) => s.name === name) : config.servers[0];
  if (!entry) {
    const known = config.servers.map((s) => s.name).join(", ");
    throw new ConfigError(`Unknown server "${name ?? ""}" (configured: ${known})`);
  }
  const { command, args = [], env, cwd } = entry.definition;
  if (!command.trim()) {
    throw new ConfigError(`No command specified for server "${entry.name}"`);
  }
  return Object.freeze({
    name: entry.name,
    command,
    args: Object.freeze([...args]),
    ...(env ? { env: Object.freeze({ ...env }) } : {}),
    ...(cwd ? { cwd: path.resolve(path.dirname(config.path), cwd) } : {}),
  });
}
