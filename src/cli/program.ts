import { Command } from "commander";
import { DEFAULT_LISTEN } from "../shared/constants.js";
import { runCheck } from "./commands/check.js";
import { runServe, type ServeOptions } from "./commands/serve.js";
import type { CommonOptions } from "./utils.js";
import { getPackageJsonVersion } from "./utils.js";

function withCommonOptions(command: Command): Command {
  return command
    .option("--config <path>", "MCP config file (default ./mcp_config.json)")
    .option("--server <name>", "Server entry to launch (default: first)")
    .option("--timeout <ms>", "Response timeout in ms, 0 to wait forever")
    .option("-v, --verbose", "Verbose logging")
    .option("--log-level <level>", "Log level")
    .option("--log-format <format>", "Log format: text, json or plain", "text");
}

export function createProgram(): Command {
  const program = new Command();

  withCommonOptions(
    program
      .name("rpcbridge")
      .description("HTTP bridge to a stdio JSON-RPC (MCP) tool server")
      .version(getPackageJsonVersion())
      .option("--listen <host:port>", `Listen address (default ${DEFAULT_LISTEN})`)
  ).action((opts: ServeOptions) => runServe(opts));

  withCommonOptions(
    program
      .command("serve")
      .description("Start the HTTP bridge (default command)")
      .option("--listen <host:port>", `Listen address (default ${DEFAULT_LISTEN})`)
  ).action((opts: ServeOptions) => runServe(opts));

  withCommonOptions(
    program.command("check").description("Connect once, list tools and exit")
  ).action((opts: CommonOptions) => runCheck(opts));

  return program;
}
