import chalk from "chalk";
import { SessionManager } from "../../bridge/session.js";
import { EXIT, exit, errorMessage } from "../../shared/errors.js";
import { getPackageJsonVersion, initCliLogger, parseTimeout, resolveTarget, type CommonOptions } from "../utils.js";

function toolNames(result: unknown): string[] {
  if (typeof result !== "object" || result === null || !("tools" in result)) return [];
  const { tools } = result;
  if (!Array.isArray(tools)) return [];
  return tools.flatMap((tool: unknown) =>
    typeof tool === "object" && tool !== null && "name" in tool && typeof tool.name === "string"
      ? [tool.name]
      : []
  );
}

/** Connect once, list the server's tools, disconnect. */
export async function runCheck(opts: CommonOptions): Promise<void> {
  initCliLogger(opts);
  const { config, spec } = await resolveTarget(opts);
  if (!spec) exit(EXIT.CONFIG_FAILURE, `No usable MCP server in ${config.path}`);

  const session = new SessionManager({
    spec,
    requestTimeoutMs: parseTimeout(opts.timeout),
    clientInfo: { name: "rpcbridge", version: getPackageJsonVersion() },
  });

  process.stderr.write(`Server:  ${spec.name} (${[spec.command, ...spec.args].join(" ")})\n`);
  try {
    await session.connect();
    process.stderr.write(`Session: ${chalk.green("ready")}\n`);
    const names = toolNames(await session.call("tools/list", {}));
    process.stderr.write(`Tools:   ${names.length}\n`);
    for (const name of names) process.stdout.write(`${name}\n`);
  } catch (err) {
    process.stderr.write(`Session: ${chalk.red(session.state)}\n`);
    await session.disconnect();
    exit(EXIT.SERVER_FAILURE, errorMessage(err));
  }
  await session.disconnect();
}
