import chalk from "chalk";
import { startBridgeServer } from "../../bridge/server.js";
import { DEFAULT_LISTEN } from "../../shared/constants.js";
import { getEnv } from "../../shared/env.js";
import { bridgeUrl } from "../../shared/net.js";
import { EXIT } from "../../shared/errors.js";
import { getPackageJsonVersion, initCliLogger, parseTimeout, resolveTarget, type CommonOptions } from "../utils.js";

export interface ServeOptions extends CommonOptions {
  listen?: string;
}

export async function runServe(opts: ServeOptions): Promise<void> {
  initCliLogger(opts);

  const listen = opts.listen || getEnv("LISTEN") || DEFAULT_LISTEN;
  const { config, spec } = await resolveTarget(opts);

  const handle = await startBridgeServer(listen, {
    spec,
    configLoaded: config.loaded,
    session: {
      requestTimeoutMs: parseTimeout(opts.timeout),
      clientInfo: { name: "rpcbridge", version: getPackageJsonVersion() },
    },
  });

  const url = bridgeUrl(handle);
  const server = spec ? `${spec.name} (${[spec.command, ...spec.args].join(" ")})` : "not configured";
  const state = handle.session?.state ?? "disconnected";

  process.stderr.write("\n");
  process.stderr.write(chalk.bold("rpcbridge") + "\n");
  process.stderr.write("───────────────────────────────────────────────────────────────\n");
  process.stderr.write(`Version:     v${getPackageJsonVersion()}\n`);
  process.stderr.write(`Bridge URL:  ${url}\n`);
  process.stderr.write(`Config:      ${config.path}${config.loaded ? "" : chalk.red(" (not loaded)")}\n`);
  process.stderr.write(`Server:      ${server}\n`);
  process.stderr.write(`Session:     ${state === "ready" ? chalk.green(state) : chalk.yellow(state)}\n`);
  process.stderr.write("───────────────────────────────────────────────────────────────\n\n");

  await new Promise<void>((_, reject) => {
    const closeAll = () =>
      handle
        .close()
        .then(() => process.exit(EXIT.SUCCESS))
        .catch(reject);
    process.on("SIGINT", closeAll);
    process.on("SIGTERM", closeAll);
  });
}
