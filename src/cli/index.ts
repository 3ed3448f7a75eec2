#!/usr/bin/env node
import { EXIT, exit, errorMessage } from "../shared/errors.js";
import { createProgram } from "./program.js";

async function main() {
  const program = createProgram();
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  const message = errorMessage(error);
  process.stderr.write(`${message}\n`);
  const code =
    message.includes("invalid") || message.includes("Unknown option") || message.includes("Invalid")
      ? EXIT.INVALID_ARGS
      : EXIT.GENERIC_ERROR;
  exit(code, undefined);
});
