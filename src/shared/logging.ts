import { Writable } from "node:stream";
import pino from "pino";
import pinoPretty from "pino-pretty";

export type LogLevel = "error" | "warn" | "info" | "debug";
export type LogFormat = "text" | "json" | "plain";

export const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug"];
export const LOG_FORMATS: readonly LogFormat[] = ["text", "json", "plain"];

/** Masks bearer tokens and `*_TOKEN` / `*_API_KEY` assignments that server configs tend to carry. */
export function redactSecrets(input: string): string {
  return input
    .replace(/\bBearer\s+[A-Za-z0-9._~+/-]{8,}=*/g, "Bearer [REDACTED]")
    .replace(
      /\b([A-Z][A-Z0-9_]*(?:_TOKEN|_API_KEY|_SECRET|_PASSWORD))\s*=\s*([^\s]+)/g,
      (_match, name: string) => `${name}=[REDACTED]`
    )
    .replace(
      /\b([A-Z][A-Z0-9_]*(?:_TOKEN|_API_KEY|_SECRET|_PASSWORD))\b"?\s*:\s*"([^"]*)"/g,
      (_match, name: string) => `${name}":"[REDACTED]"`
    );
}

export function isValidLevel(s: string): s is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(s);
}

export function isValidFormat(s: string): s is LogFormat {
  return (LOG_FORMATS as readonly string[]).includes(s);
}

function redactingStderr(): Writable {
  return new Writable({
    write(chunk: Buffer | string, _enc, cb) {
      const s = typeof chunk === "string" ? chunk : chunk.toString("utf8");
      process.stderr.write(redactSecrets(s));
      cb();
    },
  });
}

/** Writable that parses pino JSON lines and writes only the message (no time/level). */
function plainMessageStderr(): Writable {
  let buffer = "";
  return new Writable({
    write(chunk: Buffer | string, _enc, cb) {
      buffer += typeof chunk === "string" ? chunk : chunk.toString("utf8");
      const lines = buffer.split("\n");
      buffer = lines.pop() ?? "";
      for (const line of lines) {
        if (!line.trim()) continue;
        let msg: unknown;
        try {
          msg = (JSON.parse(line) as { msg?: unknown }).msg;
        } catch {
          msg = line;
        }
        if (typeof msg === "string") {
          process.stderr.write(redactSecrets(msg) + "\n");
        }
      }
      cb();
    },
  });
}

let rootLogger: pino.Logger | null = null;

export function initLogger(level = "info", format: string = "text"): pino.Logger {
  const logLevel = isValidLevel(level) ? level : "info";
  const logFormat = isValidFormat(format) ? format : "text";
  if (logFormat === "plain") {
    rootLogger = pino({ level: logLevel, name: "rpcbridge" }, plainMessageStderr());
  } else if (logFormat === "text") {
    const prettyStream = pinoPretty({ colorize: true, destination: redactingStderr() });
    rootLogger = pino({ level: logLevel, name: "rpcbridge" }, prettyStream);
  } else {
    rootLogger = pino({ level: logLevel, name: "rpcbridge" }, redactingStderr());
  }
  return rootLogger;
}

function ensureLogger(): pino.Logger {
  return rootLogger ?? initLogger("info", "plain");
}

export function getLogger(): pino.Logger {
  return ensureLogger();
}

export const log = {
  info: (...args: Parameters<pino.Logger["info"]>) => ensureLogger().info(...args),
  warn: (...args: Parameters<pino.Logger["warn"]>) => ensureLogger().warn(...args),
  error: (...args: Parameters<pino.Logger["error"]>) => ensureLogger().error(...args),
  debug: (...args: Parameters<pino.Logger["debug"]>) => ensureLogger().debug(...args),
};
