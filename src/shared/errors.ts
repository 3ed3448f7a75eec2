import { getLogger } from "./logging.js";

/** CLI exit codes. */
export const EXIT = {
  SUCCESS: 0,
  GENERIC_ERROR: 1,
  INVALID_ARGS: 2,
  SERVER_FAILURE: 3,
  CONFIG_FAILURE: 4,
} as const;

export function exit(code: number, message?: string): never {
  if (message) {
    if (code === EXIT.SUCCESS) getLogger().info(message);
    else getLogger().error(message);
  }
  process.exit(code);
}

export type BridgeErrorCode =
  | "SPAWN_FAILED"
  | "WRITE_FAILED"
  | "READ_FAILED"
  | "END_OF_STREAM"
  | "MALFORMED_MESSAGE"
  | "HANDSHAKE_FAILED"
  | "TRANSPORT_FAILED"
  | "REMOTE_ERROR"
  | "SESSION_BUSY"
  | "TIMEOUT"
  | "NOT_CONNECTED"
  | "SESSION_CLOSED"
  | "CONFIG_ERROR";

/** Base for every error the bridge raises on purpose. */
export abstract class BridgeError extends Error {
  abstract readonly code: BridgeErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The child process could not be started. */
export class SpawnFailedError extends BridgeError {
  readonly code = "SPAWN_FAILED";
}

export class WriteFailedError extends BridgeError {
  readonly code = "WRITE_FAILED";
}

export class ReadFailedError extends BridgeError {
  readonly code = "READ_FAILED";
}

/** The child's stdout closed, usually because it exited. */
export class EndOfStreamError extends BridgeError {
  readonly code = "END_OF_STREAM";

  constructor(message = "Server output stream closed", options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class MalformedMessageError extends BridgeError {
  readonly code = "MALFORMED_MESSAGE";

  constructor(
    message: string,
    readonly line?: string,
  ) {
    super(message);
  }
}

export class HandshakeFailedError extends BridgeError {
  readonly code = "HANDSHAKE_FAILED";
}

/** The session lost its transport while a call was in flight. */
export class TransportFailedError extends BridgeError {
  readonly code = "TRANSPORT_FAILED";
}

/** Application-level error returned by the child server. Does not break the session. */
export class RemoteError extends BridgeError {
  readonly code = "REMOTE_ERROR";

  constructor(
    readonly rpcCode: number,
    message: string,
    readonly data?: unknown,
  ) {
    super(message);
  }
}

export class SessionBusyError extends BridgeError {
  readonly code = "SESSION_BUSY";

  constructor(message = "Another request is already in flight") {
    super(message);
  }
}

export class TimeoutError extends BridgeError {
  readonly code = "TIMEOUT";

  constructor(readonly timeoutMs: number, what = "response") {
    super(`Timed out after ${timeoutMs}ms waiting for ${what}`);
  }
}

export class NotConnectedError extends BridgeError {
  readonly code = "NOT_CONNECTED";

  constructor(message = "MCP server not connected") {
    super(message);
  }
}

export class SessionClosedError extends BridgeError {
  readonly code = "SESSION_CLOSED";

  constructor(message = "Session is closed") {
    super(message);
  }
}

export class ConfigError extends BridgeError {
  readonly code = "CONFIG_ERROR";
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
