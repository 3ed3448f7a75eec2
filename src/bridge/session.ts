import { EventEmitter } from "node:events";
import { encode, decode, notification, request } from "../protocols/jsonrpc/codec.js";
import { replyToServerRequest, toRemoteError } from "../protocols/jsonrpc/response.js";
import type { JsonRpcNotification, JsonRpcRequest } from "../protocols/jsonrpc/types.js";
import { isNotification, isRequest, isResponse } from "../protocols/jsonrpc/validate.js";
import {
  CLIENT_NAME,
  CLIENT_VERSION,
  DEFAULT_HANDSHAKE_TIMEOUT_MS,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_TERMINATE_GRACE_MS,
  PROTOCOL_VERSION,
} from "../shared/constants.js";
import {
  HandshakeFailedError,
  MalformedMessageError,
  NotConnectedError,
  RemoteError,
  SessionBusyError,
  SessionClosedError,
  TimeoutError,
  TransportFailedError,
  errorMessage,
} from "../shared/errors.js";
import { getLogger } from "../shared/logging.js";
import type { BusyPolicy, PendingCall, ServerSpec, SessionState } from "../types.js";
import { ProcessSupervisor } from "./transport.js";

export interface ClientInfo {
  name: string;
  version: string;
}

export interface SessionManagerOptions {
  spec: ServerSpec;
  clientInfo?: ClientInfo;
  protocolVersion?: string;
  /** Bound on each response wait; 0 waits forever. */
  requestTimeoutMs?: number;
  handshakeTimeoutMs?: number;
  terminateGraceMs?: number;
  /**
   * `queue` (default): a call issued while another is in flight waits its turn.
   * `reject`: it fails fast with SessionBusyError.
   */
  busy?: BusyPolicy;
  /** Notifications the server sends while a call is waiting. */
  onNotification?: (method: string, params: unknown) => void;
  /** Replaces process spawning; used by tests to talk to in-process streams. */
  openTransport?: (spec: ServerSpec) => Promise<ProcessSupervisor>;
}

/**
 * One session with one stdio JSON-RPC server.
 *
 * disconnected -> connecting -> ready, back to disconnected on any transport failure,
 * and closed (terminal) after `disconnect()`. Exactly one request is on the wire at a
 * time, so a response must carry the id of the pending request; anything else ends
 * the session.
 *
 * Emits `state` with `(next, previous)` on every transition.
 */
export class SessionManager extends EventEmitter {
  private readonly logger = getLogger();
  private readonly spec: ServerSpec;
  private readonly clientInfo: ClientInfo;
  private readonly protocolVersion: string;
  private readonly requestTimeoutMs: number;
  private readonly handshakeTimeoutMs: number;
  private readonly terminateGraceMs: number;
  private readonly busy: BusyPolicy;
  private readonly onNotification?: (method: string, params: unknown) => void;
  private readonly openTransport: (spec: ServerSpec) => Promise<ProcessSupervisor>;

  private current: SessionState = "disconnected";
  private transport: ProcessSupervisor | null = null;
  private nextId = 1;
  private pending: PendingCall | null = null;
  private inflight: AbortController | null = null;
  private connecting: Promise<void> | null = null;
  private tail: Promise<void> = Promise.resolve();
  private activeCalls = 0;
  private stopping: Promise<void> | null = null;
  private initializeResult: unknown = undefined;

  constructor(opts: SessionManagerOptions) {
    super();
    this.spec = opts.spec;
    this.clientInfo = opts.clientInfo ?? { name: CLIENT_NAME, version: CLIENT_VERSION };
    this.protocolVersion = opts.protocolVersion ?? PROTOCOL_VERSION;
    this.requestTimeoutMs = opts.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.handshakeTimeoutMs = opts.handshakeTimeoutMs ?? DEFAULT_HANDSHAKE_TIMEOUT_MS;
    this.terminateGraceMs = opts.terminateGraceMs ?? DEFAULT_TERMINATE_GRACE_MS;
    this.busy = opts.busy ?? "queue";
    this.onNotification = opts.onNotification;
    this.openTransport = opts.openTransport ?? ((spec) => ProcessSupervisor.spawn(spec));
  }

  get state(): SessionState {
    return this.current;
  }

  get connected(): boolean {
    return this.current === "ready";
  }

  get serverName(): string {
    return this.spec.name;
  }

  /** The `initialize` result of the current session, if any. */
  get serverInfo(): unknown {
    return this.initializeResult;
  }

  get pendingCall(): PendingCall | null {
    return this.pending;
  }

  private isClosed(): boolean {
    return this.current === "closed";
  }

  private setState(next: SessionState): void {
    const previous = this.current;
    if (previous === next) return;
    this.current = next;
    this.logger.info({ server: this.spec.name, from: previous, to: next }, `Session ${next}`);
    this.emit("state", next, previous);
  }

  /**
   * Spawn the server and run the `initialize` handshake. A no-op when already ready;
   * concurrent callers share one attempt. Throws HandshakeFailedError, leaving the
   * session disconnected so the caller may retry.
   */
  connect(): Promise<void> {
    if (this.isClosed()) return Promise.reject(new SessionClosedError());
    if (this.current === "ready") return Promise.resolve();
    if (!this.connecting) {
      this.connecting = this.handshake().finally(() => {
        this.connecting = null;
      });
    }
    return this.connecting;
  }

  private async handshake(): Promise<void> {
    this.setState("connecting");
    const controller = new AbortController();
    this.inflight = controller;
    try {
      // The previous child must be gone before a new one starts.
      if (this.stopping) await this.stopping;
      if (this.isClosed()) throw new SessionClosedError("Session closed during connect");
      const transport = await this.openTransport(this.spec);
      if (this.isClosed()) {
        await transport.terminate({ graceMs: this.terminateGraceMs });
        throw new SessionClosedError("Session closed during connect");
      }
      this.transport = transport;
      this.initializeResult = await this.exchange(
        transport,
        "initialize",
        {
          protocolVersion: this.protocolVersion,
          capabilities: { roots: { listChanged: true }, sampling: {} },
          clientInfo: this.clientInfo,
        },
        this.handshakeTimeoutMs,
        controller.signal
      );
      await transport.writeLine(encode(notification("notifications/initialized")));
      if (this.isClosed()) throw new SessionClosedError("Session closed during connect");
      this.setState("ready");
      this.logger.info({ server: this.spec.name, pid: transport.pid }, "Connected to MCP server");
    } catch (err) {
      if (!this.isClosed()) this.setState("disconnected");
      await this.teardown();
      this.logger.error({ server: this.spec.name, err: errorMessage(err) }, "Handshake failed");
      throw new HandshakeFailedError(
        `Failed to connect to ${this.spec.name}: ${errorMessage(err)}`,
        { cause: err }
      );
    } finally {
      this.inflight = null;
    }
  }

  /**
   * Send one request and wait for its response. Throws RemoteError when the server
   * answers with an error (the session stays ready) and TransportFailedError when the
   * exchange breaks (the session drops to disconnected and must be reconnected).
   */
  call(method: string, params: unknown = {}): Promise<unknown> {
    if (this.busy === "reject" && this.activeCalls > 0) {
      return Promise.reject(new SessionBusyError());
    }
    this.activeCalls++;
    const run = this.tail.then(() => this.callNow(method, params));
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run.finally(() => {
      this.activeCalls--;
    });
  }

  private async callNow(method: string, params: unknown): Promise<unknown> {
    if (this.isClosed()) throw new SessionClosedError();
    const transport = this.transport;
    if (this.current !== "ready" || !transport) throw new NotConnectedError();

    const controller = new AbortController();
    this.inflight = controller;
    try {
      return await this.exchange(transport, method, params, this.requestTimeoutMs, controller.signal);
    } catch (err) {
      if (err instanceof RemoteError) throw err;
      if (this.isClosed()) {
        throw err instanceof TransportFailedError
          ? err
          : new TransportFailedError(`Request ${method} aborted: ${errorMessage(err)}`, { cause: err });
      }
      this.logger.error({ server: this.spec.name, method, err: errorMessage(err) }, "Transport failed");
      this.setState("disconnected");
      await this.teardown();
      throw new TransportFailedError(`Request ${method} failed: ${errorMessage(err)}`, { cause: err });
    } finally {
      this.inflight = null;
    }
  }

  private async exchange(
    transport: ProcessSupervisor,
    method: string,
    params: unknown,
    timeoutMs: number,
    signal: AbortSignal
  ): Promise<unknown> {
    const id = this.nextId++;
    this.pending = { id, method };
    const deadline = timeoutMs > 0 ? Date.now() + timeoutMs : undefined;
    try {
      const line = encode(request(id, method, params));
      this.logger.debug({ server: this.spec.name, line }, "-> server");
      await transport.writeLine(line);

      for (;;) {
        const remaining = deadline === undefined ? undefined : deadline - Date.now();
        if (remaining !== undefined && remaining <= 0) throw new TimeoutError(timeoutMs);
        const incoming = await transport.readLine({ signal, timeoutMs: remaining });
        this.logger.debug({ server: this.spec.name, line: incoming }, "<- server");
        const msg = decode(incoming);

        if (isResponse(msg)) {
          if (msg.id !== id) {
            throw new MalformedMessageError(
              `Response id ${String(msg.id)} does not match pending request id ${id}`,
              incoming
            );
          }
          if (msg.error) {
            throw toRemoteError(msg.error);
          }
          return msg.result;
        }
        if (isNotification(msg)) {
          this.handleNotification(msg);
        } else if (isRequest(msg)) {
          await this.answerServerRequest(transport, msg);
        }
      }
    } finally {
      this.pending = null;
    }
  }

  private handleNotification(msg: JsonRpcNotification): void {
    this.logger.debug({ server: this.spec.name, method: msg.method }, "Server notification");
    this.onNotification?.(msg.method, msg.params);
  }

  private async answerServerRequest(transport: ProcessSupervisor, msg: JsonRpcRequest): Promise<void> {
    this.logger.debug({ server: this.spec.name, method: msg.method }, "Server request");
    await transport.writeLine(encode(replyToServerRequest(msg)));
  }

  /**
   * Terminate the server and close the session for good. A call waiting for a response
   * is released with TransportFailedError.
   */
  async disconnect(): Promise<void> {
    if (!this.isClosed()) {
      this.setState("closed");
      this.inflight?.abort(new TransportFailedError("Session disconnected"));
    }
    await this.teardown();
  }

  /**
   * Detach the transport and terminate it. Resolves once every child this session
   * started has exited, including one a failed call is still stopping.
   */
  private teardown(): Promise<void> {
    const transport = this.transport;
    this.transport = null;
    this.initializeResult = undefined;
    if (transport) {
      const stopping = transport.terminate({ graceMs: this.terminateGraceMs }).finally(() => {
        if (this.stopping === stopping) this.stopping = null;
      });
      this.stopping = stopping;
    }
    return this.stopping ?? Promise.resolve();
  }
}
