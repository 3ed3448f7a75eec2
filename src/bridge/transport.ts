import { spawn, type ChildProcess, type ChildProcessWithoutNullStreams } from "node:child_process";
import { createInterface, type Interface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import { DEFAULT_TERMINATE_GRACE_MS } from "../shared/constants.js";
import {
  EndOfStreamError,
  ReadFailedError,
  SpawnFailedError,
  TimeoutError,
  WriteFailedError,
  errorMessage,
} from "../shared/errors.js";
import { log } from "../shared/logging.js";
import type { ServerSpec } from "../types.js";

export interface TransportStreams {
  stdin: Writable;
  stdout: Readable;
  stderr?: Readable | null;
}

export interface TerminateOptions {
  /** How long to wait after SIGTERM before sending SIGKILL. */
  graceMs?: number;
}

export interface ReadLineOptions {
  /** Aborting rejects the pending read with the signal's reason. */
  signal?: AbortSignal;
  /** 0 or undefined waits indefinitely. */
  timeoutMs?: number;
}

interface Waiter {
  resolve: (line: string) => void;
  reject: (err: Error) => void;
}

export function buildChildEnv(spec: ServerSpec): NodeJS.ProcessEnv {
  return spec.env ? { ...process.env, ...spec.env } : process.env;
}

function spawnServer(spec: ServerSpec): ChildProcessWithoutNullStreams {
  try {
    return spawn(spec.command, [...spec.args], {
      cwd: spec.cwd ?? process.cwd(),
      env: buildChildEnv(spec),
      stdio: ["pipe", "pipe", "pipe"],
    });
  } catch (err) {
    throw new SpawnFailedError(`Failed to start ${spec.command}: ${errorMessage(err)}`, { cause: err });
  }
}

function waitForSpawn(child: ChildProcess, command: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const onSpawn = () => {
      child.off("error", onError);
      resolve();
    };
    const onError = (err: Error) => {
      child.off("spawn", onSpawn);
      reject(new SpawnFailedError(`Failed to start ${command}: ${err.message}`, { cause: err }));
    };
    child.once("spawn", onSpawn);
    child.once("error", onError);
  });
}

/**
 * Owns one child process and its pipes. Stdout is split into lines and queued;
 * `readLine` hands them out one at a time in arrival order.
 */
export class ProcessSupervisor {
  private readonly lines: string[] = [];
  private readonly rl: Interface;
  private readonly errRl: Interface | null = null;
  private waiter: Waiter | null = null;
  private failure: Error | null = null;
  private hasExited = false;
  private readonly exitPromise: Promise<void>;
  private terminating: Promise<void> | null = null;

  private constructor(
    private readonly streams: TransportStreams,
    private readonly child: ChildProcess | null,
    readonly label: string
  ) {
    this.rl = createInterface({ input: streams.stdout, crlfDelay: Infinity });
    this.rl.on("line", (line) => this.onLine(line));
    this.rl.on("close", () => this.fail(new EndOfStreamError()));
    const onReadError = (err: Error) =>
      this.fail(new ReadFailedError(`Failed to read from server: ${err.message}`, { cause: err }));
    this.rl.on("error", onReadError);
    streams.stdout.on("error", onReadError);
    streams.stdin.on("error", (err: Error) => {
      log.debug({ server: label, err: err.message }, "Server stdin error");
    });

    if (streams.stderr) {
      this.errRl = createInterface({ input: streams.stderr, crlfDelay: Infinity });
      this.errRl.on("line", (line) => {
        if (line.trim()) log.warn({ server: label }, line);
      });
      this.errRl.on("error", (err: Error) => {
        log.debug({ server: label, err: err.message }, "Server stderr error");
      });
    }

    if (child) {
      this.exitPromise = new Promise((resolve) => {
        child.once("exit", (code, signal) => {
          this.hasExited = true;
          log.debug({ server: label, code, signal }, "Server process exited");
          resolve();
        });
      });
      child.on("error", (err: Error) => {
        log.error({ server: label, err: err.message }, "Server process error");
      });
    } else {
      this.exitPromise = Promise.resolve();
    }
  }

  /** Launch the server described by `spec`. Throws SpawnFailedError. */
  static async spawn(spec: ServerSpec): Promise<ProcessSupervisor> {
    log.debug(`Spawning server: ${spec.command} ${spec.args.join(" ")}`);
    const child = spawnServer(spec);
    await waitForSpawn(child, spec.command);
    return new ProcessSupervisor(
      { stdin: child.stdin, stdout: child.stdout, stderr: child.stderr },
      child,
      spec.name
    );
  }

  /** Wrap existing streams instead of spawning a process. */
  static fromStreams(streams: TransportStreams, label = "streams"): ProcessSupervisor {
    return new ProcessSupervisor(streams, null, label);
  }

  get pid(): number | undefined {
    return this.child?.pid;
  }

  get exited(): boolean {
    return this.hasExited || this.terminating !== null;
  }

  private onLine(line: string): void {
    if (!line.trim()) return;
    if (this.waiter) {
      this.waiter.resolve(line);
      return;
    }
    this.lines.push(line);
  }

  private fail(err: Error): void {
    if (this.failure) return;
    this.failure = err;
    this.waiter?.reject(err);
  }

  /** Write `text` plus a newline and wait until it is flushed. Throws WriteFailedError. */
  async writeLine(text: string): Promise<void> {
    const { stdin } = this.streams;
    if (this.exited || !stdin.writable) {
      throw new WriteFailedError("Server input stream is closed");
    }
    await new Promise<void>((resolve, reject) => {
      stdin.write(text + "\n", (err) => {
        if (err) {
          reject(new WriteFailedError(`Failed to write to server: ${err.message}`, { cause: err }));
          return;
        }
        resolve();
      });
    });
  }

  /**
   * Next line from the server's stdout. Queued lines are returned before a stream
   * failure is reported. Throws EndOfStreamError, ReadFailedError or TimeoutError.
   */
  readLine(options: ReadLineOptions = {}): Promise<string> {
    const queued = this.lines.shift();
    if (queued !== undefined) return Promise.resolve(queued);
    if (this.failure) return Promise.reject(this.failure);
    if (this.waiter) {
      return Promise.reject(new ReadFailedError("Another read is already waiting"));
    }

    const { signal, timeoutMs } = options;
    if (signal?.aborted) {
      return Promise.reject(abortReason(signal));
    }

    return new Promise<string>((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;
      const onAbort = () => {
        cleanup();
        reject(abortReason(signal));
      };
      const cleanup = () => {
        this.waiter = null;
        if (timer) clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
      };
      if (timeoutMs && timeoutMs > 0) {
        timer = setTimeout(() => {
          cleanup();
          reject(new TimeoutError(timeoutMs));
        }, timeoutMs);
      }
      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiter = {
        resolve: (line) => {
          cleanup();
          resolve(line);
        },
        reject: (err) => {
          cleanup();
          reject(err);
        },
      };
    });
  }

  /** SIGTERM, then SIGKILL after `graceMs`. Safe to call more than once. */
  terminate({ graceMs = DEFAULT_TERMINATE_GRACE_MS }: TerminateOptions = {}): Promise<void> {
    if (!this.terminating) {
      this.terminating = this.shutdown(graceMs);
    }
    return this.terminating;
  }

  private async shutdown(graceMs: number): Promise<void> {
    this.fail(new EndOfStreamError("Server process terminated"));
    this.rl.close();
    this.errRl?.close();
    if (!this.streams.stdin.writableEnded) this.streams.stdin.end();

    const child = this.child;
    if (!child || this.hasExited) return;
    child.kill("SIGTERM");
    const exitedInTime = await waitAtMost(this.exitPromise, graceMs);
    if (!exitedInTime && !this.hasExited) {
      log.warn({ server: this.label, graceMs }, "Server did not exit after SIGTERM, sending SIGKILL");
      child.kill("SIGKILL");
      await this.exitPromise;
    }
  }
}

function abortReason(signal: AbortSignal | undefined): Error {
  const reason: unknown = signal?.reason;
  return reason instanceof Error ? reason : new ReadFailedError("Read aborted");
}

function waitAtMost(promise: Promise<void>, ms: number): Promise<boolean> {
  return new Promise((resolve) => {
    const timer = setTimeout(() => resolve(false), ms);
    void promise.then(() => {
      clearTimeout(timer);
      resolve(true);
    });
  });
}
