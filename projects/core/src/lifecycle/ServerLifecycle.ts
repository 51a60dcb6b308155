/**
 * Startup and shutdown of the local server.
 *
 * State flow:
 *   not-started -> port-check -> (port-clear | port-reclaimed) -> listening
 *   any state -> stopping -> stopped
 *
 * Requests are only served while listening. stop() may be called from any
 * state and any number of times; the shutdown itself runs once.
 */
import { serve } from "@hono/node-server";

import { ServerStateError } from "../errors/LifecycleError.js";
import { createSilentLogger, type Logger } from "../logging/logger.js";
import { PortReclaimer } from "./PortReclaimer.js";

export type ServerState =
  | "not-started"
  | "port-check"
  | "port-clear"
  | "port-reclaimed"
  | "listening"
  | "stopping"
  | "stopped";

export type FetchHandler = (request: Request) => Response | Promise<Response>;

/**
 * A bound server.
 */
export interface ServerHandle {
  readonly port: number;
  /** Stop accepting connections and wait for open ones to finish. */
  close(): Promise<void>;
  /** Best-effort synchronous close, used from the process "exit" event. */
  closeNow(): void;
}

export interface ListenOptions {
  readonly fetch: FetchHandler;
  readonly port: number;
  readonly host: string;
}

export type ListenFunction = (options: Readonly<ListenOptions>) => Promise<ServerHandle>;

export interface ServerStateChangeEvent {
  readonly previousState: ServerState;
  readonly currentState: ServerState;
}

export type ServerStateChangeListener = (event: Readonly<ServerStateChangeEvent>) => void;

export interface ServerLifecycleOptions {
  readonly fetch: FetchHandler;
  readonly port: number;
  readonly host: string;
  /** Kill a stale process holding the port. */
  readonly reclaimPort: boolean;
  readonly reclaimer?: PortReclaimer;
  /** Binds the server. Default: @hono/node-server */
  readonly listen?: ListenFunction;
  readonly logger?: Logger;
}

export type ExitSignal = "SIGINT" | "SIGTERM" | "SIGHUP";

const EXIT_SIGNALS: readonly ExitSignal[] = ["SIGINT", "SIGTERM", "SIGHUP"];

/**
 * The parts of `process` the exit handlers use.
 */
export interface ExitEventSource {
  once(event: "exit", listener: (code: number) => void): unknown;
  once(event: ExitSignal, listener: (signal: NodeJS.Signals) => void): unknown;
  off(event: "exit", listener: (code: number) => void): unknown;
  off(event: ExitSignal, listener: (signal: NodeJS.Signals) => void): unknown;
  exit(code: number): void;
}

/**
 * Bind with @hono/node-server and resolve once listening.
 */
export const nodeListen: ListenFunction = ({ fetch, port, host }) =>
  new Promise((resolve, reject) => {
    const server = serve({ fetch, port, hostname: host }, (info) => {
      server.off("error", reject);
      resolve({
        port: info.port,
        close: () =>
          new Promise<void>((resolveClose, rejectClose) => {
            server.close((error) => (error ? rejectClose(error) : resolveClose()));
            if ("closeIdleConnections" in server) {
              server.closeIdleConnections();
            }
          }),
        closeNow: () => {
          server.close();
          if ("closeAllConnections" in server) {
            server.closeAllConnections();
          }
        },
      });
    });
    server.once("error", reject);
  });

export class ServerLifecycle {
  private readonly fetch: FetchHandler;
  private readonly port: number;
  private readonly host: string;
  private readonly reclaimPort: boolean;
  private readonly reclaimer: PortReclaimer;
  private readonly listen: ListenFunction;
  private readonly logger: Logger;

  private state: ServerState = "not-started";
  private handle: ServerHandle | null = null;
  private stopPromise: Promise<void> | null = null;
  private listeners: Set<ServerStateChangeListener> = new Set();

  constructor(options: Readonly<ServerLifecycleOptions>) {
    this.fetch = options.fetch;
    this.port = options.port;
    this.host = options.host;
    this.reclaimPort = options.reclaimPort;
    this.logger = (options.logger ?? createSilentLogger()).child({ component: "lifecycle" });
    this.reclaimer = options.reclaimer ?? new PortReclaimer({ logger: this.logger });
    this.listen = options.listen ?? nodeListen;
  }

  get currentState(): ServerState {
    return this.state;
  }

  get isListening(): boolean {
    return this.state === "listening";
  }

  /**
   * Check the port, reclaim it if needed, then bind and serve.
   *
   * @throws {ServerStateError} If already started, or stopped during startup
   * @throws {PortConflictError | PortReclaimFailedError} If the port cannot be freed
   */
  async start(): Promise<ServerHandle> {
    if (this.state !== "not-started") {
      throw new ServerStateError("start", this.state);
    }

    this.setState("port-check");
    const outcome = await this.reclaimer.ensurePortAvailable(
      this.port,
      this.host,
      this.reclaimPort
    );
    this.assertNotStopping("start");
    this.setState(outcome === "clear" ? "port-clear" : "port-reclaimed");

    const handle = await this.listen({ fetch: this.fetch, port: this.port, host: this.host });

    if (this.stopPromise) {
      // stop() ran while we were binding; release the port again
      await handle.close();
      throw new ServerStateError("start", this.state);
    }

    this.handle = handle;
    this.setState("listening");
    this.logger.info("Server listening", {
      url: `http://${this.host}:${handle.port}`,
      portReclaimed: outcome === "reclaimed",
    });
    return handle;
  }

  /**
   * Stop the server and release the port. Idempotent.
   */
  stop(): Promise<void> {
    if (this.stopPromise) {
      return this.stopPromise;
    }

    this.setState("stopping");
    this.stopPromise = this.shutdown();
    return this.stopPromise;
  }

  /**
   * Stop the server on SIGINT, SIGTERM or SIGHUP and exit with code 0.
   * On a plain process exit the server is closed synchronously.
   *
   * @returns Function that removes the handlers again
   */
  registerExitHandlers(source: ExitEventSource = process): () => void {
    const onSignal = (signal: ExitSignal) => (): void => {
      this.logger.info("Received signal, shutting down", { signal });
      void this.stop().then(
        () => source.exit(0),
        (error: unknown) => {
          this.logger.error("Shutdown failed", error);
          source.exit(1);
        }
      );
    };

    const signalHandlers = EXIT_SIGNALS.map((signal) => [signal, onSignal(signal)] as const);
    const onExit = (): void => {
      this.handle?.closeNow();
    };

    for (const [signal, handler] of signalHandlers) {
      source.once(signal, handler);
    }
    source.once("exit", onExit);

    return () => {
      for (const [signal, handler] of signalHandlers) {
        source.off(signal, handler);
      }
      source.off("exit", onExit);
    };
  }

  /**
   * Subscribe to state changes.
   *
   * @returns Function to unsubscribe
   */
  onStateChange(listener: ServerStateChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private async shutdown(): Promise<void> {
    const handle = this.handle;
    try {
      if (handle) {
        this.logger.info("Stopping server", { port: handle.port });
        await handle.close();
      }
    } finally {
      this.handle = null;
      this.setState("stopped");
      this.logger.info("Server stopped");
    }
  }

  private assertNotStopping(operation: string): void {
    if (this.stopPromise) {
      throw new ServerStateError(operation, this.state);
    }
  }

  private setState(next: ServerState): void {
    const previous = this.state;
    if (previous === next) {
      return;
    }
    this.state = next;
    for (const listener of this.listeners) {
      listener({ previousState: previous, currentState: next });
    }
  }
}

export function createServerLifecycle(
  options: Readonly<ServerLifecycleOptions>
): ServerLifecycle {
  return new ServerLifecycle(options);
}
