/**
 * Clears a port left occupied by a previous run before the server binds it.
 *
 * Reclamation kills processes and is therefore an explicit, logged step
 * that callers can switch off (see ServerConfig.reclaimPort).
 */
import { execFile } from "node:child_process";
import { createServer } from "node:net";
import { promisify } from "node:util";

import { PortConflictError, PortReclaimFailedError } from "../errors/LifecycleError.js";
import { createSilentLogger, type Logger } from "../logging/logger.js";

const execFileAsync = promisify(execFile);

const DEFAULT_POLL_INTERVAL_MS = 100;
const DEFAULT_RELEASE_TIMEOUT_MS = 5000;

/**
 * Operating system operations used during reclamation.
 */
export interface PortProbe {
  isPortInUse(port: number, host: string): Promise<boolean>;
  /** PIDs of processes listening on the port. */
  findPortOwners(port: number): Promise<number[]>;
  /** Forcibly terminate a process. */
  terminate(pid: number): void;
}

export type PortCheckOutcome = "clear" | "reclaimed";

export interface PortReclaimerOptions {
  readonly probe?: PortProbe;
  readonly logger?: Logger;
  /** Delay between checks while waiting for the port to be released. Default: 100 */
  readonly pollIntervalMs?: number;
  /** How long to wait for the port after killing its owners. Default: 5000 */
  readonly releaseTimeoutMs?: number;
  /** Our own PID, never killed. Default: process.pid */
  readonly selfPid?: number;
}

/**
 * Try to bind the port briefly; EADDRINUSE means someone else holds it.
 */
export function isPortInUse(port: number, host: string): Promise<boolean> {
  return new Promise((resolve, reject) => {
    const probe = createServer();
    probe.unref();
    probe.once("error", (error: NodeJS.ErrnoException) => {
      if (error.code === "EADDRINUSE") {
        resolve(true);
      } else {
        reject(error);
      }
    });
    probe.listen({ port, host, exclusive: true }, () => {
      probe.close(() => resolve(false));
    });
  });
}

/**
 * List listening PIDs with lsof. lsof exits with 1 when nothing matches.
 */
export async function findPortOwners(port: number): Promise<number[]> {
  try {
    const { stdout } = await execFileAsync("lsof", ["-t", "-i", `tcp:${port}`, "-sTCP:LISTEN"]);
    return parsePidList(stdout);
  } catch (error) {
    if (isExecFailure(error) && error.code === 1) {
      return parsePidList(error.stdout ?? "");
    }
    throw error;
  }
}

export function parsePidList(output: string): number[] {
  const pids = output
    .split(/\s+/)
    .filter((token) => /^\d+$/.test(token))
    .map((token) => Number.parseInt(token, 10));
  return [...new Set(pids)];
}

function isExecFailure(
  error: unknown
): error is Error & { code?: number | string; stdout?: string } {
  return error instanceof Error && "code" in error;
}

export const systemPortProbe: PortProbe = {
  isPortInUse,
  findPortOwners,
  terminate: (pid) => {
    process.kill(pid, "SIGKILL");
  },
};

export class PortReclaimer {
  private readonly probe: PortProbe;
  private readonly logger: Logger;
  private readonly pollIntervalMs: number;
  private readonly releaseTimeoutMs: number;
  private readonly selfPid: number;

  constructor(options?: Readonly<PortReclaimerOptions>) {
    this.probe = options?.probe ?? systemPortProbe;
    this.logger = (options?.logger ?? createSilentLogger()).child({ component: "port-reclaimer" });
    this.pollIntervalMs = options?.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.releaseTimeoutMs = options?.releaseTimeoutMs ?? DEFAULT_RELEASE_TIMEOUT_MS;
    this.selfPid = options?.selfPid ?? process.pid;
  }

  /**
   * Make sure the port can be bound, killing stale owners when allowed.
   *
   * @throws {PortConflictError} If the port is taken and reclaiming is disabled
   * @throws {PortReclaimFailedError} If the owners could not be removed
   */
  async ensurePortAvailable(
    port: number,
    host: string,
    reclaim: boolean
  ): Promise<PortCheckOutcome> {
    if (!(await this.probe.isPortInUse(port, host))) {
      return "clear";
    }

    if (!reclaim) {
      throw new PortConflictError(port);
    }

    this.logger.warn("Port already in use, reclaiming it from the previous process", { port });

    let owners: number[];
    try {
      owners = (await this.probe.findPortOwners(port)).filter((pid) => pid !== this.selfPid);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new PortReclaimFailedError(port, `could not look up the owning process: ${reason}`);
    }

    if (owners.length === 0) {
      throw new PortReclaimFailedError(port, "no owning process found");
    }

    for (const pid of owners) {
      this.logger.warn("Killing process holding the port", { port, pid });
      try {
        this.probe.terminate(pid);
      } catch (error) {
        // ESRCH: the process exited on its own in the meantime
        if (isErrno(error) && error.code === "ESRCH") {
          continue;
        }
        const reason = error instanceof Error ? error.message : String(error);
        throw new PortReclaimFailedError(port, `could not kill process ${pid}: ${reason}`);
      }
    }

    await this.waitForRelease(port, host);
    this.logger.info("Port reclaimed", { port, killed: owners });
    return "reclaimed";
  }

  private async waitForRelease(port: number, host: string): Promise<void> {
    const deadline = Date.now() + this.releaseTimeoutMs;

    while (await this.probe.isPortInUse(port, host)) {
      if (Date.now() >= deadline) {
        throw new PortReclaimFailedError(
          port,
          `port still in use ${this.releaseTimeoutMs}ms after killing its owner`
        );
      }
      await this.delay(this.pollIntervalMs);
    }
  }

  private delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

function isErrno(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

export function createPortReclaimer(options?: Readonly<PortReclaimerOptions>): PortReclaimer {
  return new PortReclaimer(options);
}
