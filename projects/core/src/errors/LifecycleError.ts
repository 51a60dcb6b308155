/**
 * Error codes for server lifecycle errors.
 */
export const LifecycleErrorCode = {
  PORT_CONFLICT: "LIFECYCLE_001",
  PORT_RECLAIM_FAILED: "LIFECYCLE_002",
  INVALID_STATE: "LIFECYCLE_003",
} as const;

export type LifecycleErrorCodeType =
  (typeof LifecycleErrorCode)[keyof typeof LifecycleErrorCode];

/**
 * Base error class for lifecycle errors.
 */
export class LifecycleError extends Error {
  readonly code: LifecycleErrorCodeType;

  constructor(
    code: LifecycleErrorCodeType,
    message: string,
    public readonly context?: Readonly<Record<string, unknown>>
  ) {
    super(message);
    this.code = code;
    this.name = "LifecycleError";
  }
}

/**
 * Error thrown when the port is taken and reclamation is disabled.
 */
export class PortConflictError extends LifecycleError {
  constructor(public readonly port: number) {
    super(
      LifecycleErrorCode.PORT_CONFLICT,
      `Port ${port} is already in use and port reclamation is disabled`,
      { port }
    );
    this.name = "PortConflictError";
  }
}

/**
 * Error thrown when a stale process could not be cleared off the port.
 */
export class PortReclaimFailedError extends LifecycleError {
  constructor(
    public readonly port: number,
    reason: string
  ) {
    super(
      LifecycleErrorCode.PORT_RECLAIM_FAILED,
      `Failed to reclaim port ${port}: ${reason}`,
      { port, reason }
    );
    this.name = "PortReclaimFailedError";
  }
}

/**
 * Error thrown when a lifecycle operation is called in the wrong state.
 */
export class ServerStateError extends LifecycleError {
  constructor(operation: string, state: string) {
    super(
      LifecycleErrorCode.INVALID_STATE,
      `Cannot ${operation} while server is ${state}`,
      { operation, state }
    );
    this.name = "ServerStateError";
  }
}
