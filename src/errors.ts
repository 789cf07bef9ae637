/** Classification tokens carried in `ExecutionResult.errorType` for failures the runtime itself detects. */
export const ERROR_TYPES = {
  timeout: "TimeoutError",
  launch: "LaunchError",
  command: "CommandError",
  protocol: "ProtocolError",
  execution: "ExecutionError"
} as const;

export type RuntimeErrorType = (typeof ERROR_TYPES)[keyof typeof ERROR_TYPES];

/** Thrown by registry lookups on an id that was never registered or has been released. */
export class ProcessNotFoundError extends Error {
  constructor(readonly processId: string) {
    super(`process not found: ${processId}`);
    this.name = "ProcessNotFoundError";
  }
}

/** The OS could not spawn the executable at all (ENOENT, EACCES, ...). */
export class ProcessLaunchError extends Error {
  constructor(
    readonly command: string,
    readonly code: string | undefined,
    message: string
  ) {
    super(message);
    this.name = "ProcessLaunchError";
  }
}

export class ExecutionTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`execution timed out after ${formatSeconds(timeoutMs)}`);
    this.name = "ExecutionTimeoutError";
  }
}

/** Sentinel payload present but not a valid result object. Never escapes `decodeOutput`. */
export class ProtocolDecodeError extends Error {
  constructor(rawLine: string, reason: string) {
    super(`${reason}: ${rawLine}`);
    this.name = "ProtocolDecodeError";
  }
}

export function formatSeconds(ms: number): string {
  return `${Number((ms / 1000).toFixed(3))}s`;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** A gateway call failed before producing a result (transport, auth, rate limit, bad envelope). */
export class RemoteRequestError extends Error {
  constructor(
    readonly statusCode: number,
    readonly rpcCode: string,
    message: string
  ) {
    super(message);
    this.name = "RemoteRequestError";
  }
}
