import { ERROR_TYPES } from "./errors.js";
import { fromWire, toWire, type ResultValue } from "./result-value.js";

export type Language = "javascript" | "python";

export const LANGUAGES: readonly Language[] = ["javascript", "python"];

export interface ExecutionResult {
  readonly result: ResultValue;
  readonly success: boolean;
  /** Wall-clock seconds. */
  readonly duration: number;
  readonly error?: string;
  readonly errorType?: string;
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode?: number;
}

export interface ExecutionResultInit {
  result?: ResultValue;
  success: boolean;
  duration?: number;
  error?: string | undefined;
  errorType?: string | undefined;
  stdout?: string;
  stderr?: string;
  exitCode?: number | undefined;
}

export function createExecutionResult(init: ExecutionResultInit): ExecutionResult {
  const out: {
    result: ResultValue;
    success: boolean;
    duration: number;
    stdout: string;
    stderr: string;
    error?: string;
    errorType?: string;
    exitCode?: number;
  } = {
    result: init.result ?? null,
    success: init.success,
    duration: Math.max(0, init.duration ?? 0),
    stdout: init.stdout ?? "",
    stderr: init.stderr ?? ""
  };
  if (init.error !== undefined) out.error = init.error;
  if (init.errorType !== undefined) out.errorType = init.errorType;
  if (init.exitCode !== undefined) out.exitCode = init.exitCode;
  return Object.freeze(out);
}

/**
 * Terminal failure: always `success=false`, `result=null` and a non-empty
 * error and errorType, whatever the caller passes in.
 */
export function failureResult(init: {
  error: string;
  errorType: string;
  duration?: number;
  stdout?: string;
  stderr?: string;
  exitCode?: number | undefined;
}): ExecutionResult {
  return createExecutionResult({
    result: null,
    success: false,
    duration: init.duration ?? 0,
    error: init.error || init.errorType,
    errorType: init.errorType,
    stdout: init.stdout ?? "",
    stderr: init.stderr ?? "",
    exitCode: init.exitCode
  });
}

export type OutputStream = "stdout" | "stderr";

export interface ProcessStartedEvent {
  type: "started";
  processId: string;
  command: string;
}

export interface OutputEvent {
  type: "output";
  processId: string;
  stream: OutputStream;
  data: string;
}

export interface ProcessCompletedEvent {
  type: "completed";
  processId: string;
  exitCode: number;
}

export type ProcessEvent = ProcessStartedEvent | OutputEvent | ProcessCompletedEvent;

export interface ProcessInfo {
  processId: string;
  command: string;
  args: string[];
  cwd: string;
  createdAt: string;
  isRunning: boolean;
  exitCode?: number;
}

export interface ProcessOutput {
  stdout: string;
  stderr: string;
  /** Both streams in arrival order. */
  combined: string;
  exitCode?: number;
}

/** JSON form of an ExecutionResult exchanged with remote backends. */
export interface ExecutionResultWire {
  result: unknown;
  success: boolean;
  duration: number;
  error: string | null;
  error_type: string | null;
  stdout: string;
  stderr: string;
  exit_code: number | null;
}

export function resultToWire(result: ExecutionResult): ExecutionResultWire {
  return {
    result: toWire(result.result),
    success: result.success,
    duration: result.duration,
    error: result.error ?? null,
    error_type: result.errorType ?? null,
    stdout: result.stdout,
    stderr: result.stderr,
    exit_code: result.exitCode ?? null
  };
}

export function resultFromWire(wire: ExecutionResultWire): ExecutionResult {
  if (!wire.success) {
    return failureResult({
      error: wire.error ?? "",
      errorType: wire.error_type ?? ERROR_TYPES.execution,
      duration: wire.duration,
      stdout: wire.stdout,
      stderr: wire.stderr,
      exitCode: wire.exit_code ?? undefined
    });
  }
  return createExecutionResult({
    result: fromWire(wire.result),
    success: true,
    duration: wire.duration,
    error: wire.error ?? undefined,
    errorType: wire.error_type ?? undefined,
    stdout: wire.stdout,
    stderr: wire.stderr,
    exitCode: wire.exit_code ?? undefined
  });
}

export interface RpcRequest {
  id?: string;
  version: string;
  method: string;
  params?: Record<string, unknown>;
}

export interface RpcResponse {
  id?: string;
  auditId: string;
  ok: boolean;
  result?: unknown;
  error?: {
    code: string;
    message: string;
  };
}
