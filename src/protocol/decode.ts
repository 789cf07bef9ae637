import { ERROR_TYPES, ProtocolDecodeError } from "../errors.js";
import { describeResult, fromWire, type ResultValue } from "../result-value.js";
import { createExecutionResult, failureResult, type ExecutionResult } from "../types.js";
import { parseSentinelPayload, SENTINEL } from "./sentinel.js";

export interface SentinelMatch {
  /** Everything before the marker on its line; user output that lacked a trailing newline. */
  prefix: string;
  /** Text after the marker. */
  raw: string;
  /** stdout with the sentinel (but not `prefix`) removed. */
  strippedStdout: string;
}

/** Locate the last sentinel line in stdout, tolerating user output around it. */
export function findSentinel(stdout: string): SentinelMatch | null {
  const markerAt = stdout.lastIndexOf(SENTINEL);
  if (markerAt < 0) {
    return null;
  }
  const newlineAt = stdout.indexOf("\n", markerAt);
  const lineEnd = newlineAt < 0 ? stdout.length : newlineAt;
  const lineStart = stdout.lastIndexOf("\n", markerAt - 1) + 1;
  const prefix = stdout.slice(lineStart, markerAt);
  const raw = stdout.slice(markerAt + SENTINEL.length, lineEnd).replace(/\r$/, "");
  const after = newlineAt < 0 ? "" : stdout.slice(newlineAt + 1);
  const strippedStdout = stdout.slice(0, markerAt) + (prefix.length > 0 && after.length > 0 ? "\n" : "") + after;
  return { prefix, raw, strippedStdout };
}

const TRACE_LINE = /^([A-Za-z_][\w.]*(?:Error|Exception|Interrupt|Exit))(?::|$)/;

/**
 * Classification name from a standard exception trace in stderr (Python
 * tracebacks, uncaught Node.js errors). The last matching line wins, since
 * the final exception is the one that terminated the process.
 */
export function classifyStderr(stderr: string): { errorType: string; message: string } | null {
  let found: { errorType: string; message: string } | null = null;
  for (const line of stderr.split(/\r?\n/)) {
    const match = TRACE_LINE.exec(line.trim());
    if (!match?.[1]) continue;
    const name = match[1];
    const errorType = name.slice(name.lastIndexOf(".") + 1);
    const message = line.trim().slice(name.length).replace(/^:\s*/, "");
    found = { errorType, message };
  }
  return found;
}

function lastNonEmptyLine(text: string): string | undefined {
  const lines = text.split(/\r?\n/).map((line) => line.trim()).filter(Boolean);
  return lines[lines.length - 1];
}

/**
 * Turn captured output into an ExecutionResult. Total: malformed payloads and
 * missing sentinels degrade to failure results instead of throwing.
 */
export function decodeOutput(
  stdout: string,
  stderr: string,
  exitCode: number | undefined,
  duration = 0
): ExecutionResult {
  const match = findSentinel(stdout);
  if (match) {
    const parsed = parseSentinelPayload(match.raw);
    if (!parsed.ok) {
      console.warn("[runbox]", new ProtocolDecodeError(match.raw, parsed.reason).message);
      return failureResult({
        error: `${SENTINEL}${match.raw}`,
        errorType: ERROR_TYPES.protocol,
        duration,
        stdout,
        stderr,
        exitCode
      });
    }
    const { payload } = parsed;
    if (!payload.success) {
      return failureResult({
        error: payload.error ?? "",
        errorType: payload.error_type ?? ERROR_TYPES.execution,
        duration,
        stdout: match.strippedStdout,
        stderr,
        exitCode
      });
    }
    return createExecutionResult({
      result: fromWire(payload.result),
      success: true,
      duration,
      stdout: match.strippedStdout,
      stderr,
      exitCode
    });
  }

  if (exitCode === 0) {
    return createExecutionResult({ result: null, success: true, duration, stdout, stderr, exitCode });
  }
  const classified = classifyStderr(stderr);
  const fallbackMessage =
    exitCode === undefined ? "process did not report an exit code" : `process exited with code ${exitCode}`;
  return failureResult({
    error: classified?.message || lastNonEmptyLine(stderr) || fallbackMessage,
    errorType: classified?.errorType ?? ERROR_TYPES.command,
    duration,
    stdout,
    stderr,
    exitCode
  });
}

/** Synthetic trailing line of a code stream summarizing its decoded value. */
export function formatResultLine(value: ResultValue): string {
  return `Result: ${describeResult(value)}`;
}
