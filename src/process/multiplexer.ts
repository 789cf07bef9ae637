import type { ChildProcess } from "node:child_process";
import { constants } from "node:os";

import type { OutputStream } from "../types.js";

export interface StreamSink {
  onChunk(stream: OutputStream, data: string): void;
  /** Called once, after both pipes have been drained and the process is gone. */
  onExit(exitCode: number, signal: NodeJS.Signals | null): void;
}

export interface PumpOptions {
  combineStderr?: boolean;
}

/** Exit code for a process that died from a signal: the shell convention 128 + signal number. */
export function exitCodeFrom(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) {
    return code;
  }
  if (signal) {
    const signo = Object.entries(constants.signals).find(([name]) => name === signal)?.[1];
    if (typeof signo === "number") {
      return 128 + signo;
    }
  }
  return 1;
}

/**
 * Pump both output pipes of `child` into `sink`. Each pipe has its own
 * listener, so a silent stream never holds back the other; chunks are
 * forwarded as they arrive. Completion waits for `close`, which Node emits
 * only after the process exited and both pipes reached EOF.
 */
export function pumpProcess(child: ChildProcess, sink: StreamSink, options: PumpOptions = {}): void {
  const forward =
    (stream: OutputStream) =>
    (chunk: string): void => {
      if (chunk.length === 0) return;
      sink.onChunk(options.combineStderr && stream === "stderr" ? "stdout" : stream, chunk);
    };
  child.stdout?.setEncoding("utf8");
  child.stdout?.on("data", forward("stdout"));
  child.stderr?.setEncoding("utf8");
  child.stderr?.on("data", forward("stderr"));
  child.once("close", (code: number | null, signal: NodeJS.Signals | null) => {
    sink.onExit(exitCodeFrom(code, signal), signal);
  });
}
