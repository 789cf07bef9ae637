import { SENTINEL } from "../protocol/sentinel.js";
import type { OutputStream, ProcessEvent } from "../types.js";

/** Splits a chunked stream into complete lines, holding back the unterminated tail. */
export class LineSplitter {
  private pending = "";

  push(chunk: string): string[] {
    this.pending += chunk;
    const parts = this.pending.split(/\r?\n/);
    this.pending = parts.pop() ?? "";
    return parts;
  }

  flush(): string[] {
    const rest = this.pending;
    this.pending = "";
    return rest.length > 0 ? [rest] : [];
  }
}

export interface CapturedRun {
  stdout: string;
  stderr: string;
  exitCode: number | undefined;
}

/** Drain an event stream into the text it carried and its exit code. */
export async function collectEvents(events: AsyncIterable<ProcessEvent>): Promise<CapturedRun> {
  let stdout = "";
  let stderr = "";
  let exitCode: number | undefined;
  for await (const event of events) {
    if (event.type === "output") {
      if (event.stream === "stdout") stdout += event.data;
      else stderr += event.data;
    } else if (event.type === "completed") {
      exitCode = event.exitCode;
    }
  }
  return { stdout, stderr, exitCode };
}

/** A line as shown to stream consumers: the sentinel payload is withheld, text before it is kept. */
function visibleLine(line: string): string | null {
  const markerAt = line.indexOf(SENTINEL);
  if (markerAt < 0) return line;
  return markerAt > 0 ? line.slice(0, markerAt) : null;
}

export interface LineStreamOptions {
  /** Lines appended after completion, computed from everything captured. */
  trailer?: (captured: CapturedRun) => string[];
}

/**
 * Text lines from live output events, in arrival order, split per stream.
 * Ends when the completed event arrives; partial last lines are flushed.
 */
export async function* linesFromEvents(
  events: AsyncIterable<ProcessEvent>,
  options: LineStreamOptions = {}
): AsyncGenerator<string> {
  const splitters: Record<OutputStream, LineSplitter> = {
    stdout: new LineSplitter(),
    stderr: new LineSplitter()
  };
  const captured: CapturedRun = { stdout: "", stderr: "", exitCode: undefined };
  for await (const event of events) {
    if (event.type === "output") {
      captured[event.stream] += event.data;
      for (const line of splitters[event.stream].push(event.data)) {
        const visible = visibleLine(line);
        if (visible !== null) yield visible;
      }
    } else if (event.type === "completed") {
      captured.exitCode = event.exitCode;
    }
  }
  for (const stream of ["stdout", "stderr"] as const) {
    for (const line of splitters[stream].flush()) {
      const visible = visibleLine(line);
      if (visible !== null) yield visible;
    }
  }
  if (options.trailer) {
    yield* options.trailer(captured);
  }
}
