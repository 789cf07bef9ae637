import type { ProcessEvent, ProcessInfo, ProcessOutput } from "../types.js";

export interface StartProcessOptions {
  cwd?: string;
  /** Merged over the host environment. */
  env?: Record<string, string>;
  /** Report stderr chunks as stdout (single diagnostic stream). */
  combineStderr?: boolean;
  /** Keep stdin open as a pipe for `writeInput`; otherwise it is closed at launch. */
  stdin?: boolean;
}

export interface EventsOptions {
  /** Start with the started event and every chunk already captured (default). When false, only live events follow. */
  replay?: boolean;
}

export interface WaitOptions {
  /** Explicit deadline; without it the wait has no limit. */
  timeoutMs?: number;
}

/**
 * Lifecycle of supervised processes. The local registry and the mock manager
 * both implement it; every lookup on an unknown or released id throws
 * ProcessNotFoundError.
 */
export interface ProcessManager {
  startProcess(command: string, args?: string[], options?: StartProcessOptions): Promise<string>;
  /** Point-in-time snapshot; never waits for more data. */
  getOutput(processId: string): ProcessOutput;
  getProcessInfo(processId: string): ProcessInfo;
  /** Resolves with the exit code once the process is no longer running. */
  waitForExit(processId: string, options?: WaitOptions): Promise<number>;
  /** Interrupt; a no-op when the process already terminated. */
  killProcess(processId: string): Promise<void>;
  /** Kill if running, then forget the handle. */
  releaseProcess(processId: string): Promise<void>;
  listProcesses(): string[];
  /** Started event, every chunk so far, then live events until completion. Single use. */
  events(processId: string, options?: EventsOptions): AsyncIterable<ProcessEvent>;
}
