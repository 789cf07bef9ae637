import type { ProcessManager } from "../process/types.js";
import type { ExecutionResult, Language, ProcessEvent } from "../types.js";

/**
 * Contract every execution backend satisfies: run code or commands, either to
 * completion or as a live stream. Execution failures come back as failed
 * results; only misuse (e.g. a closed environment) throws.
 */
export interface ExecutionEnvironment {
  readonly kind: string;
  readonly language: Language;

  /** Processes this environment supervises; absent when they run on another host. */
  readonly processManager?: ProcessManager;

  start(): Promise<void>;
  /** Stop every process the environment owns. Safe to call twice. */
  close(): Promise<void>;

  execute(code: string): Promise<ExecutionResult>;
  /** Output lines as they arrive, then a `Result: ...` line when the decoded value is non-null. */
  executeStream(code: string): AsyncIterable<string>;
  executeCommand(command: string): Promise<ExecutionResult>;
  executeCommandStream(command: string): AsyncIterable<string>;

  streamCode(code: string): AsyncIterable<ProcessEvent>;
  streamCommand(command: string): AsyncIterable<ProcessEvent>;
}

export interface EnvironmentOptions {
  language?: Language;
  isolated?: boolean;
  timeoutMs?: number;
  keepAliveMs?: number;
  cpu?: number;
  memoryMb?: number;
  cwd?: string;
  env?: Record<string, string>;
}

/** Run `fn` between `start()` and `close()`. */
export async function withEnvironment<E extends ExecutionEnvironment, T>(
  environment: E,
  fn: (environment: E) => Promise<T>
): Promise<T> {
  await environment.start();
  try {
    return await fn(environment);
  } finally {
    await environment.close();
  }
}
