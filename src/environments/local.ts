import { performance } from "node:perf_hooks";

import { ERROR_TYPES, ExecutionTimeoutError, errorMessage, formatSeconds, ProcessLaunchError } from "../errors.js";
import { decodeOutput, findSentinel, formatResultLine } from "../protocol/decode.js";
import { getLanguageRuntime, type LanguageRuntime } from "../protocol/languages.js";
import { collectEvents, linesFromEvents, type CapturedRun } from "../process/lines.js";
import { ProcessRegistry } from "../process/registry.js";
import type { StartProcessOptions } from "../process/types.js";
import {
  createExecutionResult,
  failureResult,
  type ExecutionResult,
  type Language,
  type ProcessEvent
} from "../types.js";
import { launchFailureEvents, SharedKernel, type RunState } from "./shared-kernel.js";
import type { EnvironmentOptions, ExecutionEnvironment } from "./types.js";

export interface LocalEnvironmentOptions extends EnvironmentOptions {
  /** Interpreter for the configured language; defaults to the runtime's own. */
  executable?: string;
  /** Shell for commands; false splits the command on whitespace and spawns it directly. */
  shell?: string | false;
  killGraceMs?: number;
}

function elapsedSeconds(startedAt: number): number {
  return (performance.now() - startedAt) / 1000;
}

function lastLine(text: string): string | undefined {
  const lines = text.split(/\r?\n/).map((line) => line.trim()).filter(Boolean);
  return lines[lines.length - 1];
}

function defaultShell(): string {
  return process.platform === "win32" ? "cmd.exe" : "/bin/sh";
}

/**
 * Runs code and commands as child processes of this host. Isolated
 * environments spawn a process per call; non-isolated ones route code through
 * a SharedKernel so state persists between calls.
 */
export class LocalExecutionEnvironment implements ExecutionEnvironment {
  readonly kind = "local";
  readonly language: Language;
  readonly processManager: ProcessRegistry;
  readonly isolated: boolean;
  readonly timeoutMs: number;
  /** Pass-through hints; the local backend does not enforce them. */
  readonly hints: { cpu?: number; memoryMb?: number; keepAliveMs?: number };

  private readonly runtime: LanguageRuntime;
  private readonly executable: string;
  private readonly shell: string | false;
  private readonly cwd: string | undefined;
  private readonly env: Record<string, string>;
  private kernel: SharedKernel | null = null;

  constructor(options: LocalEnvironmentOptions = {}) {
    this.language = options.language ?? "javascript";
    this.runtime = getLanguageRuntime(this.language);
    this.isolated = options.isolated ?? true;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.executable = options.executable ?? this.runtime.defaultExecutable;
    this.shell = options.shell ?? defaultShell();
    this.cwd = options.cwd;
    this.env = options.env ?? {};
    this.hints = {};
    if (options.cpu !== undefined) this.hints.cpu = options.cpu;
    if (options.memoryMb !== undefined) this.hints.memoryMb = options.memoryMb;
    if (options.keepAliveMs !== undefined) this.hints.keepAliveMs = options.keepAliveMs;
    this.processManager =
      options.killGraceMs !== undefined ? new ProcessRegistry({ killGraceMs: options.killGraceMs }) : new ProcessRegistry();
  }

  async start(): Promise<void> {
    if (!this.isolated) {
      await this.getKernel().ensureStarted();
    }
  }

  async close(): Promise<void> {
    const kernel = this.kernel;
    this.kernel = null;
    await kernel?.shutdown();
    await this.processManager.releaseAll();
  }

  async execute(code: string): Promise<ExecutionResult> {
    const startedAt = performance.now();
    if (!this.isolated) {
      const state: RunState = { timedOut: false, launchError: null };
      const captured = await collectEvents(this.getKernel().run(code, this.timeoutMs, state));
      return this.codeResult(captured, state, elapsedSeconds(startedAt));
    }
    const program = this.runtime.wrap(code);
    return this.runToCompletion(this.executable, this.runtime.inlineArgs(program), startedAt, (captured, duration) =>
      decodeOutput(captured.stdout, captured.stderr, captured.exitCode, duration)
    );
  }

  async *executeStream(code: string): AsyncGenerator<string> {
    const state: RunState = { timedOut: false, launchError: null };
    yield* linesFromEvents(this.codeEvents(code, state), {
      trailer: (captured) => {
        if (state.timedOut) return [this.timeoutLine()];
        if (state.launchError !== null || !findSentinel(captured.stdout)) return [];
        const decoded = decodeOutput(captured.stdout, captured.stderr, captured.exitCode);
        return decoded.success && decoded.result !== null ? [formatResultLine(decoded.result)] : [];
      }
    });
  }

  async executeCommand(command: string): Promise<ExecutionResult> {
    const startedAt = performance.now();
    const resolved = this.resolveCommand(command);
    if (!resolved) {
      return failureResult({ error: "empty command", errorType: ERROR_TYPES.launch });
    }
    return this.runToCompletion(resolved.command, resolved.args, startedAt, (captured, duration) => {
      if (captured.exitCode === 0) {
        return createExecutionResult({
          result: captured.stdout,
          success: true,
          duration,
          stdout: captured.stdout,
          stderr: captured.stderr,
          exitCode: 0
        });
      }
      return failureResult({
        error: lastLine(captured.stderr) ?? `command exited with code ${String(captured.exitCode)}`,
        errorType: ERROR_TYPES.command,
        duration,
        stdout: captured.stdout,
        stderr: captured.stderr,
        exitCode: captured.exitCode
      });
    });
  }

  async *executeCommandStream(command: string): AsyncGenerator<string> {
    const state: RunState = { timedOut: false, launchError: null };
    yield* linesFromEvents(this.commandEvents(command, state), {
      trailer: () => (state.timedOut ? [this.timeoutLine()] : [])
    });
  }

  streamCode(code: string): AsyncGenerator<ProcessEvent> {
    return this.codeEvents(code, { timedOut: false, launchError: null });
  }

  streamCommand(command: string): AsyncGenerator<ProcessEvent> {
    return this.commandEvents(command, { timedOut: false, launchError: null });
  }

  private getKernel(): SharedKernel {
    if (!this.kernel) {
      this.kernel = new SharedKernel({
        registry: this.processManager,
        runtime: this.runtime,
        executable: this.executable,
        ...(this.cwd !== undefined ? { cwd: this.cwd } : {}),
        env: this.env
      });
    }
    return this.kernel;
  }

  private codeEvents(code: string, state: RunState): AsyncGenerator<ProcessEvent> {
    if (!this.isolated) {
      return this.getKernel().run(code, this.timeoutMs, state);
    }
    const program = this.runtime.wrap(code);
    return this.processEvents(this.executable, this.runtime.inlineArgs(program), state, this.runtime.displayName);
  }

  private async *commandEvents(command: string, state: RunState): AsyncGenerator<ProcessEvent> {
    const resolved = this.resolveCommand(command);
    if (!resolved) {
      state.launchError = "empty command";
      yield* launchFailureEvents(command, state.launchError);
      return;
    }
    yield* this.processEvents(resolved.command, resolved.args, state, command);
  }

  private resolveCommand(command: string): { command: string; args: string[] } | null {
    if (this.shell === false) {
      const [bin, ...args] = command.split(/\s+/).filter(Boolean);
      return bin ? { command: bin, args } : null;
    }
    if (!command.trim()) {
      return null;
    }
    const isCmd = /(^|[\\/])cmd(\.exe)?$/i.test(this.shell);
    return { command: this.shell, args: isCmd ? ["/d", "/s", "/c", command] : ["-c", command] };
  }

  private startOptions(): StartProcessOptions {
    const options: StartProcessOptions = { env: this.env };
    if (this.cwd !== undefined) options.cwd = this.cwd;
    return options;
  }

  /** Start, wait under the timeout, snapshot output, release. */
  private async runToCompletion(
    command: string,
    args: string[],
    startedAt: number,
    interpret: (captured: CapturedRun, duration: number) => ExecutionResult
  ): Promise<ExecutionResult> {
    let processId: string;
    try {
      processId = await this.processManager.startProcess(command, args, this.startOptions());
    } catch (error: unknown) {
      if (error instanceof ProcessLaunchError) {
        return failureResult({
          error: error.message,
          errorType: ERROR_TYPES.launch,
          duration: elapsedSeconds(startedAt)
        });
      }
      throw error;
    }
    try {
      let timedOut = false;
      try {
        await this.processManager.waitForExit(processId, { timeoutMs: this.timeoutMs });
      } catch (error: unknown) {
        if (!(error instanceof ExecutionTimeoutError)) throw error;
        timedOut = true;
        await this.processManager.killProcess(processId);
      }
      const output = this.processManager.getOutput(processId);
      const captured: CapturedRun = { stdout: output.stdout, stderr: output.stderr, exitCode: output.exitCode };
      const duration = elapsedSeconds(startedAt);
      if (timedOut) {
        return failureResult({
          error: `execution timed out after ${formatSeconds(this.timeoutMs)}`,
          errorType: ERROR_TYPES.timeout,
          duration,
          stdout: output.stdout,
          stderr: output.stderr,
          exitCode: output.exitCode
        });
      }
      return interpret(captured, duration);
    } finally {
      if (this.processManager.has(processId)) {
        await this.processManager.releaseProcess(processId);
      }
    }
  }

  /** Live events of one process, killed on timeout or when the consumer stops early. */
  private async *processEvents(
    command: string,
    args: string[],
    state: RunState,
    displayCommand: string
  ): AsyncGenerator<ProcessEvent> {
    let processId: string;
    try {
      processId = await this.processManager.startProcess(command, args, this.startOptions());
    } catch (error: unknown) {
      if (!(error instanceof ProcessLaunchError)) throw error;
      state.launchError = error.message;
      yield* launchFailureEvents(displayCommand, error.message);
      return;
    }
    const timer = setTimeout(() => {
      state.timedOut = true;
      void this.processManager.killProcess(processId).catch((error: unknown) => {
        console.warn("[runbox] failed to stop timed out process", processId, errorMessage(error));
      });
    }, this.timeoutMs);
    let completed = false;
    try {
      for await (const event of this.processManager.events(processId)) {
        if (event.type === "started") {
          yield { ...event, command: displayCommand };
          continue;
        }
        if (event.type === "completed") completed = true;
        yield event;
      }
    } finally {
      clearTimeout(timer);
      if (this.processManager.has(processId)) {
        if (!completed) {
          await this.processManager.killProcess(processId);
        }
        await this.processManager.releaseProcess(processId);
      }
    }
  }

  private codeResult(captured: CapturedRun, state: RunState, duration: number): ExecutionResult {
    if (state.launchError !== null) {
      return failureResult({ error: state.launchError, errorType: ERROR_TYPES.launch, duration });
    }
    if (state.timedOut) {
      return failureResult({
        error: `execution timed out after ${formatSeconds(this.timeoutMs)}`,
        errorType: ERROR_TYPES.timeout,
        duration,
        stdout: captured.stdout,
        stderr: captured.stderr,
        exitCode: captured.exitCode
      });
    }
    return decodeOutput(captured.stdout, captured.stderr, captured.exitCode, duration);
  }

  private timeoutLine(): string {
    return `${ERROR_TYPES.timeout}: execution timed out after ${formatSeconds(this.timeoutMs)}`;
  }
}
