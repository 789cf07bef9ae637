import { randomUUID } from "node:crypto";

import { ProcessNotFoundError } from "../errors.js";
import { formatResultLine } from "../protocol/decode.js";
import { getLanguageRuntime } from "../protocol/languages.js";
import type { EventsOptions, ProcessManager, StartProcessOptions } from "../process/types.js";
import { KILLED_EXIT_CODE } from "../process/registry.js";
import {
  createExecutionResult,
  type ExecutionResult,
  type Language,
  type ProcessEvent,
  type ProcessInfo,
  type ProcessOutput
} from "../types.js";
import type { ExecutionEnvironment } from "./types.js";

interface MockProcess {
  info: ProcessInfo;
  output: ProcessOutput;
}

export interface MockProcessManagerOptions {
  /** Keyed by `command + " " + args`, or by the bare command. */
  commandOutputs?: Record<string, ProcessOutput>;
  defaultOutput?: ProcessOutput;
}

const EMPTY_OUTPUT: ProcessOutput = { stdout: "", stderr: "", combined: "", exitCode: 0 };

/**
 * In-memory ProcessManager. Nothing is spawned: a process holds its canned
 * output from the start and counts as running until it is waited on or killed.
 */
export class MockProcessManager implements ProcessManager {
  private readonly processes = new Map<string, MockProcess>();
  private readonly commandOutputs: Record<string, ProcessOutput>;
  private readonly defaultOutput: ProcessOutput;

  constructor(options: MockProcessManagerOptions = {}) {
    this.commandOutputs = options.commandOutputs ?? {};
    this.defaultOutput = options.defaultOutput ?? EMPTY_OUTPUT;
  }

  async startProcess(command: string, args: string[] = [], options: StartProcessOptions = {}): Promise<string> {
    const processId = `mock_${randomUUID().replace(/-/g, "").slice(0, 12)}`;
    const full = [command, ...args].join(" ");
    const output = this.commandOutputs[full] ?? this.commandOutputs[command] ?? this.defaultOutput;
    this.processes.set(processId, {
      info: {
        processId,
        command,
        args: [...args],
        cwd: options.cwd ?? process.cwd(),
        createdAt: new Date().toISOString(),
        isRunning: true
      },
      output: { ...output }
    });
    return processId;
  }

  getOutput(processId: string): ProcessOutput {
    return { ...this.require(processId).output };
  }

  getProcessInfo(processId: string): ProcessInfo {
    const { info } = this.require(processId);
    return { ...info, args: [...info.args] };
  }

  async waitForExit(processId: string): Promise<number> {
    const entry = this.require(processId);
    if (entry.info.isRunning) {
      this.finish(entry, entry.output.exitCode ?? 0);
    }
    return entry.info.exitCode ?? 0;
  }

  async killProcess(processId: string): Promise<void> {
    const entry = this.require(processId);
    if (entry.info.isRunning) {
      this.finish(entry, KILLED_EXIT_CODE);
    }
  }

  async releaseProcess(processId: string): Promise<void> {
    this.require(processId);
    this.processes.delete(processId);
  }

  listProcesses(): string[] {
    return [...this.processes.keys()];
  }

  async *events(processId: string, options: EventsOptions = {}): AsyncGenerator<ProcessEvent> {
    const entry = this.require(processId);
    const exitCode = await this.waitForExit(processId);
    if (options.replay ?? true) {
      yield { type: "started", processId, command: entry.info.command };
      if (entry.output.stdout) yield { type: "output", processId, stream: "stdout", data: entry.output.stdout };
      if (entry.output.stderr) yield { type: "output", processId, stream: "stderr", data: entry.output.stderr };
    }
    yield { type: "completed", processId, exitCode };
  }

  private finish(entry: MockProcess, exitCode: number): void {
    entry.info.isRunning = false;
    entry.info.exitCode = exitCode;
    entry.output.exitCode = exitCode;
  }

  private require(processId: string): MockProcess {
    const entry = this.processes.get(processId);
    if (!entry) {
      throw new ProcessNotFoundError(processId);
    }
    return entry;
  }
}

export interface MockEnvironmentOptions {
  language?: Language;
  /** Canned results keyed by exact code text. */
  codeResults?: Record<string, ExecutionResult>;
  /** Canned results keyed by exact command text. */
  commandResults?: Record<string, ExecutionResult>;
  defaultResult?: ExecutionResult;
  processManager?: MockProcessManager;
  processOutputs?: Record<string, ProcessOutput>;
}

function lines(text: string): string[] {
  const parts = text.split(/\r?\n/);
  if (parts[parts.length - 1] === "") parts.pop();
  return parts;
}

/** Canned-answer environment for tests of code that drives an ExecutionEnvironment. */
export class MockExecutionEnvironment implements ExecutionEnvironment {
  readonly kind = "mock";
  readonly language: Language;
  readonly processManager: MockProcessManager;

  private readonly codeResults: Record<string, ExecutionResult>;
  private readonly commandResults: Record<string, ExecutionResult>;
  private readonly defaultResult: ExecutionResult;

  constructor(options: MockEnvironmentOptions = {}) {
    this.language = options.language ?? "javascript";
    this.codeResults = options.codeResults ?? {};
    this.commandResults = options.commandResults ?? {};
    this.defaultResult = options.defaultResult ?? createExecutionResult({ success: true, exitCode: 0 });
    this.processManager =
      options.processManager ??
      new MockProcessManager(options.processOutputs ? { commandOutputs: options.processOutputs } : {});
  }

  async start(): Promise<void> {}

  async close(): Promise<void> {
    for (const processId of this.processManager.listProcesses()) {
      await this.processManager.releaseProcess(processId);
    }
  }

  async execute(code: string): Promise<ExecutionResult> {
    return this.codeResults[code] ?? this.defaultResult;
  }

  async *executeStream(code: string): AsyncGenerator<string> {
    const result = await this.execute(code);
    yield* lines(result.stdout);
    yield* lines(result.stderr);
    if (result.success && result.result !== null) {
      yield formatResultLine(result.result);
    }
  }

  async executeCommand(command: string): Promise<ExecutionResult> {
    return this.commandResults[command] ?? this.defaultResult;
  }

  async *executeCommandStream(command: string): AsyncGenerator<string> {
    const result = await this.executeCommand(command);
    yield* lines(result.stdout);
    yield* lines(result.stderr);
  }

  async *streamCode(code: string): AsyncGenerator<ProcessEvent> {
    yield* this.replay(getLanguageRuntime(this.language).displayName, await this.execute(code));
  }

  async *streamCommand(command: string): AsyncGenerator<ProcessEvent> {
    yield* this.replay(command, await this.executeCommand(command));
  }

  private *replay(command: string, result: ExecutionResult): Generator<ProcessEvent> {
    const processId = `mock_${randomUUID().replace(/-/g, "").slice(0, 12)}`;
    yield { type: "started", processId, command };
    if (result.stdout) {
      yield { type: "output", processId, stream: "stdout", data: result.stdout };
    } else if (result.stderr) {
      yield { type: "output", processId, stream: "stderr", data: result.stderr };
    }
    yield { type: "completed", processId, exitCode: result.exitCode ?? (result.success ? 0 : 1) };
  }
}
