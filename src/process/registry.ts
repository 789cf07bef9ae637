import { spawn, type ChildProcess } from "node:child_process";
import { randomUUID } from "node:crypto";

import { ProcessLaunchError, ProcessNotFoundError } from "../errors.js";
import { redactSecrets } from "../security.js";
import type {
  OutputEvent,
  OutputStream,
  ProcessCompletedEvent,
  ProcessEvent,
  ProcessInfo,
  ProcessOutput,
  ProcessStartedEvent
} from "../types.js";
import { AsyncChannel } from "./channel.js";
import { withDeadline } from "./deadline.js";
import { pumpProcess } from "./multiplexer.js";
import type { EventsOptions, ProcessManager, StartProcessOptions, WaitOptions } from "./types.js";

/** Exit code recorded for a process terminated by `killProcess` (SIGINT convention). */
export const KILLED_EXIT_CODE = 130;

type HandleState = "running" | "completed" | "killed";

interface ProcessHandle {
  processId: string;
  command: string;
  args: string[];
  cwd: string;
  createdAt: string;
  state: HandleState;
  exitCode?: number;
  stdout: string;
  stderr: string;
  combined: string;
  chunks: OutputEvent[];
  child: ChildProcess;
  killRequested: boolean;
  exited: Promise<number>;
  resolveExit: (code: number) => void;
  subscribers: Set<AsyncChannel<ProcessEvent>>;
  started: ProcessStartedEvent;
}

export interface ProcessRegistryOptions {
  /** Delay between SIGINT and SIGKILL when a process ignores the interrupt. */
  killGraceMs?: number;
  /** Default for `StartProcessOptions.combineStderr`. */
  combineStderr?: boolean;
}

function isProcessRunning(child: ChildProcess): boolean {
  return child.exitCode === null && child.signalCode === null;
}

/**
 * Process table owned by one execution environment. Handles stay registered
 * after they terminate, until released.
 */
export class ProcessRegistry implements ProcessManager {
  private readonly handles = new Map<string, ProcessHandle>();
  private readonly killGraceMs: number;
  private readonly combineStderr: boolean;

  constructor(options: ProcessRegistryOptions = {}) {
    this.killGraceMs = options.killGraceMs ?? 500;
    this.combineStderr = options.combineStderr ?? false;
  }

  async startProcess(command: string, args: string[] = [], options: StartProcessOptions = {}): Promise<string> {
    const processId = this.allocateId();
    const cwd = options.cwd ?? process.cwd();
    const child = spawn(command, args, {
      cwd,
      env: { ...process.env, ...options.env },
      stdio: [options.stdin ? "pipe" : "ignore", "pipe", "pipe"],
      // Own process group, so a kill reaches everything a shell command forked.
      detached: process.platform !== "win32",
      windowsHide: true
    });

    let resolveExit: (code: number) => void = () => undefined;
    const exited = new Promise<number>((resolve) => {
      resolveExit = resolve;
    });
    const handle: ProcessHandle = {
      processId,
      command,
      args: [...args],
      cwd,
      createdAt: new Date().toISOString(),
      state: "running",
      stdout: "",
      stderr: "",
      combined: "",
      chunks: [],
      child,
      killRequested: false,
      exited,
      resolveExit,
      subscribers: new Set(),
      started: { type: "started", processId, command }
    };
    pumpProcess(
      child,
      {
        onChunk: (stream, data) => this.append(handle, stream, data),
        onExit: (exitCode) => this.settle(handle, exitCode)
      },
      { combineStderr: options.combineStderr ?? this.combineStderr }
    );

    await new Promise<void>((resolve, reject) => {
      const onSpawn = (): void => {
        child.off("error", onError);
        resolve();
      };
      const onError = (error: NodeJS.ErrnoException): void => {
        child.off("spawn", onSpawn);
        reject(new ProcessLaunchError(command, error.code, `failed to launch ${command}: ${error.message}`));
      };
      child.once("spawn", onSpawn);
      child.once("error", onError);
    });
    child.on("error", (error) => {
      console.warn("[runbox] process error", processId, redactSecrets(error.message));
    });
    child.stdin?.on("error", (error) => {
      console.warn("[runbox] stdin error", processId, error.message);
    });
    this.handles.set(processId, handle);
    return processId;
  }

  getOutput(processId: string): ProcessOutput {
    const handle = this.require(processId);
    const output: ProcessOutput = {
      stdout: handle.stdout,
      stderr: handle.stderr,
      combined: handle.combined
    };
    if (handle.exitCode !== undefined) {
      output.exitCode = handle.exitCode;
    }
    return output;
  }

  getProcessInfo(processId: string): ProcessInfo {
    const handle = this.require(processId);
    const info: ProcessInfo = {
      processId: handle.processId,
      command: handle.command,
      args: [...handle.args],
      cwd: handle.cwd,
      createdAt: handle.createdAt,
      isRunning: handle.state === "running"
    };
    if (handle.exitCode !== undefined) {
      info.exitCode = handle.exitCode;
    }
    return info;
  }

  async waitForExit(processId: string, options: WaitOptions = {}): Promise<number> {
    const handle = this.require(processId);
    if (handle.exitCode !== undefined) {
      return handle.exitCode;
    }
    if (options.timeoutMs === undefined) {
      return handle.exited;
    }
    return withDeadline(handle.exited, options.timeoutMs);
  }

  async killProcess(processId: string): Promise<void> {
    const handle = this.require(processId);
    if (handle.state !== "running") {
      return;
    }
    if (!isProcessRunning(handle.child)) {
      // Exited on its own; only the pipes are still draining.
      await handle.exited;
      return;
    }
    handle.killRequested = true;
    this.signal(handle, "SIGINT");
    const escalation = setTimeout(() => {
      if (handle.state === "running") {
        console.warn("[runbox] process", processId, "ignored SIGINT; sending SIGKILL");
        this.signal(handle, "SIGKILL");
      }
    }, this.killGraceMs);
    try {
      await handle.exited;
    } finally {
      clearTimeout(escalation);
    }
  }

  async releaseProcess(processId: string): Promise<void> {
    const handle = this.require(processId);
    if (handle.state === "running") {
      await this.killProcess(processId);
    }
    for (const subscriber of handle.subscribers) {
      subscriber.close();
    }
    handle.subscribers.clear();
    this.handles.delete(processId);
  }

  async releaseAll(): Promise<void> {
    const ids = [...this.handles.keys()];
    await Promise.all(
      ids.map((id) =>
        this.releaseProcess(id).catch((error: unknown) => {
          // Released concurrently by another caller.
          if (!(error instanceof ProcessNotFoundError)) throw error;
        })
      )
    );
  }

  has(processId: string): boolean {
    return this.handles.has(processId);
  }

  listProcesses(): string[] {
    return [...this.handles.keys()];
  }

  events(processId: string, options: EventsOptions = {}): AsyncIterable<ProcessEvent> {
    const handle = this.require(processId);
    const channel: AsyncChannel<ProcessEvent> = new AsyncChannel<ProcessEvent>(() => {
      handle.subscribers.delete(channel);
    });
    if (options.replay ?? true) {
      channel.push(handle.started);
      for (const chunk of handle.chunks) {
        channel.push(chunk);
      }
    }
    if (handle.state === "running") {
      handle.subscribers.add(channel);
    } else {
      channel.push(this.completedEvent(handle));
      channel.close();
    }
    return channel;
  }

  /** Write to the stdin of a process started with `stdin: true`. */
  async writeInput(processId: string, data: string): Promise<void> {
    const handle = this.require(processId);
    const stdin = handle.child.stdin;
    if (handle.state !== "running" || !stdin || stdin.destroyed) {
      throw new Error(`process ${processId} does not accept input`);
    }
    await new Promise<void>((resolve, reject) => {
      stdin.write(data, "utf8", (error) => {
        if (error) reject(error);
        else resolve();
      });
    });
  }

  private require(processId: string): ProcessHandle {
    const handle = this.handles.get(processId);
    if (!handle) {
      throw new ProcessNotFoundError(processId);
    }
    return handle;
  }

  private allocateId(): string {
    let id: string;
    do {
      id = `proc_${randomUUID().replace(/-/g, "").slice(0, 12)}`;
    } while (this.handles.has(id));
    return id;
  }

  private append(handle: ProcessHandle, stream: OutputStream, data: string): void {
    if (stream === "stdout") {
      handle.stdout += data;
    } else {
      handle.stderr += data;
    }
    handle.combined += data;
    const event: OutputEvent = { type: "output", processId: handle.processId, stream, data };
    handle.chunks.push(event);
    for (const subscriber of handle.subscribers) {
      subscriber.push(event);
    }
  }

  /** The single terminal transition of a handle; later calls are ignored. */
  private settle(handle: ProcessHandle, exitCode: number): void {
    if (handle.state !== "running") {
      return;
    }
    handle.state = handle.killRequested ? "killed" : "completed";
    handle.exitCode = handle.killRequested ? KILLED_EXIT_CODE : exitCode;
    const completed = this.completedEvent(handle);
    for (const subscriber of handle.subscribers) {
      subscriber.push(completed);
      subscriber.close();
    }
    handle.subscribers.clear();
    handle.resolveExit(handle.exitCode);
  }

  private completedEvent(handle: ProcessHandle): ProcessCompletedEvent {
    return {
      type: "completed",
      processId: handle.processId,
      exitCode: handle.exitCode ?? KILLED_EXIT_CODE
    };
  }

  private signal(handle: ProcessHandle, signal: NodeJS.Signals): void {
    const pid = handle.child.pid;
    if (pid !== undefined && process.platform !== "win32") {
      try {
        process.kill(-pid, signal);
        return;
      } catch {
        // Group already gone; fall back to the direct child.
      }
    }
    handle.child.kill(signal);
  }
}
