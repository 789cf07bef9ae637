import { errorMessage, ProcessLaunchError } from "../errors.js";
import { decodeOutput } from "../protocol/decode.js";
import type { LanguageRuntime } from "../protocol/languages.js";
import { KERNEL_DONE_MARKER } from "../protocol/sentinel.js";
import { LineSplitter } from "../process/lines.js";
import type { ProcessRegistry } from "../process/registry.js";
import type { OutputStream, ProcessEvent } from "../types.js";

export interface RunState {
  timedOut: boolean;
  launchError: string | null;
}

export interface SharedKernelOptions {
  registry: ProcessRegistry;
  runtime: LanguageRuntime;
  executable: string;
  cwd?: string;
  env?: Record<string, string>;
}

/** Exit code reported for a run whose process could not be launched (shell "not found" convention). */
export const LAUNCH_FAILURE_EXIT_CODE = 127;

export function* launchFailureEvents(command: string, message: string): Generator<ProcessEvent> {
  yield { type: "started", processId: "", command };
  yield { type: "output", processId: "", stream: "stderr", data: `${message}\n` };
  yield { type: "completed", processId: "", exitCode: LAUNCH_FAILURE_EXIT_CODE };
}

/**
 * One long-lived interpreter shared by every call of a non-isolated
 * environment. Requests go to its stdin as JSON lines and are answered one at
 * a time; a request is finished when the done marker for its id has arrived
 * on both stdout and stderr. Globals defined by one call stay visible to the
 * next until the kernel is killed (timeout, abandoned stream, close).
 */
export class SharedKernel {
  private processId: string | null = null;
  private sequence = 0;
  private tail: Promise<void> = Promise.resolve();

  constructor(private readonly options: SharedKernelOptions) {}

  async ensureStarted(): Promise<string> {
    const { registry, runtime } = this.options;
    if (this.processId && registry.has(this.processId)) {
      if (registry.getProcessInfo(this.processId).isRunning) {
        return this.processId;
      }
      console.warn("[runbox] shared kernel", this.processId, "is gone; starting a new one");
      await registry.releaseProcess(this.processId);
    }
    this.processId = null;
    const startOptions: { cwd?: string; env?: Record<string, string>; stdin: boolean } = { stdin: true };
    if (this.options.cwd !== undefined) startOptions.cwd = this.options.cwd;
    if (this.options.env !== undefined) startOptions.env = this.options.env;
    this.processId = await registry.startProcess(
      this.options.executable,
      runtime.inlineArgs(runtime.kernelProgram()),
      startOptions
    );
    return this.processId;
  }

  async shutdown(): Promise<void> {
    const id = this.processId;
    this.processId = null;
    if (id && this.options.registry.has(id)) {
      await this.options.registry.releaseProcess(id);
    }
  }

  /** Events of one request. Calls queue behind each other. */
  async *run(code: string, timeoutMs: number, state: RunState): AsyncGenerator<ProcessEvent> {
    const unlock = await this.lock();
    try {
      yield* this.runLocked(code, timeoutMs, state);
    } finally {
      unlock();
    }
  }

  private async lock(): Promise<() => void> {
    let unlock: () => void = () => undefined;
    const next = new Promise<void>((resolve) => {
      unlock = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => next);
    await previous;
    return unlock;
  }

  private async *runLocked(code: string, timeoutMs: number, state: RunState): AsyncGenerator<ProcessEvent> {
    const { registry, runtime } = this.options;
    let kernelId: string;
    try {
      kernelId = await this.ensureStarted();
    } catch (error: unknown) {
      if (!(error instanceof ProcessLaunchError)) throw error;
      state.launchError = error.message;
      yield* launchFailureEvents(runtime.displayName, error.message);
      return;
    }

    const requestId = ++this.sequence;
    const marker = `${KERNEL_DONE_MARKER}${requestId}`;
    yield { type: "started", processId: kernelId, command: runtime.displayName };
    // Subscribe only once the consumer asks for more; the request is sent after this.
    const live = registry.events(kernelId, { replay: false });
    try {
      await registry.writeInput(kernelId, `${JSON.stringify({ id: requestId, code })}\n`);
    } catch (error: unknown) {
      // The kernel exited under us; its completed event ends the loop below.
      console.warn("[runbox] could not send request to kernel", kernelId, errorMessage(error));
    }

    const splitters: Record<OutputStream, LineSplitter> = {
      stdout: new LineSplitter(),
      stderr: new LineSplitter()
    };
    const answered: Record<OutputStream, boolean> = { stdout: false, stderr: false };
    let stdout = "";
    let exitCode: number | undefined;
    let finished = false;
    const timer = setTimeout(() => {
      state.timedOut = true;
      void registry.killProcess(kernelId).catch((error: unknown) => {
        console.warn("[runbox] failed to stop timed out kernel", kernelId, errorMessage(error));
      });
    }, timeoutMs);

    try {
      for await (const event of live) {
        if (event.type === "completed") {
          exitCode = event.exitCode;
          break;
        }
        if (event.type !== "output" || answered[event.stream]) continue;
        for (const line of splitters[event.stream].push(event.data)) {
          if (line.endsWith(marker)) {
            answered[event.stream] = true;
            const prefix = line.slice(0, line.length - marker.length);
            if (prefix.length > 0) {
              if (event.stream === "stdout") stdout += prefix;
              yield { type: "output", processId: kernelId, stream: event.stream, data: prefix };
            }
            break;
          }
          if (event.stream === "stdout") stdout += `${line}\n`;
          yield { type: "output", processId: kernelId, stream: event.stream, data: `${line}\n` };
        }
        if (answered.stdout && answered.stderr) break;
      }
      if (exitCode === undefined) {
        exitCode = decodeOutput(stdout, "", 0).success ? 0 : 1;
      } else {
        // Kernel died mid-request: hand over whatever it printed last.
        for (const stream of ["stdout", "stderr"] as const) {
          for (const rest of splitters[stream].flush()) {
            yield { type: "output", processId: kernelId, stream, data: rest };
          }
        }
      }
      finished = true;
      yield { type: "completed", processId: kernelId, exitCode };
    } finally {
      clearTimeout(timer);
      if (!finished && registry.has(kernelId)) {
        // Abandoned mid-request; the kernel cannot be reused safely.
        await registry.killProcess(kernelId);
      }
    }
  }
}
