import { describe, expect, it } from "vitest";

import { MockExecutionEnvironment, MockProcessManager } from "../src/environments/mock.js";
import { withEnvironment } from "../src/environments/types.js";
import { createExecutionResult, type ProcessEvent } from "../src/types.js";

function createMockEnvironment(): MockExecutionEnvironment {
  return new MockExecutionEnvironment({
    language: "python",
    codeResults: {
      "print(1)": createExecutionResult({ result: 1, duration: 0.01, success: true, stdout: "1\n" }),
      "raise ValueError()": createExecutionResult({
        result: null,
        duration: 0.01,
        success: false,
        errorType: "ValueError",
        stderr: "ValueError\n",
        exitCode: 1
      })
    },
    commandResults: {
      "echo hello": createExecutionResult({ duration: 0.01, success: true, stdout: "hello\n", exitCode: 0 }),
      "ls /nonexistent": createExecutionResult({
        duration: 0.01,
        success: false,
        stderr: "No such file or directory\n",
        exitCode: 2
      })
    },
    processOutputs: {
      echo: { stdout: "hello world", stderr: "", combined: "hello world", exitCode: 0 },
      sleep: { stdout: "", stderr: "", combined: "", exitCode: 0 }
    }
  });
}

async function drain<T>(source: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of source) {
    out.push(item);
  }
  return out;
}

describe("MockExecutionEnvironment", () => {
  it("returns the canned result for known code", async () => {
    const result = await createMockEnvironment().execute("print(1)");
    expect(result).toMatchObject({ success: true, stdout: "1\n", result: 1 });
  });

  it("falls back to the default result", async () => {
    const result = await createMockEnvironment().execute("unknown_code()");
    expect(result).toMatchObject({ success: true, stdout: "", result: null });
  });

  it("uses a configured default result", async () => {
    const env = new MockExecutionEnvironment({
      defaultResult: createExecutionResult({ result: "custom", duration: 1, success: true, stdout: "custom output" })
    });
    expect(await env.execute("any code")).toMatchObject({ stdout: "custom output", result: "custom" });
  });

  it("returns canned command results", async () => {
    const env = createMockEnvironment();
    expect(await env.executeCommand("echo hello")).toMatchObject({ success: true, stdout: "hello\n", exitCode: 0 });
    expect(await env.executeCommand("ls /nonexistent")).toMatchObject({
      success: false,
      stderr: "No such file or directory\n",
      exitCode: 2
    });
  });

  it("streams code as started, output and completed", async () => {
    const events: ProcessEvent[] = await drain(createMockEnvironment().streamCode("print(1)"));
    expect(events).toHaveLength(3);
    expect(events[0]).toMatchObject({ type: "started", command: "python" });
    expect(events[1]).toMatchObject({ type: "output", stream: "stdout", data: "1\n" });
    expect(events[2]).toMatchObject({ type: "completed", exitCode: 0 });
  });

  it("streams stderr for failures", async () => {
    const events = await drain(createMockEnvironment().streamCode("raise ValueError()"));
    const outputs = events.filter((event) => event.type === "output");
    expect(outputs).toEqual([expect.objectContaining({ stream: "stderr", data: "ValueError\n" })]);
    expect(events[events.length - 1]).toMatchObject({ type: "completed", exitCode: 1 });
  });

  it("streams commands under their own text", async () => {
    const events = await drain(createMockEnvironment().streamCommand("echo hello"));
    expect(events.map((event) => event.type)).toEqual(["started", "output", "completed"]);
    expect(events[0]).toMatchObject({ command: "echo hello" });
    expect(events[1]).toMatchObject({ data: "hello\n" });
  });

  it("streams lines with a result line", async () => {
    expect(await drain(createMockEnvironment().executeStream("print(1)"))).toEqual(["1", "Result: 1"]);
    expect(await drain(createMockEnvironment().executeCommandStream("echo hello"))).toEqual(["hello"]);
  });

  it("works inside withEnvironment", async () => {
    const stdout = await withEnvironment(createMockEnvironment(), async (env) => (await env.execute("print(1)")).stdout);
    expect(stdout).toBe("1\n");
  });
});

describe("MockProcessManager", () => {
  it("starts processes with mock ids", async () => {
    const manager = createMockEnvironment().processManager;
    const id = await manager.startProcess("echo", ["hello", "world"]);
    expect(id).toMatch(/^mock_[0-9a-f]{12}$/);
    expect(manager.listProcesses()).toContain(id);
  });

  it("serves canned output by command", async () => {
    const manager = createMockEnvironment().processManager;
    const id = await manager.startProcess("echo", ["test"]);
    expect(manager.getOutput(id)).toMatchObject({ stdout: "hello world", exitCode: 0 });
  });

  it("records 130 when a running process is killed", async () => {
    const manager = createMockEnvironment().processManager;
    const id = await manager.startProcess("sleep", ["100"]);
    await manager.killProcess(id);
    expect(manager.getProcessInfo(id)).toMatchObject({ isRunning: false, exitCode: 130 });
  });

  it("completes on wait", async () => {
    const manager = createMockEnvironment().processManager;
    const id = await manager.startProcess("echo");
    await expect(manager.waitForExit(id)).resolves.toBe(0);
    expect(manager.getProcessInfo(id).isRunning).toBe(false);
  });

  it("reports process info", async () => {
    const manager = createMockEnvironment().processManager;
    const id = await manager.startProcess("echo", ["hello"], { cwd: "/tmp" });
    const info = manager.getProcessInfo(id);
    expect(info).toMatchObject({ processId: id, command: "echo", args: ["hello"], cwd: "/tmp" });
    expect(typeof info.createdAt).toBe("string");
  });

  it("forgets released processes", async () => {
    const manager = createMockEnvironment().processManager;
    const id = await manager.startProcess("echo");
    await manager.releaseProcess(id);
    expect(manager.listProcesses()).not.toContain(id);
  });

  it("throws not found for unknown ids", async () => {
    const manager = new MockProcessManager();
    expect(() => manager.getOutput("nonexistent")).toThrow("not found");
    await expect(manager.killProcess("nonexistent")).rejects.toThrow("not found");
    await expect(manager.releaseProcess("nonexistent")).rejects.toThrow("not found");
  });

  it("prefers full command lines over the bare command", async () => {
    const manager = new MockProcessManager({
      defaultOutput: { stdout: "default output", stderr: "", combined: "default output", exitCode: 0 },
      commandOutputs: { "custom cmd": { stdout: "custom", stderr: "", combined: "custom", exitCode: 42 } }
    });
    const fallback = await manager.startProcess("unknown");
    expect(manager.getOutput(fallback).stdout).toBe("default output");
    const custom = await manager.startProcess("custom", ["cmd"]);
    expect(manager.getOutput(custom)).toMatchObject({ stdout: "custom", exitCode: 42 });
  });

  it("replays canned output as events", async () => {
    const manager = createMockEnvironment().processManager;
    const id = await manager.startProcess("echo");
    expect(await drain(manager.events(id))).toEqual([
      { type: "started", processId: id, command: "echo" },
      { type: "output", processId: id, stream: "stdout", data: "hello world" },
      { type: "completed", processId: id, exitCode: 0 }
    ]);
  });
});
