import { spawnSync } from "node:child_process";

import { afterEach, describe, expect, it } from "vitest";

import { LocalExecutionEnvironment } from "../src/environments/local.js";
import { isOpaque } from "../src/result-value.js";
import type { ProcessEvent } from "../src/types.js";

// The python suite needs python3 on PATH and is skipped without it.
// Set RUNBOX_REQUIRE_PYTHON=1 to turn a missing interpreter into a failure instead.
const hasPython = spawnSync("python3", ["--version"]).status === 0;
const requirePython = process.env.RUNBOX_REQUIRE_PYTHON === "1";
const environments: LocalExecutionEnvironment[] = [];

function createEnvironment(isolated = true): LocalExecutionEnvironment {
  const environment = new LocalExecutionEnvironment({ language: "python", isolated, timeoutMs: 10_000 });
  environments.push(environment);
  return environment;
}

afterEach(async () => {
  while (environments.length > 0) {
    await environments.pop()?.close();
  }
});

describe("python availability", () => {
  it.runIf(requirePython)("finds python3 when it is required", () => {
    expect(hasPython).toBe(true);
  });

  it.skipIf(hasPython || requirePython)("reports the suite as skipped", () => {
    console.warn("[runbox] python3 not found; python execution tests are skipped");
  });
});

describe.skipIf(!hasPython)("python execution", () => {
  it("returns the value of main", async () => {
    const result = await createEnvironment().execute("def main():\n    return 40 + 2\n");
    expect(result).toMatchObject({ success: true, result: 42, exitCode: 0 });
  });

  it("runs a coroutine main", async () => {
    const result = await createEnvironment().execute(
      "import asyncio\n\nasync def main():\n    await asyncio.sleep(0.01)\n    return 'async'\n"
    );
    expect(result.result).toBe("async");
  });

  it("captures _result and plain output", async () => {
    const result = await createEnvironment().execute("print('hi')\n_result = [1, 2.5, None, {'k': True}]\n");
    expect(result).toMatchObject({ success: true, stdout: "hi\n", result: [1, 2.5, null, { k: true }] });
  });

  it("reports exceptions with their class name", async () => {
    const result = await createEnvironment().execute("raise ValueError('bad value')");
    expect(result).toMatchObject({ success: false, errorType: "ValueError", error: "bad value", exitCode: 1 });
    expect(result.stderr).toContain("Traceback");
  });

  it("marks unserializable values opaque", async () => {
    const result = await createEnvironment().execute("_result = object()");
    expect(isOpaque(result.result)).toBe(true);
    expect(String(result.result).startsWith("<object object at")).toBe(true);
  });

  it("keeps module state in the shared kernel", async () => {
    const env = createEnvironment(false);
    await env.execute("x = 10");
    const result = await env.execute("_result = x * 2");
    expect(result).toMatchObject({ success: true, result: 20 });
  });

  it("labels code events with the interpreter name", async () => {
    const events: ProcessEvent[] = [];
    for await (const event of createEnvironment().streamCode("print('hi')")) {
      events.push(event);
    }
    expect(events[0]).toMatchObject({ type: "started", command: "python" });
  });
});
