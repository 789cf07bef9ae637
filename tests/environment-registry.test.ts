import { describe, expect, it } from "vitest";

import { loadConfig } from "../src/config.js";
import { LocalExecutionEnvironment } from "../src/environments/local.js";
import { MockExecutionEnvironment } from "../src/environments/mock.js";
import { createEnvironment, listEnvironmentKinds, registerEnvironment } from "../src/environments/registry.js";
import { RemoteExecutionEnvironment } from "../src/environments/remote.js";
import { createExecutionResult } from "../src/types.js";

describe("environment registry", () => {
  it("builds the built-in backends from config", () => {
    expect(createEnvironment(loadConfig())).toBeInstanceOf(LocalExecutionEnvironment);

    const mock = createEnvironment(loadConfig({ execution: { backend: "mock", language: "python" } }));
    expect(mock).toBeInstanceOf(MockExecutionEnvironment);
    expect(mock.language).toBe("python");

    const remote = createEnvironment(loadConfig({ execution: { backend: "remote" }, remote: { token: "test-secret" } }));
    expect(remote).toBeInstanceOf(RemoteExecutionEnvironment);
    expect(remote.kind).toBe("remote");
  });

  it("returns a new instance per call", () => {
    const config = loadConfig({ execution: { backend: "mock" } });
    expect(createEnvironment(config)).not.toBe(createEnvironment(config));
  });

  it("rejects unknown backends", () => {
    expect(() => createEnvironment(loadConfig({ execution: { backend: "cloud" } }))).toThrow(
      "unknown execution backend: cloud"
    );
  });

  it("accepts registered backends", async () => {
    registerEnvironment("canned", () =>
      new MockExecutionEnvironment({ defaultResult: createExecutionResult({ result: "canned", success: true }) })
    );
    expect(listEnvironmentKinds()).toEqual(expect.arrayContaining(["local", "mock", "remote", "canned"]));
    const env = createEnvironment(loadConfig({ execution: { backend: "canned" } }));
    expect((await env.execute("anything")).result).toBe("canned");
  });
});
