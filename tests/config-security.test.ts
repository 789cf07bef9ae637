import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join, resolve } from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import {
  DEFAULT_CONFIG,
  isDevMode,
  loadConfig,
  loadConfigFromDisk,
  resolveConfigPath,
  validateStartupConfig
} from "../src/config.js";

const tempDirs: string[] = [];

afterEach(async () => {
  while (tempDirs.length > 0) {
    const dir = tempDirs.pop();
    if (dir) {
      await rm(dir, { recursive: true, force: true });
    }
  }
});

describe("config security startup rules", () => {
  it("rejects placeholder credentials at startup in secure mode", () => {
    const config = loadConfigFromDisk({
      cwd: "/definitely/missing-path"
    });
    expect(() =>
      validateStartupConfig(config, {
        allowInsecureDefaults: false
      })
    ).toThrow(/placeholder gateway credentials/i);
  });

  it("allows insecure defaults in explicit dev mode", () => {
    const config = loadConfig();
    expect(() =>
      validateStartupConfig(config, {
        allowInsecureDefaults: true
      })
    ).not.toThrow();
  });

  it("rejects literal undefined/null tokens", () => {
    for (const token of ["undefined", " NULL "]) {
      const config = loadConfig({ gateway: { auth: { mode: "token", token } } });
      expect(() => validateStartupConfig(config, { allowInsecureDefaults: false })).toThrow(/invalid literal/);
    }
  });

  it("accepts a real token and auth mode none", () => {
    expect(() =>
      validateStartupConfig(loadConfig({ gateway: { auth: { token: "test-secret" } } }), { allowInsecureDefaults: false })
    ).not.toThrow();
    expect(() =>
      validateStartupConfig(loadConfig({ gateway: { auth: { mode: "none" } } }), { allowInsecureDefaults: false })
    ).not.toThrow();
  });

  it("reads dev mode from RUNBOX_DEV_MODE", () => {
    expect(isDevMode({ RUNBOX_DEV_MODE: "1" })).toBe(true);
    expect(isDevMode({ RUNBOX_DEV_MODE: "TRUE" })).toBe(true);
    expect(isDevMode({ RUNBOX_DEV_MODE: "0" })).toBe(false);
    expect(isDevMode({})).toBe(false);
  });
});

describe("config loading", () => {
  it("deep-merges overrides onto the defaults", () => {
    const config = loadConfig({ execution: { timeoutMs: 1_500, isolated: false } });
    expect(config.execution.timeoutMs).toBe(1_500);
    expect(config.execution.isolated).toBe(false);
    expect(config.execution.language).toBe("javascript");
    expect(config.execution.killGraceMs).toBe(500);
    expect(config.gateway).toEqual(DEFAULT_CONFIG.gateway);
  });

  it("does not mutate the defaults", () => {
    loadConfig({ execution: { timeoutMs: 10 } });
    expect(DEFAULT_CONFIG.execution.timeoutMs).toBe(30_000);
  });

  it("rejects invalid execution settings", () => {
    expect(() => loadConfig({ execution: { timeoutMs: 0 } })).toThrow("execution.timeoutMs must be a positive number");
    expect(() => loadConfig({ execution: { memoryMb: -1 } })).toThrow("execution.memoryMb must be a positive number");
    expect(() => loadConfig({ execution: { backend: "  " } })).toThrow("execution.backend must be a non-empty string");
    expect(() => loadConfig({ remote: { baseUrl: "" }, execution: { backend: "remote" } })).toThrow(
      "remote backend requires remote.baseUrl"
    );
  });

  it("requires a gateway token in token mode", () => {
    expect(() => loadConfig({ gateway: { auth: { mode: "token", token: "" } } })).toThrow(
      "secure config requires gateway auth token"
    );
  });

  it("resolves the config path from options, env, then cwd", () => {
    expect(resolveConfigPath({ configPath: "/etc/runbox.json" })).toBe("/etc/runbox.json");
    expect(resolveConfigPath({ env: { RUNBOX_CONFIG_PATH: "/tmp/custom.json" } })).toBe("/tmp/custom.json");
    expect(resolveConfigPath({ cwd: "/srv/app", env: {} })).toBe(resolve("/srv/app", "runbox.json"));
  });

  it("loads runbox.json from disk", async () => {
    const dir = await mkdtemp(join(tmpdir(), "runbox-config-"));
    tempDirs.push(dir);
    await writeFile(
      join(dir, "runbox.json"),
      JSON.stringify({
        execution: { backend: "mock", language: "python", timeoutMs: 2_000 },
        gateway: { port: 9999, auth: { token: "test-secret" } }
      }),
      "utf8"
    );
    const config = loadConfigFromDisk({ cwd: dir, env: {} });
    expect(config.execution.backend).toBe("mock");
    expect(config.execution.language).toBe("python");
    expect(config.execution.timeoutMs).toBe(2_000);
    expect(config.gateway.port).toBe(9999);
    expect(config.gateway.auth).toEqual({ mode: "token", token: "test-secret" });
  });

  it("rejects an unsupported language from disk", async () => {
    const dir = await mkdtemp(join(tmpdir(), "runbox-config-"));
    tempDirs.push(dir);
    const configPath = join(dir, "custom.json");
    await writeFile(configPath, JSON.stringify({ execution: { language: "cobol" } }), "utf8");
    expect(() => loadConfigFromDisk({ configPath })).toThrow("unsupported language: cobol");
  });
});
