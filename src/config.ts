import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";

import { LANGUAGES, type Language } from "./types.js";

/** Built-in backends are "local", "mock" and "remote"; others come from `registerEnvironment`. */
export type BackendKind = string;

export interface ExecutionConfig {
  backend: BackendKind;
  language: Language;
  /** Fresh process per call when true; one long-lived kernel per environment when false. */
  isolated: boolean;
  timeoutMs: number;
  /** Keep-warm hint for backends that hold a session between calls. */
  keepAliveMs: number;
  cpu?: number;
  memoryMb?: number;
  /** Shell used by executeCommand; false spawns the first word directly. */
  shell: string | false;
  killGraceMs: number;
  cwd?: string;
  env: Record<string, string>;
  executables: Partial<Record<Language, string>>;
}

export interface RemoteConfig {
  baseUrl: string;
  token?: string;
  protocolVersion: string;
}

export interface GatewayConfig {
  bind: "loopback" | "0.0.0.0";
  port: number;
  bodyLimitBytes: number;
  auth: {
    mode: "token" | "none";
    token?: string;
  };
  protocolVersion: string;
  rateLimitPerMinute: number;
}

export interface RunboxConfig {
  execution: ExecutionConfig;
  remote: RemoteConfig;
  gateway: GatewayConfig;
}

export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends Array<infer U>
    ? U[]
    : T[K] extends object
      ? DeepPartial<T[K]>
      : T[K];
};

export const DEFAULT_CONFIG: RunboxConfig = {
  execution: {
    backend: "local",
    language: "javascript",
    isolated: true,
    timeoutMs: 30_000,
    keepAliveMs: 5 * 60_000,
    shell: process.platform === "win32" ? "cmd.exe" : "/bin/sh",
    killGraceMs: 500,
    env: {},
    executables: {}
  },
  remote: {
    baseUrl: "http://127.0.0.1:8787",
    protocolVersion: "1.0"
  },
  gateway: {
    bind: "loopback",
    port: 8787,
    bodyLimitBytes: 1024 * 1024,
    auth: { mode: "token", token: "changeme" },
    protocolVersion: "1.0",
    rateLimitPerMinute: 120
  }
};

function merge<T extends object>(base: T, override?: DeepPartial<T>): T {
  if (!override) {
    return base;
  }
  const out: Record<string, unknown> = { ...(base as Record<string, unknown>) };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) {
      continue;
    }
    const current = out[key];
    if (value && typeof value === "object" && !Array.isArray(value) && current && typeof current === "object") {
      out[key] = merge(current as object, value as DeepPartial<object>);
      continue;
    }
    out[key] = value;
  }
  return out as T;
}

function assertPositive(value: number, name: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`${name} must be a positive number`);
  }
}

export function loadConfig(raw?: DeepPartial<RunboxConfig>): RunboxConfig {
  const config = merge(DEFAULT_CONFIG, raw);
  const { execution } = config;
  if (typeof execution.backend !== "string" || !execution.backend.trim()) {
    throw new Error("execution.backend must be a non-empty string");
  }
  if (!LANGUAGES.includes(execution.language)) {
    throw new Error(`unsupported language: ${execution.language}`);
  }
  assertPositive(execution.timeoutMs, "execution.timeoutMs");
  assertPositive(execution.killGraceMs, "execution.killGraceMs");
  if (execution.cpu !== undefined) assertPositive(execution.cpu, "execution.cpu");
  if (execution.memoryMb !== undefined) assertPositive(execution.memoryMb, "execution.memoryMb");
  if (execution.backend === "remote" && !config.remote.baseUrl) {
    throw new Error("remote backend requires remote.baseUrl");
  }
  if (config.gateway.auth.mode !== "none" && !config.gateway.auth.token) {
    throw new Error("secure config requires gateway auth token");
  }
  return config;
}

export interface LoadConfigFromDiskOptions {
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

function isLiteralNullishToken(value: string | undefined): boolean {
  if (value === undefined) {
    return false;
  }
  const normalized = value.trim().toLowerCase();
  return normalized === "undefined" || normalized === "null";
}

export function resolveConfigPath(options: LoadConfigFromDiskOptions = {}): string {
  if (options.configPath) {
    return options.configPath;
  }
  const env = options.env ?? process.env;
  if (env.RUNBOX_CONFIG_PATH) {
    return env.RUNBOX_CONFIG_PATH;
  }
  return join(options.cwd ?? process.cwd(), "runbox.json");
}

export function loadConfigFromDisk(options: LoadConfigFromDiskOptions = {}): RunboxConfig {
  const configPath = resolveConfigPath(options);
  if (!existsSync(configPath)) {
    return loadConfig();
  }
  const rawText = readFileSync(configPath, "utf8");
  const parsed = JSON.parse(rawText) as DeepPartial<RunboxConfig>;
  return loadConfig(parsed);
}

export interface StartupValidationOptions {
  allowInsecureDefaults: boolean;
}

export function validateStartupConfig(config: RunboxConfig, options: StartupValidationOptions): void {
  if (options.allowInsecureDefaults || config.gateway.auth.mode === "none") {
    return;
  }
  const token = config.gateway.auth.token;
  if (token?.trim() === "changeme") {
    throw new Error("refusing startup with placeholder gateway credentials");
  }
  if (isLiteralNullishToken(token)) {
    throw new Error('refusing startup with invalid literal gateway credentials ("undefined"/"null")');
  }
}

export function isDevMode(env: NodeJS.ProcessEnv = process.env): boolean {
  return /^(1|true|yes)$/i.test(env.RUNBOX_DEV_MODE ?? "");
}
