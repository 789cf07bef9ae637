import type { RunboxConfig } from "../config.js";
import { LocalExecutionEnvironment, type LocalEnvironmentOptions } from "./local.js";
import { MockExecutionEnvironment } from "./mock.js";
import { RemoteExecutionEnvironment, type RemoteEnvironmentOptions } from "./remote.js";
import type { ExecutionEnvironment } from "./types.js";

export type EnvironmentFactory = (config: RunboxConfig) => ExecutionEnvironment;

function localOptions(config: RunboxConfig): LocalEnvironmentOptions {
  const { execution } = config;
  const options: LocalEnvironmentOptions = {
    language: execution.language,
    isolated: execution.isolated,
    timeoutMs: execution.timeoutMs,
    keepAliveMs: execution.keepAliveMs,
    shell: execution.shell,
    killGraceMs: execution.killGraceMs,
    env: execution.env
  };
  const executable = execution.executables[execution.language];
  if (executable !== undefined) options.executable = executable;
  if (execution.cpu !== undefined) options.cpu = execution.cpu;
  if (execution.memoryMb !== undefined) options.memoryMb = execution.memoryMb;
  if (execution.cwd !== undefined) options.cwd = execution.cwd;
  return options;
}

function remoteOptions(config: RunboxConfig): RemoteEnvironmentOptions {
  const options: RemoteEnvironmentOptions = {
    baseUrl: config.remote.baseUrl,
    protocolVersion: config.remote.protocolVersion,
    language: config.execution.language
  };
  if (config.remote.token !== undefined) options.token = config.remote.token;
  return options;
}

const builtin: Record<string, EnvironmentFactory> = {
  local: (config) => new LocalExecutionEnvironment(localOptions(config)),
  mock: (config) => new MockExecutionEnvironment({ language: config.execution.language }),
  remote: (config) => new RemoteExecutionEnvironment(remoteOptions(config))
};

/**
 * Build the environment named by `config.execution.backend`. Every call
 * returns a new instance; environments own processes and are not shared.
 */
export function createEnvironment(config: RunboxConfig): ExecutionEnvironment {
  const factory = builtin[config.execution.backend];
  if (!factory) {
    throw new Error(`unknown execution backend: ${config.execution.backend}`);
  }
  return factory(config);
}

/** Register (or replace) a backend under an id usable as `execution.backend`. */
export function registerEnvironment(backendId: string, factory: EnvironmentFactory): void {
  builtin[backendId] = factory;
}

export function listEnvironmentKinds(): string[] {
  return Object.keys(builtin);
}
