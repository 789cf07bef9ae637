export {
  DEFAULT_CONFIG,
  isDevMode,
  loadConfig,
  loadConfigFromDisk,
  resolveConfigPath,
  validateStartupConfig,
  type BackendKind,
  type DeepPartial,
  type ExecutionConfig,
  type GatewayConfig,
  type RemoteConfig,
  type RunboxConfig
} from "./config.js";
export {
  ERROR_TYPES,
  ExecutionTimeoutError,
  ProcessLaunchError,
  ProcessNotFoundError,
  ProtocolDecodeError,
  RemoteRequestError,
  type RuntimeErrorType
} from "./errors.js";
export { LocalExecutionEnvironment, type LocalEnvironmentOptions } from "./environments/local.js";
export {
  MockExecutionEnvironment,
  MockProcessManager,
  type MockEnvironmentOptions,
  type MockProcessManagerOptions
} from "./environments/mock.js";
export {
  RemoteExecutionEnvironment,
  type RemoteEnvironmentOptions,
  type RemoteRequestInit,
  type RemoteResponse,
  type RemoteTransport
} from "./environments/remote.js";
export {
  createEnvironment,
  listEnvironmentKinds,
  registerEnvironment,
  type EnvironmentFactory
} from "./environments/registry.js";
export { SharedKernel } from "./environments/shared-kernel.js";
export { withEnvironment, type EnvironmentOptions, type ExecutionEnvironment } from "./environments/types.js";
export { buildGateway, type GatewayDependencies } from "./gateway.js";
export { KILLED_EXIT_CODE, ProcessRegistry, type ProcessRegistryOptions } from "./process/registry.js";
export type { EventsOptions, ProcessManager, StartProcessOptions, WaitOptions } from "./process/types.js";
export * from "./protocol/index.js";
export { OpaqueValue, describeResult, isOpaque, type ResultValue } from "./result-value.js";
export {
  LANGUAGES,
  createExecutionResult,
  failureResult,
  resultFromWire,
  resultToWire,
  type ExecutionResult,
  type ExecutionResultWire,
  type Language,
  type OutputEvent,
  type OutputStream,
  type ProcessCompletedEvent,
  type ProcessEvent,
  type ProcessInfo,
  type ProcessOutput,
  type ProcessStartedEvent
} from "./types.js";
