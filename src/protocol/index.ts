export { classifyStderr, decodeOutput, findSentinel, formatResultLine, type SentinelMatch } from "./decode.js";
export { getLanguageRuntime, wrapCode, type LanguageRuntime } from "./languages.js";
export {
  ENTRY_FUNCTION,
  KERNEL_DONE_MARKER,
  RESULT_VARIABLE,
  SENTINEL,
  formatSentinelLine,
  parseSentinelPayload,
  type SentinelPayload
} from "./sentinel.js";
export { isExecutionResultWire, isProcessEvent, wireErrors } from "./wire.js";
