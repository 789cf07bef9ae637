import { ERROR_TYPES, errorMessage, RemoteRequestError } from "../errors.js";
import { decodeOutput, findSentinel, formatResultLine } from "../protocol/decode.js";
import { isExecutionResultWire, isProcessEvent, wireErrors } from "../protocol/wire.js";
import { linesFromEvents } from "../process/lines.js";
import {
  failureResult,
  resultFromWire,
  type ExecutionResult,
  type Language,
  type ProcessEvent,
  type RpcRequest,
  type RpcResponse
} from "../types.js";
import type { ExecutionEnvironment } from "./types.js";

export interface RemoteRequestInit {
  method: "GET" | "POST";
  headers: Record<string, string>;
  body?: string;
}

interface ChunkReader {
  read(): Promise<{ done: boolean; value?: Uint8Array | undefined }>;
  cancel(): Promise<void>;
  releaseLock(): void;
}

/** The part of a fetch Response the client reads. */
export interface RemoteResponse {
  readonly status: number;
  readonly ok: boolean;
  readonly body: { getReader(): ChunkReader } | null;
  text(): Promise<string>;
}

export type RemoteTransport = (url: string, init: RemoteRequestInit) => Promise<RemoteResponse>;

export interface RemoteEnvironmentOptions {
  baseUrl: string;
  token?: string;
  protocolVersion?: string;
  language?: Language;
  transport?: RemoteTransport;
}

const fetchTransport: RemoteTransport = (url, init) => fetch(url, init);

function isRpcResponse(value: unknown): value is RpcResponse {
  return typeof value === "object" && value !== null && "ok" in value && typeof value.ok === "boolean";
}

/**
 * Client of a runbox gateway. Execution happens on the gateway host; this side
 * rebuilds results from their wire form and derives line streams from the
 * relayed event stream.
 */
export class RemoteExecutionEnvironment implements ExecutionEnvironment {
  readonly kind = "remote";
  readonly language: Language;

  private readonly baseUrl: string;
  private readonly protocolVersion: string;
  private readonly transport: RemoteTransport;
  private sequence = 0;

  constructor(private readonly options: RemoteEnvironmentOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.protocolVersion = options.protocolVersion ?? "1.0";
    this.language = options.language ?? "javascript";
    this.transport = options.transport ?? fetchTransport;
  }

  async start(): Promise<void> {
    const response = await this.transport(`${this.baseUrl}/health`, { method: "GET", headers: this.headers(false) });
    if (!response.ok) {
      throw new RemoteRequestError(response.status, "UNAVAILABLE", `gateway health check failed (${response.status})`);
    }
  }

  async close(): Promise<void> {}

  execute(code: string): Promise<ExecutionResult> {
    return this.call("execute", { code, language: this.language });
  }

  executeCommand(command: string): Promise<ExecutionResult> {
    return this.call("execute_command", { command });
  }

  async *executeStream(code: string): AsyncGenerator<string> {
    yield* linesFromEvents(this.streamCode(code), {
      trailer: (captured) => {
        if (!findSentinel(captured.stdout)) return [];
        const decoded = decodeOutput(captured.stdout, captured.stderr, captured.exitCode);
        return decoded.success && decoded.result !== null ? [formatResultLine(decoded.result)] : [];
      }
    });
  }

  async *executeCommandStream(command: string): AsyncGenerator<string> {
    yield* linesFromEvents(this.streamCommand(command));
  }

  streamCode(code: string): AsyncGenerator<ProcessEvent> {
    return this.stream("stream_code", { code, language: this.language });
  }

  streamCommand(command: string): AsyncGenerator<ProcessEvent> {
    return this.stream("stream_command", { command });
  }

  private headers(json = true): Record<string, string> {
    const headers: Record<string, string> = json ? { "content-type": "application/json" } : {};
    if (this.options.token) {
      headers.authorization = `Bearer ${this.options.token}`;
    }
    return headers;
  }

  private envelope(method: string, params: Record<string, unknown>): string {
    this.sequence += 1;
    const request: RpcRequest = { id: `rbx-${this.sequence}`, version: this.protocolVersion, method, params };
    return JSON.stringify(request);
  }

  private async call(method: string, params: Record<string, unknown>): Promise<ExecutionResult> {
    let response: RemoteResponse;
    try {
      response = await this.transport(`${this.baseUrl}/rpc`, {
        method: "POST",
        headers: this.headers(),
        body: this.envelope(method, params)
      });
    } catch (error: unknown) {
      return failureResult({ error: `gateway unreachable: ${errorMessage(error)}`, errorType: ERROR_TYPES.launch });
    }
    const text = await response.text();
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch {
      throw new RemoteRequestError(response.status, "BAD_RESPONSE", `gateway returned non-JSON body (${response.status})`);
    }
    if (!isRpcResponse(parsed)) {
      throw new RemoteRequestError(response.status, "BAD_RESPONSE", "gateway returned an invalid envelope");
    }
    if (!parsed.ok) {
      throw new RemoteRequestError(
        response.status,
        parsed.error?.code ?? "INTERNAL",
        parsed.error?.message ?? `gateway request failed (${response.status})`
      );
    }
    if (!isExecutionResultWire(parsed.result)) {
      return failureResult({
        error: `invalid result from gateway (${wireErrors("result")})`,
        errorType: ERROR_TYPES.protocol
      });
    }
    return resultFromWire(parsed.result);
  }

  /** NDJSON events from `POST /stream`. */
  private async *stream(method: string, params: Record<string, unknown>): AsyncGenerator<ProcessEvent> {
    const response = await this.transport(`${this.baseUrl}/stream`, {
      method: "POST",
      headers: this.headers(),
      body: this.envelope(method, params)
    });
    if (!response.ok || !response.body) {
      const text = await response.text();
      let message = `gateway stream failed (${response.status})`;
      let code = "INTERNAL";
      try {
        const parsed: unknown = JSON.parse(text);
        if (isRpcResponse(parsed) && parsed.error) {
          message = parsed.error.message;
          code = parsed.error.code;
        }
      } catch (error: unknown) {
        console.warn("[runbox] gateway error body is not JSON:", errorMessage(error));
      }
      throw new RemoteRequestError(response.status, code, message);
    }

    const reader = response.body.getReader();
    const decoder = new TextDecoder();
    let pending = "";
    let finished = false;
    try {
      while (true) {
        const { value, done } = await reader.read();
        pending += done ? decoder.decode() : decoder.decode(value, { stream: true });
        const lines = pending.split("\n");
        pending = done ? "" : (lines.pop() ?? "");
        for (const line of lines) {
          if (!line.trim()) continue;
          const event: unknown = JSON.parse(line);
          if (!isProcessEvent(event)) {
            throw new RemoteRequestError(response.status, "BAD_RESPONSE", `invalid event (${wireErrors("event")})`);
          }
          yield event;
        }
        if (done) break;
      }
      finished = true;
    } finally {
      if (!finished) {
        // Dropping the connection lets the gateway kill the remote process.
        await reader.cancel();
      }
      reader.releaseLock();
    }
  }
}
