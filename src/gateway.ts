import { Readable } from "node:stream";

import Fastify, { type FastifyInstance, type FastifyRequest } from "fastify";

import type { RunboxConfig } from "./config.js";
import type { ExecutionEnvironment } from "./environments/types.js";
import { AuthService, MethodRateLimiter, createAuditId, redactSecrets } from "./security.js";
import { LANGUAGES, resultToWire, type ProcessEvent, type RpcRequest, type RpcResponse } from "./types.js";

export class RpcGatewayError extends Error {
  constructor(
    readonly statusCode: number,
    readonly rpcCode: string,
    readonly clientMessage: string
  ) {
    super(clientMessage);
    this.name = "RpcGatewayError";
  }
}

export interface GatewayDependencies {
  config: RunboxConfig;
  environment: ExecutionEnvironment;
  auth?: AuthService;
  rateLimiter?: MethodRateLimiter;
}

const RPC_METHODS = new Set(["execute", "execute_command"]);
const STREAM_METHODS = new Set(["stream_code", "stream_command"]);

interface AdmittedRequest {
  body: RpcRequest;
  auditId: string;
}

export function buildGateway(deps: GatewayDependencies): FastifyInstance {
  const { config, environment } = deps;
  const auth = deps.auth ?? new AuthService(config.gateway.auth);
  const rateLimiter = deps.rateLimiter ?? new MethodRateLimiter(config.gateway.rateLimitPerMinute, 60_000);
  const app = Fastify({
    logger: false,
    bodyLimit: config.gateway.bodyLimitBytes
  });

  function admit(request: FastifyRequest, allowed: Set<string>): AdmittedRequest {
    const auditId = createAuditId("req");
    const body = parseEnvelope(request.body);
    if (body.version !== config.gateway.protocolVersion) {
      throw new RpcGatewayError(400, "PROTO_VERSION_UNSUPPORTED", "Unsupported protocol version");
    }
    const verdict = auth.authorize({ headers: mapHeaders(request.headers) });
    if (!verdict.ok) {
      throw new RpcGatewayError(401, verdict.reason ?? "AUTH_INVALID", "Unauthorized");
    }
    if (!allowed.has(body.method)) {
      throw new RpcGatewayError(400, "BAD_REQUEST", `unknown method: ${body.method}`);
    }
    if (!rateLimiter.allow(body.method, request.ip || "unknown")) {
      throw new RpcGatewayError(429, "RATE_LIMITED", "Rate limited");
    }
    const language = body.params?.language;
    if (language !== undefined && language !== environment.language) {
      const known = LANGUAGES.some((entry) => entry === language);
      throw new RpcGatewayError(
        400,
        "BAD_REQUEST",
        known ? `gateway runs ${environment.language}, not ${String(language)}` : `unsupported language: ${String(language)}`
      );
    }
    return { body, auditId };
  }

  app.get("/health", async () => {
    return {
      ok: true,
      time: new Date().toISOString(),
      backend: environment.kind,
      language: environment.language
    };
  });

  app.post("/rpc", async (request, reply) => {
    let admitted: AdmittedRequest | undefined;
    try {
      admitted = admit(request, RPC_METHODS);
      const { body, auditId } = admitted;
      const result =
        body.method === "execute"
          ? await environment.execute(stringParam(body, "code"))
          : await environment.executeCommand(stringParam(body, "command"));
      const response: RpcResponse = {
        auditId,
        ok: true,
        result: resultToWire(result)
      };
      if (body.id !== undefined) {
        response.id = body.id;
      }
      return response;
    } catch (error: unknown) {
      const mapped = mapRpcError(error);
      return reply
        .code(mapped.statusCode)
        .send(errorResponse(admitted?.body.id, admitted?.auditId ?? createAuditId("req"), mapped.rpcCode, mapped.clientMessage));
    }
  });

  app.post("/stream", async (request, reply) => {
    let admitted: AdmittedRequest | undefined;
    let events: AsyncIterable<ProcessEvent>;
    try {
      admitted = admit(request, STREAM_METHODS);
      const { body } = admitted;
      events =
        body.method === "stream_code"
          ? environment.streamCode(stringParam(body, "code"))
          : environment.streamCommand(stringParam(body, "command"));
    } catch (error: unknown) {
      const mapped = mapRpcError(error);
      return reply
        .code(mapped.statusCode)
        .send(errorResponse(admitted?.body.id, admitted?.auditId ?? createAuditId("req"), mapped.rpcCode, mapped.clientMessage));
    }
    // A client disconnect destroys the stream, which returns the generator and kills the process.
    return reply.header("content-type", "application/x-ndjson").send(Readable.from(toNdjson(events)));
  });

  return app;
}

async function* toNdjson(events: AsyncIterable<ProcessEvent>): AsyncGenerator<string> {
  for await (const event of events) {
    yield `${JSON.stringify(event)}\n`;
  }
}

function parseEnvelope(value: unknown): RpcRequest {
  if (typeof value !== "object" || value === null) {
    throw new RpcGatewayError(400, "PROTO_VERSION_UNSUPPORTED", "Invalid RPC envelope");
  }
  const method: unknown = "method" in value ? value.method : undefined;
  const version: unknown = "version" in value ? value.version : undefined;
  if (typeof method !== "string" || !method || typeof version !== "string" || !version) {
    throw new RpcGatewayError(400, "PROTO_VERSION_UNSUPPORTED", "Invalid RPC envelope");
  }
  const envelope: RpcRequest = { method, version };
  const id: unknown = "id" in value ? value.id : undefined;
  if (typeof id === "string") {
    envelope.id = id;
  }
  const params: unknown = "params" in value ? value.params : undefined;
  if (params !== undefined) {
    if (typeof params !== "object" || params === null || Array.isArray(params)) {
      throw new RpcGatewayError(400, "BAD_REQUEST", "params must be an object");
    }
    envelope.params = Object.fromEntries(Object.entries(params));
  }
  return envelope;
}

function stringParam(body: RpcRequest, name: string): string {
  const value = body.params?.[name];
  if (typeof value !== "string") {
    throw new RpcGatewayError(400, "BAD_REQUEST", `${name} must be a string`);
  }
  return value;
}

export function errorResponse(id: string | undefined, auditId: string, code: string, message: string): RpcResponse {
  const response: RpcResponse = {
    auditId,
    ok: false,
    error: {
      code,
      message
    }
  };
  if (id !== undefined) {
    response.id = id;
  }
  return response;
}

function mapHeaders(headers: Record<string, unknown>): Record<string, string | undefined> {
  const out: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (Array.isArray(value)) {
      out[key.toLowerCase()] = value.join(",");
    } else if (typeof value === "string") {
      out[key.toLowerCase()] = value;
    } else {
      out[key.toLowerCase()] = undefined;
    }
  }
  return out;
}

export function mapRpcError(error: unknown): {
  statusCode: number;
  rpcCode: string;
  clientMessage: string;
} {
  if (error instanceof RpcGatewayError) {
    return {
      statusCode: error.statusCode,
      rpcCode: error.rpcCode,
      clientMessage: error.clientMessage
    };
  }
  console.warn("[runbox] gateway request failed:", redactSecrets(error instanceof Error ? error.message : String(error)));
  return {
    statusCode: 500,
    rpcCode: "INTERNAL",
    clientMessage: "Internal server error"
  };
}
