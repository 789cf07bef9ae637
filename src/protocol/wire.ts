import { Ajv, type ValidateFunction } from "ajv";

import type { ExecutionResultWire, ProcessEvent } from "../types.js";

const nullableString = { type: ["string", "null"] } as const;

const resultWireSchema = {
  type: "object",
  properties: {
    success: { type: "boolean" },
    duration: { type: "number", minimum: 0 },
    error: nullableString,
    error_type: nullableString,
    stdout: { type: "string" },
    stderr: { type: "string" },
    exit_code: { type: ["integer", "null"] }
  },
  required: ["result", "success", "duration", "error", "error_type", "stdout", "stderr", "exit_code"]
} as const;

const processEventSchema = {
  type: "object",
  required: ["type", "processId"],
  properties: { processId: { type: "string" } },
  oneOf: [
    {
      properties: { type: { const: "started" }, command: { type: "string" } },
      required: ["command"]
    },
    {
      properties: {
        type: { const: "output" },
        stream: { enum: ["stdout", "stderr"] },
        data: { type: "string" }
      },
      required: ["stream", "data"]
    },
    {
      properties: { type: { const: "completed" }, exitCode: { type: "integer" } },
      required: ["exitCode"]
    }
  ]
} as const;

const ajv = new Ajv({ strict: false, allErrors: true });
const validateResultWire: ValidateFunction<unknown> = ajv.compile(resultWireSchema);
const validateProcessEvent: ValidateFunction<unknown> = ajv.compile(processEventSchema);

export function isExecutionResultWire(value: unknown): value is ExecutionResultWire {
  return validateResultWire(value);
}

export function isProcessEvent(value: unknown): value is ProcessEvent {
  return validateProcessEvent(value);
}

export function wireErrors(kind: "result" | "event"): string {
  return ajv.errorsText(kind === "result" ? validateResultWire.errors : validateProcessEvent.errors);
}
