import { Ajv, type ValidateFunction } from "ajv";

/** Prefix of the one stdout line carrying the structured result payload. */
export const SENTINEL = "__RUNBOX_RESULT_7f3a9c1e__";

/** Line a shared kernel writes on both streams once a request is fully answered; the request id follows it. */
export const KERNEL_DONE_MARKER = "__RUNBOX_DONE_7f3a9c1e__";

/** Entry function awaited by the wrapper when the code defines it. */
export const ENTRY_FUNCTION = "main";

/** Variable holding the final value when there is no entry function. */
export const RESULT_VARIABLE = "_result";

export interface SentinelPayload {
  result?: unknown;
  success: boolean;
  error?: string | null;
  error_type?: string | null;
}

const payloadSchema = {
  type: "object",
  properties: {
    success: { type: "boolean" },
    error: { type: ["string", "null"] },
    error_type: { type: ["string", "null"] }
  },
  required: ["success"],
  additionalProperties: true
} as const;

const ajv = new Ajv({ strict: false, allErrors: true });
const validatePayload: ValidateFunction<unknown> = ajv.compile(payloadSchema);

function isSentinelPayload(value: unknown): value is SentinelPayload {
  return validatePayload(value);
}

export function formatSentinelLine(payload: SentinelPayload): string {
  return `${SENTINEL}${JSON.stringify(payload)}`;
}

/**
 * Parse the JSON following the sentinel. Returns the reason on failure so the
 * decoder can degrade to a protocol error instead of throwing.
 */
export function parseSentinelPayload(
  raw: string
): { ok: true; payload: SentinelPayload } | { ok: false; reason: string } {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { ok: false, reason: "malformed result payload" };
  }
  if (!isSentinelPayload(parsed)) {
    const detail = ajv.errorsText(validatePayload.errors);
    return { ok: false, reason: `invalid result payload (${detail})` };
  }
  return { ok: true, payload: parsed };
}
