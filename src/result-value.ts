/**
 * Value captured from executed code. Closed over what JSON can carry, plus an
 * explicit opaque marker for anything that cannot be serialized.
 */
export type ResultValue =
  | null
  | boolean
  | number
  | string
  | ResultValue[]
  | { [key: string]: ResultValue }
  | OpaqueValue;

/** Wire key marking an opaque value: `{"$opaque": "<repr>"}`. */
export const OPAQUE_KEY = "$opaque";

export class OpaqueValue {
  readonly kind = "opaque";

  constructor(readonly repr: string) {}

  toJSON(): { [OPAQUE_KEY]: string } {
    return { [OPAQUE_KEY]: this.repr };
  }

  toString(): string {
    return this.repr;
  }
}

export function isOpaque(value: ResultValue): value is OpaqueValue {
  return value instanceof OpaqueValue;
}

function isPlainRecord(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Rebuild a ResultValue from parsed JSON. Single-key `$opaque` objects become
 * OpaqueValue instances; anything JSON.parse cannot produce is marked opaque.
 */
export function fromWire(raw: unknown): ResultValue {
  if (raw === null || raw === undefined) return null;
  if (typeof raw === "boolean" || typeof raw === "string") return raw;
  if (typeof raw === "number") {
    return Number.isFinite(raw) ? raw : new OpaqueValue(String(raw));
  }
  if (Array.isArray(raw)) {
    return raw.map((item) => fromWire(item));
  }
  if (typeof raw === "object" && isPlainRecord(raw)) {
    const keys = Object.keys(raw);
    const marker = raw[OPAQUE_KEY];
    if (keys.length === 1 && typeof marker === "string") {
      return new OpaqueValue(marker);
    }
    const out: { [key: string]: ResultValue } = {};
    for (const key of keys) {
      out[key] = fromWire(raw[key]);
    }
    return out;
  }
  return new OpaqueValue(String(raw));
}

/**
 * Convert an arbitrary in-process value into a ResultValue. Used by the mock
 * backend and by callers building results by hand.
 */
export function toResultValue(value: unknown, seen: WeakSet<object> = new WeakSet()): ResultValue {
  if (value === null || value === undefined) return null;
  if (value instanceof OpaqueValue) return value;
  switch (typeof value) {
    case "boolean":
    case "string":
      return value;
    case "number":
      return Number.isFinite(value) ? value : new OpaqueValue(String(value));
    case "bigint":
      return new OpaqueValue(`${value.toString()}n`);
    case "symbol":
      return new OpaqueValue(value.toString());
    case "function":
      return new OpaqueValue(`[Function ${value.name || "anonymous"}]`);
    default:
      break;
  }
  if (typeof value !== "object") {
    return new OpaqueValue(String(value));
  }
  if (seen.has(value)) {
    return new OpaqueValue("[Circular]");
  }
  seen.add(value);
  try {
    if (Array.isArray(value)) {
      return value.map((item: unknown) => toResultValue(item, seen));
    }
    if (!isPlainRecord(value)) {
      const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
      const name = typeof ctor === "function" && ctor.name ? ctor.name : "Object";
      return new OpaqueValue(`[object ${name}]`);
    }
    const out: { [key: string]: ResultValue } = {};
    for (const [key, entry] of Object.entries(value)) {
      out[key] = toResultValue(entry, seen);
    }
    return out;
  } finally {
    seen.delete(value);
  }
}

/** Serialize a ResultValue into its JSON wire form (opaque values via toJSON). */
export function toWire(value: ResultValue): unknown {
  return JSON.parse(JSON.stringify(value)) as unknown;
}

/** Human-readable rendering used for the synthetic `Result:` stream line. */
export function describeResult(value: ResultValue): string {
  if (typeof value === "string") return value;
  if (value instanceof OpaqueValue) return value.repr;
  return JSON.stringify(value);
}
