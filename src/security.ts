import { randomUUID, timingSafeEqual } from "node:crypto";

export type AuthReasonCode = "AUTH_MISSING" | "AUTH_INVALID";

export interface AuthContext {
  headers: Record<string, string | undefined>;
}

export interface AuthResult {
  ok: boolean;
  reason?: AuthReasonCode;
}

export function createAuditId(prefix = "audit"): string {
  return `${prefix}_${randomUUID()}`;
}

export class MethodRateLimiter {
  private readonly events = new Map<string, number[]>();

  constructor(
    private readonly defaultLimit: number,
    private readonly windowMs: number,
    private readonly methodLimits: Record<string, number> = {}
  ) {}

  allow(method: string, subject: string, now = Date.now()): boolean {
    const key = `${method}:${subject}`;
    const history = this.events.get(key) ?? [];
    const floor = now - this.windowMs;
    const filtered = history.filter((timestamp) => timestamp >= floor);
    const limit = this.methodLimits[method] ?? this.defaultLimit;
    if (filtered.length >= limit) {
      this.events.set(key, filtered);
      return false;
    }
    filtered.push(now);
    this.events.set(key, filtered);
    return true;
  }
}

function tokensEqual(a: string, b: string): boolean {
  const left = Buffer.from(a, "utf8");
  const right = Buffer.from(b, "utf8");
  return left.length === right.length && timingSafeEqual(left, right);
}

/** Bearer-token check for the execution gateway. */
export class AuthService {
  constructor(
    private readonly options: {
      mode: "token" | "none";
      token?: string;
    }
  ) {}

  authorize(context: AuthContext): AuthResult {
    if (this.options.mode === "none") {
      return { ok: true };
    }
    const headerToken = context.headers.authorization?.replace(/^Bearer\s+/i, "");
    if (!headerToken) {
      return { ok: false, reason: "AUTH_MISSING" };
    }
    if (!this.options.token || !tokensEqual(headerToken, this.options.token)) {
      return { ok: false, reason: "AUTH_INVALID" };
    }
    return { ok: true };
  }
}

export function redactSecrets(value: string): string {
  return value
    .replace(/(token|password|secret)\s*[:=]\s*[^\s,]+/gi, "$1=[REDACTED]")
    .replace(/gh[pousr]_[a-zA-Z0-9_]+/g, "[REDACTED_GH_TOKEN]");
}
