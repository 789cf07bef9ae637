import type { Language } from "../types.js";
import { ENTRY_FUNCTION, KERNEL_DONE_MARKER, RESULT_VARIABLE, SENTINEL } from "./sentinel.js";

/**
 * How one target language is launched. Program text is always passed inline
 * (`-e` / `-c`) so a run never leaves files behind.
 */
export interface LanguageRuntime {
  language: Language;
  defaultExecutable: string;
  /** Display name used as the `command` of events for code runs. */
  displayName: string;
  /** Program text running `code` once and emitting the sentinel line. */
  wrap(code: string): string;
  /** Arguments that run `program` with this language's executable. */
  inlineArgs(program: string): string[];
  /** Program text of the long-lived kernel behind non-isolated environments. */
  kernelProgram(): string;
}

const JS_ENCODE = String.raw`
  const encode = (value, seen = new WeakSet()) => {
    if (value === undefined || value === null) return null;
    const kind = typeof value;
    if (kind === "boolean" || kind === "string") return value;
    if (kind === "number") return Number.isFinite(value) ? value : { "$opaque": String(value) };
    if (kind === "bigint") return { "$opaque": value.toString() + "n" };
    if (kind !== "object") return { "$opaque": inspect(value) };
    if (seen.has(value)) return { "$opaque": "[Circular]" };
    seen.add(value);
    try {
      if (Array.isArray(value)) return value.map((item) => encode(item, seen));
      if (typeof value.toJSON === "function") return encode(value.toJSON(), seen);
      const proto = Object.getPrototypeOf(value);
      if (proto !== Object.prototype && proto !== null) return { "$opaque": inspect(value) };
      const out = {};
      for (const [key, entry] of Object.entries(value)) out[key] = encode(entry, seen);
      return out;
    } finally {
      seen.delete(value);
    }
  };
  const failure = (error) => {
    const isError = error instanceof Error;
    const className =
      error !== null && typeof error === "object" && typeof error.constructor === "function"
        ? error.constructor.name
        : "";
    // Subclasses inherit name "Error" unless they set it; their class name is the better token.
    const name = isError && error.name && error.name !== "Error" ? error.name : className || "Error";
    process.stderr.write((isError && error.stack ? error.stack : String(error)) + "\n");
    return { result: null, success: false, error: isError ? error.message : String(error), error_type: name };
  };
  const write = (stream, text) => new Promise((resolve) => stream.write(text, () => resolve()));`;

const javascript: LanguageRuntime = {
  language: "javascript",
  defaultExecutable: process.execPath,
  displayName: "node",
  wrap(code: string): string {
    return String.raw`(() => {
  const { inspect } = require("node:util");
  const sentinel = ${JSON.stringify(SENTINEL)};${JS_ENCODE}
  const run = async () => {
    const captured = await (async () => {
${code}
;
      return [
        typeof ${ENTRY_FUNCTION} === "function" ? ${ENTRY_FUNCTION} : undefined,
        typeof ${RESULT_VARIABLE} === "undefined" ? undefined : ${RESULT_VARIABLE}
      ];
    })();
    if (!Array.isArray(captured)) return null;
    const [entry, value] = captured;
    return entry ? await entry() : value;
  };
  run().then(
    (value) => ({ result: encode(value), success: true, error: null, error_type: null }),
    (error) => failure(error)
  ).then(async (payload) => {
    await write(process.stdout, sentinel + JSON.stringify(payload) + "\n");
    process.exit(payload.success ? 0 : 1);
  });
})();
`;
  },
  inlineArgs(program: string): string[] {
    return ["-e", program];
  },
  kernelProgram(): string {
    return String.raw`(() => {
  const { inspect } = require("node:util");
  const { createInterface } = require("node:readline");
  const vm = require("node:vm");
  const sentinel = ${JSON.stringify(SENTINEL)};
  const done = ${JSON.stringify(KERNEL_DONE_MARKER)};${JS_ENCODE}
  globalThis.require = require;
  const entryLookup = '(typeof ${ENTRY_FUNCTION} === "function" ? ${ENTRY_FUNCTION} : undefined)';
  const resultLookup = '(typeof ${RESULT_VARIABLE} === "undefined" ? undefined : ${RESULT_VARIABLE})';
  const asyncBody = (code, tail) => "(async () => {\n" + code + "\n;\n" + tail + "\n})";
  const compiles = (source) => {
    try {
      new vm.Script(source);
      return true;
    } catch (error) {
      if (error instanceof SyntaxError) return false;
      throw error;
    }
  };
  const handle = async (line) => {
    if (!line.trim()) return;
    const request = JSON.parse(line);
    let payload;
    try {
      vm.runInThisContext("try { ${ENTRY_FUNCTION} = undefined; } catch {}\ntry { ${RESULT_VARIABLE} = undefined; } catch {}");
      let entry;
      let value;
      if (compiles(request.code) || !compiles(asyncBody(request.code, ""))) {
        vm.runInThisContext(request.code, { filename: "<sandbox>" });
        entry = vm.runInThisContext(entryLookup);
        value = vm.runInThisContext(resultLookup);
      } else {
        // Top-level await: run as an async body. Its declarations stay local;
        // only bare assignments and globalThis properties outlive the call.
        [entry, value] = await vm.runInThisContext(
          asyncBody(request.code, "return [" + entryLookup + ", " + resultLookup + "];") + "()",
          { filename: "<sandbox>" }
        );
      }
      if (entry) value = await entry();
      payload = { result: encode(value), success: true, error: null, error_type: null };
    } catch (error) {
      payload = failure(error);
    }
    await write(process.stdout, sentinel + JSON.stringify(payload) + "\n");
    await write(process.stdout, done + request.id + "\n");
    await write(process.stderr, done + request.id + "\n");
  };
  let chain = Promise.resolve();
  const lines = createInterface({ input: process.stdin, crlfDelay: Infinity });
  lines.on("line", (line) => {
    chain = chain.then(() => handle(line));
  });
  lines.on("close", () => {
    chain.then(() => process.exit(0));
  });
})();
`;
  }
};

const PY_PRELUDE = String.raw`import asyncio as _rbx_asyncio
import json as _rbx_json
import sys as _rbx_sys
import traceback as _rbx_traceback

_RBX_SENTINEL = ${JSON.stringify(SENTINEL)}


def _rbx_encode(value, seen=None):
    if seen is None:
        seen = set()
    if value is None or isinstance(value, (bool, str, int)):
        return value
    if isinstance(value, float):
        if value != value or value in (float("inf"), float("-inf")):
            return {"$opaque": repr(value)}
        return value
    if isinstance(value, (list, tuple, dict)):
        if id(value) in seen:
            return {"$opaque": "[Circular]"}
        seen.add(id(value))
        try:
            if isinstance(value, dict):
                return {str(k): _rbx_encode(v, seen) for k, v in value.items()}
            return [_rbx_encode(v, seen) for v in value]
        finally:
            seen.discard(id(value))
    return {"$opaque": repr(value)}


def _rbx_execute(namespace, source):
    try:
        exec(compile(source, "<sandbox>", "exec"), namespace)
        entry = namespace.get(${JSON.stringify(ENTRY_FUNCTION)})
        if callable(entry):
            value = entry()
            if _rbx_asyncio.iscoroutine(value):
                value = _rbx_asyncio.run(value)
        else:
            value = namespace.get(${JSON.stringify(RESULT_VARIABLE)})
        payload = {"result": _rbx_encode(value), "success": True, "error": None, "error_type": None}
    except Exception as exc:
        _rbx_traceback.print_exc()
        payload = {"result": None, "success": False, "error": str(exc), "error_type": type(exc).__name__}
    _rbx_sys.stderr.flush()
    print(_RBX_SENTINEL + _rbx_json.dumps(payload), flush=True)
    return payload["success"]
`;

const python: LanguageRuntime = {
  language: "python",
  defaultExecutable: process.platform === "win32" ? "python" : "python3",
  displayName: "python",
  wrap(code: string): string {
    return `${PY_PRELUDE}

_rbx_sys.exit(0 if _rbx_execute({"__name__": "__main__"}, ${JSON.stringify(code)}) else 1)
`;
  },
  inlineArgs(program: string): string[] {
    return ["-u", "-c", program];
  },
  kernelProgram(): string {
    return String.raw`${PY_PRELUDE}
_RBX_DONE = ${JSON.stringify(KERNEL_DONE_MARKER)}
_rbx_namespace = {"__name__": "__main__"}

while True:
    _rbx_line = _rbx_sys.stdin.readline()
    if not _rbx_line:
        break
    if not _rbx_line.strip():
        continue
    _rbx_request = _rbx_json.loads(_rbx_line)
    _rbx_namespace.pop(${JSON.stringify(ENTRY_FUNCTION)}, None)
    _rbx_namespace.pop(${JSON.stringify(RESULT_VARIABLE)}, None)
    _rbx_execute(_rbx_namespace, _rbx_request["code"])
    print(_RBX_DONE + str(_rbx_request["id"]), flush=True)
    print(_RBX_DONE + str(_rbx_request["id"]), file=_rbx_sys.stderr, flush=True)
`;
  }
};

const RUNTIMES: Record<Language, LanguageRuntime> = { javascript, python };

export function getLanguageRuntime(language: Language): LanguageRuntime {
  return RUNTIMES[language];
}

/** Wrap `code` into a program that reports its outcome on the sentinel line. */
export function wrapCode(code: string, language: Language = "javascript"): string {
  return getLanguageRuntime(language).wrap(code);
}
