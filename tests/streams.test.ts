import { describe, expect, it } from "vitest";

import { SENTINEL } from "../src/protocol/sentinel.js";
import { AsyncChannel } from "../src/process/channel.js";
import { collectEvents, LineSplitter, linesFromEvents } from "../src/process/lines.js";
import { exitCodeFrom } from "../src/process/multiplexer.js";
import type { ProcessEvent } from "../src/types.js";

async function drain<T>(source: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of source) {
    out.push(item);
  }
  return out;
}

async function* fromArray(events: ProcessEvent[]): AsyncGenerator<ProcessEvent> {
  yield* events;
}

describe("AsyncChannel", () => {
  it("delivers buffered values, then ends on close", async () => {
    const channel = new AsyncChannel<number>();
    channel.push(1);
    channel.push(2);
    channel.close();
    channel.push(3);
    expect(await drain(channel)).toEqual([1, 2]);
  });

  it("wakes a waiting consumer", async () => {
    const channel = new AsyncChannel<string>();
    const pending = drain(channel);
    setTimeout(() => {
      channel.push("late");
      channel.close();
    }, 20);
    expect(await pending).toEqual(["late"]);
  });

  it("runs onReturn when the consumer stops early", async () => {
    let returned = 0;
    const channel = new AsyncChannel<number>(() => {
      returned += 1;
    });
    channel.push(1);
    channel.push(2);
    for await (const value of channel) {
      expect(value).toBe(1);
      break;
    }
    expect(returned).toBe(1);
    channel.push(3);
    await expect(drain(channel)).rejects.toThrow("channel can only be iterated once");
  });

  it("can only be iterated once", async () => {
    const channel = new AsyncChannel<number>();
    channel.close();
    await drain(channel);
    await expect(drain(channel)).rejects.toThrow("channel can only be iterated once");
  });
});

describe("LineSplitter", () => {
  it("holds back the unterminated tail", () => {
    const splitter = new LineSplitter();
    expect(splitter.push("a\nb")).toEqual(["a"]);
    expect(splitter.push("c\r\nd")).toEqual(["bc"]);
    expect(splitter.flush()).toEqual(["d"]);
    expect(splitter.flush()).toEqual([]);
  });
});

describe("event streams", () => {
  const events: ProcessEvent[] = [
    { type: "started", processId: "p1", command: "node" },
    { type: "output", processId: "p1", stream: "stdout", data: "one\ntw" },
    { type: "output", processId: "p1", stream: "stderr", data: "warn\n" },
    { type: "output", processId: "p1", stream: "stdout", data: `o\nlead${SENTINEL}{"success":true,"result":1}\n` },
    { type: "output", processId: "p1", stream: "stdout", data: "tail" },
    { type: "completed", processId: "p1", exitCode: 0 }
  ];

  it("collects text and exit code", async () => {
    expect(await collectEvents(fromArray(events))).toEqual({
      stdout: `one\ntwo\nlead${SENTINEL}{"success":true,"result":1}\ntail`,
      stderr: "warn\n",
      exitCode: 0
    });
  });

  it("splits lines per stream and withholds the sentinel payload", async () => {
    const lines = await drain(linesFromEvents(fromArray(events), { trailer: (captured) => [`exit ${captured.exitCode}`] }));
    expect(lines).toEqual(["one", "warn", "two", "lead", "tail", "exit 0"]);
  });
});

describe("exitCodeFrom", () => {
  it("maps signals with the 128 + signo convention", () => {
    expect(exitCodeFrom(3, null)).toBe(3);
    expect(exitCodeFrom(null, "SIGKILL")).toBe(137);
    expect(exitCodeFrom(null, "SIGTERM")).toBe(143);
    expect(exitCodeFrom(null, null)).toBe(1);
  });
});
