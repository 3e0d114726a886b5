import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { closeHost, formatLogArgs, handleLine, interceptConsole } from "./harness.js";
import type { HarnessIO } from "./harness.js";
import { PublisherHost } from "./host.js";
import { PROTOCOL_VERSION } from "./protocol.js";
import type { ChildMessage } from "./protocol.js";
import type { PublisherFactory } from "./types.js";

const factory: PublisherFactory = () => ({
  publisherId: "test-pub",
  updateInterval: 60_000,
  publishNodes: () => {},
  update: async () => {},
});

describe("handleLine", () => {
  let sent: ChildMessage[];
  let errors: string[];
  let io: HarnessIO;
  let host: PublisherHost;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["setInterval", "clearInterval"] });
    sent = [];
    errors = [];
    io = { send: (msg) => sent.push(msg), stderr: (text) => errors.push(text) };
    host = new PublisherHost(factory, { send: io.send, exit: vi.fn() });
  });

  afterEach(async () => {
    await host.stop();
    vi.restoreAllMocks();
    vi.useRealTimers();
  });

  it("reports a line that is not JSON", async () => {
    await handleLine("not json", host, io);

    expect(errors).toEqual(["[publisher-sdk] Failed to parse message: not json\n"]);
    expect(sent).toEqual([]);
  });

  it("reports a message that does not match the protocol", async () => {
    await handleLine(JSON.stringify({ type: "update" }), host, io);

    expect(errors).toHaveLength(1);
    expect(errors[0].startsWith("[publisher-sdk] Invalid message:")).toBe(true);
    expect(sent).toEqual([]);
  });

  it("dispatches valid messages to the host", async () => {
    await handleLine(JSON.stringify({ type: "ping", requestId: "r1" }), host, io);
    await handleLine(JSON.stringify({ type: "init", protocolVersion: PROTOCOL_VERSION, config: {} }), host, io);
    await handleLine(JSON.stringify({ type: "ping", requestId: "r2" }), host, io);

    expect(sent[0]).toEqual({ type: "error", requestId: "r1", message: "Not initialized" });
    expect(sent.map((m) => m.type)).toContain("ready");
    expect(sent[sent.length - 1]).toEqual({ type: "pong", requestId: "r2" });
    expect(host.state?.zone).toBe("local");
    expect(errors).toEqual([]);
  });

  it("reports a failure the host did not handle", async () => {
    vi.spyOn(host, "handleMessage").mockRejectedValue(new Error("boom"));

    await handleLine(JSON.stringify({ type: "shutdown" }), host, io);

    expect(sent).toEqual([{ type: "error", message: "Unhandled error: boom" }]);
  });
});

describe("closeHost", () => {
  it("stops the host and exits cleanly", async () => {
    const host = new PublisherHost(factory, { send: vi.fn(), exit: vi.fn() });
    const stop = vi.spyOn(host, "stop");
    const exit = vi.fn();
    const errors: string[] = [];

    await closeHost(host, { send: vi.fn(), stderr: (text) => errors.push(text) }, exit);

    expect(stop).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(0);
    expect(errors).toEqual([]);
  });

  it("still exits when stopping fails", async () => {
    const host = new PublisherHost(factory, { send: vi.fn(), exit: vi.fn() });
    vi.spyOn(host, "stop").mockRejectedValue(new Error("destroy failed"));
    const exit = vi.fn();
    const errors: string[] = [];

    await closeHost(host, { send: vi.fn(), stderr: (text) => errors.push(text) }, exit);

    expect(errors).toEqual(["[publisher-sdk] Shutdown failed: destroy failed\n"]);
    expect(exit).toHaveBeenCalledWith(0);
  });
});

describe("interceptConsole", () => {
  const original = {
    log: console.log,
    info: console.info,
    warn: console.warn,
    error: console.error,
    debug: console.debug,
  };

  afterEach(() => {
    console.log = original.log;
    console.info = original.info;
    console.warn = original.warn;
    console.error = original.error;
    console.debug = original.debug;
  });

  it("forwards console output as log messages", () => {
    const sent: ChildMessage[] = [];
    interceptConsole((msg) => sent.push(msg));

    console.error("[Scheduler] update failed:", new Error("boom"));
    console.log("[OpenWeatherMap] Cities", ["Oslo"], 2);
    console.warn("careful");

    expect(sent).toEqual([
      { type: "log", level: "error", message: "[Scheduler] update failed: boom" },
      { type: "log", level: "info", message: '[OpenWeatherMap] Cities ["Oslo"] 2' },
      { type: "log", level: "warn", message: "careful" },
    ]);
  });
});

describe("formatLogArgs", () => {
  it("uses the message of an Error and serialises other values", () => {
    expect(formatLogArgs(["failed:", new TypeError("bad city"), { code: 404 }])).toBe('failed: bad city {"code":404}');
  });
});
