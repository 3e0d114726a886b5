import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { PublisherHost } from "./host.js";
import { newConfig } from "./nodes.js";
import { PROTOCOL_VERSION, parentMessageSchema } from "./protocol.js";
import type { ChildMessage } from "./protocol.js";
import { IOType, PUBLISHER_NODE_ID } from "./types.js";
import type { Publisher, PublisherFactory } from "./types.js";

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

function init(config: Record<string, unknown> = {}, nodes?: Record<string, Record<string, string>>) {
  return parentMessageSchema.parse({
    type: "init",
    protocolVersion: PROTOCOL_VERSION,
    zone: "home",
    config,
    nodes,
  });
}

describe("PublisherHost", () => {
  let sent: ChildMessage[];
  let exit: ReturnType<typeof vi.fn>;
  let update: ReturnType<typeof vi.fn>;
  let destroy: ReturnType<typeof vi.fn>;
  let onNodeConfig: Publisher["onNodeConfig"];
  let updateError: Error | null;
  let host: PublisherHost;

  const factory: PublisherFactory = () => ({
    publisherId: "test-pub",
    updateInterval: 60_000,
    publishNodes: (pub) => {
      const node = pub.nodes.updateNode(pub.newNode("Oslo"));
      pub.nodes.updateNodeConfig(node, newConfig("language", "enum", "Language", "en"));
      pub.outputs.newOutput(node, IOType.Temperature, "current");
    },
    update: async (pub) => {
      update(pub);
      if (updateError) throw updateError;
    },
    onNodeConfig,
    destroy: async () => {
      destroy();
    },
  });

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["setInterval", "clearInterval"] });
    sent = [];
    exit = vi.fn();
    update = vi.fn();
    destroy = vi.fn();
    onNodeConfig = undefined;
    updateError = null;
    host = new PublisherHost(factory, { send: (msg) => sent.push(msg), exit });
  });

  afterEach(async () => {
    await host.stop();
    vi.useRealTimers();
  });

  it("rejects a protocol version mismatch", async () => {
    await host.handleMessage({ type: "init", protocolVersion: 99, zone: "home", config: {} });

    expect(sent).toEqual([
      { type: "error", message: `Protocol version mismatch: expected ${PROTOCOL_VERSION}, got 99` },
    ]);
    expect(exit).toHaveBeenCalledWith(1);
  });

  it("provisions nodes, reports ready and starts polling", async () => {
    await host.handleMessage(init());

    const ready = sent.find((m) => m.type === "ready");
    expect(ready?.type === "ready" && ready.nodes.map((n) => n.id)).toEqual([PUBLISHER_NODE_ID, "Oslo"]);
    expect(ready?.type === "ready" && ready.outputs.map((o) => o.address)).toEqual([
      "home/test-pub/Oslo/temperature/current",
    ]);
    expect(update).toHaveBeenCalledTimes(1);
    expect(exit).not.toHaveBeenCalled();
  });

  it("restores stored node config before provisioning", async () => {
    await host.handleMessage(init({}, { Oslo: { language: "no" } }));

    expect(host.state?.nodes.getNodeById("Oslo")?.config.language.value).toBe("no");
  });

  it("reports init failures and exits", async () => {
    host = new PublisherHost(
      () => {
        throw new Error("api_key is required");
      },
      { send: (msg) => sent.push(msg), exit },
    );

    await host.handleMessage(init());

    expect(sent).toEqual([{ type: "error", message: "Init failed: api_key is required" }]);
    expect(exit).toHaveBeenCalledWith(1);
  });

  it("refuses requests before init", async () => {
    await host.handleMessage({ type: "ping", requestId: "r1" });
    await host.handleMessage({ type: "configure", requestId: "r2", nodeId: "Oslo", values: {} });

    expect(sent).toEqual([
      { type: "error", requestId: "r1", message: "Not initialized" },
      { type: "error", requestId: "r2", message: "Not initialized" },
    ]);
  });

  it("answers pings", async () => {
    await host.handleMessage(init());
    await host.handleMessage({ type: "ping", requestId: "r1" });

    expect(sent[sent.length - 1]).toEqual({ type: "pong", requestId: "r1" });
  });

  it("routes configure requests through the publisher's handler", async () => {
    onNodeConfig = () => null;
    await host.handleMessage(init());

    await host.handleMessage({ type: "configure", requestId: "r1", nodeId: "Oslo", values: { language: "de" } });

    expect(sent[sent.length - 1]).toEqual({ type: "configure_result", requestId: "r1", applied: {} });
    expect(host.state?.nodes.getNodeById("Oslo")?.config.language.value).toBe("en");
  });

  it("reports configure requests for unknown nodes", async () => {
    await host.handleMessage(init());
    await host.handleMessage({ type: "configure", requestId: "r1", nodeId: "Lima", values: {} });

    expect(sent[sent.length - 1]).toEqual({ type: "error", requestId: "r1", message: "Unknown node: Lima" });
  });

  it("runs an update on demand", async () => {
    await host.handleMessage(init());
    await flush();

    await host.handleMessage({ type: "update", requestId: "r1" });

    expect(update).toHaveBeenCalledTimes(2);
    expect(sent[sent.length - 1]).toEqual({ type: "update_result", requestId: "r1", success: true });
  });

  it("reports an on-demand update that aborted", async () => {
    await host.handleMessage(init());
    await flush();
    updateError = new Error("Current weather for Oslo failed: offline");

    await host.handleMessage({ type: "update", requestId: "r1" });

    expect(sent[sent.length - 1]).toEqual({
      type: "update_result",
      requestId: "r1",
      success: false,
      error: "Current weather for Oslo failed: offline",
    });
  });

  it("stops the previous publisher when initialised again", async () => {
    await host.handleMessage(init());
    await flush();
    await host.handleMessage(init());
    await flush();

    expect(destroy).toHaveBeenCalledTimes(1);
    expect(update).toHaveBeenCalledTimes(2);

    vi.advanceTimersByTime(60_000);
    expect(update).toHaveBeenCalledTimes(3);
    expect(update).toHaveBeenLastCalledWith(host.state);

    await host.stop();
    vi.advanceTimersByTime(300_000);
    expect(update).toHaveBeenCalledTimes(3);
  });

  it("destroys the publisher and exits on shutdown", async () => {
    await host.handleMessage(init());
    await host.handleMessage({ type: "shutdown" });

    expect(destroy).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(0);
  });
});
