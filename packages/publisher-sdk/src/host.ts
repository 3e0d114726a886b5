import type { PublisherFactory, Publisher } from "./types.js";
import type { MessageSink, ParentMessage } from "./protocol.js";
import { PROTOCOL_VERSION } from "./protocol.js";
import { PublisherState } from "./publisher.js";
import { Scheduler } from "./scheduler.js";

export interface PublisherHostOptions {
  send: MessageSink;
  exit: (code: number) => void;
  historyRetentionMs?: number;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Handles host messages for one publisher process. */
export class PublisherHost {
  private publisher: Publisher | null = null;
  private pub: PublisherState | null = null;
  private scheduler: Scheduler | null = null;
  private send: MessageSink;
  private exit: (code: number) => void;

  constructor(
    private factory: PublisherFactory,
    private opts: PublisherHostOptions,
  ) {
    this.send = opts.send;
    this.exit = opts.exit;
  }

  get state(): PublisherState | null {
    return this.pub;
  }

  async handleMessage(msg: ParentMessage): Promise<void> {
    switch (msg.type) {
      case "init": {
        if (msg.protocolVersion !== PROTOCOL_VERSION) {
          this.send({
            type: "error",
            message: `Protocol version mismatch: expected ${PROTOCOL_VERSION}, got ${msg.protocolVersion}`,
          });
          this.exit(1);
          return;
        }
        // A repeated init replaces the running publisher
        await this.stop();
        try {
          const publisher = this.factory(msg.config);
          const pub = new PublisherState({
            zone: msg.zone,
            publisherId: publisher.publisherId,
            send: this.send,
            historyRetentionMs: this.opts.historyRetentionMs,
          });
          if (msg.nodes) pub.nodes.restoreNodeConfig(msg.nodes);

          publisher.publishNodes(pub);
          if (publisher.onNodeConfig) {
            pub.onNodeConfig(publisher.onNodeConfig.bind(publisher));
          }

          this.publisher = publisher;
          this.pub = pub;
          this.send({
            type: "ready",
            nodes: pub.nodes.getAllNodes(),
            outputs: pub.outputs.getAllOutputs(),
          });

          this.scheduler = new Scheduler(publisher, pub);
          this.scheduler.start();
        } catch (err) {
          this.send({ type: "error", message: `Init failed: ${errorMessage(err)}` });
          this.exit(1);
        }
        break;
      }

      case "configure": {
        if (!this.pub) {
          this.send({ type: "error", requestId: msg.requestId, message: "Not initialized" });
          return;
        }
        try {
          const applied = this.pub.handleNodeConfig(msg.nodeId, msg.values);
          this.send({ type: "configure_result", requestId: msg.requestId, applied });
        } catch (err) {
          this.send({ type: "error", requestId: msg.requestId, message: errorMessage(err) });
        }
        break;
      }

      case "update": {
        if (!this.scheduler) {
          this.send({ type: "error", requestId: msg.requestId, message: "Not initialized" });
          return;
        }
        try {
          const ran = await this.scheduler.runUpdate();
          this.send(
            ran
              ? { type: "update_result", requestId: msg.requestId, success: true }
              : {
                  type: "update_result",
                  requestId: msg.requestId,
                  success: false,
                  error: "Update already in progress",
                },
          );
        } catch (err) {
          this.send({
            type: "update_result",
            requestId: msg.requestId,
            success: false,
            error: errorMessage(err),
          });
        }
        break;
      }

      case "ping": {
        if (!this.pub) {
          this.send({ type: "error", requestId: msg.requestId, message: "Not initialized" });
          return;
        }
        this.send({ type: "pong", requestId: msg.requestId });
        break;
      }

      case "shutdown": {
        await this.stop();
        this.exit(0);
      }
    }
  }

  async stop(): Promise<void> {
    this.scheduler?.stop();
    this.scheduler = null;
    const publisher = this.publisher;
    this.publisher = null;
    if (publisher?.destroy) {
      await publisher.destroy();
    }
  }
}
