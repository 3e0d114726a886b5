import type { MessageSink } from "./protocol.js";
import { NodeList, newNode } from "./nodes.js";
import { OutputList, outputAddress } from "./outputs.js";
import { OutputHistory } from "./output-history.js";
import { PUBLISHER_NODE_ID } from "./types.js";
import type { AttrMap, HistoryList, IOType, Node } from "./types.js";

export interface PublisherStateOptions {
  zone: string;
  publisherId: string;
  send: MessageSink;
  /** How long output history is kept. Defaults to 24 hours. */
  historyRetentionMs?: number;
}

export type NodeConfigHandler = (node: Node, values: AttrMap) => AttrMap | null;

/**
 * Everything a publisher owns during a run: its nodes, their outputs and the
 * values last published on them. Passed explicitly to the adapter hooks.
 */
export class PublisherState {
  readonly zone: string;
  readonly publisherId: string;
  readonly nodes: NodeList;
  readonly outputs: OutputList;
  readonly outputHistory: OutputHistory;
  readonly publisherNode: Node;

  private send: MessageSink;
  private configHandler: NodeConfigHandler | null = null;

  constructor(opts: PublisherStateOptions) {
    this.zone = opts.zone;
    this.publisherId = opts.publisherId;
    this.send = opts.send;
    this.nodes = new NodeList(opts.send);
    this.outputs = new OutputList(opts.send);
    this.outputHistory = new OutputHistory(opts.send, opts.historyRetentionMs);
    this.publisherNode = this.nodes.updateNode(newNode(this.zone, this.publisherId, PUBLISHER_NODE_ID));
  }

  newNode(id: string): Node {
    return newNode(this.zone, this.publisherId, id);
  }

  setErrorStatus(node: Node, message: string): void {
    this.nodes.setStatus(node.id, (status) => {
      status.error = message;
      status.lastUpdated = Date.now();
    });
  }

  /**
   * Clear a node's error. With `message`, only that error is cleared, so one
   * cycle recovering does not hide another cycle's failure.
   */
  clearErrorStatus(node: Node, message?: string): void {
    const stored = this.nodes.getNodeById(node.id);
    if (!stored || stored.status.error === undefined) return;
    if (message !== undefined && stored.status.error !== message) return;
    this.nodes.setStatus(node.id, (status) => {
      delete status.error;
      status.lastUpdated = Date.now();
    });
  }

  /** Publish a forecast for the output at (node, type, instance). */
  updateForecast(node: Node, type: IOType, instance: string, forecast: HistoryList): void {
    this.send({ type: "forecast", address: outputAddress(node, type, instance), forecast });
  }

  onNodeConfig(handler: NodeConfigHandler): void {
    this.configHandler = handler;
  }

  /**
   * Route a configuration change from the host through the registered handler.
   * Only what the handler returns is applied.
   */
  handleNodeConfig(nodeId: string, values: AttrMap): AttrMap {
    const node = this.nodes.getNodeById(nodeId);
    if (!node) throw new Error(`Unknown node: ${nodeId}`);
    if (!this.configHandler) return {};

    const accepted = this.configHandler(node, values);
    if (!accepted) return {};
    return this.nodes.setNodeConfigValues(nodeId, accepted);
  }
}
