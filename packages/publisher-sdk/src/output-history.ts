import type { MessageSink } from "./protocol.js";
import { outputAddress } from "./outputs.js";
import type { HistoryList, IOType, Node } from "./types.js";

const DEFAULT_RETENTION_MS = 24 * 3600_000;

/**
 * Latest value and recent history per output address. Values are only
 * published to the host when they change.
 */
export class OutputHistory {
  private history = new Map<string, HistoryList>();

  constructor(
    private send: MessageSink,
    private retentionMs = DEFAULT_RETENTION_MS,
    private now: () => number = Date.now,
  ) {}

  /** Record a value for an output. Returns true if it differs from the latest one. */
  updateOutputValue(node: Node, type: IOType, instance: string, value: string): boolean {
    const address = outputAddress(node, type, instance);
    const list = this.history.get(address) ?? [];
    const latest = list[0];
    if (latest && latest.value === value) return false;

    const nowMs = this.now();
    const timestamp = new Date(nowMs).toISOString();
    list.unshift({ timestamp, value });

    // Newest first, so expired entries sit at the tail
    const cutoff = nowMs - this.retentionMs;
    while (list.length > 1 && Date.parse(list[list.length - 1].timestamp) < cutoff) {
      list.pop();
    }
    this.history.set(address, list);

    this.send({ type: "output_value", address, value, timestamp });
    return true;
  }

  getOutputValue(node: Node, type: IOType, instance: string): string | undefined {
    return this.history.get(outputAddress(node, type, instance))?.[0]?.value;
  }

  getHistory(address: string): HistoryList {
    return [...(this.history.get(address) ?? [])];
  }
}
