import type { PublisherState } from "./publisher.js";

// ── Reserved IDs ────────────────────────────────────────────────────────────

/** Node that represents the publisher itself. Adapters skip it when polling. */
export const PUBLISHER_NODE_ID = "$publisher";

// ── IO Types ────────────────────────────────────────────────────────────────

export const IOType = {
  AtmosphericPressure: "atmosphericpressure",
  Humidity: "humidity",
  Rain: "rain",
  Snow: "snow",
  Temperature: "temperature",
  Weather: "weather",
  WindHeading: "windheading",
  WindSpeed: "windspeed",
} as const;

export type IOType = (typeof IOType)[keyof typeof IOType];

// ── Node Configuration ──────────────────────────────────────────────────────

export type ConfigDataType = "bool" | "enum" | "float" | "int" | "string";

export interface ConfigAttr {
  id: string;
  datatype: ConfigDataType;
  description: string;
  default: string;
  value: string;
  values?: string[];
}

/** Plain attribute-name → value map, as sent by the host. */
export type AttrMap = Record<string, string>;

// ── Nodes ───────────────────────────────────────────────────────────────────

export interface NodeStatus {
  error?: string;
  lastUpdated?: number;
}

export interface Node {
  id: string;
  zone: string;
  publisherId: string;
  config: Record<string, ConfigAttr>;
  status: NodeStatus;
}

// ── Outputs ─────────────────────────────────────────────────────────────────

export interface Output {
  nodeId: string;
  type: IOType;
  instance: string;
  address: string;
}

export interface HistoryValue {
  /** ISO-8601 timestamp */
  timestamp: string;
  value: string;
}

export type HistoryList = HistoryValue[];

// ── Publisher Interface ─────────────────────────────────────────────────────

export interface Publisher {
  /** Identifies this publisher in output addresses. */
  readonly publisherId: string;
  /** Milliseconds between update() runs. */
  readonly updateInterval: number;
  /** Milliseconds between updateForecast() runs. Leave unset to disable forecasts. */
  readonly forecastInterval?: number;

  publishNodes(pub: PublisherState): void;
  /** Rejects when the cycle was aborted, after any node status has been set. */
  update(pub: PublisherState): Promise<void>;
  /** Same contract as update(). */
  updateForecast?(pub: PublisherState): Promise<void>;
  /**
   * Called when the host asks to change a node's configuration.
   * Return the values to apply, or null to acknowledge without applying.
   */
  onNodeConfig?(node: Node, values: AttrMap): AttrMap | null;
  destroy?(): Promise<void>;
}

export type PublisherFactory = (config: Record<string, unknown>) => Publisher;
