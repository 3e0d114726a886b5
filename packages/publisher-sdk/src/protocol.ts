import { z } from "zod";
import type { HistoryList, Node, Output } from "./types.js";

export const PROTOCOL_VERSION = 1;

// ── Host → Publisher Messages ───────────────────────────────────────────────

const attrMapSchema = z.record(z.string(), z.string());

export const initMessageSchema = z.object({
  type: z.literal("init"),
  protocolVersion: z.number().int(),
  zone: z.string().min(1).default("local"),
  config: z.record(z.string(), z.unknown()),
  /** Stored node configuration values, keyed by node id, restored before provisioning. */
  nodes: z.record(z.string(), attrMapSchema).optional(),
});

export const configureMessageSchema = z.object({
  type: z.literal("configure"),
  requestId: z.string(),
  nodeId: z.string(),
  values: attrMapSchema,
});

export const updateMessageSchema = z.object({
  type: z.literal("update"),
  requestId: z.string(),
});

export const pingMessageSchema = z.object({
  type: z.literal("ping"),
  requestId: z.string(),
});

export const shutdownMessageSchema = z.object({
  type: z.literal("shutdown"),
});

export const parentMessageSchema = z.discriminatedUnion("type", [
  initMessageSchema,
  configureMessageSchema,
  updateMessageSchema,
  pingMessageSchema,
  shutdownMessageSchema,
]);

export type InitMessage = z.infer<typeof initMessageSchema>;
export type ConfigureMessage = z.infer<typeof configureMessageSchema>;
export type UpdateMessage = z.infer<typeof updateMessageSchema>;
export type PingMessage = z.infer<typeof pingMessageSchema>;
export type ShutdownMessage = z.infer<typeof shutdownMessageSchema>;
export type ParentMessage = z.infer<typeof parentMessageSchema>;

// ── Publisher → Host Messages ───────────────────────────────────────────────

export interface ReadyMessage {
  type: "ready";
  nodes: Node[];
  outputs: Output[];
}

export interface NodeUpdatedMessage {
  type: "node_updated";
  node: Node;
}

export interface OutputDiscoveredMessage {
  type: "output_discovered";
  output: Output;
}

export interface OutputValueMessage {
  type: "output_value";
  address: string;
  value: string;
  timestamp: string;
}

export interface ForecastMessage {
  type: "forecast";
  address: string;
  forecast: HistoryList;
}

export interface ConfigureResultMessage {
  type: "configure_result";
  requestId: string;
  applied: Record<string, string>;
}

export interface UpdateResultMessage {
  type: "update_result";
  requestId: string;
  success: boolean;
  error?: string;
}

export interface PongMessage {
  type: "pong";
  requestId: string;
}

export interface ErrorMessage {
  type: "error";
  requestId?: string;
  message: string;
}

export interface LogMessage {
  type: "log";
  level: "debug" | "info" | "warn" | "error";
  message: string;
}

export type ChildMessage =
  | ReadyMessage
  | NodeUpdatedMessage
  | OutputDiscoveredMessage
  | OutputValueMessage
  | ForecastMessage
  | ConfigureResultMessage
  | UpdateResultMessage
  | PongMessage
  | ErrorMessage
  | LogMessage;

export type MessageSink = (msg: ChildMessage) => void;
