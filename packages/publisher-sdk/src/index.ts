export type {
  ConfigDataType,
  ConfigAttr,
  AttrMap,
  NodeStatus,
  Node,
  Output,
  HistoryValue,
  HistoryList,
  Publisher,
  PublisherFactory,
} from "./types.js";

export { IOType, PUBLISHER_NODE_ID } from "./types.js";

export type {
  ParentMessage,
  InitMessage,
  ConfigureMessage,
  UpdateMessage,
  PingMessage,
  ShutdownMessage,
  ChildMessage,
  ReadyMessage,
  NodeUpdatedMessage,
  OutputDiscoveredMessage,
  OutputValueMessage,
  ForecastMessage,
  ConfigureResultMessage,
  UpdateResultMessage,
  PongMessage,
  ErrorMessage,
  LogMessage,
  MessageSink,
} from "./protocol.js";

export { PROTOCOL_VERSION, parentMessageSchema } from "./protocol.js";

export { NodeList, newNode, newConfig } from "./nodes.js";
export { OutputList, outputAddress } from "./outputs.js";
export { OutputHistory } from "./output-history.js";
export { PublisherState } from "./publisher.js";
export type { PublisherStateOptions, NodeConfigHandler } from "./publisher.js";
export { Scheduler } from "./scheduler.js";
export { PublisherHost } from "./host.js";
export type { PublisherHostOptions } from "./host.js";
export { runPublisher, handleLine, closeHost, interceptConsole, formatLogArgs } from "./harness.js";
export type { HarnessIO } from "./harness.js";
