import type { MessageSink } from "./protocol.js";
import type { IOType, Node, Output } from "./types.js";

export function outputAddress(node: Node, type: IOType, instance: string): string {
  return `${node.zone}/${node.publisherId}/${node.id}/${type}/${instance}`;
}

export class OutputList {
  private outputs = new Map<string, Output>();

  constructor(private send: MessageSink) {}

  /** Create an output on a node. Returns the existing one if the address is taken. */
  newOutput(node: Node, type: IOType, instance: string): Output {
    const address = outputAddress(node, type, instance);
    const existing = this.outputs.get(address);
    if (existing) return existing;

    const output: Output = { nodeId: node.id, type, instance, address };
    this.outputs.set(address, output);
    this.send({ type: "output_discovered", output });
    return output;
  }

  getOutput(node: Node, type: IOType, instance: string): Output | undefined {
    return this.outputs.get(outputAddress(node, type, instance));
  }

  getAllOutputs(): Output[] {
    return [...this.outputs.values()];
  }

  getNodeOutputs(nodeId: string): Output[] {
    return this.getAllOutputs().filter((o) => o.nodeId === nodeId);
  }
}
