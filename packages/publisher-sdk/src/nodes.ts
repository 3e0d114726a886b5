import type { MessageSink } from "./protocol.js";
import type { AttrMap, ConfigAttr, ConfigDataType, Node } from "./types.js";

export function newNode(zone: string, publisherId: string, id: string): Node {
  return { id, zone, publisherId, config: {}, status: {} };
}

export function newConfig(
  id: string,
  datatype: ConfigDataType,
  description: string,
  defaultValue: string,
): ConfigAttr {
  return { id, datatype, description, default: defaultValue, value: defaultValue };
}

/** Registry of the publisher's nodes, in the order they were first added. */
export class NodeList {
  private nodes = new Map<string, Node>();
  private restored = new Map<string, AttrMap>();

  constructor(private send: MessageSink) {}

  getAllNodes(): Node[] {
    return [...this.nodes.values()];
  }

  getNodeById(id: string): Node | undefined {
    return this.nodes.get(id);
  }

  /**
   * Add a node, or refresh the metadata of an existing one. Configuration and
   * status already held for the node are kept.
   */
  updateNode(node: Node): Node {
    const existing = this.nodes.get(node.id);
    if (!existing) {
      const stored: Node = {
        ...node,
        config: { ...node.config },
        status: { ...node.status },
      };
      this.nodes.set(stored.id, stored);
      this.send({ type: "node_updated", node: stored });
      return stored;
    }

    if (existing.zone !== node.zone || existing.publisherId !== node.publisherId) {
      existing.zone = node.zone;
      existing.publisherId = node.publisherId;
      this.send({ type: "node_updated", node: existing });
    }
    return existing;
  }

  /** Seed configuration values persisted by the host from a previous run. */
  restoreNodeConfig(stored: Record<string, AttrMap>): void {
    for (const [nodeId, values] of Object.entries(stored)) {
      this.restored.set(nodeId, { ...values });
    }
  }

  /**
   * Attach a configuration attribute to a node. If the node already has a value
   * for it (restored or set earlier), that value wins over the default.
   */
  updateNodeConfig(node: Node, attr: ConfigAttr): void {
    const stored = this.updateNode(node);
    const previous = stored.config[attr.id]?.value ?? this.restored.get(stored.id)?.[attr.id];
    stored.config[attr.id] = { ...attr, value: previous ?? attr.value };
  }

  /** Set values on existing attributes. Unknown attribute ids are ignored. */
  setNodeConfigValues(nodeId: string, values: AttrMap): AttrMap {
    const node = this.nodes.get(nodeId);
    const applied: AttrMap = {};
    if (!node) return applied;

    for (const [id, value] of Object.entries(values)) {
      const attr = node.config[id];
      if (!attr) continue;
      attr.value = value;
      applied[id] = value;
    }
    if (Object.keys(applied).length > 0) {
      this.send({ type: "node_updated", node });
    }
    return applied;
  }

  setStatus(nodeId: string, update: (status: Node["status"]) => void): void {
    const node = this.nodes.get(nodeId);
    if (!node) return;
    update(node.status);
    this.send({ type: "node_updated", node });
  }
}
