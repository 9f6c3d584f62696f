import { GraphBuildError, NodeTimeoutError } from './errors';
import type { GraphNode, NodeContext, NodeHandler } from './types';

export function assertNodeExists(nodes: ReadonlyMap<string, GraphNode>, nodeId: string): GraphNode {
  const node = nodes.get(nodeId);
  if (!node) {
    throw new GraphBuildError(`Graph node not found: ${nodeId}`);
  }
  return node;
}

export class NodeRegistry {
  private readonly nodes = new Map<string, GraphNode>();

  register(id: string, handler: NodeHandler, description?: string): GraphNode {
    if (!id || typeof id !== 'string') {
      throw new GraphBuildError('Node id must be a non-empty string');
    }
    if (this.nodes.has(id)) {
      throw new GraphBuildError(`Duplicate node id: ${id}`);
    }
    const node: GraphNode = Object.freeze({
      id,
      handler,
      ...(description ? { description } : {}),
    });
    this.nodes.set(id, node);
    return node;
  }

  has(id: string): boolean {
    return this.nodes.has(id);
  }

  get(id: string): GraphNode {
    return assertNodeExists(this.nodes, id);
  }

  get size(): number {
    return this.nodes.size;
  }

  /** Copy of the registered nodes, in registration order. */
  snapshot(): ReadonlyMap<string, GraphNode> {
    return new Map(this.nodes);
  }
}

/**
 * Invoke a node once and hand back whatever it returned. With a positive
 * `timeoutMs` the call rejects with `NodeTimeoutError` when it runs over.
 */
export function invokeNode(
  node: GraphNode,
  context: NodeContext,
  timeoutMs: number,
): Promise<unknown> {
  const call = new Promise<unknown>((resolve) => resolve(node.handler(context)));
  if (timeoutMs <= 0) {
    return call;
  }
  return new Promise<unknown>((resolve, reject) => {
    const timer = setTimeout(() => reject(new NodeTimeoutError(node.id, timeoutMs)), timeoutMs);
    call
      .then((res) => {
        clearTimeout(timer);
        resolve(res);
      })
      .catch((err: unknown) => {
        clearTimeout(timer);
        reject(err);
      });
  });
}
