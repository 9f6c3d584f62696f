import { FieldMapping } from './fieldMapping';
import { assertNodeExists } from './nodeRegistry';
import type { EdgeRef, GraphEdge, GraphNode } from './types';

export interface StateGraphParts {
  name: string;
  entryPoint: string;
  nodes: ReadonlyMap<string, GraphNode>;
  edges: readonly GraphEdge[];
  fieldMapping: FieldMapping;
}

/**
 * Immutable graph definition produced by `GraphBuilder.build()`. One
 * definition can back any number of executions.
 */
export class StateGraph {
  readonly name: string;
  readonly entryPoint: string;
  readonly nodes: ReadonlyMap<string, GraphNode>;
  readonly edges: readonly GraphEdge[];
  readonly fieldMapping: FieldMapping;
  private readonly outgoingIndex: ReadonlyMap<string, readonly GraphEdge[]>;

  constructor(parts: StateGraphParts) {
    this.name = parts.name;
    this.entryPoint = parts.entryPoint;
    this.nodes = parts.nodes;
    this.edges = Object.freeze([...parts.edges].sort((a, b) => a.order - b.order));
    this.fieldMapping = parts.fieldMapping;

    const index = new Map<string, GraphEdge[]>();
    for (const edge of this.edges) {
      const list = index.get(edge.source) ?? [];
      list.push(edge);
      index.set(edge.source, list);
    }
    this.outgoingIndex = new Map(
      [...index.entries()].map(
        ([source, list]): [string, readonly GraphEdge[]] => [source, Object.freeze(list)],
      ),
    );
    Object.freeze(this);
  }

  getNode(nodeId: string): GraphNode {
    return assertNodeExists(this.nodes, nodeId);
  }

  /** Outgoing edges in registration order. */
  outgoing(nodeId: string): readonly GraphEdge[] {
    return this.outgoingIndex.get(nodeId) ?? [];
  }

  getEdge(edgeId: string): GraphEdge | undefined {
    return this.edges.find((edge) => edge.id === edgeId);
  }

  describe(): { name: string; entryPoint: string; nodes: string[]; edges: EdgeRef[] } {
    return {
      name: this.name,
      entryPoint: this.entryPoint,
      nodes: [...this.nodes.keys()],
      edges: this.edges.map(toEdgeRef),
    };
  }
}

export function toEdgeRef(edge: GraphEdge): EdgeRef {
  return {
    id: edge.id,
    source: edge.source,
    target: edge.target,
    requiresUserInput: edge.requiresUserInput,
    ...(edge.label ? { label: edge.label } : {}),
  };
}
