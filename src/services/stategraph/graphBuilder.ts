import logger from '../../utils/logger';
import { always } from './conditions';
import { GraphBuildError } from './errors';
import { FieldMapping, type FieldMappingInput } from './fieldMapping';
import { StateGraph } from './graph';
import { NodeRegistry } from './nodeRegistry';
import type { EdgePredicate, GraphEdge, NodeHandler } from './types';

export interface NodeRef {
  readonly id: string;
}

export interface EdgeOptions {
  requiresUserInput?: boolean;
  label?: string;
}

export interface GraphBuilderOptions {
  name?: string;
  fieldMapping?: FieldMappingInput | FieldMapping;
}

type NodeTarget = string | NodeRef;

function idOf(target: NodeTarget): string {
  return typeof target === 'string' ? target : target.id;
}

/**
 * Mutable assembly of a graph. Edge registration order is kept: when more
 * than one outgoing edge of a node is true, the one added first wins.
 */
export class GraphBuilder {
  private readonly registry = new NodeRegistry();
  private readonly edges: GraphEdge[] = [];
  private readonly name: string;
  private fieldMapping: FieldMapping;
  private entryPoint?: string;
  private built = false;

  constructor(options: GraphBuilderOptions = {}) {
    this.name = options.name ?? 'graph';
    this.fieldMapping = options.fieldMapping
      ? FieldMapping.from(options.fieldMapping)
      : FieldMapping.empty();
  }

  withFieldMapping(mapping: FieldMappingInput | FieldMapping): this {
    this.assertOpen('set field mapping');
    this.fieldMapping = FieldMapping.from(mapping);
    return this;
  }

  addNode(id: string, handler: NodeHandler, description?: string): NodeRef {
    this.assertOpen('add node');
    const node = this.registry.register(id, handler, description);
    return { id: node.id };
  }

  addEdge(
    source: NodeTarget,
    target: NodeTarget,
    predicate: EdgePredicate = always,
    options: EdgeOptions = {},
  ): GraphEdge {
    this.assertOpen('add edge');
    const order = this.edges.length;
    const sourceId = idOf(source);
    const targetId = idOf(target);
    const edge: GraphEdge = Object.freeze({
      id: `${sourceId}->${targetId}#${order}`,
      order,
      source: sourceId,
      target: targetId,
      predicate,
      requiresUserInput: options.requiresUserInput ?? false,
      ...(options.label ? { label: options.label } : {}),
    });
    this.edges.push(edge);
    return edge;
  }

  setEntryPoint(node: NodeTarget): this {
    this.assertOpen('set entry point');
    this.entryPoint = idOf(node);
    return this;
  }

  build(): StateGraph {
    this.assertOpen('build');
    if (this.registry.size === 0) {
      throw new GraphBuildError('Graph must contain at least one node');
    }
    if (!this.entryPoint) {
      throw new GraphBuildError('Graph has no entry point');
    }
    if (!this.registry.has(this.entryPoint)) {
      throw new GraphBuildError(`Entry point references unknown node: ${this.entryPoint}`);
    }
    for (const edge of this.edges) {
      if (!this.registry.has(edge.source)) {
        throw new GraphBuildError(`Edge ${edge.id} references unknown source node: ${edge.source}`);
      }
      if (!this.registry.has(edge.target)) {
        throw new GraphBuildError(`Edge ${edge.id} references unknown target node: ${edge.target}`);
      }
    }

    const graph = new StateGraph({
      name: this.name,
      entryPoint: this.entryPoint,
      nodes: this.registry.snapshot(),
      edges: this.edges,
      fieldMapping: this.fieldMapping,
    });
    this.built = true;
    logger.info(`[GraphBuilder] Built graph ${this.name}`, {
      nodes: this.registry.size,
      edges: this.edges.length,
      entryPoint: this.entryPoint,
    });
    return graph;
  }

  private assertOpen(action: string): void {
    if (this.built) {
      throw new GraphBuildError(`Cannot ${action}: graph ${this.name} is already built`);
    }
  }
}
