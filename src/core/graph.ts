/**
 * In-memory property graph using adjacency sets
 *
 * Nodes and edges live in id-keyed maps. Each node keeps the ids of its
 * outgoing and incoming edges, so adjacency lookups never scan the edge map.
 *
 * Memory complexity: O(n + m) where n=nodes, m=edges
 */

import { isDeepStrictEqual } from 'util';
import { v4 as uuidv4 } from 'uuid';
import type {
  GraphNode,
  GraphEdge,
  GraphConfig,
  GraphMetrics,
  Neighbor,
  NeighborDirection,
  OperationRecord,
  Properties,
  PropertyValue
} from './types.js';
import { resolveGraphConfig } from './config.js';
import { GraphError, InvalidArgumentError, ReferenceNotFoundError } from './errors.js';
import { ErrorCategory, ErrorHandler, ErrorSeverity } from '../utils/error-handler.js';

interface StoredNode {
  id: number;
  properties: Readonly<Properties>;
  outgoing: Set<number>;
  incoming: Set<number>;
  createdAt: Date;
}

/**
 * Property graph of nodes and directed, labeled edges
 *
 * The graph is the only writer of its records: ids come from two independent
 * counters that start at 0 and are never reused, and every edge is registered
 * in the adjacency sets of both endpoints when it is added. Nothing is ever
 * removed.
 */
export class PropertyGraph {
  readonly graphId: string = uuidv4();

  // Core storage: records keyed by id, adjacency kept on each node
  private nodes: Map<number, StoredNode> = new Map();
  private edges: Map<number, GraphEdge> = new Map();

  // Id counters, independent per namespace
  private nextNodeId = 0;
  private nextEdgeId = 0;

  private config: GraphConfig;

  // Rejection reporting and its counters are scoped to this graph
  private errorHandler = new ErrorHandler();

  // Successful mutations, bounded by config.historyLimit
  private operationHistory: OperationRecord[] = [];

  constructor(config: Partial<GraphConfig> = {}) {
    this.config = resolveGraphConfig(config, this.errorHandler);
  }

  get nodeCount(): number {
    return this.nodes.size;
  }

  get edgeCount(): number {
    return this.edges.size;
  }

  /**
   * Add a node carrying a copy of `properties`
   *
   * @returns the new node's id
   */
  addNode(properties: Properties = {}): number {
    const nodeId = this.nextNodeId++;
    const now = new Date();

    // Adjacency sets start empty and only grow as edges are added
    this.nodes.set(nodeId, {
      id: nodeId,
      properties: freezeProperties(properties),
      outgoing: new Set(),
      incoming: new Set(),
      createdAt: now
    });

    // Log operation for debugging
    this.recordOperation({ type: 'add_node', timestamp: now, details: { nodeId } });

    return nodeId;
  }

  /**
   * Add a directed edge from `tailId` to `headId`
   *
   * Both endpoints must exist and the label must be non-empty. Validation
   * runs before anything is written, so a rejected call leaves the graph
   * and its id counters unchanged. Parallel edges and self-loops are allowed.
   *
   * @returns the new edge's id
   */
  addEdge(tailId: number, label: string, headId: number, properties: Properties = {}): number {
    // Validate both endpoints and the label before touching any state
    const tail = this.nodes.get(tailId);
    if (!tail) {
      this.reject(new ReferenceNotFoundError('node', tailId, 'tail'), 'add edge', { tailId, headId, label });
    }
    const head = this.nodes.get(headId);
    if (!head) {
      this.reject(new ReferenceNotFoundError('node', headId, 'head'), 'add edge', { tailId, headId, label });
    }
    if (label.trim().length === 0) {
      this.reject(new InvalidArgumentError('label', 'Edge label must be a non-empty string'), 'add edge', { tailId, headId });
    }

    const edgeId = this.nextEdgeId++;
    const now = new Date();

    this.edges.set(edgeId, {
      id: edgeId,
      tail: tailId,
      head: headId,
      label,
      properties: freezeProperties(properties),
      createdAt: now
    });

    // Register on both endpoints (tail -> head)
    tail.outgoing.add(edgeId);
    head.incoming.add(edgeId);

    // Log operation
    this.recordOperation({
      type: 'add_edge',
      timestamp: now,
      details: { edgeId, tail: tailId, head: headId, label }
    });

    return edgeId;
  }

  /**
   * Retrieve a node by its id
   */
  getNode(nodeId: number): GraphNode {
    const node = this.nodes.get(nodeId);
    if (!node) {
      this.reject(new ReferenceNotFoundError('node', nodeId), 'get node', { nodeId });
    }
    return node;
  }

  /**
   * Retrieve an edge by its id
   */
  getEdge(edgeId: number): GraphEdge {
    const edge = this.edges.get(edgeId);
    if (!edge) {
      this.reject(new ReferenceNotFoundError('edge', edgeId), 'get edge', { edgeId });
    }
    return edge;
  }

  hasNode(nodeId: number): boolean {
    return this.nodes.has(nodeId);
  }

  hasEdge(edgeId: number): boolean {
    return this.edges.has(edgeId);
  }

  /**
   * Get all outgoing edges of a node in creation order
   * Optionally filtered by labels
   */
  getOutgoingEdges(nodeId: number, labels?: string[]): GraphEdge[] {
    return this.resolveEdges(this.getStoredNode(nodeId).outgoing, labels);
  }

  /**
   * Get all incoming edges of a node in creation order
   * Optionally filtered by labels
   */
  getIncomingEdges(nodeId: number, labels?: string[]): GraphEdge[] {
    return this.resolveEdges(this.getStoredNode(nodeId).incoming, labels);
  }

  /**
   * Get the nodes one edge away, outgoing neighbors first
   */
  getNeighbors(nodeId: number, direction: NeighborDirection = 'both', labels?: string[]): Neighbor[] {
    const neighbors: Neighbor[] = [];

    if (direction !== 'in') {
      for (const edge of this.getOutgoingEdges(nodeId, labels)) {
        neighbors.push({ node: this.getNode(edge.head), edge, direction: 'out' });
      }
    }

    if (direction !== 'out') {
      for (const edge of this.getIncomingEdges(nodeId, labels)) {
        neighbors.push({ node: this.getNode(edge.tail), edge, direction: 'in' });
      }
    }

    return neighbors;
  }

  /**
   * Find nodes sharing at least one key/value pair with `properties`
   *
   * Only the top level of the map is compared; values are compared deeply.
   * An empty query matches no node.
   */
  findNodes(properties: Properties): GraphNode[] {
    const query = Object.entries(properties);

    return this.getAllNodes().filter(node =>
      query.some(([key, value]) =>
        Object.prototype.hasOwnProperty.call(node.properties, key) &&
        isDeepStrictEqual(node.properties[key], value)
      )
    );
  }

  /**
   * Get all nodes in creation order
   */
  getAllNodes(): GraphNode[] {
    return Array.from(this.nodes.values());
  }

  /**
   * Get all edges in creation order
   */
  getAllEdges(): GraphEdge[] {
    return Array.from(this.edges.values());
  }

  /**
   * Get current graph metrics
   * Density = edges / possible_edges = m / (n * (n-1))
   */
  getMetrics(): GraphMetrics {
    const nodeCount = this.nodes.size;
    const edgeCount = this.edges.size;

    return {
      graphId: this.graphId,
      nodeCount,
      edgeCount,
      density: nodeCount <= 1 ? 0 : edgeCount / (nodeCount * (nodeCount - 1))
    };
  }

  /**
   * Get counts of rejected calls reported by this graph, keyed by
   * `category:message`
   */
  getErrorStats(): Record<string, number> {
    return this.errorHandler.getErrorStats();
  }

  /**
   * Get the last `limit` successful mutations, oldest first
   */
  getOperationHistory(limit: number = 100): OperationRecord[] {
    if (limit <= 0) {
      return [];
    }
    return this.operationHistory.slice(-limit);
  }

  /**
   * Validate graph consistency
   * Checks that every edge and every adjacency entry agree with each other
   */
  validateConsistency(): string[] {
    const errors: string[] = [];

    for (const edge of this.edges.values()) {
      const tail = this.nodes.get(edge.tail);
      const head = this.nodes.get(edge.head);

      if (!tail) {
        errors.push(`Edge ${edge.id} references non-existent tail node: ${edge.tail}`);
      } else if (!tail.outgoing.has(edge.id)) {
        errors.push(`Edge ${edge.id} missing from outgoing set of node ${edge.tail}`);
      }

      if (!head) {
        errors.push(`Edge ${edge.id} references non-existent head node: ${edge.head}`);
      } else if (!head.incoming.has(edge.id)) {
        errors.push(`Edge ${edge.id} missing from incoming set of node ${edge.head}`);
      }
    }

    for (const node of this.nodes.values()) {
      for (const edgeId of node.outgoing) {
        const edge = this.edges.get(edgeId);
        if (!edge) {
          errors.push(`Node ${node.id} lists non-existent outgoing edge: ${edgeId}`);
        } else if (edge.tail !== node.id) {
          errors.push(`Edge ${edgeId} has mismatched tail node`);
        }
      }

      for (const edgeId of node.incoming) {
        const edge = this.edges.get(edgeId);
        if (!edge) {
          errors.push(`Node ${node.id} lists non-existent incoming edge: ${edgeId}`);
        } else if (edge.head !== node.id) {
          errors.push(`Edge ${edgeId} has mismatched head node`);
        }
      }
    }

    return errors;
  }

  private getStoredNode(nodeId: number): StoredNode {
    const node = this.nodes.get(nodeId);
    if (!node) {
      this.reject(new ReferenceNotFoundError('node', nodeId), 'read adjacency', { nodeId });
    }
    return node;
  }

  private resolveEdges(edgeIds: ReadonlySet<number>, labels?: string[]): GraphEdge[] {
    const edges: GraphEdge[] = [];
    for (const edgeId of edgeIds) {
      const edge = this.edges.get(edgeId);
      if (edge && (!labels || labels.length === 0 || labels.includes(edge.label))) {
        edges.push(edge);
      }
    }
    return edges;
  }

  private recordOperation(operation: OperationRecord): void {
    if (!this.config.enableHistory) {
      return;
    }

    this.operationHistory.push(operation);
    if (this.operationHistory.length > this.config.historyLimit) {
      this.operationHistory.shift();
    }
  }

  /**
   * Report a rejected call and throw its error
   *
   * The reported message names only the operation; ids go in the context,
   * so repeated misses share one counter.
   */
  private reject(error: GraphError, operationName: string, context: Record<string, unknown>): never {
    if (this.config.reportErrors) {
      const category = error instanceof ReferenceNotFoundError ? ErrorCategory.LOOKUP : ErrorCategory.VALIDATION;
      this.errorHandler.handle(
        category,
        ErrorSeverity.LOW,
        `Rejected ${operationName}`,
        error,
        { graphId: this.graphId, ...context }
      );
    }
    throw error;
  }
}

/**
 * Deep copy of a property map, frozen at every level
 */
function freezeProperties(properties: Properties): Readonly<Properties> {
  const copy = structuredClone(properties);
  freezeValue(copy);
  return copy;
}

function freezeValue(value: PropertyValue | Properties): void {
  if (value === null || typeof value !== 'object') {
    return;
  }
  if (Array.isArray(value)) {
    value.forEach(freezeValue);
  } else {
    Object.values(value).forEach(freezeValue);
  }
  Object.freeze(value);
}
