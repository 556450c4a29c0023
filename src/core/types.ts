/**
 * Core type definitions for the property graph
 *
 * Nodes and edges are plain records owned by the graph. Callers receive them
 * through read-only views; only the graph grows the adjacency sets.
 */

/**
 * A value that can be stored under a property key
 */
export type PropertyValue =
  | string
  | number
  | boolean
  | null
  | PropertyValue[]
  | { [key: string]: PropertyValue };

/**
 * Key/value map attached to nodes and edges
 */
export type Properties = Record<string, PropertyValue>;

/**
 * A vertex in the property graph
 */
export interface GraphNode {
  /** Monotonic identifier, unique among the graph's nodes */
  readonly id: number;
  readonly properties: Readonly<Properties>;
  /** Ids of edges whose tail is this node */
  readonly outgoing: ReadonlySet<number>;
  /** Ids of edges whose head is this node */
  readonly incoming: ReadonlySet<number>;
  readonly createdAt: Date;
}

/**
 * A directed, labeled edge between two nodes
 */
export interface GraphEdge {
  /** Monotonic identifier, unique among the graph's edges */
  readonly id: number;
  /** Node the edge starts at */
  readonly tail: number;
  /** Node the edge ends at */
  readonly head: number;
  /** Relationship kind (e.g. 'BORN_IN', 'WITHIN') */
  readonly label: string;
  readonly properties: Readonly<Properties>;
  readonly createdAt: Date;
}

export type EdgeDirection = 'out' | 'in';

export type NeighborDirection = EdgeDirection | 'both';

/**
 * A node reached through one of its edges
 */
export interface Neighbor {
  node: GraphNode;
  edge: GraphEdge;
  direction: EdgeDirection;
}

/**
 * Snapshot of graph size for monitoring
 */
export interface GraphMetrics {
  /** Identifier of the graph instance */
  graphId: string;
  nodeCount: number;
  edgeCount: number;
  /** Graph density (edges / possible directed edges) */
  density: number;
}

/**
 * A successful mutation, kept for debugging
 */
export type OperationRecord =
  | { type: 'add_node'; timestamp: Date; details: { nodeId: number } }
  | { type: 'add_edge'; timestamp: Date; details: { edgeId: number; tail: number; head: number; label: string } };

/**
 * Configuration for a graph instance
 */
export type GraphConfig = {
  /** Record successful mutations in the operation history */
  enableHistory: boolean;
  /** Maximum number of history entries retained */
  historyLimit: number;
  /** Report rejected calls through the ErrorHandler before throwing */
  reportErrors: boolean;
}
