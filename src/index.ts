/**
 * Public API of the property graph
 */

export { PropertyGraph } from './core/graph.js';
export {
  createDefaultGraphConfig,
  resolveGraphConfig,
  validateGraphConfig
} from './core/config.js';
export {
  GraphError,
  ReferenceNotFoundError,
  InvalidArgumentError,
  InvalidConfigurationError
} from './core/errors.js';
export type { ReferenceKind, EndpointRole } from './core/errors.js';

export type {
  PropertyValue,
  Properties,
  GraphNode,
  GraphEdge,
  EdgeDirection,
  NeighborDirection,
  Neighbor,
  GraphMetrics,
  OperationRecord,
  GraphConfig
} from './core/types.js';

export {
  ErrorHandler,
  ErrorCategory,
  ErrorSeverity,
  type ErrorInfo,
  type ErrorResult,
  type SuccessResult,
  type OperationResult
} from './utils/error-handler.js';
