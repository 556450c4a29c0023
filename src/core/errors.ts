/**
 * Error classes thrown by the property graph
 *
 * Every failure is raised to the caller immediately; none is retried.
 */

/**
 * Base error for all graph failures
 */
export class GraphError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GraphError';
  }
}

export type ReferenceKind = 'node' | 'edge';

/**
 * Endpoint role of a node referenced by an edge
 */
export type EndpointRole = 'tail' | 'head';

/**
 * Thrown when a node or edge id is not present in the graph
 */
export class ReferenceNotFoundError extends GraphError {
  constructor(
    public readonly kind: ReferenceKind,
    public readonly id: number,
    public readonly role?: EndpointRole,
  ) {
    const subject = role ? `${capitalize(role)} ${kind}` : capitalize(kind);
    super(`${subject} ${id} does not exist`);
    this.name = 'ReferenceNotFoundError';
  }
}

/**
 * Thrown when an argument is malformed (e.g. an empty edge label)
 */
export class InvalidArgumentError extends GraphError {
  constructor(
    public readonly argument: string,
    message: string,
  ) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Thrown by the graph constructor when the configuration is rejected
 */
export class InvalidConfigurationError extends GraphError {
  constructor(public readonly errors: string[]) {
    super(`Invalid graph configuration: ${errors.join(', ')}`);
    this.name = 'InvalidConfigurationError';
  }
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}
