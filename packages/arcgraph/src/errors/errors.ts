/**
 * Custom Error Classes
 */

/**
 * Validation issue reported by an options schema.
 */
export interface OptionIssue {
  path: string
  message: string
}

/**
 * Base error for all graph storage errors.
 */
export class GraphError extends Error {
  public override readonly cause?: Error

  constructor(message: string, cause?: Error) {
    super(message)
    this.name = 'GraphError'
    this.cause = cause

    Error.captureStackTrace(this, this.constructor)
  }
}

/**
 * Size mismatch error.
 * Thrown at construction when the node weights do not cover exactly the node count.
 */
export class SizeMismatchError extends GraphError {
  constructor(
    public readonly expected: number,
    public readonly actual: number,
  ) {
    super(`Size mismatch: expected ${expected} node weights, got ${actual}`)
    this.name = 'SizeMismatchError'
  }
}

/**
 * Arc not found error.
 * Thrown when a query, update or removal references an arc that is not stored.
 */
export class ArcNotFoundError extends GraphError {
  constructor(
    public readonly from: number,
    public readonly to: number,
  ) {
    super(`Arc not found: (${from}, ${to})`)
    this.name = 'ArcNotFoundError'
  }
}

/**
 * Arc already exists error.
 * Thrown when inserting an arc that is already stored. Use updateArc instead.
 */
export class ArcAlreadyExistsError extends GraphError {
  constructor(
    public readonly from: number,
    public readonly to: number,
  ) {
    super(`Arc already exists: (${from}, ${to})`)
    this.name = 'ArcAlreadyExistsError'
  }
}

/**
 * Invalid options error.
 * Thrown when a configuration object fails its schema.
 */
export class InvalidOptionsError extends GraphError {
  constructor(
    message: string,
    public readonly issues: OptionIssue[] = [],
  ) {
    super(message)
    this.name = 'InvalidOptionsError'
  }
}
