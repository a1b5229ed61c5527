import { GraphError, type OptionIssue } from "@arcgraph/core"

/**
 * Serialization error.
 * Thrown when a document cannot be parsed, validated or rebuilt into a graph.
 */
export class SerializationError extends GraphError {
  constructor(
    message: string,
    public readonly issues: OptionIssue[] = [],
    cause?: Error,
  ) {
    super(message, cause)
    this.name = "SerializationError"
  }
}
