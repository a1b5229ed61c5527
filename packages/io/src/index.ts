/**
 * arcgraph I/O Adapters
 *
 * Stateless views over an arcgraph graph: JSON serialization and Graphviz
 * DOT export.
 *
 * @example
 * ```typescript
 * import { createGraph } from "@arcgraph/core";
 * import { serialize, deserialize, numericCodecs, toDot } from "@arcgraph/io";
 *
 * const graph = createGraph({ nodeCount: 3, nodeWeights: [1, 2, 3] });
 * graph.insertArc(0, 1, 10);
 *
 * const text = serialize(graph, numericCodecs);
 * const copy = deserialize(text, numericCodecs, { backend: "matrix" });
 * copy.getArc(0, 1); // 10
 *
 * console.log(toDot(copy, { name: "G" }));
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// SERIALIZATION
// =============================================================================

export {
  toDocument,
  fromDocument,
  serialize,
  deserialize,
  numberCodec,
  bigintCodec,
  numericCodecs,
  DOCUMENT_VERSION,
  graphDocumentSchema,
  nodeSectionSchema,
  arcSectionSchema,
  serializeOptionsSchema,
  deserializeOptionsSchema,
} from "./serialization"
export type {
  WeightCodec,
  GraphCodecs,
  EncodedWeight,
  GraphDocument,
  NodeSection,
  ArcSection,
  SerializeOptions,
  DeserializeOptions,
} from "./serialization"

// =============================================================================
// DOT EXPORT
// =============================================================================

export { toDot, escapeLabel, dotOptionsSchema } from "./dot"
export type { DotOptions } from "./dot"

// =============================================================================
// ERRORS
// =============================================================================

export { SerializationError } from "./errors"
