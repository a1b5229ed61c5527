/**
 * Graph Serializer
 *
 * Converts a graph to a plain JSON document and back. The document records
 * node count, directedness, backend, every node weight and every arc, so a
 * round trip answers every query the same way the source graph did.
 */

import { Graph, GraphError, createLogger, issuesOf, parseOptions, type OptionIssue } from "@arcgraph/core"
import { SerializationError } from "../errors"
import type { EncodedWeight, GraphCodecs, WeightCodec } from "./codecs"
import {
  DOCUMENT_VERSION,
  deserializeOptionsSchema,
  graphDocumentSchema,
  serializeOptionsSchema,
  type ArcSection,
  type DeserializeOptions,
  type GraphDocument,
  type NodeSection,
  type SerializeOptions,
} from "./document"

const log = createLogger("serialization")

// =============================================================================
// WRITE
// =============================================================================

/**
 * Build the document for a graph.
 *
 * Undirected graphs list each pair once, as `[from, to]` with `from <= to`.
 */
export function toDocument<N, A>(
  graph: Graph<N, A>,
  codecs: GraphCodecs<N, A>,
  options: SerializeOptions = {},
): GraphDocument {
  const { nodeEncoding, arcEncoding } = parseOptions(serializeOptionsSchema, options, "serialize")

  const nodes = encodeNodes(graph, codecs.node, nodeEncoding)
  const arcs = encodeArcs(graph, codecs.arc, arcEncoding)

  log.debug(`Serialized ${graph.nodeCount} nodes (${nodes.kind}) and ${arcs.arcs.length} arcs (${arcs.kind})`)

  return {
    version: DOCUMENT_VERSION,
    directed: graph.directed,
    backend: graph.backend,
    nodes,
    arcs,
  }
}

/**
 * Serialize a graph to JSON text.
 */
export function serialize<N, A>(graph: Graph<N, A>, codecs: GraphCodecs<N, A>, options?: SerializeOptions): string {
  return JSON.stringify(toDocument(graph, codecs, options))
}

function encodeNodes<N, A>(
  graph: Graph<N, A>,
  codec: WeightCodec<N>,
  encoding: "auto" | "extended" | "compact",
): NodeSection {
  const entries = [...graph.nodes()]
  const isZero = (weight: N) => graph.algebra.node.isZero(weight)
  const zeros = entries.filter((entry) => isZero(entry.weight)).length

  const compact = encoding === "compact" || (encoding === "auto" && 2 * zeros > entries.length + 1)
  if (compact) {
    return {
      kind: "compact",
      count: entries.length,
      weights: entries
        .filter((entry) => !isZero(entry.weight))
        .map((entry): [number, EncodedWeight] => [entry.index, codec.encode(entry.weight)]),
    }
  }

  return {
    kind: "extended",
    weights: entries.map((entry) => codec.encode(entry.weight)),
  }
}

function encodeArcs<N, A>(graph: Graph<N, A>, codec: WeightCodec<A>, encoding: "weighted" | "simple"): ArcSection {
  const arcs = [...graph.arcs()].filter((arc) => graph.directed || arc.from <= arc.to)

  if (encoding === "simple") {
    return {
      kind: "simple",
      arcs: arcs.map((arc): [number, number] => [arc.from, arc.to]),
    }
  }

  return {
    kind: "weighted",
    arcs: arcs.map((arc): [number, number, EncodedWeight] => [arc.from, arc.to, codec.encode(arc.weight)]),
  }
}

// =============================================================================
// READ
// =============================================================================

/**
 * Rebuild a graph from a document.
 *
 * In an undirected document an arc `[from, to]` with `from > to` is read as
 * the mirror of `[to, from]` and skipped.
 *
 * @throws SerializationError if the document is invalid
 */
export function fromDocument<N, A>(
  input: unknown,
  codecs: GraphCodecs<N, A>,
  options: DeserializeOptions = {},
): Graph<N, A> {
  const { backend } = parseOptions(deserializeOptionsSchema, options, "deserialize")

  const parsed = graphDocumentSchema.safeParse(input)
  if (!parsed.success) {
    throw invalid("Invalid graph document", issuesOf(parsed.error))
  }
  const doc = parsed.data

  const nodeWeights = decodeNodes(doc.nodes, codecs.node)
  const graph = Graph.create({
    nodeCount: nodeWeights.length,
    directed: doc.directed,
    backend: backend ?? doc.backend,
    nodeWeights,
    algebra: { node: codecs.node.algebra, arc: codecs.arc.algebra },
  })

  applyArcs(graph, doc.arcs, codecs.arc)

  log.debug(`Deserialized ${graph.nodeCount} nodes and ${graph.edgeCount()} arcs into a ${graph.backend} graph`)

  return graph
}

/**
 * Parse JSON text and rebuild the graph it describes.
 * @throws SerializationError if the text is not valid JSON or not a valid document
 */
export function deserialize<N, A>(text: string, codecs: GraphCodecs<N, A>, options?: DeserializeOptions): Graph<N, A> {
  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (error) {
    throw new SerializationError("Graph document is not valid JSON", [], error instanceof Error ? error : undefined)
  }
  return fromDocument(raw, codecs, options)
}

function decodeNodes<N>(section: NodeSection, codec: WeightCodec<N>): N[] {
  if (section.kind === "extended") {
    return section.weights.map((raw, i) => decodeWeight(codec, raw, `nodes.weights.${i}`))
  }

  const weights = Array.from({ length: section.count }, () => codec.algebra.zero())
  for (const [i, [index, raw]] of section.weights.entries()) {
    if (index >= section.count) {
      throw invalid(`Node index ${index} is out of range for ${section.count} nodes`, [
        { path: `nodes.weights.${i}.0`, message: `Expected an index below ${section.count}` },
      ])
    }
    weights[index] = decodeWeight(codec, raw, `nodes.weights.${i}.1`)
  }
  return weights
}

function applyArcs<N, A>(graph: Graph<N, A>, section: ArcSection, codec: WeightCodec<A>): void {
  for (const [i, arc] of section.arcs.entries()) {
    const [from, to] = arc
    if (from >= graph.nodeCount || to >= graph.nodeCount) {
      throw invalid(`Arc (${from}, ${to}) is out of range for ${graph.nodeCount} nodes`, [
        { path: `arcs.arcs.${i}`, message: `Expected indices below ${graph.nodeCount}` },
      ])
    }
    if (!graph.directed && from > to) continue

    try {
      if (arc.length === 3) {
        graph.insertArc(from, to, decodeWeight(codec, arc[2], `arcs.arcs.${i}.2`))
      } else {
        graph.insertDefaultArc(from, to)
      }
    } catch (error) {
      if (error instanceof GraphError && !(error instanceof SerializationError)) {
        throw new SerializationError(`Cannot rebuild arc (${from}, ${to}): ${error.message}`, [], error)
      }
      throw error
    }
  }
}

function decodeWeight<W>(codec: WeightCodec<W>, raw: EncodedWeight, path: string): W {
  const result = codec.schema.safeParse(raw)
  if (!result.success) {
    const issues = issuesOf(result.error).map((issue) => ({
      path: issue.path ? `${path}.${issue.path}` : path,
      message: issue.message,
    }))
    throw invalid(`Invalid ${codec.algebra.name} weight`, issues)
  }
  return result.data
}

function invalid(message: string, issues: OptionIssue[]): SerializationError {
  const first = issues[0]
  return new SerializationError(first ? `${message}: ${first.path}: ${first.message}` : message, issues)
}
