/**
 * Graphviz Export
 *
 * Read-only traversal of a graph into DOT source.
 */

import { z } from "zod"
import { createLogger, parseOptions, type Graph } from "@arcgraph/core"

const log = createLogger("dot")

export const dotOptionsSchema = z.object({
  /** Graph identifier written after the graph keyword */
  name: z
    .string()
    .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "Expected a DOT identifier")
    .optional(),
  /** Label nodes with their weight */
  nodeLabels: z.boolean().default(true),
  /** Label arcs with their weight */
  arcLabels: z.boolean().default(true),
})

export type DotOptions = z.input<typeof dotOptionsSchema>

/**
 * Escape a value for a DOT double-quoted string.
 */
export function escapeLabel(value: string): string {
  return value.replace(/["\\]/g, "\\$&")
}

/**
 * Render a graph as DOT source.
 *
 * One node statement per node in index order, then one edge statement per
 * arc: nodes in index order, each node's arcs in backend order. Undirected
 * graphs use `--` and write each pair once, from its lower index.
 *
 * @example
 * ```typescript
 * toDot(graph)
 * // digraph {
 * // 	n0 [label="1"];
 * // 	n1 [label="2"];
 * // 	n0 -> n1 [label="10"];
 * // }
 * ```
 */
export function toDot<N, A>(graph: Graph<N, A>, options: DotOptions = {}): string {
  const { name, nodeLabels, arcLabels } = parseOptions(dotOptionsSchema, options, "dot")

  const keyword = graph.directed ? "digraph" : "graph"
  const operator = graph.directed ? "->" : "--"
  const lines: string[] = []

  for (const { index, weight } of graph.nodes()) {
    lines.push(`\tn${index}${attributes(nodeLabels, () => graph.algebra.node.format(weight))};`)
  }

  let arcs = 0
  for (const { from, to, weight } of graph.arcs()) {
    if (!graph.directed && from > to) continue
    lines.push(`\tn${from} ${operator} n${to}${attributes(arcLabels, () => graph.algebra.arc.format(weight))};`)
    arcs++
  }

  log.debug(`Exported ${graph.nodeCount} nodes and ${arcs} arcs to DOT`)

  const header = name ? `${keyword} ${name} {` : `${keyword} {`
  return `${header}\n${lines.join("\n")}\n}`
}

function attributes(enabled: boolean, label: () => string): string {
  return enabled ? ` [label="${escapeLabel(label())}"]` : ""
}
