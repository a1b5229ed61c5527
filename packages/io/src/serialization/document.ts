/**
 * Graph Document
 *
 * The JSON shape of a serialized graph. Weights stay encoded here; the
 * codecs turn them into caller types when the graph is rebuilt.
 */

import { z } from "zod"

export const DOCUMENT_VERSION = 1

const index = z.number().int().nonnegative()
const encodedWeight = z.union([z.number(), z.string()])

/**
 * Node weights, either one per node or only the non-zero ones.
 */
export const nodeSectionSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("extended"),
    weights: z.array(encodedWeight),
  }),
  z.object({
    kind: z.literal("compact"),
    count: index,
    weights: z.array(z.tuple([index, encodedWeight])),
  }),
])

/**
 * Arcs, with weights or as bare endpoint pairs.
 */
export const arcSectionSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("weighted"),
    arcs: z.array(z.tuple([index, index, encodedWeight])),
  }),
  z.object({
    kind: z.literal("simple"),
    arcs: z.array(z.tuple([index, index])),
  }),
])

export const graphDocumentSchema = z.object({
  version: z.literal(DOCUMENT_VERSION),
  directed: z.boolean(),
  backend: z.enum(["list", "matrix"]),
  nodes: nodeSectionSchema,
  arcs: arcSectionSchema,
})

export type NodeSection = z.infer<typeof nodeSectionSchema>
export type ArcSection = z.infer<typeof arcSectionSchema>
export type GraphDocument = z.infer<typeof graphDocumentSchema>

/**
 * Encoding choices when writing a document.
 */
export const serializeOptionsSchema = z.object({
  /** "auto" picks compact when more than about half the node weights are zero */
  nodeEncoding: z.enum(["auto", "extended", "compact"]).default("auto"),
  /** "simple" drops arc weights; they come back as the arc algebra's zero */
  arcEncoding: z.enum(["weighted", "simple"]).default("weighted"),
})

export type SerializeOptions = z.input<typeof serializeOptionsSchema>

/**
 * Choices when rebuilding a graph from a document.
 */
export const deserializeOptionsSchema = z.object({
  /** Rebuild on another backend than the one recorded in the document */
  backend: z.enum(["list", "matrix"]).optional(),
})

export type DeserializeOptions = z.input<typeof deserializeOptionsSchema>
