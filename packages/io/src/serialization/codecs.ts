/**
 * Weight Codecs
 *
 * How a weight type travels through JSON. Each codec pairs the weight's
 * algebra with an encoder and a zod schema that decodes the JSON value.
 */

import { z } from "zod"
import { bigintAlgebra, numberAlgebra, type WeightAlgebra } from "@arcgraph/core"

/**
 * JSON form of a single weight.
 */
export type EncodedWeight = number | string

export interface WeightCodec<W> {
  algebra: WeightAlgebra<W>
  encode(value: W): EncodedWeight
  /** Parses an encoded weight back into W */
  schema: z.ZodType<W, z.ZodTypeDef, unknown>
}

/**
 * Codecs for the node and arc weight types of one graph.
 */
export interface GraphCodecs<N, A> {
  node: WeightCodec<N>
  arc: WeightCodec<A>
}

/**
 * Finite numbers are written as JSON numbers. JSON has no Infinity or NaN,
 * so those are written as the strings "Infinity", "-Infinity" and "NaN".
 */
export const numberCodec: WeightCodec<number> = {
  algebra: numberAlgebra,
  encode: (value) => (Number.isFinite(value) ? value : String(value)),
  schema: z.union([z.number(), z.enum(["Infinity", "-Infinity", "NaN"]).transform(Number)]),
}

/**
 * Bigints are written as decimal strings, JSON numbers would lose precision.
 */
export const bigintCodec: WeightCodec<bigint> = {
  algebra: bigintAlgebra,
  encode: (value) => value.toString(),
  schema: z
    .string()
    .regex(/^-?\d+$/, "Expected a decimal integer string")
    .transform((value) => BigInt(value)),
}

export const numericCodecs: GraphCodecs<number, number> = {
  node: numberCodec,
  arc: numberCodec,
}
