/**
 * Serialization Module
 */

export { toDocument, fromDocument, serialize, deserialize } from "./serializer"
export { numberCodec, bigintCodec, numericCodecs } from "./codecs"
export type { WeightCodec, GraphCodecs, EncodedWeight } from "./codecs"
export {
  DOCUMENT_VERSION,
  graphDocumentSchema,
  nodeSectionSchema,
  arcSectionSchema,
  serializeOptionsSchema,
  deserializeOptionsSchema,
} from "./document"
export type { GraphDocument, NodeSection, ArcSection, SerializeOptions, DeserializeOptions } from "./document"
