/**
 * osc-packet-codec: Open Sound Control 1.0 encoder and decoder.
 *
 * decodePacket(bytes) → message or bundle; encodePacket(packet) → bytes.
 */

export { decodePacket, safeDecodePacket, encodePacket, type DecodeResult } from "./codec/packet.js";
export { decodeMessage, encodeMessage, createMessage, validateMessage, typeTagString } from "./codec/message.js";
export { decodeBundle, encodeBundle, createBundle, validateBundle, BUNDLE_HEADER } from "./codec/bundle.js";
export {
  decodeArgument,
  encodeArgument,
  inferOscArg,
  typeTagOf,
  type OscInput,
  type OscScalarInput,
} from "./codec/arguments.js";
export {
  OscCodecError,
  isOscCodecError,
  type OscErrorCode,
  type OscDecodeErrorCode,
  type OscEncodeErrorCode,
} from "./codec/errors.js";
export {
  IMMEDIATELY,
  NTP_EPOCH_OFFSET,
  timeTagFromDate,
  timeTagToDate,
  timeTagFromParts,
  timeTagToParts,
  type TimeTagParts,
} from "./codec/time-tag.js";
export type * from "./codec/types.js";
export { loadConfig, type CodecConfig, type LogLevel } from "./config.js";
export { initLogger, getLogger } from "./logger.js";
