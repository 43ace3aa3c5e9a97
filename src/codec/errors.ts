/**
 * Codec failures. Every decode or encode error is fatal to the call that
 * raised it; no partial packet is ever returned.
 */

export type OscDecodeErrorCode =
  | "MalformedPacket"
  | "MissingTypeTagComma"
  | "MisalignedAddress"
  | "MissingNullTerminator"
  | "UnknownTypeTag"
  | "NestedArraysUnsupported"
  | "UnbalancedArray"
  | "TruncatedArgument"
  | "NotABundle"
  | "TruncatedBundle"
  | "NestedBundleUnsupported";

export type OscEncodeErrorCode =
  | "InvalidAddress"
  | "InvalidArgument"
  | "NestedArraysUnsupported";

export type OscErrorCode = OscDecodeErrorCode | OscEncodeErrorCode;

export class OscCodecError extends Error {
  readonly code: OscErrorCode;
  /** Byte offset where decoding stopped, when known. */
  readonly offset?: number;

  constructor(code: OscErrorCode, message: string, offset?: number) {
    super(message);
    this.name = "OscCodecError";
    this.code = code;
    this.offset = offset;
  }
}

export function isOscCodecError(value: unknown): value is OscCodecError {
  return value instanceof OscCodecError;
}
