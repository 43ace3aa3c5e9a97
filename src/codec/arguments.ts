/**
 * Per-type-tag argument codec.
 *
 * Decoding reads one scalar argument at a byte offset and reports where the
 * next one starts (already re-aligned to 4). Encoding produces the argument's
 * padded payload; T, F, N and I carry no payload at all.
 */

import { OscCodecError } from "./errors.js";
import {
  align4,
  encodeFloat32,
  encodeFloat64,
  encodeInt32,
  encodeInt64,
  encodePaddedString,
  encodeUInt64,
  padToFour,
  readFloat32,
  readFloat64,
  readInt32,
  readInt64,
  readUInt64,
} from "./primitives.js";
import { timeTagFromDate } from "./time-tag.js";
import type { OscArg, OscScalarArg } from "./types.js";

export interface DecodedArgument {
  arg: OscScalarArg;
  /** Offset of the next argument, aligned to 4. */
  next: number;
}

const INT32_MIN = -0x8000_0000;
const INT32_MAX = 0x7fff_ffff;

// ---------------------------------------------------------------------------
// Decode
// ---------------------------------------------------------------------------

function requireBytes(buf: Buffer, offset: number, width: number, tag: string): void {
  if (offset + width > buf.length) {
    throw new OscCodecError(
      "TruncatedArgument",
      `Argument '${tag}' needs ${width} bytes at offset ${offset}, but the packet ends at ${buf.length}`,
      offset,
    );
  }
}

/** Read a null-terminated string starting at offset. */
function readPaddedString(buf: Buffer, offset: number): { value: string; next: number } {
  const end = buf.indexOf(0, offset);
  if (end === -1) {
    throw new OscCodecError(
      "MissingNullTerminator",
      `String argument at offset ${offset} has no null terminator`,
      offset,
    );
  }
  return { value: buf.toString("utf-8", offset, end), next: align4(end + 1) };
}

function fixed(offset: number, width: number, arg: OscScalarArg): DecodedArgument {
  return { arg, next: align4(offset + width) };
}

/**
 * Decode the argument for `tag` at `offset`.
 * @throws OscCodecError `UnknownTypeTag` for any tag outside the OSC 1.0 set.
 */
export function decodeArgument(tag: string, buf: Buffer, offset: number): DecodedArgument {
  switch (tag) {
    case "i":
      requireBytes(buf, offset, 4, tag);
      return fixed(offset, 4, { type: "i", value: readInt32(buf, offset) });
    case "f":
      requireBytes(buf, offset, 4, tag);
      return fixed(offset, 4, { type: "f", value: readFloat32(buf, offset) });
    case "h":
      requireBytes(buf, offset, 8, tag);
      return fixed(offset, 8, { type: "h", value: readInt64(buf, offset) });
    case "t":
      requireBytes(buf, offset, 8, tag);
      return fixed(offset, 8, { type: "t", value: readUInt64(buf, offset) });
    case "d":
      requireBytes(buf, offset, 8, tag);
      return fixed(offset, 8, { type: "d", value: readFloat64(buf, offset) });
    case "c":
      requireBytes(buf, offset, 4, tag);
      return fixed(offset, 4, { type: "c", value: String.fromCharCode(buf[offset + 3]) });
    case "r":
      requireBytes(buf, offset, 4, tag);
      return fixed(offset, 4, {
        type: "r",
        value: { r: buf[offset], g: buf[offset + 1], b: buf[offset + 2], a: buf[offset + 3] },
      });
    case "m":
      requireBytes(buf, offset, 4, tag);
      return fixed(offset, 4, {
        type: "m",
        value: {
          port: buf[offset],
          status: buf[offset + 1],
          data1: buf[offset + 2],
          data2: buf[offset + 3],
        },
      });
    case "s": {
      const { value, next } = readPaddedString(buf, offset);
      return { arg: { type: "s", value }, next };
    }
    case "S": {
      const { value, next } = readPaddedString(buf, offset);
      return { arg: { type: "S", value }, next };
    }
    case "b": {
      requireBytes(buf, offset, 4, tag);
      const size = readInt32(buf, offset);
      if (size < 0) {
        throw new OscCodecError("TruncatedArgument", `Blob at offset ${offset} has negative size ${size}`, offset);
      }
      requireBytes(buf, offset + 4, size, tag);
      const value = new Uint8Array(buf.subarray(offset + 4, offset + 4 + size));
      return { arg: { type: "b", value }, next: align4(offset + 4 + size) };
    }
    case "T":
      return { arg: { type: "T", value: true }, next: offset };
    case "F":
      return { arg: { type: "F", value: false }, next: offset };
    case "N":
      return { arg: { type: "N", value: null }, next: offset };
    case "I":
      return { arg: { type: "I", value: Infinity }, next: offset };
    default:
      throw new OscCodecError("UnknownTypeTag", `OSC type tag '${tag}' is unknown`, offset);
  }
}

// ---------------------------------------------------------------------------
// Encode
// ---------------------------------------------------------------------------

const EMPTY = Buffer.alloc(0);

function fourBytes(a: number, b: number, c: number, d: number): Buffer {
  return Buffer.from([a, b, c, d]);
}

/** Encode a scalar argument's payload (without its type tag). */
export function encodeArgument(arg: OscScalarArg): Buffer {
  switch (arg.type) {
    case "i":
      return encodeInt32(arg.value);
    case "f":
      return encodeFloat32(arg.value);
    case "s":
    case "S":
      return encodePaddedString(arg.value);
    case "b":
      return padToFour(Buffer.concat([encodeInt32(arg.value.length), arg.value]));
    case "h":
      return encodeInt64(arg.value);
    case "t":
      return encodeUInt64(arg.value);
    case "d":
      return encodeFloat64(arg.value);
    case "c":
      return fourBytes(0, 0, 0, arg.value.charCodeAt(0));
    case "r":
      return fourBytes(arg.value.r, arg.value.g, arg.value.b, arg.value.a);
    case "m":
      return fourBytes(arg.value.port, arg.value.status, arg.value.data1, arg.value.data2);
    case "T":
    case "F":
    case "N":
    case "I":
      return EMPTY;
    default: {
      const unreachable: never = arg;
      throw new OscCodecError("InvalidArgument", `Unsupported argument ${JSON.stringify(unreachable)}`);
    }
  }
}

/** Type-tag characters for an argument: one char, or `[`...`]` around an array. */
export function typeTagOf(arg: OscArg): string {
  if (arg.type === "array") {
    return "[" + arg.value.map((a) => a.type).join("") + "]";
  }
  return arg.type;
}

// ---------------------------------------------------------------------------
// Inference
// ---------------------------------------------------------------------------

export type OscScalarInput = string | number | bigint | boolean | null | Uint8Array | Date;
export type OscInput = OscScalarInput | OscScalarInput[];

function inferScalar(value: OscScalarInput): OscScalarArg {
  if (typeof value === "string") return { type: "s", value };
  if (typeof value === "bigint") return { type: "h", value };
  if (typeof value === "boolean") return value ? { type: "T", value: true } : { type: "F", value: false };
  if (value === null) return { type: "N", value: null };
  if (value instanceof Uint8Array) return { type: "b", value };
  if (value instanceof Date) return { type: "t", value: timeTagFromDate(value) };
  if (value === Infinity) return { type: "I", value: Infinity };
  if (Number.isInteger(value) && value >= INT32_MIN && value <= INT32_MAX) return { type: "i", value };
  return { type: "f", value };
}

/**
 * Infer an OSC arg from a plain JS value.
 *   - String → "s"
 *   - Integer number in int32 range → "i"
 *   - Infinity → "I"
 *   - Any other number → "f"
 *   - bigint → "h", boolean → "T"/"F", null → "N"
 *   - Uint8Array → "b", Date → "t"
 *   - Array → one-level array of the above
 */
export function inferOscArg(value: OscInput | OscInput[]): OscArg {
  if (Array.isArray(value)) {
    const items: OscScalarArg[] = [];
    for (const item of value) {
      if (Array.isArray(item)) {
        throw new OscCodecError("NestedArraysUnsupported", "OSC arrays cannot contain arrays");
      }
      items.push(inferScalar(item));
    }
    return { type: "array", value: items };
  }
  return inferScalar(value);
}
