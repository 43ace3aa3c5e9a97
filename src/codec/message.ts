/**
 * OSC message codec.
 *
 * Wire layout:
 *   - Address: UTF-8, null-padded to a 4-byte boundary
 *   - Type tag string: "," + one char per arg, `[`/`]` around an array,
 *     null-terminated and padded to 4
 *   - Arguments: each padded to 4 on its own; array elements inline
 */

import type { ZodError } from "zod";
import { decodeArgument, encodeArgument, inferOscArg, typeTagOf, type OscInput } from "./arguments.js";
import { OscCodecError } from "./errors.js";
import { align4, asBuffer, encodeAddress, encodePaddedString } from "./primitives.js";
import type { OscArg, OscMessage, OscScalarArg } from "./types.js";
import { addressSchema, argSchema } from "../schemas/packet.js";

const COMMA = 0x2c;

export function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

// ---------------------------------------------------------------------------
// Decode
// ---------------------------------------------------------------------------

/**
 * Decode one OSC message occupying the whole of `data`.
 *
 * @throws OscCodecError on any malformed field; nothing is returned partially.
 */
export function decodeMessage(data: Uint8Array): OscMessage {
  const buf = asBuffer(data);

  const comma = buf.indexOf(COMMA);
  if (comma === -1) {
    throw new OscCodecError("MissingTypeTagComma", "No type tag string found: packet has no ','");
  }
  if (comma % 4 !== 0) {
    throw new OscCodecError(
      "MisalignedAddress",
      `Address is not padded to a 4-byte boundary (type tags start at offset ${comma})`,
      comma,
    );
  }
  const address = buf.toString("utf-8", 0, comma).replace(/\0+$/, "");

  const tagEnd = buf.indexOf(0, comma);
  if (tagEnd === -1) {
    throw new OscCodecError("MissingNullTerminator", "No null terminator after type tag string", comma);
  }
  const tags = buf.toString("latin1", comma + 1, tagEnd);

  const args: OscArg[] = [];
  // Open `[` container, if any. Only one level is allowed.
  let array: OscScalarArg[] | null = null;
  let offset = align4(tagEnd + 1);

  for (const tag of tags) {
    if (tag === "[") {
      if (array) {
        throw new OscCodecError("NestedArraysUnsupported", "Nested OSC arrays are not supported", offset);
      }
      array = [];
      continue;
    }
    if (tag === "]") {
      if (!array) {
        throw new OscCodecError("UnbalancedArray", "Type tag ']' without a matching '['", offset);
      }
      args.push({ type: "array", value: array });
      array = null;
      continue;
    }
    const { arg, next } = decodeArgument(tag, buf, offset);
    if (array) array.push(arg);
    else args.push(arg);
    offset = align4(next);
  }

  if (array) {
    throw new OscCodecError("UnbalancedArray", "Type tag '[' is never closed", offset);
  }

  return { kind: "message", address, args };
}

// ---------------------------------------------------------------------------
// Encode
// ---------------------------------------------------------------------------

/**
 * Check a caller-built message before encoding.
 * @throws OscCodecError `InvalidAddress`, `NestedArraysUnsupported` or `InvalidArgument`
 */
export function validateMessage(message: OscMessage): void {
  const address = addressSchema.safeParse(message.address);
  if (!address.success) {
    throw new OscCodecError(
      "InvalidAddress",
      `Invalid OSC address "${message.address}": ${formatZodError(address.error)}`,
    );
  }

  for (const arg of message.args) {
    if (arg.type !== "array") continue;
    const items: readonly OscArg[] = arg.value;
    if (items.some((item) => item.type === "array")) {
      throw new OscCodecError("NestedArraysUnsupported", `Nested array in message ${message.address}`);
    }
  }

  for (const [i, arg] of message.args.entries()) {
    const result = argSchema.safeParse(arg);
    if (!result.success) {
      throw new OscCodecError(
        "InvalidArgument",
        `Invalid argument ${i} of ${message.address}: ${formatZodError(result.error)}`,
      );
    }
  }
}

/** Type tag string for an argument list, including the leading ",". */
export function typeTagString(args: readonly OscArg[]): string {
  return "," + args.map(typeTagOf).join("");
}

/**
 * Encode an OSC message into a binary Buffer.
 *
 * @throws OscCodecError if the message fails validation
 */
export function encodeMessage(message: OscMessage): Buffer {
  validateMessage(message);

  const parts: Buffer[] = [encodeAddress(message.address), encodePaddedString(typeTagString(message.args))];

  for (const arg of message.args) {
    if (arg.type === "array") {
      for (const item of arg.value) parts.push(encodeArgument(item));
    } else {
      parts.push(encodeArgument(arg));
    }
  }

  return Buffer.concat(parts);
}

function isOscArg(value: OscInput | OscArg): value is OscArg {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Uint8Array) &&
    !(value instanceof Date)
  );
}

/**
 * Build a message from typed args or plain JS values (see `inferOscArg`).
 *
 * @example
 * createMessage("/synth/note", [60, 0.5, "saw"]);
 * // args: i 60, f 0.5, s "saw"
 */
export function createMessage(address: string, values: readonly (OscInput | OscArg)[] = []): OscMessage {
  const args = values.map((v) => (isOscArg(v) ? v : inferOscArg(v)));
  const message: OscMessage = { kind: "message", address, args };
  validateMessage(message);
  return message;
}
