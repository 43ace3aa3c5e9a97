/**
 * OSC bundle codec.
 *
 *   "#bundle\0"            8 bytes
 *   time tag               8 bytes, uint64 big-endian
 *   repeated:
 *     size                 int32 big-endian
 *     message              `size` bytes
 *     padding              nulls to the next 4-byte boundary
 *
 * Elements are messages only; a bundle nested in a bundle is rejected.
 */

import { OscCodecError } from "./errors.js";
import { decodeMessage, encodeMessage, formatZodError, validateMessage } from "./message.js";
import { align4, asBuffer, encodeInt32, encodeUInt64, padToFour, readInt32, readUInt64 } from "./primitives.js";
import type { OscBundle, OscMessage } from "./types.js";
import { bundleSchema } from "../schemas/packet.js";
import { getLogger } from "../logger.js";

export const BUNDLE_HEADER = Buffer.from("#bundle\0", "ascii");

const HEADER_SIZE = 16;
const HASH = 0x23;

export function decodeBundle(data: Uint8Array): OscBundle {
  const buf = asBuffer(data);

  if (buf.length < BUNDLE_HEADER.length || !buf.subarray(0, BUNDLE_HEADER.length).equals(BUNDLE_HEADER)) {
    throw new OscCodecError("NotABundle", 'Packet starts with "#" but has no "#bundle\\0" header', 0);
  }
  if (buf.length < HEADER_SIZE) {
    throw new OscCodecError("TruncatedBundle", "Bundle ends before its time tag", BUNDLE_HEADER.length);
  }

  const timeTag = readUInt64(buf, 8);
  const elements: OscMessage[] = [];
  let offset = HEADER_SIZE;

  while (offset < buf.length) {
    if (offset + 4 > buf.length) {
      throw new OscCodecError("TruncatedBundle", `Bundle element size at offset ${offset} is cut short`, offset);
    }
    const size = readInt32(buf, offset);
    offset += 4;
    if (size < 0 || offset + size > buf.length) {
      throw new OscCodecError(
        "TruncatedBundle",
        `Bundle element declares ${size} bytes but only ${buf.length - offset} remain`,
        offset,
      );
    }

    const element = buf.subarray(offset, offset + size);
    if (element[0] === HASH) {
      throw new OscCodecError("NestedBundleUnsupported", "Bundles nested inside bundles are not supported", offset);
    }
    elements.push(decodeMessage(element));

    offset = align4(offset + size);
  }

  getLogger("bundle").trace({ timeTag: timeTag.toString(), elements: elements.length }, "decoded bundle");
  return { kind: "bundle", timeTag, elements };
}

/**
 * Check a caller-built bundle: time tag in uint64 range, every element valid.
 * @throws OscCodecError
 */
export function validateBundle(bundle: OscBundle): void {
  const timeTag = bundleSchema.shape.timeTag.safeParse(bundle.timeTag);
  if (!timeTag.success) {
    throw new OscCodecError("InvalidArgument", `Invalid bundle time tag: ${formatZodError(timeTag.error)}`);
  }
  for (const element of bundle.elements) validateMessage(element);
}

/**
 * Encode a bundle of messages.
 * @throws OscCodecError if the time tag or any element fails validation
 */
export function encodeBundle(bundle: OscBundle): Buffer {
  // Validate every element before encoding any of them.
  validateBundle(bundle);

  const parts: Buffer[] = [BUNDLE_HEADER, encodeUInt64(bundle.timeTag)];
  for (const element of bundle.elements) {
    const bytes = encodeMessage(element);
    parts.push(encodeInt32(bytes.length), padToFour(bytes));
  }
  return Buffer.concat(parts);
}

export function createBundle(timeTag: bigint, elements: readonly OscMessage[] = []): OscBundle {
  const bundle: OscBundle = { kind: "bundle", timeTag, elements };
  validateBundle(bundle);
  return bundle;
}
