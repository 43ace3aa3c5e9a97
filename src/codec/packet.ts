/**
 * Packet entry points: pick the message or bundle codec.
 */

import { decodeBundle, encodeBundle } from "./bundle.js";
import { isOscCodecError, OscCodecError } from "./errors.js";
import { decodeMessage, encodeMessage } from "./message.js";
import type { OscPacket } from "./types.js";
import { getLogger } from "../logger.js";

const HASH = 0x23;

export type DecodeResult =
  | { ok: true; packet: OscPacket }
  | { ok: false; error: OscCodecError };

/**
 * Decode a raw OSC packet. A leading "#" means a bundle, anything else a message.
 *
 * @throws OscCodecError `MalformedPacket` for an empty buffer, or the
 *   message/bundle codec's error
 */
export function decodePacket(data: Uint8Array): OscPacket {
  if (data.length === 0) {
    throw new OscCodecError("MalformedPacket", "Cannot decode an empty packet", 0);
  }
  return data[0] === HASH ? decodeBundle(data) : decodeMessage(data);
}

/**
 * Like `decodePacket`, but codec failures come back as `{ ok: false }` so the
 * caller can drop the packet. Any other error still propagates.
 */
export function safeDecodePacket(data: Uint8Array): DecodeResult {
  try {
    return { ok: true, packet: decodePacket(data) };
  } catch (error) {
    if (!isOscCodecError(error)) throw error;
    getLogger("packet").debug(
      { code: error.code, offset: error.offset, bytes: data.length },
      `discarding packet: ${error.message}`,
    );
    return { ok: false, error };
  }
}

export function encodePacket(packet: OscPacket): Buffer {
  return packet.kind === "bundle" ? encodeBundle(packet) : encodeMessage(packet);
}
