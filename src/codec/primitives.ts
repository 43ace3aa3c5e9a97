/**
 * Big-endian fixed-width primitives and 4-byte alignment helpers.
 *
 * Every numeric field on the OSC wire goes through these functions.
 * Readers do no bounds checking: callers verify the buffer is long enough.
 */

/** Round an offset up to the next multiple of 4. */
export function align4(offset: number): number {
  return (offset + 3) & ~3;
}

/** Pad a buffer with null bytes to the next 4-byte boundary. */
export function padToFour(buf: Buffer): Buffer {
  const remainder = buf.length % 4;
  if (remainder === 0) return buf;
  const padding = Buffer.alloc(4 - remainder, 0);
  return Buffer.concat([buf, padding]);
}

/**
 * Encode a string as UTF-8 followed by 1-4 null bytes, ending on a 4-byte
 * boundary. Used for type-tag strings, strings and symbols.
 */
export function encodePaddedString(s: string): Buffer {
  const raw = Buffer.from(s, "utf-8");
  const out = Buffer.alloc(raw.length - (raw.length % 4) + 4, 0);
  raw.copy(out, 0);
  return out;
}

/**
 * Encode an address as UTF-8 null-padded to a 4-byte boundary.
 * No terminator is added when the length is already aligned: the type-tag
 * comma marks where the address ends.
 */
export function encodeAddress(address: string): Buffer {
  return padToFour(Buffer.from(address, "utf-8"));
}

/** View any Uint8Array as a Buffer without copying. */
export function asBuffer(data: Uint8Array): Buffer {
  return Buffer.isBuffer(data)
    ? data
    : Buffer.from(data.buffer, data.byteOffset, data.byteLength);
}

// ---------------------------------------------------------------------------
// Readers
// ---------------------------------------------------------------------------

export function readInt32(buf: Buffer, offset: number): number {
  return buf.readInt32BE(offset);
}

export function readFloat32(buf: Buffer, offset: number): number {
  return buf.readFloatBE(offset);
}

export function readInt64(buf: Buffer, offset: number): bigint {
  return buf.readBigInt64BE(offset);
}

export function readUInt64(buf: Buffer, offset: number): bigint {
  return buf.readBigUInt64BE(offset);
}

export function readFloat64(buf: Buffer, offset: number): number {
  return buf.readDoubleBE(offset);
}

// ---------------------------------------------------------------------------
// Writers
// ---------------------------------------------------------------------------

/** Encode a 32-bit signed integer (big-endian). */
export function encodeInt32(n: number): Buffer {
  const buf = Buffer.alloc(4);
  buf.writeInt32BE(n, 0);
  return buf;
}

/** Encode a 32-bit float (big-endian IEEE 754). */
export function encodeFloat32(n: number): Buffer {
  const buf = Buffer.alloc(4);
  buf.writeFloatBE(n, 0);
  return buf;
}

export function encodeInt64(n: bigint): Buffer {
  const buf = Buffer.alloc(8);
  buf.writeBigInt64BE(n, 0);
  return buf;
}

export function encodeUInt64(n: bigint): Buffer {
  const buf = Buffer.alloc(8);
  buf.writeBigUInt64BE(n, 0);
  return buf;
}

export function encodeFloat64(n: number): Buffer {
  const buf = Buffer.alloc(8);
  buf.writeDoubleBE(n, 0);
  return buf;
}
