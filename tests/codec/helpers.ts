import { isOscCodecError } from "../../src/codec/errors.js";

/** Run `fn` and return the OscCodecError code it throws, if any. */
export function errorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return isOscCodecError(error) ? error.code : `non-codec error: ${String(error)}`;
  }
  return undefined;
}

/** The 12-byte message `/foo ,i 42`. */
export const FOO_42 = Buffer.from([
  0x2f, 0x66, 0x6f, 0x6f, // "/foo"
  0x2c, 0x69, 0x00, 0x00, // ",i\0\0"
  0x00, 0x00, 0x00, 0x2a, // 42
]);
