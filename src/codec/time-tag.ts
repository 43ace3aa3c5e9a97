/**
 * OSC time tags: 64-bit NTP fixed point.
 *   - upper 32 bits: seconds since 1900-01-01T00:00:00Z
 *   - lower 32 bits: fractions of a second (1 / 2^32)
 */

/** Seconds between the NTP epoch (1900) and the Unix epoch (1970). */
export const NTP_EPOCH_OFFSET = 2208988800;

/** The special time tag meaning "process immediately". */
export const IMMEDIATELY = 1n;

const TWO_POW_32 = 0x1_0000_0000;
const UINT32_MASK = 0xffff_ffffn;

export interface TimeTagParts {
  seconds: number;
  fraction: number;
}

export function timeTagFromParts(seconds: number, fraction: number): bigint {
  return (BigInt(seconds >>> 0) << 32n) | BigInt(fraction >>> 0);
}

export function timeTagToParts(tag: bigint): TimeTagParts {
  return {
    seconds: Number((tag >> 32n) & UINT32_MASK),
    fraction: Number(tag & UINT32_MASK),
  };
}

/**
 * Convert a Date to a time tag.
 * Millisecond precision; dates past 2036-02-07 wrap like the 32-bit field does.
 */
export function timeTagFromDate(date: Date): bigint {
  const ms = date.getTime();
  const unixSeconds = Math.floor(ms / 1000);
  const millis = ms - unixSeconds * 1000;
  const fraction = Math.round((millis / 1000) * TWO_POW_32);
  return timeTagFromParts(unixSeconds + NTP_EPOCH_OFFSET, fraction);
}

export function timeTagToDate(tag: bigint): Date {
  const { seconds, fraction } = timeTagToParts(tag);
  const ms = (seconds - NTP_EPOCH_OFFSET) * 1000 + Math.round((fraction / TWO_POW_32) * 1000);
  return new Date(ms);
}
