import { describe, it, expect } from "vitest";
import {
  IMMEDIATELY,
  NTP_EPOCH_OFFSET,
  timeTagFromDate,
  timeTagFromParts,
  timeTagToDate,
  timeTagToParts,
} from "../../src/codec/time-tag.js";

describe("time tags", () => {
  it("IMMEDIATELY is seconds 0, fraction 1", () => {
    expect(timeTagToParts(IMMEDIATELY)).toEqual({ seconds: 0, fraction: 1 });
  });

  it("packs seconds into the upper 32 bits", () => {
    expect(timeTagFromParts(1, 0)).toBe(0x1_0000_0000n);
    expect(timeTagFromParts(0xffff_ffff, 0xffff_ffff)).toBe(2n ** 64n - 1n);
    expect(timeTagToParts(0x0000_0002_8000_0000n)).toEqual({ seconds: 2, fraction: 0x8000_0000 });
  });

  it("converts the Unix epoch", () => {
    expect(timeTagFromDate(new Date(0))).toBe(BigInt(NTP_EPOCH_OFFSET) << 32n);
    expect(timeTagToDate(BigInt(NTP_EPOCH_OFFSET) << 32n).getTime()).toBe(0);
  });

  it("keeps millisecond precision", () => {
    const date = new Date(Date.UTC(2024, 0, 1, 0, 0, 0, 500));
    const tag = timeTagFromDate(date);
    expect(timeTagToParts(tag).fraction).toBe(0x8000_0000);
    expect(timeTagToDate(tag).getTime()).toBe(date.getTime());
  });
});
