import { describe, it, expect } from "vitest";
import { decodeArgument, encodeArgument, inferOscArg, typeTagOf } from "../../src/codec/arguments.js";
import { NTP_EPOCH_OFFSET } from "../../src/codec/time-tag.js";
import { errorCode } from "./helpers.js";

describe("decodeArgument", () => {
  it("reads fixed-width values and re-aligns", () => {
    const buf = Buffer.from([0xff, 0xff, 0xff, 0xfe, 0x3f, 0x80, 0, 0]);
    expect(decodeArgument("i", buf, 0)).toEqual({ arg: { type: "i", value: -2 }, next: 4 });
    expect(decodeArgument("f", buf, 4)).toEqual({ arg: { type: "f", value: 1 }, next: 8 });
  });

  it("reads a char from the low byte of its slot", () => {
    const buf = Buffer.from([0, 0, 0, 0x41]);
    expect(decodeArgument("c", buf, 0).arg).toEqual({ type: "c", value: "A" });
  });

  it("reads color and midi as four bytes", () => {
    const buf = Buffer.from([10, 20, 30, 40]);
    expect(decodeArgument("r", buf, 0).arg).toEqual({ type: "r", value: { r: 10, g: 20, b: 30, a: 40 } });
    expect(decodeArgument("m", buf, 0).arg).toEqual({
      type: "m",
      value: { port: 10, status: 20, data1: 30, data2: 40 },
    });
  });

  it("reads strings and symbols up to the null terminator", () => {
    const buf = Buffer.from("abcd\0\0\0\0xy\0\0");
    expect(decodeArgument("s", buf, 0)).toEqual({ arg: { type: "s", value: "abcd" }, next: 8 });
    expect(decodeArgument("S", buf, 8)).toEqual({ arg: { type: "S", value: "xy" }, next: 12 });
  });

  it("reads a blob and skips its padding", () => {
    const buf = Buffer.from([0, 0, 0, 3, 1, 2, 3, 0]);
    expect(decodeArgument("b", buf, 0)).toEqual({
      arg: { type: "b", value: new Uint8Array([1, 2, 3]) },
      next: 8,
    });
  });

  it("zero-width tags consume nothing", () => {
    const buf = Buffer.alloc(0);
    expect(decodeArgument("T", buf, 0)).toEqual({ arg: { type: "T", value: true }, next: 0 });
    expect(decodeArgument("F", buf, 0)).toEqual({ arg: { type: "F", value: false }, next: 0 });
    expect(decodeArgument("N", buf, 0)).toEqual({ arg: { type: "N", value: null }, next: 0 });
    expect(decodeArgument("I", buf, 0)).toEqual({ arg: { type: "I", value: Infinity }, next: 0 });
  });

  it("rejects unknown tags", () => {
    expect(errorCode(() => decodeArgument("x", Buffer.alloc(4), 0))).toBe("UnknownTypeTag");
  });

  it("rejects payloads that run past the buffer", () => {
    expect(errorCode(() => decodeArgument("i", Buffer.alloc(2), 0))).toBe("TruncatedArgument");
    expect(errorCode(() => decodeArgument("d", Buffer.alloc(4), 0))).toBe("TruncatedArgument");
    expect(errorCode(() => decodeArgument("b", Buffer.from([0, 0, 0, 9, 1]), 0))).toBe("TruncatedArgument");
    expect(errorCode(() => decodeArgument("b", Buffer.from([0xff, 0xff, 0xff, 0xff]), 0))).toBe(
      "TruncatedArgument",
    );
    expect(errorCode(() => decodeArgument("s", Buffer.from("abcd"), 0))).toBe("MissingNullTerminator");
  });
});

describe("encodeArgument", () => {
  it("pads blobs so length prefix plus data is a multiple of 4", () => {
    expect(encodeArgument({ type: "b", value: new Uint8Array([1, 2, 3]) })).toEqual(
      Buffer.from([0, 0, 0, 3, 1, 2, 3, 0]),
    );
    expect(encodeArgument({ type: "b", value: new Uint8Array([1, 2, 3, 4]) })).toEqual(
      Buffer.from([0, 0, 0, 4, 1, 2, 3, 4]),
    );
  });

  it("writes char, color and midi into one 4-byte slot", () => {
    expect(encodeArgument({ type: "c", value: "A" })).toEqual(Buffer.from([0, 0, 0, 0x41]));
    expect(encodeArgument({ type: "r", value: { r: 255, g: 128, b: 0, a: 1 } })).toEqual(
      Buffer.from([255, 128, 0, 1]),
    );
    expect(encodeArgument({ type: "m", value: { port: 0, status: 0x90, data1: 60, data2: 100 } })).toEqual(
      Buffer.from([0, 0x90, 60, 100]),
    );
  });

  it("writes strings and symbols identically", () => {
    expect(encodeArgument({ type: "s", value: "sine" })).toEqual(encodeArgument({ type: "S", value: "sine" }));
    expect(encodeArgument({ type: "S", value: "sine" }).length).toBe(8);
  });

  it("writes nothing for T, F, N and I", () => {
    expect(encodeArgument({ type: "T", value: true }).length).toBe(0);
    expect(encodeArgument({ type: "F", value: false }).length).toBe(0);
    expect(encodeArgument({ type: "N", value: null }).length).toBe(0);
    expect(encodeArgument({ type: "I", value: Infinity }).length).toBe(0);
  });
});

describe("typeTagOf", () => {
  it("wraps array elements in brackets", () => {
    expect(typeTagOf({ type: "i", value: 1 })).toBe("i");
    expect(
      typeTagOf({
        type: "array",
        value: [
          { type: "i", value: 1 },
          { type: "s", value: "x" },
          { type: "f", value: 0.5 },
        ],
      }),
    ).toBe("[isf]");
  });
});

describe("inferOscArg", () => {
  it("distinguishes int, float, and string", () => {
    expect(inferOscArg(140)).toEqual({ type: "i", value: 140 });
    expect(inferOscArg(140.5)).toEqual({ type: "f", value: 140.5 });
    expect(inferOscArg("hello")).toEqual({ type: "s", value: "hello" });
  });

  it("falls back to float outside the int32 range", () => {
    expect(inferOscArg(2 ** 31)).toEqual({ type: "f", value: 2 ** 31 });
    expect(inferOscArg(-(2 ** 31))).toEqual({ type: "i", value: -(2 ** 31) });
  });

  it("maps the remaining JS types", () => {
    expect(inferOscArg(Infinity)).toEqual({ type: "I", value: Infinity });
    expect(inferOscArg(5n)).toEqual({ type: "h", value: 5n });
    expect(inferOscArg(true)).toEqual({ type: "T", value: true });
    expect(inferOscArg(false)).toEqual({ type: "F", value: false });
    expect(inferOscArg(null)).toEqual({ type: "N", value: null });
    expect(inferOscArg(new Uint8Array([7]))).toEqual({ type: "b", value: new Uint8Array([7]) });
    expect(inferOscArg(new Date(0))).toEqual({ type: "t", value: BigInt(NTP_EPOCH_OFFSET) << 32n });
  });

  it("infers one level of array", () => {
    expect(inferOscArg([1, "a"])).toEqual({
      type: "array",
      value: [
        { type: "i", value: 1 },
        { type: "s", value: "a" },
      ],
    });
    expect(errorCode(() => inferOscArg([[1]]))).toBe("NestedArraysUnsupported");
  });
});
