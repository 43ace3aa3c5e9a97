/**
 * OSC 1.0 value model.
 *
 * Arguments are a closed union keyed by their wire type tag, so a switch over
 * `arg.type` is checked for exhaustiveness by the compiler.
 */

export interface OscArgInt { type: "i"; value: number }
export interface OscArgFloat { type: "f"; value: number }
export interface OscArgString { type: "s"; value: string }
export interface OscArgBlob { type: "b"; value: Uint8Array }
export interface OscArgInt64 { type: "h"; value: bigint }
/** Unsigned 64-bit NTP fixed point (see time-tag.ts). */
export interface OscArgTimeTag { type: "t"; value: bigint }
export interface OscArgDouble { type: "d"; value: number }
export interface OscArgSymbol { type: "S"; value: string }
/** Single character; only the low byte of its code travels on the wire. */
export interface OscArgChar { type: "c"; value: string }
export interface OscArgColor { type: "r"; value: OscColor }
export interface OscArgMidi { type: "m"; value: OscMidi }
export interface OscArgTrue { type: "T"; value: true }
export interface OscArgFalse { type: "F"; value: false }
export interface OscArgNil { type: "N"; value: null }
export interface OscArgInfinitum { type: "I"; value: number }

export interface OscColor {
  r: number;
  g: number;
  b: number;
  a: number;
}

export interface OscMidi {
  port: number;
  status: number;
  data1: number;
  data2: number;
}

export type OscScalarArg =
  | OscArgInt
  | OscArgFloat
  | OscArgString
  | OscArgBlob
  | OscArgInt64
  | OscArgTimeTag
  | OscArgDouble
  | OscArgSymbol
  | OscArgChar
  | OscArgColor
  | OscArgMidi
  | OscArgTrue
  | OscArgFalse
  | OscArgNil
  | OscArgInfinitum;

/** One level of `[` ... `]` grouping. Elements are never arrays themselves. */
export interface OscArgArray {
  type: "array";
  value: readonly OscScalarArg[];
}

export type OscArg = OscScalarArg | OscArgArray;

export type OscScalarTag = OscScalarArg["type"];

export interface OscMessage {
  readonly kind: "message";
  /** Must start with `/`. */
  readonly address: string;
  readonly args: readonly OscArg[];
}

export interface OscBundle {
  readonly kind: "bundle";
  readonly timeTag: bigint;
  readonly elements: readonly OscMessage[];
}

export type OscPacket = OscMessage | OscBundle;
