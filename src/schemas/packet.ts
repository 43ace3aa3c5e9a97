/**
 * Zod schemas for caller-built OSC values.
 *
 * Encoding validates against these before writing a single byte, so a bad
 * value never produces a partial buffer.
 */

import { z } from "zod";

/** Floats may be NaN: the decoder produces them and they must re-encode. */
const float = z.union([z.number(), z.nan()]);

const byte = z.number().int().min(0).max(255);

export const addressSchema = z
  .string()
  .min(1)
  .refine((s) => s.startsWith("/"), { message: 'OSC address must start with "/"' })
  .refine((s) => !s.includes("\0"), { message: "OSC address must not contain null bytes" })
  .refine((s) => !s.includes(","), { message: 'OSC address must not contain ","' });

/** Strings travel null-terminated, so they cannot carry a null themselves. */
const oscString = z
  .string()
  .refine((s) => !s.includes("\0"), { message: "OSC strings must not contain null bytes" });

export const scalarArgSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("i"), value: z.number().int().min(-0x8000_0000).max(0x7fff_ffff) }),
  z.object({ type: z.literal("f"), value: float }),
  z.object({ type: z.literal("s"), value: oscString }),
  z.object({ type: z.literal("b"), value: z.instanceof(Uint8Array) }),
  z.object({ type: z.literal("h"), value: z.bigint().gte(-(2n ** 63n)).lte(2n ** 63n - 1n) }),
  z.object({ type: z.literal("t"), value: z.bigint().gte(0n).lte(2n ** 64n - 1n) }),
  z.object({ type: z.literal("d"), value: float }),
  z.object({ type: z.literal("S"), value: oscString }),
  z.object({
    type: z.literal("c"),
    value: z
      .string()
      .length(1)
      .refine((s) => s.charCodeAt(0) <= 0xff, { message: "OSC chars must fit in one byte" }),
  }),
  z.object({ type: z.literal("r"), value: z.object({ r: byte, g: byte, b: byte, a: byte }) }),
  z.object({
    type: z.literal("m"),
    value: z.object({ port: byte, status: byte, data1: byte, data2: byte }),
  }),
  z.object({ type: z.literal("T"), value: z.literal(true) }),
  z.object({ type: z.literal("F"), value: z.literal(false) }),
  z.object({ type: z.literal("N"), value: z.null() }),
  z.object({ type: z.literal("I"), value: z.literal(Infinity) }),
]);

export const argSchema = z.union([
  scalarArgSchema,
  z.object({ type: z.literal("array"), value: z.array(scalarArgSchema) }),
]);

export const messageSchema = z.object({
  kind: z.literal("message"),
  address: addressSchema,
  args: z.array(argSchema),
});

export const bundleSchema = z.object({
  kind: z.literal("bundle"),
  timeTag: z.bigint().gte(0n).lte(2n ** 64n - 1n),
  elements: z.array(messageSchema),
});
