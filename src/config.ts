/**
 * Environment configuration, validated with zod.
 *
 *   OSC_LOG_LEVEL   trace | debug | info | warn | error | fatal | silent  (default: warn)
 *   OSC_LOG_PRETTY  true | false                                        (default: false)
 */

import { z } from "zod";

export const logLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);

export type LogLevel = z.infer<typeof logLevelSchema>;

const booleanString = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

const envSchema = z.object({
  OSC_LOG_LEVEL: logLevelSchema.default("warn"),
  OSC_LOG_PRETTY: booleanString.default("false"),
});

export interface CodecConfig {
  logLevel: LogLevel;
  logPretty: boolean;
}

/**
 * Read configuration from environment variables.
 * @throws Error naming each invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CodecConfig {
  const result = envSchema.safeParse({
    OSC_LOG_LEVEL: env.OSC_LOG_LEVEL || undefined,
    OSC_LOG_PRETTY: env.OSC_LOG_PRETTY || undefined,
  });
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }
  return {
    logLevel: result.data.OSC_LOG_LEVEL,
    logPretty: result.data.OSC_LOG_PRETTY,
  };
}
