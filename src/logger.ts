/**
 * pino logging with scoped child loggers.
 *
 * The root logger is built lazily from `loadConfig()`; call `initLogger` to
 * replace it (tests, host applications that want their own level).
 */

import { pino, type Logger } from "pino";
import { loadConfig, type CodecConfig } from "./config.js";

let rootLogger: Logger | null = null;
const children = new Map<string, Logger>();

export function initLogger(config: CodecConfig = loadConfig()): Logger {
  children.clear();
  rootLogger = config.logPretty
    ? pino({
        level: config.logLevel,
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss",
            ignore: "pid,hostname",
            messageFormat: "[{module}] {msg}",
          },
        },
      })
    : pino({ level: config.logLevel });
  return rootLogger;
}

export function getRootLogger(): Logger {
  return rootLogger ?? initLogger();
}

/** Child logger tagged with `{ module }`. */
export function getLogger(module: string): Logger {
  let child = children.get(module);
  if (!child) {
    child = getRootLogger().child({ module });
    children.set(module, child);
  }
  return child;
}
