/**
 * Structured logging via Pino.
 *
 * Development: pino-pretty on stderr, so reports written to stdout stay clean.
 * Production:  JSON lines on stderr.
 * Tests:       silent unless LOG_LEVEL says otherwise.
 */
import pino, { LoggerOptions } from "pino";
import { config } from "../config/env";

const options: LoggerOptions = {
  level: config.logLevel,
  base: { service: "retail-dashboard", env: config.nodeEnv },
  serializers: { err: pino.stdSerializers.err },
};

export const logger =
  config.nodeEnv === "development"
    ? pino({
        ...options,
        transport: {
          target: "pino-pretty",
          options: { colorize: true, translateTime: "HH:MM:ss", ignore: "pid,hostname", destination: 2 },
        },
      })
    : pino(options, pino.destination(2));

/**
 * Child logger with extra bindings.
 * Usage: const log = childLogger({ module: "filter-engine" });
 */
export function childLogger(bindings: Record<string, unknown>) {
  return logger.child(bindings);
}
