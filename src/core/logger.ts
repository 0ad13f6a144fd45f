/**
 * Structured logger: pino-based, JSON in production, stdout transport in dev, silent under test.
 */

import pino from "pino";

const env = process.env.NODE_ENV;
const level = process.env.LOG_LEVEL ?? (env === "production" ? "info" : env === "test" ? "silent" : "debug");

export const logger = pino({
  level,
  ...(env !== "production" && env !== "test" && {
    transport: { target: "pino/file", options: { destination: 1 } },
  }),
});

export type Logger = pino.Logger;

export function createChildLogger(module: string): pino.Logger {
  return logger.child({ module });
}
