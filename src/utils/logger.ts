import pino from "pino";
import { config } from "../config/index.js";

// stdout carries the MCP stdio protocol, so every log line goes to stderr.
export const logger =
  config.NODE_ENV === "development"
    ? pino({
        level: config.LOG_LEVEL,
        transport: { target: "pino-pretty", options: { colorize: true, destination: 2 } },
      })
    : pino({ level: config.LOG_LEVEL }, pino.destination(2));

export function createChildLogger(name: string) {
  return logger.child({ module: name });
}
