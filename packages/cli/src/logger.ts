/**
 * @txledger/cli — Structured logging.
 *
 * pino writes JSON lines to stderr; stdout is reserved for the
 * account report. Development runs get pino-pretty instead.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { AppConfig } from "./config.js";

export type { Logger } from "pino";

const STDERR = 2;

export function createLogger(
  config: Pick<AppConfig, "LOG_LEVEL" | "NODE_ENV">,
): Logger {
  if (config.NODE_ENV === "development") {
    return pino({
      level: config.LOG_LEVEL,
      transport: { target: "pino-pretty", options: { destination: STDERR } },
    });
  }
  return pino({ level: config.LOG_LEVEL }, pino.destination(STDERR));
}
