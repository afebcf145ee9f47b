import { config } from "./config.js";
import { writeLog } from "./sink.js";

/**
 * Console logger with a `[vecmat]` prefix. `debug` and `info` lines are only
 * emitted when the `debug` config flag is on; warnings always are.
 */
export const logger = {
  debug(message: string, ...details: unknown[]): void {
    if (!config.get("debug")) return;
    writeLog("debug", message, details);
  },

  info(message: string, ...details: unknown[]): void {
    if (!config.get("debug")) return;
    writeLog("info", message, details);
  },

  warn(message: string, ...details: unknown[]): void {
    writeLog("warn", message, details);
  },
};

/**
 * Log a domain error at debug level and hand it back, so call sites can
 * write `throw reportError(new SingularMatrixError(...))`.
 */
export function reportError<E extends Error>(error: E): E {
  logger.debug(`${error.name}: ${error.message}`);
  return error;
}
