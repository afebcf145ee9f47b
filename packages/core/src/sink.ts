export type LogLevel = "debug" | "info" | "warn";

const PREFIX = "[vecmat]";

/**
 * Write one prefixed line to the console. Shared by the logger and the
 * config loader; the loader cannot go through `logger`, which reads config.
 */
export function writeLog(level: LogLevel, message: string, details: readonly unknown[]): void {
  console[level](`${PREFIX} ${message}`, ...details);
}
