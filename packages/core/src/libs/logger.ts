import bunyan from "bunyan";

const LEVELS: readonly bunyan.LogLevelString[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
];

export type Logger = bunyan;

export function isLogLevel(value: string): value is bunyan.LogLevelString {
  const names: readonly string[] = LEVELS;
  return names.includes(value);
}

/** Bunyan level for `raw`, falling back to "info" for unset or unknown values. */
export function resolveLogLevel(raw: string | undefined): bunyan.LogLevelString {
  return raw !== undefined && isLogLevel(raw) ? raw : "info";
}

export function createLogger(
  name: string,
  level: bunyan.LogLevelString = resolveLogLevel(process.env.LOG_LEVEL)
): Logger {
  return bunyan.createLogger({ name: `deduce-${name}`, level });
}
