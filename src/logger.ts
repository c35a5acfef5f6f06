// Structured JSON logger that writes to stdout (errors go to stderr).

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

const envLevel = process.env.LOG_LEVEL;
const minLevel: LogLevel = isLogLevel(envLevel) ? envLevel : "info";

export function log(
  level: LogLevel,
  msg: string,
  fields?: Record<string, unknown>
): void {
  if (LOG_LEVELS[level] < LOG_LEVELS[minLevel]) return;

  const entry: Record<string, unknown> = {
    time: new Date().toISOString(),
    level: level.toUpperCase(),
    msg,
    component: "site",
    ...fields,
  };

  const out = level === "error" ? process.stderr : process.stdout;
  out.write(JSON.stringify(entry) + "\n");
}

/** Error message plus stack, for log lines that need the diagnostic trace. */
export function errorFields(err: unknown): Record<string, unknown> {
  if (err instanceof Error) {
    return { error: err.message, error_type: err.name, stack: err.stack };
  }
  return { error: String(err) };
}
