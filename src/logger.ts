type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  repo?: string;
  pr?: number;
  provider?: string;
  attempt?: number;
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Child logger whose entries always carry `context`. */
  withContext(context: LogContext): Logger;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const SINKS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

function isLogLevel(value: string): value is LogLevel {
  return value in SEVERITY;
}

// Read on every call so LOG_LEVEL can change after import.
function threshold(): number {
  const configured = process.env.LOG_LEVEL?.toLowerCase() ?? "info";
  return SEVERITY[isLogLevel(configured) ? configured : "info"];
}

function emit(level: LogLevel, message: string, context: LogContext): void {
  if (SEVERITY[level] < threshold()) return;
  SINKS[level](
    JSON.stringify({ timestamp: new Date().toISOString(), level, message, ...context })
  );
}

export function createLogger(base: LogContext = {}): Logger {
  const at =
    (level: LogLevel) =>
    (message: string, context?: LogContext): void =>
      emit(level, message, { ...base, ...context });

  return {
    debug: at("debug"),
    info: at("info"),
    warn: at("warn"),
    error: at("error"),
    withContext: (context) => createLogger({ ...base, ...context }),
  };
}

export const logger = createLogger();
