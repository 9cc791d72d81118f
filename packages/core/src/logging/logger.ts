export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

const LEVEL_LABELS: Record<LogLevel, string> = {
  debug: "DEBUG",
  info: "INFO ",
  warn: "WARN ",
  error: "ERROR"
};

export const resolveLogLevel = (value: string | undefined): LogLevel => {
  const normalized = value?.toLowerCase();
  if (
    normalized === "debug" ||
    normalized === "info" ||
    normalized === "warn" ||
    normalized === "error"
  ) {
    return normalized;
  }
  return "info";
};

export const formatLogLine = (
  level: LogLevel,
  component: string,
  message: string,
  fields?: LogFields,
  now: Date = new Date()
): string => {
  const timestamp = now.toISOString().slice(11, 19);
  let line = `[${timestamp}] [${LEVEL_LABELS[level]}] [${component}] ${message}`;

  if (fields) {
    const sanitized: LogFields = {};
    Object.entries(fields).forEach(([key, value]) => {
      if (value !== undefined && value !== null) {
        sanitized[key] = value;
      }
    });
    if (Object.keys(sanitized).length > 0) {
      line += ` ${JSON.stringify(sanitized)}`;
    }
  }

  return line;
};

/**
 * Leveled console logger for one component of the colony.
 *
 * The minimum level comes from `ANTPATH_LOG_LEVEL` unless one is passed in.
 */
export const createLogger = (
  component: string,
  minLevel: LogLevel = resolveLogLevel(process.env.ANTPATH_LOG_LEVEL)
): Logger => {
  const emit = (level: LogLevel, message: string, fields?: LogFields) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) {
      return;
    }
    const line = formatLogLine(level, component, message, fields);
    if (level === "error") {
      console.error(line);
    } else if (level === "warn") {
      console.warn(line);
    } else {
      console.log(line);
    }
  };

  return {
    debug: (message, fields) => emit("debug", message, fields),
    info: (message, fields) => emit("info", message, fields),
    warn: (message, fields) => emit("warn", message, fields),
    error: (message, fields) => emit("error", message, fields)
  };
};
