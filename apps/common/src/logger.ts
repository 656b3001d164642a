type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogMeta {
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  withContext(context: LogMeta): Logger;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function thresholdLevel(): LogLevel {
  const raw = (process.env.LOG_LEVEL ?? "").trim().toLowerCase();
  if (raw === "debug" || raw === "info" || raw === "warn" || raw === "error") {
    return raw;
  }
  return "info";
}

function stringify(meta?: LogMeta): string {
  if (!meta || Object.keys(meta).length === 0) {
    return "";
  }
  return ` ${JSON.stringify(meta)}`;
}

function emit(level: LogLevel, message: string, meta?: LogMeta): void {
  if (LEVEL_RANK[level] < LEVEL_RANK[thresholdLevel()]) {
    return;
  }

  const line = `${new Date().toISOString()} [${level.toUpperCase()}] ${message}${stringify(meta)}`;
  if (level === "error") {
    console.error(line);
    return;
  }
  if (level === "warn") {
    console.warn(line);
    return;
  }
  console.log(line);
}

function createLogger(context: LogMeta): Logger {
  const merge = (meta?: LogMeta): LogMeta => ({ ...context, ...meta });

  return {
    debug(message, meta) {
      emit("debug", message, merge(meta));
    },
    info(message, meta) {
      emit("info", message, merge(meta));
    },
    warn(message, meta) {
      emit("warn", message, merge(meta));
    },
    error(message, meta) {
      emit("error", message, merge(meta));
    },
    withContext(extra) {
      return createLogger(merge(extra));
    },
  };
}

export const logger: Logger = createLogger({});
