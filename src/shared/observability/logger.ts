import { getTraceId } from "./trace";

export type LogLevel = "info" | "warn" | "error";

export type Logger = {
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
};

export type LogSink = (level: LogLevel, line: string) => void;

const consoleSink: LogSink = (level, line) => {
  if (level === "error") {
    console.error(line);
    return;
  }
  console.log(line);
};

// Keeps stdout free for command output.
export const stderrSink: LogSink = (_level, line) => {
  console.error(line);
};

export const createLogger = (service: string, sink: LogSink = consoleSink): Logger => {
  const log = (level: LogLevel, message: string, meta?: Record<string, unknown>) => {
    const traceId = getTraceId();
    const entry = {
      level,
      service,
      message,
      traceId,
      time: new Date().toISOString(),
      ...meta
    };
    sink(level, JSON.stringify(entry));
  };

  return {
    info: (message, meta) => log("info", message, meta),
    warn: (message, meta) => log("warn", message, meta),
    error: (message, meta) => log("error", message, meta)
  };
};
