/**
 * Console logging
 * Sessions take a LogFn so tests can collect lines instead of printing them
 */

export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogFn = (level: LogLevel, message: string) => void;

export type LogSink = Pick<Console, "log" | "warn" | "error">;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const COLORS = {
  reset: "\x1b[0m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  dim: "\x1b[2m",
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export function formatLine(level: LogLevel, message: string): string {
  switch (level) {
    case "debug":
      return `${COLORS.dim}${message}${COLORS.reset}`;
    case "info":
      return `${COLORS.blue}ℹ️${COLORS.reset} ${message}`;
    case "warn":
      return `${COLORS.yellow}⚠️${COLORS.reset} ${message}`;
    case "error":
      return `${COLORS.red}❌${COLORS.reset} ${message}`;
  }
}

/**
 * Create a LogFn that prints to the console, dropping levels below minLevel
 */
export function createConsoleLog(
  minLevel: LogLevel = "info",
  sink: LogSink = console
): LogFn {
  return (level, message) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;

    const line = formatLine(level, message);
    if (level === "error") {
      sink.error(line);
    } else if (level === "warn") {
      sink.warn(line);
    } else {
      sink.log(line);
    }
  };
}
