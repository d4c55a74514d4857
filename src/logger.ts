/* Tiny logger with leveled, component-tagged output */
type LogLevel = "info" | "warn" | "error" | "debug";

const levelOrder: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(levelOrder, value);
}

const envLevel = process.env.LOG_LEVEL?.trim().toLowerCase();
const currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : "info";

function shouldLog(level: LogLevel): boolean {
  return levelOrder[level] <= levelOrder[currentLevel];
}

export function formatLine(
  level: LogLevel,
  message: string,
  component?: string,
  now: Date = new Date()
): string {
  const tag = component ? ` [${component}]` : "";
  return `[${now.toISOString()}] [${level.toUpperCase()}]${tag} ${message}`;
}

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
  debug(message: string): void;
}

export function createLogger(component?: string): Logger {
  return {
    info: (message) => {
      if (shouldLog("info")) {
        console.log(formatLine("info", message, component));
      }
    },
    warn: (message) => {
      if (shouldLog("warn")) {
        console.warn(formatLine("warn", message, component));
      }
    },
    error: (message, error) => {
      if (shouldLog("error")) {
        console.error(formatLine("error", message, component), error ?? "");
      }
    },
    debug: (message) => {
      if (shouldLog("debug")) {
        console.debug(formatLine("debug", message, component));
      }
    },
  };
}

export const logger = createLogger();
