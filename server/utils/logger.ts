export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let minimumLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL);

export function parseLogLevel(value: string | undefined): LogLevel {
  switch (value?.toLowerCase()) {
    case "debug":
      return "debug";
    case "warn":
      return "warn";
    case "error":
      return "error";
    default:
      return "info";
  }
}

export function setLogLevel(level: LogLevel): void {
  minimumLevel = level;
}

export class Logger {
  constructor(
    private prefix: string,
    private context: LogContext = {},
  ) {}

  debug(message: string, context?: LogContext) {
    this.log("debug", message, context);
  }

  info(message: string, context?: LogContext) {
    this.log("info", message, context);
  }

  warn(message: string, context?: LogContext) {
    this.log("warn", message, context);
  }

  error(message: string, error?: Error, context?: LogContext) {
    const errorContext = error
      ? {
          error: error.message,
          stack: error.stack,
          ...context,
        }
      : context;
    this.log("error", message, errorContext);
  }

  child(context: LogContext): Logger {
    return new Logger(this.prefix, { ...this.context, ...context });
  }

  private log(level: LogLevel, message: string, context?: LogContext) {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minimumLevel]) return;

    const fullContext = { ...this.context, ...context };
    const contextStr =
      Object.keys(fullContext).length > 0
        ? ` ${JSON.stringify(fullContext)}`
        : "";

    const formattedMessage = `[${this.prefix}] ${message}${contextStr}`;

    switch (level) {
      case "debug":
        console.debug(formattedMessage);
        break;
      case "info":
        console.log(formattedMessage);
        break;
      case "warn":
        console.warn(formattedMessage);
        break;
      case "error":
        console.error(formattedMessage);
        break;
    }
  }
}

export function createLogger(prefix: string, context?: LogContext): Logger {
  return new Logger(prefix, context);
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
