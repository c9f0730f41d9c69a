/**
 * Structured Logger
 * =================
 * Timestamped, level-tagged console lines with an optional JSON context.
 */

type LogLevel = "info" | "warn" | "error" | "debug";

type LogContext = Record<string, unknown>;

function isSilenced(level: LogLevel): boolean {
  const raw = (process.env.LOG_LEVEL || "").trim().toLowerCase();
  if (raw === "silent") {return true;}
  if (raw === "error") {return level !== "error";}
  if (raw === "warn") {return level === "info" || level === "debug";}
  return false;
}

class Logger {
  private formatMessage(
    level: LogLevel,
    message: string,
    context?: LogContext
  ): string {
    const timestamp = new Date().toISOString();
    const contextStr = context ? ` ${JSON.stringify(context)}` : "";
    return `[${timestamp}] [${level.toUpperCase()}] ${message}${contextStr}`;
  }

  info(message: string, context?: LogContext) {
    if (isSilenced("info")) {return;}
    console.log(this.formatMessage("info", message, context));
  }

  warn(message: string, context?: LogContext) {
    if (isSilenced("warn")) {return;}
    console.warn(this.formatMessage("warn", message, context));
  }

  error(message: string, error?: Error | LogContext) {
    if (isSilenced("error")) {return;}
    if (error instanceof Error) {
      console.error(
        this.formatMessage("error", message, {
          error: error.message,
          stack: error.stack,
        })
      );
    } else {
      console.error(this.formatMessage("error", message, error));
    }
  }

  debug(message: string, context?: LogContext) {
    if (isSilenced("debug")) {return;}
    if (process.env.NODE_ENV === "development") {
      console.log(this.formatMessage("debug", message, context));
    }
  }
}

export const logger = new Logger();
