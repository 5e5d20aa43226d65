/**
 * Console logger with a minimum level.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const levelWeight: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export class Logger {
  private readonly minLevel: LogLevel;
  private readonly scope?: string;

  constructor(level: LogLevel = "info", scope?: string) {
    this.minLevel = level;
    this.scope = scope;
  }

  /**
   * Logger sharing this one's level, prefixing every line with `[scope]`.
   */
  child(scope: string): Logger {
    return new Logger(this.minLevel, scope);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.write("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.write("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.write("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.write("error", message, meta);
  }

  private write(
    level: Exclude<LogLevel, "silent">,
    message: string,
    meta?: Record<string, unknown>
  ): void {
    if (levelWeight[level] < levelWeight[this.minLevel]) {
      return;
    }
    const prefixed = this.scope ? `[${this.scope}] ${message}` : message;
    const line = meta ? `${prefixed} ${JSON.stringify(meta)}` : prefixed;
    switch (level) {
      case "debug":
      case "info":
        console.log(line);
        break;
      case "warn":
        console.warn(line);
        break;
      case "error":
        console.error(line);
        break;
    }
  }
}

export const silentLogger = new Logger("silent");
