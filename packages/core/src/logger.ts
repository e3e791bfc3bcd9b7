export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LoggerConfig {
  level?: LogLevel;
  prefix?: string;
  enableTimestamp?: boolean;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const isLogLevel = (value: string | undefined): value is LogLevel =>
  value !== undefined && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);

export class Logger {
  private level: LogLevel;
  private readonly prefix: string;
  private readonly enableTimestamp: boolean;

  constructor(config: LoggerConfig = {}) {
    const envLogLevel = process.env.LOG_LEVEL?.toLowerCase();
    if (config.level !== undefined) {
      this.level = config.level;
    } else if (isLogLevel(envLogLevel)) {
      this.level = envLogLevel;
    } else {
      this.level = "info";
    }

    this.prefix = config.prefix ?? "[LCIA]";
    this.enableTimestamp = config.enableTimestamp !== false;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private formatMessage(level: LogLevel, message: string): string {
    const timestamp = this.enableTimestamp ? new Date().toISOString() : "";
    return [timestamp, this.prefix, `[${level.toUpperCase()}]`, message]
      .filter(Boolean)
      .join(" ");
  }

  debug(message: string, data?: unknown): void {
    if (this.shouldLog("debug")) {
      console.log(this.formatMessage("debug", message), data ?? "");
    }
  }

  info(message: string, data?: unknown): void {
    if (this.shouldLog("info")) {
      console.log(this.formatMessage("info", message), data ?? "");
    }
  }

  warn(message: string, data?: unknown): void {
    if (this.shouldLog("warn")) {
      console.warn(this.formatMessage("warn", message), data ?? "");
    }
  }

  error(message: string, data?: unknown): void {
    if (this.shouldLog("error")) {
      console.error(this.formatMessage("error", message), data ?? "");
    }
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }
}

export const createLogger = (config: LoggerConfig = {}): Logger => new Logger(config);

const logger = new Logger();

export default logger;
