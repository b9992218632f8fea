// Levelled logger for the host process. Everything goes to stderr; guest output never passes through here.

export const LOG_LEVELS = ["silent", "error", "warn", "info", "verbose", "debug"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

function levelToNumber(level: LogLevel): number {
  switch (level) {
    case "silent":
      return 0;
    case "error":
      return 10;
    case "warn":
      return 20;
    case "info":
      return 30;
    case "verbose":
      return 40;
    case "debug":
      return 50;
  }
}

class Logger {
  private level: LogLevel = "info";

  configure(opts: { level?: LogLevel } = {}): void {
    this.level = opts.level ?? "info";
  }

  getLevel(): LogLevel {
    return this.level;
  }

  private shouldLog(level: LogLevel): boolean {
    return levelToNumber(level) <= levelToNumber(this.level);
  }

  private write(msg: string, level: LogLevel): void {
    try {
      process.stderr.write(`[${new Date().toISOString()}] [${level}] ${msg}\n`);
    } catch {
      // stderr closed under us; nowhere left to report it
    }
  }

  error(msg: string): void {
    if (this.shouldLog("error")) this.write(msg, "error");
  }

  warn(msg: string): void {
    if (this.shouldLog("warn")) this.write(msg, "warn");
  }

  info(msg: string): void {
    if (this.shouldLog("info")) this.write(msg, "info");
  }

  verbose(msg: string): void {
    if (this.shouldLog("verbose")) this.write(msg, "verbose");
  }

  debug(msg: string): void {
    if (this.shouldLog("debug")) this.write(msg, "debug");
  }
}

export const logger = new Logger();
