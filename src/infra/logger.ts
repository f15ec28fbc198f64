import pc from "picocolors";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

interface LoggerOptions {
  level: LogLevel;
  verbose: boolean;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/**
 * Diagnostics go to stderr so that command output on stdout stays pipeable
 * (e.g. `issue-compass prioritize --json | jq`).
 */
class Logger {
  private level: LogLevel = "info";
  private verbose = false;

  configure(options: Partial<LoggerOptions>): void {
    if (options.level !== undefined) {
      this.level = options.level;
    }
    if (options.verbose !== undefined) {
      this.verbose = options.verbose;
    }
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isEnabled(level: Exclude<LogLevel, "silent">): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private timestamp(): string {
    return new Date().toISOString().slice(11, 19);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.isEnabled("debug")) return;
    const prefix = pc.gray(`[${this.timestamp()}] ${pc.dim("DEBUG")}`);
    console.error(`${prefix} ${message}`, data ? pc.gray(JSON.stringify(data)) : "");
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (!this.isEnabled("info")) return;
    const prefix = pc.blue(`[${this.timestamp()}]`) + " " + pc.cyan("INFO");
    console.error(`${prefix}  ${message}`, data && this.verbose ? pc.gray(JSON.stringify(data)) : "");
  }

  success(message: string): void {
    if (!this.isEnabled("info")) return;
    const prefix = pc.green(`[${this.timestamp()}]`) + " " + pc.green("✓");
    console.error(`${prefix} ${message}`);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (!this.isEnabled("warn")) return;
    const prefix = pc.yellow(`[${this.timestamp()}]`) + " " + pc.yellow("WARN");
    console.warn(`${prefix}  ${message}`, data ? pc.yellow(JSON.stringify(data)) : "");
  }

  error(message: string, error?: unknown): void {
    if (!this.isEnabled("error")) return;
    const prefix = pc.red(`[${this.timestamp()}]`) + " " + pc.red("ERROR");
    console.error(`${prefix} ${message}`);
    if (error instanceof Error && this.verbose) {
      console.error(pc.red(error.stack ?? error.message));
    }
  }
}

export const logger = new Logger();
