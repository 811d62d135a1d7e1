import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

class Logger {
  private level: LogLevel = "info";
  private verbose = false;

  configure(options: { level?: LogLevel; verbose?: boolean }): void {
    if (options.level !== undefined) this.level = options.level;
    if (options.verbose !== undefined) {
      this.verbose = options.verbose;
      if (options.verbose) this.level = "debug";
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private timestamp(): string {
    return new Date().toISOString().slice(11, 19);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog("debug")) return;
    const prefix = chalk.gray(`[${this.timestamp()}] ${chalk.dim("DEBUG")}`);
    console.error(`${prefix} ${message}`, data ? chalk.gray(JSON.stringify(data)) : "");
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog("info")) return;
    const prefix = `${chalk.blue(`[${this.timestamp()}]`)} ${chalk.cyan("INFO")}`;
    console.error(`${prefix}  ${message}`, data && this.verbose ? chalk.gray(JSON.stringify(data)) : "");
  }

  success(message: string): void {
    if (!this.shouldLog("info")) return;
    console.error(`${chalk.green(`[${this.timestamp()}]`)} ${chalk.green("✓")} ${message}`);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog("warn")) return;
    const prefix = `${chalk.yellow(`[${this.timestamp()}]`)} ${chalk.yellow("WARN")}`;
    console.warn(`${prefix}  ${message}`, data ? chalk.yellow(JSON.stringify(data)) : "");
  }

  error(message: string, error?: unknown): void {
    if (!this.shouldLog("error")) return;
    console.error(`${chalk.red(`[${this.timestamp()}]`)} ${chalk.red("ERROR")} ${message}`);
    if (error instanceof Error && this.verbose) {
      console.error(chalk.red(error.stack ?? error.message));
    }
  }
}

export const logger = new Logger();
