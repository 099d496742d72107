/**
 * Centralized logging for the cheatsheet generator.
 *
 * Environment Variables:
 *   LOG_LEVEL=error|warn|info|debug|trace  (default: info)
 *   LOG_SCOPES=input,build,canon,count,roots,render,cli
 *      (optional, default: all scopes allowed)
 *   LOG_FORMAT=pretty|json  (default: pretty)
 *
 * The environment is read at import; the CLI then applies the validated Config.logging
 * through configure().
 *
 * Example Usage:
 *   LOG_LEVEL=debug LOG_SCOPES=build,render  npx tsx src/tools/build-cheatsheet.ts ./data/ftl
 *   LOG_LEVEL=warn  npx tsx src/tools/build-cheatsheet.ts ./data/ftl  // Only diagnostics and errors
 */

import type { Config } from "../config/types.js";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error";
export type LogScope =
  | "input"
  | "build"
  | "canon"
  | "count"
  | "roots"
  | "render"
  | "cli"
  | string;

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  scope?: string;
  message: string;
  data?: unknown;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

class Logger {
  private level: number;
  private scopes: Set<string>;
  private format: "pretty" | "json";

  constructor() {
    // Parse LOG_LEVEL (default: info)
    const logLevelEnv = (process.env.LOG_LEVEL ?? "info").toLowerCase();
    this.level = isLogLevel(logLevelEnv) ? LOG_LEVELS[logLevelEnv] : LOG_LEVELS.info;

    // Parse LOG_SCOPES (default: all scopes allowed)
    const logScopesEnv = process.env.LOG_SCOPES ?? "";
    this.scopes = new Set(
      logScopesEnv
        .split(",")
        .map((s) => s.trim())
        .filter((s) => s)
    );

    // Parse LOG_FORMAT (default: pretty)
    this.format = process.env.LOG_FORMAT === "json" ? "json" : "pretty";
  }

  configure(options: Config["logging"]): void {
    this.level = LOG_LEVELS[options.level];
    this.scopes = new Set(options.scopes ?? []);
    this.format = options.format;
  }

  private shouldLog(level: LogLevel, scope?: string): boolean {
    // Check level
    if (LOG_LEVELS[level] < this.level) return false;

    // Check scope: if scopes are set, only log if scope matches
    if (this.scopes.size > 0 && scope && !this.scopes.has(scope)) {
      return false;
    }

    return true;
  }

  private formatOutput(entry: LogEntry): string {
    if (this.format === "json") {
      return JSON.stringify(entry);
    }

    const time = entry.timestamp.split("T")[1].split(".")[0]; // HH:MM:SS
    const levelAbbr = {
      trace: "TRC",
      debug: "DBG",
      info: "INF",
      warn: "WRN",
      error: "ERR",
    }[entry.level];
    const scopeStr = entry.scope ? ` │ ${entry.scope}` : "";
    const dataStr = entry.data ? ` │ ${JSON.stringify(entry.data)}` : "";

    return `${time} [${levelAbbr}]${scopeStr} ${entry.message}${dataStr}`;
  }

  private emit(level: LogLevel, message: string, scope?: LogScope, data?: unknown): void {
    if (!this.shouldLog(level, scope)) return;

    const output = this.formatOutput({
      timestamp: new Date().toISOString(),
      level,
      scope,
      message,
      data,
    });

    switch (level) {
      case "error":
        console.error(output);
        break;
      case "warn":
        console.warn(output);
        break;
      case "info":
        console.log(output);
        break;
      case "debug":
        console.log(output);
        break;
      case "trace":
        console.debug(output);
        break;
    }
  }

  trace(message: string, scope?: LogScope, data?: unknown): void {
    this.emit("trace", message, scope, data);
  }

  debug(message: string, scope?: LogScope, data?: unknown): void {
    this.emit("debug", message, scope, data);
  }

  info(message: string, scope?: LogScope, data?: unknown): void {
    this.emit("info", message, scope, data);
  }

  warn(message: string, scope?: LogScope, data?: unknown): void {
    this.emit("warn", message, scope, data);
  }

  error(message: string, scope?: LogScope, data?: unknown): void {
    this.emit("error", message, scope, data);
  }

  /**
   * Create a scoped logger that automatically includes a scope in all messages.
   * Usage: const buildLog = log.withScope("build");
   *        buildLog.warn("message") -> logs with scope="build"
   */
  withScope(scope: LogScope): ScopedLogger {
    return new ScopedLogger(this, scope);
  }
}

/**
 * A logger bound to a specific scope.
 * All messages automatically include the scope.
 */
export class ScopedLogger {
  constructor(
    private logger: Logger,
    private scope: LogScope
  ) {}

  trace(message: string, data?: unknown): void {
    this.logger.trace(message, this.scope, data);
  }

  debug(message: string, data?: unknown): void {
    this.logger.debug(message, this.scope, data);
  }

  info(message: string, data?: unknown): void {
    this.logger.info(message, this.scope, data);
  }

  warn(message: string, data?: unknown): void {
    this.logger.warn(message, this.scope, data);
  }

  error(message: string, data?: unknown): void {
    this.logger.error(message, this.scope, data);
  }
}

// Export singleton instance
export const log = new Logger();
export default log;
