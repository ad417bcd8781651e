/**
 * Logging system for Curricula
 * Based on tslog with structured output
 */

import { Logger, type ILogObj } from "tslog";
import fs from "node:fs";
import path from "node:path";

/**
 * Log levels
 */
export type LogLevel = "silly" | "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/**
 * Logger configuration
 */
export interface LoggerConfig {
  name: string;
  level: LogLevel;
  prettyPrint: boolean;
  logToFile: boolean;
  logDir?: string;
}

const DEFAULT_CONFIG: LoggerConfig = {
  name: "curricula",
  level: "info",
  prettyPrint: true,
  logToFile: false,
};

const LEVELS: Record<LogLevel, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVELS, value);
}

/**
 * Narrow an arbitrary string (e.g. an env var) to a log level
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined;
  const lower = value.toLowerCase();
  return isLogLevel(lower) ? lower : undefined;
}

/**
 * Create a logger instance
 */
export function createLogger(config: Partial<LoggerConfig> = {}): Logger<ILogObj> {
  const finalConfig = { ...DEFAULT_CONFIG, ...config };

  const logger = new Logger<ILogObj>({
    name: finalConfig.name,
    type: finalConfig.prettyPrint ? "pretty" : "json",
    minLevel: LEVELS[finalConfig.level],
    prettyLogTemplate: "{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} [{{name}}] ",
    prettyLogTimeZone: "local",
    stylePrettyLogs: finalConfig.prettyPrint,
  });

  if (finalConfig.logToFile && finalConfig.logDir) {
    setupFileLogging(logger, finalConfig.logDir, finalConfig.name);
  }

  return logger;
}

/**
 * Append every log object to <logDir>/<name>.log as JSON lines
 */
function setupFileLogging(logger: Logger<ILogObj>, logDir: string, name: string): void {
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }

  const logFile = path.join(logDir, `${name}.log`);

  logger.attachTransport((logObj) => {
    fs.appendFileSync(logFile, JSON.stringify(logObj) + "\n");
  });
}

/**
 * Create a child logger with a specific name
 */
export function createChildLogger(parent: Logger<ILogObj>, name: string): Logger<ILogObj> {
  return parent.getSubLogger({ name });
}

let globalLogger: Logger<ILogObj> | null = null;

/**
 * Get the global logger instance
 */
export function getLogger(): Logger<ILogObj> {
  if (!globalLogger) {
    globalLogger = createLogger({
      level: parseLogLevel(process.env["CURRICULA_LOG_LEVEL"]) ?? DEFAULT_CONFIG.level,
    });
  }
  return globalLogger;
}

/**
 * Set the global logger instance
 */
export function setLogger(logger: Logger<ILogObj>): void {
  globalLogger = logger;
}
