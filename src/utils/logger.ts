/**
 * Colored terminal logger with JSON Lines file output
 */
import fs from 'node:fs';
import path from 'node:path';

enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

/**
 * Log event types, used to filter the JSON log file
 *
 * @example
 * ```bash
 * # Every tick failure
 * jq 'select(.meta.eventType == "TickError")' /tmp/agent-core/agent-core-*.json
 *
 * # Heartbeats per day
 * jq 'select(.meta.eventType == "Heartbeat") | .time[:10]' /tmp/agent-core/agent-core-*.json | uniq -c
 * ```
 */
export enum LogEventType {
  /** Supervisor loop entered */
  STARTED = 'Started',

  /** Successful tick */
  HEARTBEAT = 'Heartbeat',

  /** Supervisor cancelled */
  STOPPING = 'Stopping',

  /** Tick body failed */
  TICK_ERROR = 'TickError',

  /** A sink rejected an event */
  SINK_ERROR = 'SinkError',

  /** Sink lifecycle (start/stop) */
  SINK_LIFECYCLE = 'SinkLifecycle',

  /** Startup configuration rejected */
  CONFIG_ERROR = 'ConfigError',
}

/**
 * Structured log metadata with required eventType field
 *
 * Plain objects are fine for informational logs
 */
export interface StructuredLogMetadata {
  eventType: LogEventType;
  [key: string]: unknown;
}

/**
 * Serialize error object for logging
 * Converts Error objects to plain objects, stringifies non-objects
 */
export function serializeError(error: unknown): unknown {
  if (error instanceof Error) {
    const serialized: Record<string, unknown> = {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
    if (error.cause) {
      serialized.cause = serializeError(error.cause);
    }
    return serialized;
  }
  if (typeof error === 'object' && error !== null) {
    return error;
  }
  return String(error);
}

/**
 * Parse a level name such as "info" or "WARN"
 */
export function parseLogLevel(name: string): LogLevel | undefined {
  switch (name.trim().toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    default:
      return undefined;
  }
}

// ANSI color codes
const colors = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
};

export const DEFAULT_LOG_DIR = '/tmp/agent-core';

/**
 * Settings shared by a root logger and all of its children
 */
interface LoggerSettings {
  minLevel: LogLevel;
  /** null disables file output */
  logDir: string | null;
  dirReady: boolean;
}

export interface LoggerOptions {
  level?: LogLevel;
  dir?: string | null;
}

function settingsFromEnv(env: NodeJS.ProcessEnv): LoggerSettings {
  const rawDir = env.AGENT_CORE_LOG_DIR;
  const rawLevel = env.AGENT_CORE_LOG_LEVEL;
  return {
    minLevel: parseLogLevel(rawLevel ?? '') ?? LogLevel.DEBUG,
    logDir: rawDir === undefined ? DEFAULT_LOG_DIR : rawDir || null,
    dirReady: false,
  };
}

class Logger {
  private name: string;
  private settings: LoggerSettings;

  constructor(name: string = 'AgentCore', settings?: LoggerSettings) {
    this.name = name;
    this.settings = settings ?? settingsFromEnv(process.env);
  }

  private formatLocalDate(date: Date): string {
    const year = date.getFullYear();
    const month = String(date.getMonth() + 1).padStart(2, '0');
    const day = String(date.getDate()).padStart(2, '0');
    return `${year}-${month}-${day}`;
  }

  private getTimestamp(): string {
    const now = new Date();
    const hours = String(now.getHours()).padStart(2, '0');
    const minutes = String(now.getMinutes()).padStart(2, '0');
    const seconds = String(now.getSeconds()).padStart(2, '0');
    const ms = String(now.getMilliseconds()).padStart(3, '0');
    return `${hours}:${minutes}:${seconds}.${ms}`;
  }

  /**
   * Format log message
   */
  private format(
    level: string,
    levelColor: string,
    message: string,
    meta?: unknown
  ): string {
    const timestamp = colors.gray + this.getTimestamp() + colors.reset;
    const nameStr = `${colors.cyan}[${this.name}]${colors.reset}`;
    const levelStr = `${levelColor}[${level}]${colors.reset}`;

    let output = `${timestamp} ${nameStr} ${levelStr} ${message}`;

    if (meta !== undefined) {
      output += `${colors.gray}\n${JSON.stringify(meta, null, 2)}${colors.reset}`;
    }

    return output;
  }

  /**
   * Path of today's log file, or undefined when file output is off
   */
  get logFile(): string | undefined {
    const { logDir } = this.settings;
    if (!logDir) return undefined;
    return path.join(
      logDir,
      `agent-core-${this.formatLocalDate(new Date())}.json`
    );
  }

  /**
   * Write log entry to file in JSON Lines format
   */
  private writeToFile(level: string, message: string, meta?: unknown): void {
    const logFile = this.logFile;
    if (!logFile) return;
    try {
      if (!this.settings.dirReady) {
        fs.mkdirSync(path.dirname(logFile), { recursive: true });
        this.settings.dirReady = true;
      }
      const logEntry = {
        time: new Date().toISOString(),
        level: level.toLowerCase(),
        subsystem: this.name,
        message,
        ...(meta !== undefined && { meta }),
      };
      fs.appendFileSync(logFile, `${JSON.stringify(logEntry)}\n`, {
        encoding: 'utf8',
      });
    } catch (error) {
      // Report once, then keep logging to the console only
      this.settings.logDir = null;
      console.error(
        `[${this.name}] File logging disabled: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }
  }

  private log(
    level: LogLevel,
    label: string,
    color: string,
    write: (line: string) => void,
    message: string,
    meta?: Record<string, unknown>
  ): void {
    if (this.settings.minLevel > level) return;
    this.writeToFile(label, message, meta);
    write(this.format(label, color, message, meta));
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, 'DEBUG', colors.gray, console.log, message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, 'INFO', colors.blue, console.log, message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, 'WARN', colors.yellow, console.warn, message, meta);
  }

  /**
   * @param meta - Use StructuredLogMetadata so the entry carries an eventType
   */
  error(message: string, meta?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, 'ERROR', colors.red, console.error, message, meta);
  }

  /**
   * Info level, printed in green
   */
  success(message: string, meta?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, 'SUCCESS', colors.green, console.log, message, meta);
  }

  /**
   * Create a child logger sharing this logger's settings
   */
  child(name: string): Logger {
    return new Logger(`${this.name}:${name}`, this.settings);
  }

  /**
   * Change level and/or log directory for this logger and every child
   */
  configure(options: LoggerOptions): void {
    if (options.level !== undefined) {
      this.settings.minLevel = options.level;
    }
    if (options.dir !== undefined) {
      this.settings.logDir = options.dir || null;
      this.settings.dirReady = false;
    }
  }
}

// Default logger instance
export const logger = new Logger('AgentCore');

export { Logger, LogLevel };

export function getLogger(name: string): Logger {
  return logger.child(name);
}
