/**
 * Structured Logger Utility
 *
 * JSON-lines logging with secret redaction. Scan relays run unattended on
 * field devices, so every line must be machine-parseable and must never leak
 * hub credentials or API keys.
 *
 * @module utils/logger
 * @security LM-001: Structured logging with secret redaction
 */

import { APP_NAME, APP_VERSION } from './app-info';

// ============================================================================
// Types
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  /** Unique request/operation ID for tracing */
  traceId?: string;
  /** Service or module name */
  service?: string;
  /** Additional structured data */
  [key: string]: unknown;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  service: string;
  version: string;
  context?: unknown;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

// ============================================================================
// Secret Redaction Patterns
// ============================================================================

/**
 * Patterns for secret detection and redaction inside free-form strings
 */
const SECRET_PATTERNS: Array<{ pattern: RegExp; replacement: string }> = [
  { pattern: /Bearer\s+[a-zA-Z0-9\-_.]+/gi, replacement: 'Bearer [REDACTED]' },
  { pattern: /api[_-]?key["\s:=]+[a-zA-Z0-9\-_.]+/gi, replacement: 'apiKey: "[REDACTED]"' },
  { pattern: /password["\s:=]+[^\s",}]+/gi, replacement: 'password: "[REDACTED]"' },
  { pattern: /token["\s:=]+[a-zA-Z0-9\-_.]+/gi, replacement: 'token: "[REDACTED]"' },
  { pattern: /Authorization["\s:=]+[^\s",}]+/gi, replacement: 'Authorization: "[REDACTED]"' },
  // Hub connection strings and SAS tokens
  { pattern: /SharedAccessKey=[^;\s"]+/gi, replacement: 'SharedAccessKey=[REDACTED]' },
  { pattern: /SharedAccessSignature\s+[^\s"]+/gi, replacement: 'SharedAccessSignature [REDACTED]' },
];

/**
 * Keys to redact from context objects (compared lowercase)
 */
const SENSITIVE_KEYS = new Set([
  'password',
  'apikey',
  'api_key',
  'secret',
  'token',
  'authorization',
  'auth',
  'credential',
  'credentials',
  'connectionstring',
  'sharedaccesskey',
  'provisioningapikey',
]);

// ============================================================================
// Logger Class
// ============================================================================

class Logger {
  private readonly serviceName: string;
  private readonly version: string;
  private minLevel: LogLevel;
  private droppedWrites = 0;

  private readonly levelPriority: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
  };

  constructor(serviceName: string = APP_NAME) {
    this.serviceName = serviceName;
    this.version = APP_VERSION;
    this.minLevel = parseLogLevel(process.env.SCAN_RELAY_LOG_LEVEL) ?? 'info';
  }

  /**
   * Set minimum log level
   */
  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getLevel(): LogLevel {
    return this.minLevel;
  }

  /**
   * Number of log lines the output stream refused (closed pipe, etc.)
   */
  getDroppedWriteCount(): number {
    return this.droppedWrites;
  }

  /**
   * Redact secrets from a string
   */
  redactString(str: string): string {
    let result = str;
    for (const { pattern, replacement } of SECRET_PATTERNS) {
      result = result.replace(pattern, replacement);
    }
    return result;
  }

  /**
   * Redact secrets from an object (deep clone)
   */
  redactObject(obj: unknown, depth: number = 0): unknown {
    if (depth > 10) return '[MAX_DEPTH_EXCEEDED]';

    if (obj === null || obj === undefined) {
      return obj;
    }

    if (typeof obj === 'string') {
      return this.redactString(obj);
    }

    if (typeof obj === 'number' || typeof obj === 'boolean') {
      return obj;
    }

    if (obj instanceof Date) {
      return obj.toISOString();
    }

    if (obj instanceof Error) {
      return {
        name: obj.name,
        message: this.redactString(obj.message),
        stack: obj.stack ? this.redactString(obj.stack) : undefined,
      };
    }

    if (Array.isArray(obj)) {
      return obj.map((item) => this.redactObject(item, depth + 1));
    }

    if (typeof obj === 'object') {
      const result: Record<string, unknown> = {};
      for (const [key, value] of Object.entries(obj)) {
        if (SENSITIVE_KEYS.has(key.toLowerCase())) {
          result[key] = '[REDACTED]';
        } else {
          result[key] = this.redactObject(value, depth + 1);
        }
      }
      return result;
    }

    return '[UNKNOWN_TYPE]';
  }

  /**
   * Format and output a log entry
   */
  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (this.levelPriority[level] < this.levelPriority[this.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: this.redactString(message),
      service: context?.service || this.serviceName,
      version: this.version,
    };

    if (context) {
      const { service: _service, ...rest } = context;
      if (Object.keys(rest).length > 0) {
        entry.context = this.redactObject(rest);
      }
    }

    const output = JSON.stringify(entry) + '\n';

    // Write directly to the streams: console methods throw synchronously on broken pipes
    const stream = level === 'error' || level === 'warn' ? process.stderr : process.stdout;
    if (!stream.writable) {
      this.droppedWrites++;
      return;
    }
    stream.write(output, (err) => {
      if (err) this.droppedWrites++;
    });
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  /**
   * Create a child logger with additional context
   */
  child(defaultContext: LogContext): ChildLogger {
    return new ChildLogger(this, defaultContext);
  }
}

/**
 * Child logger with preset context
 */
export class ChildLogger {
  private parent: Logger;
  private defaultContext: LogContext;

  constructor(parent: Logger, defaultContext: LogContext) {
    this.parent = parent;
    this.defaultContext = defaultContext;
  }

  debug(message: string, context?: LogContext): void {
    this.parent.debug(message, { ...this.defaultContext, ...context });
  }

  info(message: string, context?: LogContext): void {
    this.parent.info(message, { ...this.defaultContext, ...context });
  }

  warn(message: string, context?: LogContext): void {
    this.parent.warn(message, { ...this.defaultContext, ...context });
  }

  error(message: string, context?: LogContext): void {
    this.parent.error(message, { ...this.defaultContext, ...context });
  }
}

/**
 * Narrow an untrusted string (env var, config value) to a LogLevel
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined;
  const lowered = value.toLowerCase();
  return LOG_LEVELS.find((level) => level === lowered);
}

// ============================================================================
// Singleton Export
// ============================================================================

/**
 * Process-wide logger. The only module-level instance in the relay.
 */
export const logger = new Logger();

/**
 * Create a child logger for a specific service
 */
export function createLogger(service: string): ChildLogger {
  return logger.child({ service });
}

export default logger;
