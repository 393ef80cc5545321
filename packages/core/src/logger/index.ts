/**
 * Logger Module
 *
 * Structured logging with Winston, supporting:
 * - Operator-facing terminal lines ([INFO], [OK], [WARN], [ERROR])
 * - Optional rotating JSON log files (CLAWHARBOR_LOG_DIR)
 * - Service-specific loggers with timed operations
 * - Sensitive data redaction
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import fs from 'fs';

/**
 * Custom levels. `ok` ranks above info: LOG_LEVEL=ok hides progress lines but
 * keeps step results.
 */
export const HARNESS_LEVELS = {
  error: 0,
  warn: 1,
  ok: 2,
  info: 3,
  debug: 4,
} as const;

export type HarnessLogLevel = keyof typeof HARNESS_LEVELS;

export function isHarnessLogLevel(value: string): value is HarnessLogLevel {
  return Object.prototype.hasOwnProperty.call(HARNESS_LEVELS, value);
}

export function parseLogLevel(value: string | undefined): HarnessLogLevel {
  const normalized = value?.trim().toLowerCase();
  return normalized && isHarnessLogLevel(normalized) ? normalized : 'info';
}

// Log rotation for CLAWHARBOR_LOG_DIR files
export const LOG_ROTATION_CONFIG = {
  maxSize: '10m',
  maxDays: '14d',
  compress: true,
} as const;

// Terminal colors
const RESET = '\x1b[0m';
const RED = '\x1b[0;31m';
const GREEN = '\x1b[0;32m';
const YELLOW = '\x1b[1;33m';
const CYAN = '\x1b[0;36m';
const DIM = '\x1b[2m';

const LEVEL_TAGS: Record<HarnessLogLevel, { label: string; color: string }> = {
  error: { label: '[ERROR]', color: RED },
  warn: { label: '[WARN]', color: YELLOW },
  ok: { label: '[OK]', color: GREEN },
  info: { label: '[INFO]', color: CYAN },
  debug: { label: '[DEBUG]', color: DIM },
};

const TAG_WIDTH = 7;

/** Indentation that lines continuation text up with the message column */
export const MESSAGE_INDENT = ' '.repeat(TAG_WIDTH + 1);

// Keys that carry formatting data rather than user metadata
const RESERVED_KEYS = new Set(['level', 'message', 'timestamp', 'service', 'operation', 'duration']);

// Patterns for sensitive data redaction
const SENSITIVE_PATTERNS = [
  /token=([^&\s'"]+)/gi,
  /api_key=([^\s'"]+)/gi,
  /password['":\s]+['"]?([^'"}\s,]+)/gi,
  /secret['":\s]+['"]?([^'"}\s,]+)/gi,
  /authorization['":\s]+['"]?([^'"}\s,]+)/gi,
  /bearer\s+([^\s'"]+)/gi,
];

const SENSITIVE_KEY_PARTS = ['token', 'secret', 'password', 'apikey', 'api_key', 'authorization'];

/**
 * Redact sensitive information from log data
 */
export function redactSensitive(data: unknown): unknown {
  if (typeof data === 'string') {
    let result = data;
    for (const pattern of SENSITIVE_PATTERNS) {
      result = result.replace(pattern, (match: string, group: string) =>
        match.replace(group, '[REDACTED]')
      );
    }
    return result;
  }
  if (Array.isArray(data)) {
    return data.map(redactSensitive);
  }
  if (data && typeof data === 'object') {
    const redacted: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      const lowerKey = key.toLowerCase();
      if (SENSITIVE_KEY_PARTS.some((part) => lowerKey.includes(part))) {
        redacted[key] = '[REDACTED]';
      } else {
        redacted[key] = redactSensitive(value);
      }
    }
    return redacted;
  }
  return data;
}

function userMeta(info: Record<string, unknown>): Record<string, unknown> {
  const meta: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(info)) {
    if (!RESERVED_KEYS.has(key) && value !== undefined) {
      meta[key] = value;
    }
  }
  return meta;
}

export interface TerminalFormatOptions {
  color: boolean;
  /** Append redacted metadata (debug runs) */
  showMeta: boolean;
}

/**
 * Render one terminal line, e.g. `[OK]    Image pulled.`
 */
export function formatTerminalLine(
  level: string,
  message: string,
  meta: Record<string, unknown>,
  options: TerminalFormatOptions
): string {
  const tag = isHarnessLogLevel(level) ? LEVEL_TAGS[level] : { label: `[${level}]`, color: '' };
  const label = tag.label.padEnd(TAG_WIDTH);
  let output =
    options.color && tag.color ? `${tag.color}${label}${RESET} ${message}` : `${label} ${message}`;

  if (options.showMeta) {
    const { stack, ...rest } = meta;
    if (Object.keys(rest).length > 0) {
      output += `\n${MESSAGE_INDENT}→ ${JSON.stringify(redactSensitive(rest))}`;
    }
    if (typeof stack === 'string') {
      output += `\n${stack}`;
    }
  }

  return output;
}

/**
 * Format log entry as structured JSON (file transport)
 */
const jsonFormat = winston.format.printf((info) => {
  const { level, message, timestamp, service, operation, duration, ...meta } = info;

  const logEntry: Record<string, unknown> = {
    timestamp,
    level: String(level).toUpperCase(),
    message: redactSensitive(message),
  };

  if (service) logEntry.service = service;
  if (operation) logEntry.operation = operation;
  if (duration !== undefined) logEntry.durationMs = duration;

  if (Object.keys(meta).length > 0) {
    logEntry.meta = redactSensitive(meta);
  }

  return JSON.stringify(logEntry);
});

export interface HarnessLoggerOptions {
  level?: HarnessLogLevel;
  /** Directory for rotating JSON logs; terminal only when unset */
  logDir?: string;
  color?: boolean;
}

/**
 * Logger options from LOG_LEVEL, CLAWHARBOR_LOG_DIR and NO_COLOR
 */
export function resolveLoggerOptions(env: NodeJS.ProcessEnv = process.env): HarnessLoggerOptions {
  return {
    level: parseLogLevel(env.LOG_LEVEL),
    logDir: env.CLAWHARBOR_LOG_DIR || undefined,
    color: !env.NO_COLOR && Boolean(process.stdout.isTTY),
  };
}

function buildTransports(options: HarnessLoggerOptions): winston.transport[] {
  const level = options.level ?? 'info';
  const terminal = new winston.transports.Console({
    stderrLevels: ['error'],
    format: winston.format.printf((info) =>
      formatTerminalLine(String(info.level), String(info.message), userMeta(info), {
        color: options.color ?? false,
        showMeta: level === 'debug',
      })
    ),
  });

  const transports: winston.transport[] = [terminal];

  if (options.logDir) {
    const logsDir = path.resolve(options.logDir);
    if (!fs.existsSync(logsDir)) {
      fs.mkdirSync(logsDir, { recursive: true });
    }
    transports.push(
      new DailyRotateFile({
        filename: path.join(logsDir, 'clawharbor-%DATE%.log'),
        datePattern: 'YYYY-MM-DD',
        level: 'debug',
        maxSize: LOG_ROTATION_CONFIG.maxSize,
        maxFiles: LOG_ROTATION_CONFIG.maxDays,
        zippedArchive: LOG_ROTATION_CONFIG.compress,
        format: jsonFormat,
      })
    );
  }

  return transports;
}

export function createHarnessLogger(options: HarnessLoggerOptions = {}): winston.Logger {
  return winston.createLogger({
    levels: HARNESS_LEVELS,
    level: options.level ?? 'info',
    format: winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.errors({ stack: true })
    ),
    transports: buildTransports(options),
  });
}

export const logger = createHarnessLogger(resolveLoggerOptions());

/**
 * Flush and close every transport (file streams keep the process alive)
 */
export function closeLogger(target: winston.Logger = logger): Promise<void> {
  return new Promise((resolve) => {
    target.on('finish', () => resolve());
    target.end();
  });
}

export interface OperationHandle {
  success: (message?: string, resultMeta?: Record<string, unknown>) => void;
  failure: (error: Error | string, resultMeta?: Record<string, unknown>) => void;
}

/**
 * Service logger interface - returned by createServiceLogger
 */
export interface ServiceLogger {
  debug: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  ok: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
  startOperation: (operation: string, meta?: Record<string, unknown>) => OperationHandle;
}

/**
 * Create a child logger with a service name attached to every entry
 */
export function createServiceLogger(
  serviceName: string,
  target: winston.Logger = logger
): ServiceLogger {
  const write = (level: HarnessLogLevel, message: string, meta?: Record<string, unknown>) => {
    target.log(level, message, { service: serviceName, ...meta });
  };

  return {
    debug: (message, meta) => write('debug', message, meta),
    info: (message, meta) => write('info', message, meta),
    ok: (message, meta) => write('ok', message, meta),
    warn: (message, meta) => write('warn', message, meta),
    error: (message, meta) => write('error', message, meta),
    /**
     * Log the start of an operation and return handles to log completion.
     * Success prints an [OK] line; failure is only recorded at debug level
     * because the caller reports the error itself.
     */
    startOperation: (operation, meta) => {
      const startTime = Date.now();
      write('debug', `Starting ${operation}`, { operation, ...meta });

      return {
        success: (message, resultMeta) => {
          write('ok', message || `Completed ${operation}`, {
            operation,
            duration: Date.now() - startTime,
            ...resultMeta,
          });
        },
        failure: (error, resultMeta) => {
          const errorMessage = error instanceof Error ? error.message : error;
          write('debug', `Failed ${operation}: ${errorMessage}`, {
            operation,
            duration: Date.now() - startTime,
            status: 'failure',
            stack: error instanceof Error ? error.stack : undefined,
            ...resultMeta,
          });
        },
      };
    },
  };
}

export default logger;
