/**
 * Logger Abstraction
 *
 * Console-backed logging used by the pipeline, the CLI script and tests.
 *
 * Supports both string messages (simple logging) and structured data objects
 * (production-friendly JSON logging for better parsing and analysis).
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Log level for structured logging.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured log entry for production logging.
 */
export interface StructuredLogEntry {
  /** Event type identifier (e.g., 'phase_complete', 'cache_hit') */
  readonly event: string;
  /** Optional message for human readability */
  readonly message?: string;
  /** Additional structured data */
  readonly [key: string]: unknown;
}

/**
 * Basic logger interface (string-based).
 */
export interface Logger {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  debug: (message: string) => void;
}

/**
 * Extended logger interface supporting structured logging.
 */
export interface StructuredLogger extends Logger {
  /**
   * Log structured data at the specified level.
   * In production (JSON mode), outputs as JSON.
   * In development, formats as readable string.
   */
  structured: (level: LogLevel, entry: StructuredLogEntry) => void;
}

/**
 * Context carried by every line of a contextual logger.
 * `correlationId` ties together all log lines of one pipeline run.
 */
export interface LoggingContext {
  readonly correlationId: string;
  readonly [key: string]: unknown;
}

/**
 * Logger bound to a LoggingContext.
 */
export interface ContextualLogger extends StructuredLogger {
  readonly context: LoggingContext;
  /** Creates a logger with the same prefix and the merged context. */
  child: (extra: Record<string, unknown>) => ContextualLogger;
}

// ============================================================================
// Configuration
// ============================================================================

/**
 * Whether to output logs as JSON (for production log aggregators).
 * Controlled by LOG_FORMAT environment variable.
 */
const isJsonLogging = (): boolean => process.env.LOG_FORMAT === 'json';

/**
 * Debug lines are noisy during pipeline runs; opt in with LOG_LEVEL=debug.
 */
const isDebugEnabled = (): boolean => process.env.LOG_LEVEL === 'debug';

// ============================================================================
// String-Based Logger
// ============================================================================

/**
 * Default logger implementation backed by the console.
 */
export const logger: Logger = {
  info: (message: string) => console.log(message),
  warn: (message: string) => console.warn(message),
  error: (message: string) => console.error(message),
  debug: (message: string) => {
    if (isDebugEnabled()) console.log(message);
  },
};

/**
 * Creates a prefixed logger for specific modules.
 *
 * @param prefix - The prefix to add to all log messages
 * @returns A logger with the prefix prepended to all messages
 *
 * @example
 * const log = createPrefixedLogger('[Research]');
 * log.info('Starting research'); // logs: "[Research] Starting research"
 */
export function createPrefixedLogger(prefix: string): Logger {
  return {
    info: (message: string) => logger.info(`${prefix} ${message}`),
    warn: (message: string) => logger.warn(`${prefix} ${message}`),
    error: (message: string) => logger.error(`${prefix} ${message}`),
    debug: (message: string) => logger.debug(`${prefix} ${message}`),
  };
}

// ============================================================================
// Structured Logger
// ============================================================================

/**
 * Formats a structured log entry as a readable string for development.
 */
function formatStructuredEntry(prefix: string, entry: StructuredLogEntry): string {
  const { event, message, ...rest } = entry;
  const dataStr = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : '';
  const msgStr = message ? `: ${message}` : '';
  return `${prefix} [${event}]${msgStr}${dataStr}`;
}

/**
 * Formats a structured log entry as JSON for production.
 */
function formatStructuredJson(prefix: string, level: LogLevel, entry: StructuredLogEntry): string {
  return JSON.stringify({
    timestamp: new Date().toISOString(),
    level,
    module: prefix.replace(/[\[\]]/g, '').trim(),
    ...entry,
  });
}

function logAtLevel(level: LogLevel, message: string): void {
  switch (level) {
    case 'debug':
      logger.debug(message);
      break;
    case 'info':
      logger.info(message);
      break;
    case 'warn':
      logger.warn(message);
      break;
    case 'error':
      logger.error(message);
      break;
  }
}

/**
 * Creates a structured logger for specific modules.
 * Supports both string messages and structured data objects.
 *
 * @param prefix - The prefix/module name to add to all log messages
 * @returns A structured logger with both string and structured logging methods
 *
 * @example
 * const log = createStructuredLogger('[Pipeline]');
 * log.structured('info', {
 *   event: 'phase_complete',
 *   phase: 'planning',
 *   durationMs: 1500,
 * });
 */
export function createStructuredLogger(prefix: string): StructuredLogger {
  return {
    info: (message: string) => logger.info(`${prefix} ${message}`),
    warn: (message: string) => logger.warn(`${prefix} ${message}`),
    error: (message: string) => logger.error(`${prefix} ${message}`),
    debug: (message: string) => logger.debug(`${prefix} ${message}`),

    structured: (level: LogLevel, entry: StructuredLogEntry): void => {
      const formatted = isJsonLogging()
        ? formatStructuredJson(prefix, level, entry)
        : formatStructuredEntry(prefix, entry);
      logAtLevel(level, formatted);
    },
  };
}

// ============================================================================
// Contextual Logger
// ============================================================================

/**
 * Generates a short, sortable correlation ID: `<base36 timestamp>-<base36 random>`.
 */
export function generateCorrelationId(): string {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).slice(2, 10).padEnd(8, '0');
  return `${timestamp}-${random}`;
}

/**
 * Creates a logger that tags every line with the run's correlation ID.
 *
 * @example
 * const log = createContextualLogger('[Pipeline]', { correlationId: 'abc-123' });
 * log.info('Starting'); // "[Pipeline] [abc-123] Starting"
 * const phaseLog = log.child({ phase: 'planning' });
 */
export function createContextualLogger(prefix: string, context: LoggingContext): ContextualLogger {
  const linePrefix = `${prefix} [${context.correlationId}]`;

  return {
    context,
    info: (message: string) => logger.info(`${linePrefix} ${message}`),
    warn: (message: string) => logger.warn(`${linePrefix} ${message}`),
    error: (message: string) => logger.error(`${linePrefix} ${message}`),
    debug: (message: string) => logger.debug(`${linePrefix} ${message}`),

    structured: (level: LogLevel, entry: StructuredLogEntry): void => {
      const enriched: StructuredLogEntry = { ...context, ...entry };
      const formatted = isJsonLogging()
        ? formatStructuredJson(prefix, level, enriched)
        : formatStructuredEntry(linePrefix, entry);
      logAtLevel(level, formatted);
    },

    child: (extra: Record<string, unknown>) =>
      createContextualLogger(prefix, { ...context, ...extra, correlationId: context.correlationId }),
  };
}
