/**
 * Collector Logger
 * Configures electron-log once and hands out scoped loggers per component
 */

import log from 'electron-log';

type LogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug' | 'silly';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'verbose', 'debug', 'silly'];

export type ScopedLogger = ReturnType<typeof log.scope>;

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function resolveConsoleLevel(): LogLevel {
  const requested = process.env.COLLECTOR_LOG_LEVEL?.toLowerCase();
  return requested && isLogLevel(requested) ? requested : 'info';
}

let configured = false;

function configure(): void {
  if (configured) return;
  configured = true;

  log.transports.file.fileName = 'collector.log';
  log.transports.file.maxSize = 10 * 1024 * 1024; // 10MB
  log.transports.file.format = '[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}] {scope} {text}';

  // Jest runs with NODE_ENV=test; keep test output clean and the disk untouched
  if (process.env.NODE_ENV === 'test') {
    log.transports.file.level = false;
    log.transports.console.level = false;
    return;
  }

  log.transports.file.level = 'debug';
  log.transports.console.level = resolveConsoleLevel();
}

/**
 * Get a logger that prefixes every line with the component name
 */
export function createLogger(scope: string): ScopedLogger {
  configure();
  return log.scope(scope);
}

export function getLogFilePath(): string {
  configure();
  return log.transports.file.getFile().path;
}

// ─────────────────────────────────────────────────────────────────────────────
// Connection logging
// ─────────────────────────────────────────────────────────────────────────────

function describeError(error: unknown): { error: string; stack?: string } {
  if (error instanceof Error) {
    return { error: error.message, stack: error.stack };
  }
  return { error: String(error) };
}

/**
 * Connection-phase logging shared by the transports and the discovery loop
 */
export class CollectorLogger {
  private readonly logger: ScopedLogger;

  constructor(scope: string) {
    this.logger = createLogger(scope);
  }

  info(message: string, ...details: unknown[]): void {
    this.logger.info(message, ...details);
  }

  warn(message: string, ...details: unknown[]): void {
    this.logger.warn(message, ...details);
  }

  error(message: string, ...details: unknown[]): void {
    this.logger.error(message, ...details);
  }

  debug(message: string, ...details: unknown[]): void {
    this.logger.debug(message, ...details);
  }

  logConnection(deviceName: string, address: string, phase: string, details?: Record<string, unknown>): void {
    if (details) {
      this.logger.info(`${phase} - ${deviceName} (${address})`, details);
    } else {
      this.logger.info(`${phase} - ${deviceName} (${address})`);
    }
  }

  logConnectionError(deviceName: string, address: string, phase: string, error: unknown): void {
    this.logger.error(`${phase} FAILED - ${deviceName} (${address})`, describeError(error));
  }
}
