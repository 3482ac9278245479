import { pino } from 'pino';
import type { Logger, LoggerOptions } from 'pino';
import type { AppConfig } from './config.js';
import { cfg } from './config.js';

/**
 * Logger configuration and setup for Planboard
 *
 * Pretty-printed output in development, structured JSON elsewhere, and only
 * warnings and errors while tests run. Everything goes to stderr so the
 * server's stdout stays free for whoever is piping it.
 */

/**
 * Logger factory for creating configured logger instances
 */
export class LoggerFactory {
  private readonly appConfig: AppConfig;
  private readonly mainLogger: Logger;

  constructor(appConfig: AppConfig) {
    this.appConfig = appConfig;
    const options = this.createLoggerOptions();
    // A transport owns its destination; plain JSON goes straight to stderr
    this.mainLogger = options.transport ? pino(options) : pino(options, process.stderr);
  }

  private createLoggerOptions(): LoggerOptions {
    const isDevelopment = this.appConfig.NODE_ENV === 'development';
    const isTest = this.appConfig.NODE_ENV === 'test';

    const baseOptions: LoggerOptions = {
      level: isTest ? 'warn' : this.appConfig.LOG_LEVEL,
      base: {
        pid: process.pid,
        hostname: process.env.HOSTNAME || 'unknown',
      },
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label: string) => ({ level: label }),
      },
    };

    if (isDevelopment) {
      return {
        ...baseOptions,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'yyyy-mm-dd HH:MM:ss',
            ignore: 'pid,hostname',
            destination: 2, // stderr
          },
        },
      };
    }

    return baseOptions;
  }

  getLogger(): Logger {
    return this.mainLogger;
  }

  /**
   * Create a module-specific logger
   *
   * @param moduleName - Name of the module/component
   */
  createModuleLogger(moduleName: string): Logger {
    return this.mainLogger.child({ module: moduleName });
  }
}

const defaultFactory = new LoggerFactory(cfg);

export function createLoggerFactory(appConfig: AppConfig): LoggerFactory {
  return new LoggerFactory(appConfig);
}

/**
 * Main application logger instance
 */
export const logger = defaultFactory.getLogger();

export function createModuleLogger(moduleName: string): Logger {
  return defaultFactory.createModuleLogger(moduleName);
}

/**
 * Performance timing utility
 *
 * @returns Function to call when the operation completes
 */
export function startTimer(
  logger: Logger,
  operation: string
): (result?: Record<string, unknown>) => void {
  const start = process.hrtime.bigint();

  return (result: Record<string, unknown> = {}) => {
    const duration = Number(process.hrtime.bigint() - start) / 1_000_000;

    logger.debug(
      {
        operation,
        duration: `${duration.toFixed(2)}ms`,
        ...result,
      },
      `${operation} completed in ${duration.toFixed(2)}ms`
    );
  };
}

/**
 * Error logging utility with stack trace handling
 */
export function logError(
  logger: Logger,
  error: unknown,
  context: Record<string, unknown> = {}
): void {
  if (typeof error === 'string') {
    logger.error(context, error);
    return;
  }

  if (!(error instanceof Error)) {
    logger.error({ ...context, error }, String(error));
    return;
  }

  const errorInfo: Record<string, unknown> = {
    name: error.name,
    message: error.message,
    stack: error.stack,
  };

  if (error.cause !== undefined) {
    errorInfo.cause = error.cause;
  }

  logger.error(
    {
      ...context,
      error: errorInfo,
    },
    error.message
  );
}

/**
 * Graceful shutdown logger
 *
 * @param cleanup - Optional cleanup function to execute before returning
 */
export async function logShutdown(
  logger: Logger,
  signal: string,
  cleanup?: () => Promise<void> | void
): Promise<void> {
  logger.info({ signal }, `Received ${signal}, starting graceful shutdown`);

  if (cleanup) {
    try {
      await cleanup();
      logger.info('Cleanup completed successfully');
    } catch (error) {
      logError(logger, error, { phase: 'cleanup' });
    }
  }

  logger.info('Shutdown complete');

  // Give pino time to flush logs before exit
  await new Promise((resolve) => setTimeout(resolve, 100));
}

export default logger;
